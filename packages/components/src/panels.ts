import { type VChild, type VElement, classNames, hasClass, isVElement, tags } from "@mobile-f7/markup";

import { invalidArgument } from "./errors.js";
import { f7Navbar } from "./navigation.js";

// =============================================================================
// Panel
// =============================================================================

export interface F7PanelOptions {
  readonly id?: string | null;
  readonly title?: string | null;
  readonly side?: "left" | "right";
  readonly theme?: "dark" | "light";
  /** reveal slides the main view aside, cover draws over it */
  readonly effect?: "reveal" | "cover";
  readonly resizable?: boolean;
}

/**
 * Side drawer. The panel wraps its own view and page so it can hold a
 * navbar and scrollable content.
 */
export const f7Panel = (options: F7PanelOptions = {}, ...children: VChild[]): VElement => {
  const side = options.side ?? "left";
  const theme = options.theme ?? "dark";
  const effect = options.effect ?? "reveal";
  if (side !== "left" && side !== "right") {
    throw invalidArgument("f7Panel", "side", `side must be "left" or "right"`);
  }
  if (effect !== "reveal" && effect !== "cover") {
    throw invalidArgument("f7Panel", "effect", `effect must be "reveal" or "cover"`);
  }
  const title = options.title ?? null;

  return tags.div(
    {
      class: classNames(
        "panel",
        `panel-${side}`,
        `panel-${effect}`,
        `theme-${theme}`,
        options.resizable === true && "panel-resizable",
      ),
      id: options.id ?? undefined,
    },
    tags.div(
      { class: "view" },
      tags.div(
        { class: "page" },
        title !== null && f7Navbar({ title }),
        tags.div({ class: "page-content" }, ...children),
      ),
    ),
  );
};

export const isF7Panel = (value: unknown): value is VElement =>
  isVElement(value) && value.type === "div" && hasClass(value, "panel");

// =============================================================================
// Panel menu
// =============================================================================

/**
 * Navigation list inside a panel; its items switch the `f7Item`s of a
 * split layout.
 */
export const f7PanelMenu = (options: { readonly id?: string | null } = {}, ...items: VChild[]): VElement =>
  tags.div(
    { class: "list links-list panel-menu", id: options.id ?? undefined },
    tags.ul({}, ...items),
  );

export interface F7PanelItemOptions {
  readonly title: string;
  /** id of the `f7Item` the entry shows */
  readonly tabName: string;
  readonly icon?: VElement | null;
  readonly active?: boolean;
}

export const f7PanelItem = (options: F7PanelItemOptions): VElement =>
  tags.li(
    tags.a(
      {
        href: "#",
        class: classNames("tab-link", "panel-close", options.active === true && "tab-link-active"),
        "data-tab": `#${options.tabName}`,
      },
      options.icon,
      tags.span({ class: "tabbar-label" }, options.title),
    ),
  );
