import { type VChild, type VElement, classNames, tags } from "@mobile-f7/markup";

import { colorClass } from "./colors.js";
import { invalidArgument } from "./errors.js";

// =============================================================================
// Icons and links
// =============================================================================

export interface F7IconOptions {
  /** Restrict the icon to one theme: ios uses Framework7 Icons, md uses Material Icons */
  readonly lib?: "ios" | "md" | null;
  readonly color?: string | null;
  /** Legacy Framework7 Icons markup: `i.f7-icons` without the `icon` base class */
  readonly old?: boolean;
}

export const f7Icon = (name: string, options: F7IconOptions = {}): VElement => {
  const lib = options.lib ?? null;
  const color = colorClass("f7Icon", options.color);
  if (options.old === true) {
    if (lib !== null) {
      throw invalidArgument("f7Icon", "old", "Legacy icons have no lib variant");
    }
    return tags.i({ class: classNames("f7-icons", color) }, name);
  }
  return tags.i(
    {
      class: classNames(
        "icon",
        lib === "md" ? "material-icons" : "f7-icons",
        lib === "ios" && "ios-only",
        lib === "md" && "md-only",
        color,
      ),
    },
    name,
  );
};

export interface F7LinkOptions {
  readonly label?: string | null;
  readonly src?: string | null;
  /** Open outside the toolkit router, in a new tab */
  readonly external?: boolean;
  readonly icon?: VElement | null;
}

export const f7Link = (options: F7LinkOptions): VElement => {
  const label = options.label ?? null;
  const icon = options.icon ?? null;
  const external = options.external ?? false;
  if (label === null && icon === null) {
    throw invalidArgument("f7Link", "label", "A link needs a label, an icon, or both");
  }
  return tags.a(
    {
      href: options.src ?? "#",
      class: classNames("link", external && "external", label === null && "icon-only"),
      target: external ? "_blank" : undefined,
    },
    icon,
    icon !== null && label !== null ? tags.span(label) : label,
  );
};

const panelOpener = (side: "left" | "right") =>
  tags.a(
    { href: "#", class: "link icon-only panel-open", "data-panel": side },
    f7Icon("bars"),
  );

// =============================================================================
// Navbar
// =============================================================================

export interface F7NavbarOptions {
  readonly title?: string | null;
  readonly subtitle?: string | null;
  readonly hairline?: boolean;
  readonly shadow?: boolean;
  /** Large title, collapsing into the regular one on scroll */
  readonly bigger?: boolean;
  readonly transparent?: boolean;
  readonly leftPanel?: boolean;
  readonly rightPanel?: boolean;
  /** Slot for `f7SubNavbar` */
  readonly subNavbar?: VElement | null;
}

/**
 * Top bar of a page. Extra children are placed on the right, next to
 * the right panel opener.
 */
export const f7Navbar = (options: F7NavbarOptions = {}, ...children: VChild[]): VElement => {
  const title = options.title ?? null;
  const bigger = options.bigger ?? false;
  const transparent = options.transparent ?? false;
  if (transparent && !bigger) {
    throw invalidArgument("f7Navbar", "transparent", "A transparent navbar must also be bigger");
  }
  const rightItems: VChild[] = [...children, options.rightPanel === true && panelOpener("right")];
  const hasRight = rightItems.some((item) => item !== false && item !== null && item !== undefined);

  return tags.div(
    {
      class: classNames(
        "navbar",
        options.hairline === false && "no-hairline",
        options.shadow === false && "no-shadow",
        bigger && "navbar-large",
        transparent && "navbar-transparent",
      ),
    },
    tags.div({ class: "navbar-bg" }),
    tags.div(
      { class: "navbar-inner sliding" },
      options.leftPanel === true && tags.div({ class: "left" }, panelOpener("left")),
      tags.div(
        { class: "title" },
        title,
        options.subtitle !== undefined &&
          options.subtitle !== null &&
          tags.span({ class: "subtitle" }, options.subtitle),
      ),
      hasRight && tags.div({ class: "right" }, rightItems),
      bigger && tags.div({ class: "title-large" }, tags.div({ class: "title-large-text" }, title)),
      options.subNavbar,
    ),
  );
};

export const f7SubNavbar = (...children: VChild[]): VElement =>
  tags.div({ class: "subnavbar" }, tags.div({ class: "subnavbar-inner" }, ...children));

// =============================================================================
// Toolbar
// =============================================================================

export interface F7ToolbarOptions {
  readonly position?: "top" | "bottom";
  readonly hairline?: boolean;
  readonly shadow?: boolean;
  /** Links carry icons above their labels */
  readonly icons?: boolean;
  readonly scrollable?: boolean;
}

export const f7Toolbar = (options: F7ToolbarOptions = {}, ...children: VChild[]): VElement => {
  const position = options.position ?? "top";
  if (position !== "top" && position !== "bottom") {
    throw invalidArgument("f7Toolbar", "position", `position must be "top" or "bottom", got "${String(position)}"`);
  }
  return tags.div(
    {
      class: classNames(
        "toolbar",
        `toolbar-${position}`,
        options.icons === true && "tabbar-labels",
        options.hairline === false && "no-hairline",
        options.shadow === false && "no-shadow",
        options.scrollable === true && "tabbar-scrollable",
      ),
    },
    tags.div({ class: "toolbar-inner" }, ...children),
  );
};

// =============================================================================
// Appbar
// =============================================================================

export interface F7AppbarOptions {
  readonly leftPanel?: boolean;
  readonly rightPanel?: boolean;
}

const appbarToggle = (side: "left" | "right") =>
  tags.a(
    {
      href: "#",
      class: "button button-small panel-toggle display-flex",
      "data-panel": side,
    },
    f7Icon("bars"),
  );

/**
 * Bar above the main view, for desktop and tablet layouts.
 */
export const f7Appbar = (options: F7AppbarOptions = {}, ...children: VChild[]): VElement =>
  tags.div(
    { class: "appbar" },
    tags.div(
      { class: "appbar-inner" },
      options.leftPanel === true && tags.div({ class: "left" }, appbarToggle("left")),
      ...children,
      options.rightPanel === true && tags.div({ class: "right" }, appbarToggle("right")),
    ),
  );
