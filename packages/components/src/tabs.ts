import {
  type VChild,
  type VElement,
  METADATA_PROP,
  appendClass,
  classNames,
  hasClass,
  isVElement,
  normalizeChildren,
  tagList,
  tags,
} from "@mobile-f7/markup";

import { invalidArgument } from "./errors.js";

// =============================================================================
// Tab
// =============================================================================

interface TabInfo {
  readonly id: string;
  readonly tabName: string;
  readonly icon: VElement | null;
}

/**
 * Tab names double as element ids, which cannot contain whitespace.
 */
export const tabIdOf = (tabName: string): string => tabName.replace(/\s+/g, "");

export interface F7TabOptions {
  /** Label of the tab link; also reported as the selected value */
  readonly tabName: string;
  readonly icon?: VElement | null;
  readonly active?: boolean;
}

export const f7Tab = (options: F7TabOptions, ...children: VChild[]): VElement => {
  const id = tabIdOf(options.tabName);
  if (id.length === 0) {
    throw invalidArgument("f7Tab", "tabName", "tabName must contain at least one non-space character");
  }
  return tags.div(
    {
      class: classNames("page-content", "tab", options.active === true && "tab-active"),
      id,
      "data-value": options.tabName,
      // Link bar icon, read back by f7Tabs
      [METADATA_PROP]: { icon: options.icon ?? null },
    },
    ...children,
  );
};

const iconOf = (tab: VElement): VElement | null => {
  const metadata = tab.props[METADATA_PROP];
  return typeof metadata === "object" &&
    metadata !== null &&
    "icon" in metadata &&
    isVElement(metadata.icon)
    ? metadata.icon
    : null;
};

/**
 * Read the link data back from a tab element. Works on copies made by the
 * class helpers (`f7Padding`, `appendClass`, ...) since it only looks at props.
 */
const tabInfoOf = (element: VElement): TabInfo | null => {
  const id = element.props.id;
  const tabName = element.props["data-value"];
  if (!hasClass(element, "tab") || typeof id !== "string" || typeof tabName !== "string") {
    return null;
  }
  return { id, tabName, icon: iconOf(element) };
};

// =============================================================================
// Tabs
// =============================================================================

export interface F7TabsOptions {
  readonly id?: string | null;
  readonly swipeable?: boolean;
  readonly animated?: boolean;
  /** Link bar look: a bottom toolbar, or a (strong) segmented control */
  readonly style?: "toolbar" | "segmented" | "strong";
}

const isActive = (tab: VElement): boolean => hasClass(tab, "tab-active");

const tabLink = (info: TabInfo, active: boolean, style: "toolbar" | "segmented" | "strong") =>
  style === "toolbar"
    ? tags.a(
        {
          href: `#${info.id}`,
          class: classNames("tab-link", active && "tab-link-active"),
        },
        info.icon,
        tags.span({ class: "tabbar-label" }, info.tabName),
      )
    : tags.a(
        {
          href: `#${info.id}`,
          class: classNames("button", "tab-link", active && "tab-link-active"),
        },
        info.icon,
        info.tabName,
      );

/**
 * Group `f7Tab`s and generate their link bar. When no tab is marked
 * active the first one is.
 *
 * The result is a fragment (link bar, then the tabs container) meant to sit
 * directly inside the page of an `f7TabLayout`.
 */
export const f7Tabs = (options: F7TabsOptions = {}, ...children: VChild[]): VElement => {
  const style = options.style ?? "toolbar";
  const animated = options.animated ?? true;
  const swipeable = options.swipeable ?? false;
  if (animated && swipeable) {
    throw invalidArgument("f7Tabs", "swipeable", "Tabs cannot be both animated and swipeable");
  }

  const tabs = normalizeChildren(children);
  if (tabs.length === 0) {
    throw invalidArgument("f7Tabs", "children", "f7Tabs needs at least one f7Tab");
  }
  const entries = tabs.map((tab) => {
    const info = tabInfoOf(tab);
    if (info === null) {
      throw invalidArgument("f7Tabs", "children", "Every child of f7Tabs must be built with f7Tab");
    }
    return { tab, info };
  });

  const seen = new Set<string>();
  for (const { info } of entries) {
    if (seen.has(info.id)) {
      throw invalidArgument("f7Tabs", "children", `Tab id "${info.id}" is used by more than one tab`);
    }
    seen.add(info.id);
  }

  const activeCount = tabs.filter(isActive).length;
  if (activeCount > 1) {
    throw invalidArgument("f7Tabs", "children", `Only one tab can be active, got ${activeCount}`);
  }
  const activeIndex = Math.max(tabs.findIndex(isActive), 0);

  const links = entries.map(({ info }, index) => tabLink(info, index === activeIndex, style));
  const panes = entries.map(({ tab }, index) =>
    index === activeIndex ? appendClass(tab, "tab-active") : tab,
  );

  const linkBar =
    style === "toolbar"
      ? tags.div(
          { class: "toolbar toolbar-bottom tabbar-labels" },
          tags.div({ class: "toolbar-inner" }, links),
        )
      : tags.div(
          { class: "block" },
          tags.div({ class: classNames("segmented", style === "strong" && "segmented-strong") }, links),
        );

  const tabsContainer = tags.div({ class: "tabs", id: options.id ?? undefined }, panes);
  const wrapped = animated
    ? tags.div({ class: "tabs-animated-wrap" }, tabsContainer)
    : swipeable
      ? tags.div({ class: "tabs-swipeable-wrap" }, tabsContainer)
      : tabsContainer;

  return tagList(linkBar, wrapped);
};
