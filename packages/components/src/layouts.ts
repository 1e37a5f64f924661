import {
  type VChild,
  type VElement,
  appendAttributes,
  isVElement,
  singleton,
  tagList,
  tags,
  updateChild,
} from "@mobile-f7/markup";

import { invalidArgument } from "./errors.js";
import { isF7Panel } from "./panels.js";
import { f7Margin } from "./typography.js";

// Content background shared by single-layout pages and split-layout items.
const CONTENT_STYLE = "background-color: gainsboro;";

const requireNavbar = (component: string, navbar: unknown): VElement => {
  if (!isVElement(navbar)) {
    throw invalidArgument(component, "navbar", `${component} requires a navbar (see f7Navbar)`);
  }
  return navbar;
};

// =============================================================================
// Single layout
// =============================================================================

export interface F7SingleLayoutOptions {
  /** Slot for `f7Navbar` */
  readonly navbar: VElement;
  /** Slot for `f7Toolbar` */
  readonly toolbar?: VElement | null;
  /** Slot for `f7Panel`; wrap several panels in `tagList` */
  readonly panels?: VElement | null;
  /** Slot for `f7Appbar` */
  readonly appbar?: VElement | null;
}

/**
 * One page: navbar, optional toolbar and a scrollable content area.
 *
 * @example
 * ```typescript
 * f7SingleLayout(
 *   {
 *     navbar: f7Navbar({ title: "Single Layout", hairline: false }),
 *     toolbar: f7Toolbar({ position: "bottom" }, f7Link({ label: "Link 1", src: "#" })),
 *   },
 *   f7Card({ title: "Card header" }, "Hello"),
 * )
 * ```
 */
export const f7SingleLayout = (options: F7SingleLayoutOptions, ...content: VChild[]): VElement => {
  const navbar = requireNavbar("f7SingleLayout", options.navbar);
  return tagList(
    options.appbar,
    options.panels,
    tags.div(
      { class: "view view-main" },
      tags.div(
        { class: "page" },
        navbar,
        options.toolbar,
        tags.div({ class: "page-content", style: CONTENT_STYLE }, ...content),
      ),
    ),
  );
};

// =============================================================================
// Tab layout
// =============================================================================

export interface F7TabLayoutOptions {
  readonly navbar: VElement;
  readonly panels?: VElement | null;
  readonly appbar?: VElement | null;
}

/**
 * Page holding `f7Tabs`. The tab link toolbar is generated by `f7Tabs`.
 */
export const f7TabLayout = (options: F7TabLayoutOptions, ...tabs: VChild[]): VElement => {
  const navbar = requireNavbar("f7TabLayout", options.navbar);
  return tagList(
    options.appbar,
    options.panels,
    tags.div(
      { class: "view view-main" },
      // Tabs only swipe, and the dark theme only applies, inside a page.
      tags.div({ class: "page" }, navbar, ...tabs),
    ),
  );
};

// =============================================================================
// Split layout
// =============================================================================

export interface F7SplitLayoutOptions {
  readonly navbar: VElement;
  /** Slot for the `f7Panel` kept open beside the main view on wide screens */
  readonly sidebar: VElement;
  readonly toolbar?: VElement | null;
  /** Extra panels, typically a right one */
  readonly panels?: VElement | null;
  readonly appbar?: VElement | null;
}

export const SIDEBAR_ID = "f7-sidebar";
export const SIDEBAR_VIEW_ID = "f7-sidebar-view";

const SPLIT_LAYOUT_CSS = `/* Left panel right border when it is visible by breakpoint */
.panel-left.panel-visible-by-breakpoint:before {
  position: absolute;
  right: 0;
  top: 0;
  height: 100%;
  width: 1px;
  background: rgba(0,0,0,0.1);
  content: "";
  z-index: 6000;
}

/* Hide navbar link which opens left panel when it is visible by breakpoint */
.panel-left.panel-visible-by-breakpoint ~ .view .navbar .panel-open[data-panel="left"] {
  display: none;
}

/* Extra borders for main view and left panel for iOS theme when it behaves as panel (before breakpoint size) */
.ios .panel-left:not(.panel-visible-by-breakpoint).panel-active ~ .view-main:before,
.ios .panel-left:not(.panel-visible-by-breakpoint).panel-closing ~ .view-main:before {
  position: absolute;
  left: 0;
  top: 0;
  height: 100%;
  width: 1px;
  background: rgba(0,0,0,0.1);
  content: "";
  z-index: 6000;
}`;

export const splitLayoutScript = (sidebarId: string): string => `document.addEventListener('DOMContentLoaded', function () {
  document.getElementById(${JSON.stringify(sidebarId)}).classList.add('panel-visible-by-breakpoint');
  document.querySelectorAll('.view:not(#${SIDEBAR_VIEW_ID})').forEach(function (view) {
    view.classList.add('safe-areas');
    view.style.marginLeft = '260px';
  });
});`;

/**
 * Tablet layout: `f7SingleLayout` with a sidebar panel that stays open
 * beside the main view. Content is usually `f7Items`, switched by an
 * `f7PanelMenu` in the sidebar.
 *
 * The sidebar keeps its id, or gets `f7-sidebar` when it has none; its
 * inner view is tagged `f7-sidebar-view` so the layout script leaves it
 * out when it offsets the other views.
 */
export const f7SplitLayout = (options: F7SplitLayoutOptions, ...content: VChild[]): VElement => {
  const navbar = requireNavbar("f7SplitLayout", options.navbar);
  if (!isF7Panel(options.sidebar)) {
    throw invalidArgument("f7SplitLayout", "sidebar", "sidebar must be built with f7Panel");
  }

  const items = f7Margin(f7Margin(tags.div({}, ...content), "left"), "right");

  const currentId = options.sidebar.props.id;
  const sidebarId = typeof currentId === "string" && currentId.length > 0 ? currentId : SIDEBAR_ID;
  const sidebar = updateChild(
    appendAttributes(options.sidebar, { class: "panel-in", id: sidebarId }),
    0,
    (view) => appendAttributes(view, { id: SIDEBAR_VIEW_ID }),
  );

  const skeleton = f7SingleLayout(
    {
      navbar,
      toolbar: options.toolbar,
      panels: tagList(sidebar, options.panels),
      appbar: options.appbar,
    },
    items,
  );

  return tagList(
    singleton("f7-split-layout-css", tags.style(SPLIT_LAYOUT_CSS)),
    // One script per sidebar: the script targets it by id
    singleton(`f7-split-layout-js:${sidebarId}`, tags.script(splitLayoutScript(sidebarId))),
    skeleton,
  );
};

// =============================================================================
// Split layout items
// =============================================================================

/**
 * Container for the `f7Item`s of a split layout.
 */
export const f7Items = (...items: VChild[]): VElement =>
  tags.div(
    { class: "tabs-animated-wrap" },
    // ios-edges keeps the iOS theme rendering of the tabs intact
    tags.div({ class: "tabs ios-edges" }, ...items),
  );

/**
 * Content switched by an `f7PanelItem` with the same `tabName`.
 */
export const f7Item = (options: { readonly tabName: string }, ...content: VChild[]): VElement =>
  tags.div(
    {
      class: "page-content tab",
      id: options.tabName,
      "data-value": options.tabName,
      style: CONTENT_STYLE,
    },
    ...content,
  );
