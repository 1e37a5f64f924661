import * as Either from "effect/Either";
import * as Schema from "effect/Schema";
import { type VElement, singleton, tagList, tags } from "@mobile-f7/markup";

import { F7_COLORS } from "./colors.js";
import { invalidArgument } from "./errors.js";

// =============================================================================
// App configuration
// =============================================================================

/**
 * Options accepted by `f7Init`. Every field is optional; the decoded form
 * carries the defaults.
 */
export const F7InitOptionsSchema = Schema.Struct({
  /** Toolkit theme (platform look): ios, md, aurora, or auto-detected */
  skin: Schema.optionalWith(Schema.Literal("ios", "md", "auto", "aurora"), {
    default: () => "auto" as const,
  }),
  /** Light or dark color scheme */
  theme: Schema.optionalWith(Schema.Literal("light", "dark"), {
    default: () => "light" as const,
  }),
  /** Fill navbar and toolbars with the theme color */
  filled: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  color: Schema.optionalWith(Schema.NullOr(Schema.Literal(...F7_COLORS)), {
    default: () => null,
  }),
  tapHold: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  iosTouchRipple: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  iosCenterTitle: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  iosTranslucentBars: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  hideNavOnPageScroll: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  hideTabsOnPageScroll: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  /** Service worker script path, registered by the toolkit when set */
  serviceWorker: Schema.optionalWith(Schema.NullOr(Schema.String), { default: () => null }),
});

export type F7InitOptions = typeof F7InitOptionsSchema.Encoded;
export type F7InitConfig = typeof F7InitOptionsSchema.Type;

const decodeInitOptions = Schema.decodeUnknownEither(F7InitOptionsSchema);

/**
 * Validate `f7Init` options, filling in defaults.
 * Throws `ComponentArgumentError` carrying the schema's report.
 */
export const resolveInitOptions = (options: unknown): F7InitConfig => {
  const result = decodeInitOptions(options);
  if (Either.isLeft(result)) {
    throw invalidArgument("f7Init", "options", result.left.message);
  }
  return result.right;
};

/**
 * The parameters object handed to `new Framework7(...)`.
 */
export const appParameters = (config: F7InitConfig) => ({
  root: "#app",
  theme: config.skin,
  iosTranslucentBars: config.iosTranslucentBars,
  touch: {
    tapHold: config.tapHold,
    tapHoldDelay: 750,
    iosTouchRipple: config.iosTouchRipple,
  },
  navbar: {
    iosCenterTitle: config.iosCenterTitle,
    hideOnPageScroll: config.hideNavOnPageScroll,
  },
  toolbar: {
    hideOnPageScroll: config.hideTabsOnPageScroll,
  },
  ...(config.serviceWorker !== null ? { serviceWorker: { path: config.serviceWorker } } : {}),
});

const FILLED_BARS_CSS = `:root {
  --f7-bars-bg-color: var(--f7-theme-color);
  --f7-bars-text-color: #fff;
  --f7-bars-link-color: #fff;
  --f7-navbar-bg-color: var(--f7-theme-color);
  --f7-toolbar-bg-color: var(--f7-theme-color);
}`;

/**
 * Create the toolkit app instance and apply theme, color and fill.
 *
 * @example
 * ```typescript
 * f7Page({ title: "My app", init: f7Init({ skin: "md", theme: "dark" }) }, layout)
 * ```
 */
export const f7Init = (options: F7InitOptions = {}): VElement => {
  const config = resolveInitOptions(options);
  return tagList(
    tags.script(`var app = new Framework7(${JSON.stringify(appParameters(config))});`),
    config.theme === "dark" && tags.script("document.documentElement.classList.add('theme-dark');"),
    config.color !== null &&
      tags.script(`document.body.classList.add('color-theme-${config.color}');`),
    config.filled && singleton("f7-filled-bars", tags.style(FILLED_BARS_CSS)),
  );
};
