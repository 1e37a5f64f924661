import { type VElement, tagList, tags } from "@mobile-f7/markup";

// =============================================================================
// Asset locations
// =============================================================================

/**
 * Where a page loads the toolkit and its companions from.
 */
export interface F7Assets {
  /** Base URL of the framework7 package (holds css/ and js/) */
  readonly framework7Base: string;
  /** Icon font stylesheets */
  readonly iconStylesheets: ReadonlyArray<string>;
  /** Script binding toolkit widgets to the reactive runtime; `null` to omit */
  readonly bindingsScript: string | null;
  /** pwacompat script, fills in PWA meta tags on platforms without manifest support */
  readonly pwacompat: string;
  readonly icon: string;
  readonly favicon: string;
  readonly manifest: string;
}

export const defaultAssets: F7Assets = {
  framework7Base: "https://cdn.jsdelivr.net/npm/framework7@5.7.14",
  iconStylesheets: [
    "https://cdn.jsdelivr.net/npm/framework7-icons@3.0.1/css/framework7-icons.css",
    "https://fonts.googleapis.com/icon?family=Material+Icons",
  ],
  bindingsScript: "/mobile-f7/bindings.js",
  pwacompat: "https://cdn.jsdelivr.net/npm/pwacompat@2.0.17/pwacompat.min.js",
  icon: "/mobile-f7/icons/128x128.png",
  favicon: "/mobile-f7/icons/favicon.png",
  manifest: "/mobile-f7/manifest.webmanifest",
};

export const resolveAssets = (overrides: Partial<F7Assets> = {}): F7Assets => ({
  ...defaultAssets,
  ...overrides,
});

// =============================================================================
// Dependency tags
// =============================================================================

const stylesheet = (href: string) => tags.link({ rel: "stylesheet", href });

export const cssDependencies = (assets: F7Assets = defaultAssets): VElement =>
  tagList(
    stylesheet(`${assets.framework7Base}/css/framework7.bundle.min.css`),
    assets.iconStylesheets.map(stylesheet),
  );

/**
 * Toolkit scripts. They go after `<body>`: the toolkit looks up `#app` as
 * soon as it is evaluated.
 */
export const jsDependencies = (assets: F7Assets = defaultAssets): VElement =>
  tagList(
    tags.script({ src: `${assets.framework7Base}/js/framework7.bundle.min.js` }),
    assets.bindingsScript !== null && tags.script({ src: assets.bindingsScript }),
  );

export interface PwaOptions {
  readonly icon?: string | null;
  readonly favicon?: string | null;
  readonly manifest?: string | null;
  readonly assets?: F7Assets;
}

/**
 * Head tags making the page installable. `null` paths fall back to the
 * assets' defaults.
 */
export const pwaDependencies = (options: PwaOptions = {}): VElement => {
  const assets = options.assets ?? defaultAssets;
  return tagList(
    tags.link({ rel: "manifest", href: options.manifest ?? assets.manifest }),
    tags.link({ rel: "apple-touch-icon", href: options.icon ?? assets.icon }),
    tags.link({ rel: "icon", href: options.favicon ?? assets.favicon }),
    tags.meta({ name: "apple-mobile-web-app-capable", content: "yes" }),
    tags.meta({ name: "apple-mobile-web-app-status-bar-style", content: "black-translucent" }),
    tags.meta({ name: "theme-color", content: "#2196f3" }),
    tags.script({ async: true, src: assets.pwacompat }),
  );
};
