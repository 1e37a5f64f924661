import { type VChild, type VElement, tags } from "@mobile-f7/markup";

import { f7Init } from "./config.js";
import {
  type F7Assets,
  cssDependencies,
  defaultAssets,
  jsDependencies,
  pwaDependencies,
} from "./dependencies.js";
import { invalidArgument } from "./errors.js";

export interface F7PageOptions {
  /** App configuration, see `f7Init` */
  readonly init?: VElement;
  readonly title?: string | null;
  /** Show the toolkit preloader dialog while the app starts */
  readonly preloader?: boolean;
  /** Preloader duration in seconds */
  readonly loadingDuration?: number;
  readonly icon?: string | null;
  readonly favicon?: string | null;
  readonly manifest?: string | null;
  readonly assets?: F7Assets;
}

const VIEWPORT = [
  "width=device-width",
  "initial-scale=1",
  "maximum-scale=1",
  "minimum-scale=1",
  "user-scalable=no",
  "viewport-fit=cover",
].join(", ");

export const preloaderScript = (durationMs: number): string =>
  `app.dialog.preloader(); setTimeout(function () { app.dialog.close(); }, ${durationMs});`;

/**
 * Build the document root. `children` are the page skeleton: a layout
 * (`f7SingleLayout`, `f7TabLayout`, `f7SplitLayout`) and optionally an
 * `f7Appbar`, all placed inside `#app`.
 *
 * Toolkit scripts and the app initialisation come after `<body>` since
 * they need `#app` to exist when they run.
 */
export const f7Page = (options: F7PageOptions = {}, ...children: VChild[]): VElement => {
  const assets = options.assets ?? defaultAssets;
  const loadingDuration = options.loadingDuration ?? 3;
  if (!(Number.isFinite(loadingDuration) && loadingDuration > 0)) {
    throw invalidArgument("f7Page", "loadingDuration", "loadingDuration must be a positive number of seconds");
  }

  return tags.html(
    tags.head(
      tags.meta({ charset: "utf-8" }),
      tags.meta({ name: "viewport", content: VIEWPORT }),
      pwaDependencies({
        icon: options.icon,
        favicon: options.favicon,
        manifest: options.manifest,
        assets,
      }),
      tags.title(options.title ?? ""),
    ),
    tags.body(
      { onload: options.preloader === true ? preloaderScript(loadingDuration * 1000) : undefined },
      cssDependencies(assets),
      tags.div({ id: "app" }, ...children),
    ),
    jsDependencies(assets),
    options.init ?? f7Init({ skin: "auto", theme: "light" }),
  );
};
