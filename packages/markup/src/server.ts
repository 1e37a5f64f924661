/**
 * HTML serialization for markup trees.
 *
 * Renders VElement trees to HTML strings so the hosting server can send
 * complete pages. Function components are invoked on the way down; their
 * Effects are awaited and their Streams contribute their first emission.
 */
import * as Effect from "effect/Effect";
import * as Stream from "effect/Stream";
import * as Option from "effect/Option";

import {
  type VElement,
  type VNode,
  RenderError,
  isComponent,
  isProperty,
  isStream,
  isVElement,
} from "./shared.js";

// =============================================================================
// HTML Escaping
// =============================================================================

export const escapeHtml = (str: string): string => {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
};

/**
 * Script and style bodies are not escaped; only a closing-tag sequence
 * is broken up so the element cannot be terminated early.
 */
const escapeRawText = (str: string): string => str.replace(/<\//g, "<\\/");

// =============================================================================
// Attribute Rendering
// =============================================================================

/**
 * Convert a prop name to its HTML attribute name
 */
const propToAttr = (prop: string): string => {
  // Handle className -> class
  if (prop === "className") return "class";
  // Handle htmlFor -> for
  if (prop === "htmlFor") return "for";
  // Convert camelCase to kebab-case for data-* and aria-*
  if (prop.startsWith("data") || prop.startsWith("aria")) {
    return prop.replace(/([A-Z])/g, "-$1").toLowerCase();
  }
  return prop;
};

/**
 * Render a single attribute to string
 */
const renderAttribute = (name: string, value: unknown): string => {
  if (value === true) {
    return ` ${name}`;
  }
  if (value === false || value === null || value === undefined) {
    return "";
  }
  return ` ${name}="${escapeHtml(String(value))}"`;
};

/**
 * Render all props as HTML attributes
 */
const renderAttributes = (props: VElement["props"]): string => {
  let attrs = "";
  for (const [key, value] of Object.entries(props)) {
    if (isProperty(key, value)) {
      attrs += renderAttribute(propToAttr(key), value);
    }
  }
  const key = props.key;
  if (key !== null && key !== undefined) {
    attrs += renderAttribute("data-key", key);
  }
  return attrs;
};

// =============================================================================
// Element Categories
// =============================================================================

const VOID_ELEMENTS = new Set([
  "area", "base", "br", "col", "embed", "hr", "img", "input",
  "link", "meta", "param", "source", "track", "wbr",
]);

const RAW_TEXT_ELEMENTS = new Set(["script", "style"]);

// =============================================================================
// Core Rendering
// =============================================================================

/**
 * Per-document state: singleton keys already emitted.
 */
interface RenderState {
  readonly emittedSingletons: Set<string>;
}

const componentNameOf = (component: { readonly name: string }): string | undefined =>
  component.name.length > 0 ? component.name : undefined;

/**
 * Resolve a component's output to the VElement it stands for.
 * `None` means the component rendered nothing (an empty stream).
 */
const resolveComponentOutput = (
  output: VNode,
): Effect.Effect<Option.Option<VElement>, unknown, never> => {
  if (isStream(output)) {
    return Stream.runHead(output);
  }
  if (isVElement(output)) {
    return Effect.succeed(Option.some(output));
  }
  return Effect.map(output, Option.some);
};

const renderChildren = (
  children: ReadonlyArray<VElement>,
  state: RenderState,
): Effect.Effect<string, RenderError, never> =>
  Effect.gen(function* () {
    let html = "";
    for (const child of children) {
      html += yield* renderNode(child, state);
    }
    return html;
  });

const renderNode = (
  vElement: VElement,
  state: RenderState,
): Effect.Effect<string, RenderError, never> =>
  Effect.gen(function* () {
    const type = vElement.type;
    const children = vElement.props.children ?? [];

    if (isComponent(type)) {
      const componentName = componentNameOf(type);
      const resolved = yield* Effect.try({
        try: () => type(vElement.props),
        catch: (cause) => cause,
      }).pipe(
        Effect.flatMap(resolveComponentOutput),
        Effect.mapError((cause) => new RenderError({ cause, componentName })),
      );
      if (Option.isNone(resolved)) {
        return "";
      }
      return yield* renderNode(resolved.value, state);
    }

    switch (type) {
      case "TEXT_ELEMENT":
        return escapeHtml(String(vElement.props.nodeValue ?? ""));

      case "FRAGMENT":
        return yield* renderChildren(children, state);

      case "SINGLETON": {
        const singletonKey = String(vElement.props.singletonKey);
        if (state.emittedSingletons.has(singletonKey)) {
          yield* Effect.logDebug(`Skipping repeated singleton "${singletonKey}"`);
          return "";
        }
        state.emittedSingletons.add(singletonKey);
        return yield* renderChildren(children, state);
      }

      default: {
        if (!/^[a-z][a-z0-9-]*$/.test(type)) {
          yield* Effect.logWarning(`Skipping element with unknown type "${type}"`);
          return "";
        }
        const attrs = renderAttributes(vElement.props);

        if (VOID_ELEMENTS.has(type)) {
          return `<${type}${attrs} />`;
        }

        if (RAW_TEXT_ELEMENTS.has(type)) {
          let body = "";
          for (const child of children) {
            body +=
              child.type === "TEXT_ELEMENT"
                ? escapeRawText(String(child.props.nodeValue ?? ""))
                : yield* renderNode(child, state);
          }
          return `<${type}${attrs}>${body}</${type}>`;
        }

        const childrenHtml = yield* renderChildren(children, state);
        return `<${type}${attrs}>${childrenHtml}</${type}>`;
      }
    }
  });

// =============================================================================
// Public API
// =============================================================================

/**
 * Render a VElement tree to an HTML string.
 *
 * Fails with `RenderError` when a function component throws or fails.
 *
 * @example
 * ```typescript
 * const html = yield* renderToString(
 *   tags.div({ class: "page" }, tags.div({ class: "page-content" }, "Hi")),
 * );
 * // <div class="page"><div class="page-content">Hi</div></div>
 * ```
 */
export const renderToString = (element: VElement): Effect.Effect<string, RenderError, never> =>
  Effect.suspend(() => renderNode(element, { emittedSingletons: new Set() }));

/**
 * Render a full document (doctype included), typically the output of `f7Page`.
 */
export const renderDocument = (element: VElement): Effect.Effect<string, RenderError, never> =>
  renderToString(element).pipe(Effect.map((html) => `<!DOCTYPE html>${html}`));
