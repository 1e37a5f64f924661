import type * as Effect from "effect/Effect";
import * as Stream from "effect/Stream";
import * as Data from "effect/Data";

/**
 * Primitive element types: HTML tags, text nodes, fragments, or singletons
 */
export type Primitive =
  | keyof HTMLElementTagNameMap
  | "TEXT_ELEMENT"
  | "FRAGMENT"
  | "SINGLETON";

/**
 * What can appear as children of an element (recursive type)
 * Includes primitives, VElements, and arrays thereof
 */
export type VChild =
  | VElement
  | string
  | number
  | bigint
  | boolean
  | null
  | undefined
  | VChild[];

/**
 * What components can return - VElement or wrapped in Effect/Stream
 */
export type VNode =
  | VElement
  | Effect.Effect<VElement, unknown, never>
  | Stream.Stream<VElement, unknown, never>;

/**
 * Element type can be a primitive or a component function.
 * Component functions are the slot where the hosting reactive framework
 * plugs its own output placeholders into a tree.
 */
export type ElementType = Primitive | Component;

/**
 * Function component: receives the element props (children included)
 */
export type Component = (props: VElement["props"]) => VNode;

/**
 * Virtual element representation - the core unit of the markup tree
 */
export interface VElement {
  type: ElementType;
  props: {
    [key: string]: unknown;
    children?: VElement[];
  };
}

/**
 * Attribute record accepted by element factories
 */
export type Attributes = { [key: string]: unknown };

/**
 * Helper to check if a prop is an event handler.
 * Only function values count: `onload="..."` strings are plain attributes.
 */
export const isEventHandler = (key: string, value: unknown) =>
  key.startsWith("on") && typeof value === "function";

/**
 * Prop carrying builder data from one builder to another; never rendered.
 */
export const METADATA_PROP = "metadata";

/**
 * Helper to check if a prop is rendered as an attribute (not children, ref, key, metadata, or handler)
 */
export const isProperty = (key: string, value: unknown) =>
  key !== "children" &&
  key !== "ref" &&
  key !== "key" &&
  key !== METADATA_PROP &&
  !isEventHandler(key, value);

/**
 * Check if element type is a component function
 */
export const isComponent = (type: ElementType): type is Component =>
  typeof type === "function";

export const isStream = (value: unknown): value is Stream.Stream<VElement, unknown, never> =>
  typeof value === "object" && value !== null && Stream.StreamTypeId in value;

export const isVElement = (value: unknown): value is VElement =>
  typeof value === "object" &&
  value !== null &&
  "type" in value &&
  "props" in value &&
  (typeof value.type === "string" || typeof value.type === "function") &&
  typeof value.props === "object" &&
  value.props !== null;

// =============================================================================
// Errors
// =============================================================================

/**
 * Error raised while serializing a component (sync throw or Effect failure).
 *
 * Can be handled via `Effect.catchTag("RenderError", ...)`:
 * ```typescript
 * yield* renderToString(page).pipe(
 *   Effect.catchTag("RenderError", (e) =>
 *     Effect.succeed(`<p>Failed to render ${e.componentName ?? "component"}</p>`),
 *   ),
 * );
 * ```
 */
export class RenderError extends Data.TaggedError("RenderError")<{
  /** The underlying error that caused the render failure */
  readonly cause: unknown;
  /** Name of the component that failed (if available) */
  readonly componentName?: string;
}> {}
