import {
  type Attributes,
  type Component,
  type ElementType,
  type Primitive,
  type VChild,
  type VElement,
  isVElement,
} from "./shared.js";

// =============================================================================
// Element Creation
// =============================================================================

/**
 * Create a text element VNode
 */
export const createTextElement = (text: string): VElement => ({
  type: "TEXT_ELEMENT",
  props: {
    nodeValue: text,
    children: [],
  },
});

/**
 * Flatten children into VElements.
 * Nested arrays are spread, `null`, `undefined` and booleans are dropped,
 * and primitives become text elements.
 */
export const normalizeChildren = (child: VChild): VElement[] => {
  if (child === null || child === undefined || child === false || child === true) {
    return [];
  }
  if (typeof child === "string" || typeof child === "number" || typeof child === "bigint") {
    return [createTextElement(String(child))];
  }
  if (Array.isArray(child)) {
    return child.flatMap(normalizeChildren);
  }
  return [child];
};

/**
 * Create a virtual element
 */
export function h(type: Primitive, props?: Attributes | null, children?: VChild[]): VElement;
export function h(type: Component, props?: Attributes | null, children?: VChild[]): VElement;
export function h(
  type: ElementType,
  props: Attributes | null = {},
  children: VChild[] = [],
): VElement {
  return {
    type,
    props: {
      ...props,
      children: normalizeChildren(children),
    },
  };
}

/**
 * Group siblings without a wrapping element.
 */
export const tagList = (...children: VChild[]): VElement => h("FRAGMENT", {}, children);

/**
 * Wrap an element so it is emitted at most once per rendered document.
 * Later occurrences with the same key are skipped by the serializer.
 */
export const singleton = (key: string, element: VElement): VElement =>
  h("SINGLETON", { singletonKey: key }, [element]);

// =============================================================================
// Tag factories
// =============================================================================

type TagFactory = (props?: Attributes | VChild, ...children: VChild[]) => VElement;

/**
 * Props may be omitted: a first argument that is an element, a primitive or
 * an array is treated as a child.
 */
const isAttributes = (value: Attributes | VChild): value is Attributes =>
  typeof value === "object" && value !== null && !Array.isArray(value) && !isVElement(value);

const tagFactory =
  (type: keyof HTMLElementTagNameMap): TagFactory =>
  (props, ...children) =>
    props === undefined || isAttributes(props)
      ? h(type, props, children)
      : h(type, {}, [props, ...children]);

/**
 * Factories for the tags the component builders use.
 *
 * @example
 * ```typescript
 * tags.div({ class: "page" }, tags.div({ class: "page-content" }, "Hello"))
 * ```
 */
export const tags = {
  a: tagFactory("a"),
  body: tagFactory("body"),
  button: tagFactory("button"),
  div: tagFactory("div"),
  head: tagFactory("head"),
  html: tagFactory("html"),
  i: tagFactory("i"),
  input: tagFactory("input"),
  label: tagFactory("label"),
  li: tagFactory("li"),
  link: tagFactory("link"),
  meta: tagFactory("meta"),
  option: tagFactory("option"),
  p: tagFactory("p"),
  script: tagFactory("script"),
  select: tagFactory("select"),
  span: tagFactory("span"),
  style: tagFactory("style"),
  textarea: tagFactory("textarea"),
  title: tagFactory("title"),
  ul: tagFactory("ul"),
} satisfies Record<string, TagFactory>;
