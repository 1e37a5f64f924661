import { type Attributes, type VElement } from "./shared.js";

// =============================================================================
// Class Names
// =============================================================================

/**
 * Join class fragments, skipping falsy ones.
 *
 * @example
 * ```typescript
 * classNames("navbar", !hairline && "no-hairline") // "navbar no-hairline"
 * ```
 */
export const classNames = (...parts: ReadonlyArray<string | false | null | undefined>): string =>
  parts.filter((part): part is string => typeof part === "string" && part.length > 0).join(" ");

const classListOf = (element: VElement): string[] => {
  const value = element.props.class ?? element.props.className;
  return typeof value === "string" ? value.split(/\s+/).filter((c) => c.length > 0) : [];
};

export const hasClass = (element: VElement, name: string): boolean =>
  classListOf(element).includes(name);

// =============================================================================
// Copy-on-write updates
// =============================================================================

/**
 * Return a copy of `element` with classes appended to its `class` attribute.
 * Classes already present are not repeated.
 */
export const appendClass = (element: VElement, ...classes: string[]): VElement => {
  const current = classListOf(element);
  const added = classes
    .flatMap((c) => c.split(/\s+/))
    .filter((c, index, all) => c.length > 0 && !current.includes(c) && all.indexOf(c) === index);
  const { className: _className, ...props } = element.props;
  return {
    type: element.type,
    props: { ...props, class: [...current, ...added].join(" ") },
  };
};

/**
 * Return a copy of `element` with merged attributes.
 * `class` is appended to the existing classes, other keys are overwritten.
 */
export const appendAttributes = (element: VElement, attributes: Attributes): VElement => {
  const { class: extraClass, children: _children, ...rest } = attributes;
  const merged: VElement = {
    type: element.type,
    props: { ...element.props, ...rest },
  };
  return typeof extraClass === "string" ? appendClass(merged, extraClass) : merged;
};

/**
 * Return a copy of `element` whose child at `index` is replaced by `update(child)`.
 */
export const updateChild = (
  element: VElement,
  index: number,
  update: (child: VElement) => VElement,
): VElement => {
  const children = element.props.children ?? [];
  const child = children[index];
  if (child === undefined) {
    throw new RangeError(`Element has no child at index ${index} (${children.length} children)`);
  }
  return {
    type: element.type,
    props: {
      ...element.props,
      children: children.map((c, i) => (i === index ? update(child) : c)),
    },
  };
};
