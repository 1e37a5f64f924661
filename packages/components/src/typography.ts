import { type VChild, type VElement, appendClass, classNames, tags } from "@mobile-f7/markup";

import { invalidArgument } from "./errors.js";

// =============================================================================
// Spacing
// =============================================================================

export type SpacingSide = "top" | "bottom" | "left" | "right" | "vertical" | "horizontal";

const SPACING_SIDES: ReadonlyArray<SpacingSide> = [
  "top",
  "bottom",
  "left",
  "right",
  "vertical",
  "horizontal",
];

const spacingClass = (component: string, prefix: string, side: SpacingSide | null | undefined) => {
  if (side === null || side === undefined) return prefix;
  if (!SPACING_SIDES.includes(side)) {
    throw invalidArgument(component, "side", `Unknown side "${String(side)}"`);
  }
  return `${prefix}-${side}`;
};

/** Add `margin` (all sides) or `margin-<side>` to an element. */
export const f7Margin = (element: VElement, side?: SpacingSide | null): VElement =>
  appendClass(element, spacingClass("f7Margin", "margin", side));

/** Add `padding` (all sides) or `padding-<side>` to an element. */
export const f7Padding = (element: VElement, side?: SpacingSide | null): VElement =>
  appendClass(element, spacingClass("f7Padding", "padding", side));

// =============================================================================
// Alignment
// =============================================================================

export const f7Align = (
  element: VElement,
  side: "left" | "center" | "right" | "justify",
): VElement => {
  if (!["left", "center", "right", "justify"].includes(side)) {
    throw invalidArgument("f7Align", "side", `Unknown alignment "${String(side)}"`);
  }
  return appendClass(element, `text-align-${side}`);
};

export const f7Float = (element: VElement, side: "left" | "right"): VElement => {
  if (side !== "left" && side !== "right") {
    throw invalidArgument("f7Float", "side", `side must be "left" or "right"`);
  }
  return appendClass(element, `float-${side}`);
};

// =============================================================================
// Elevation
// =============================================================================

export interface F7ShadowOptions {
  /** Elevation level, 1 to 24 */
  readonly intensity: number;
  readonly hover?: boolean;
  readonly pressed?: boolean;
}

export const f7Shadow = (element: VElement, options: F7ShadowOptions): VElement => {
  const { intensity } = options;
  if (!Number.isInteger(intensity) || intensity < 1 || intensity > 24) {
    throw invalidArgument("f7Shadow", "intensity", `intensity must be an integer between 1 and 24, got ${intensity}`);
  }
  return appendClass(
    element,
    classNames(
      `elevation-${intensity}`,
      options.hover === true && `elevation-hover-${intensity}`,
      options.pressed === true && `elevation-pressed-${intensity}`,
    ),
  );
};

// =============================================================================
// Grid
// =============================================================================

export const f7Row = (options: { readonly gap?: boolean } = {}, ...children: VChild[]): VElement =>
  tags.div({ class: classNames("row", options.gap === false && "no-gap") }, ...children);

export const f7Col = (...children: VChild[]): VElement => tags.div({ class: "col" }, ...children);

export const f7Flex = (...children: VChild[]): VElement =>
  tags.div({ class: "display-flex justify-content-space-between align-items-center" }, ...children);
