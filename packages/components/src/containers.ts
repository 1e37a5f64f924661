import {
  type VChild,
  type VElement,
  appendClass,
  classNames,
  normalizeChildren,
  tags,
} from "@mobile-f7/markup";

import { colorClass } from "./colors.js";
import { invalidArgument } from "./errors.js";

// =============================================================================
// Blocks
// =============================================================================

export interface F7BlockOptions {
  readonly strong?: boolean;
  readonly inset?: boolean;
  /** Inset on tablets only */
  readonly tablet?: boolean;
  readonly hairlines?: boolean;
}

export const f7Block = (options: F7BlockOptions = {}, ...children: VChild[]): VElement =>
  tags.div(
    {
      class: classNames(
        "block",
        options.strong === true && "block-strong",
        options.inset === true && "inset",
        options.tablet === true && "tablet-inset",
        options.hairlines === false && "no-hairlines",
      ),
    },
    ...children,
  );

export const f7BlockTitle = (options: {
  readonly title: string;
  readonly size?: "medium" | "large" | null;
}): VElement => {
  const size = options.size ?? null;
  if (size !== null && size !== "medium" && size !== "large") {
    throw invalidArgument("f7BlockTitle", "size", `size must be "medium" or "large"`);
  }
  return tags.div(
    { class: classNames("block-title", size !== null && `block-title-${size}`) },
    options.title,
  );
};

export const f7BlockHeader = (...children: VChild[]): VElement =>
  tags.div({ class: "block-header" }, ...children);

export const f7BlockFooter = (...children: VChild[]): VElement =>
  tags.div({ class: "block-footer" }, ...children);

// =============================================================================
// Card
// =============================================================================

export interface F7CardOptions {
  readonly title?: string | null;
  readonly footer?: VChild;
  readonly outline?: boolean;
  /** Content height in pixels; longer content scrolls */
  readonly height?: number | null;
}

export const f7Card = (options: F7CardOptions = {}, ...children: VChild[]): VElement => {
  const height = options.height ?? null;
  if (height !== null && !(Number.isFinite(height) && height > 0)) {
    throw invalidArgument("f7Card", "height", `height must be a positive number of pixels, got ${height}`);
  }
  const footer = normalizeChildren(options.footer);
  return tags.div(
    { class: classNames("card", options.outline === true && "card-outline") },
    options.title !== null && options.title !== undefined && tags.div({ class: "card-header" }, options.title),
    tags.div(
      {
        class: "card-content card-content-padding",
        style: height === null ? undefined : `height: ${height}px; overflow-y: auto;`,
      },
      ...children,
    ),
    footer.length > 0 && tags.div({ class: "card-footer" }, footer),
  );
};

// =============================================================================
// Buttons and badges
// =============================================================================

export interface F7ButtonOptions {
  /** Id reported to the reactive runtime on click; mutually exclusive with `src` */
  readonly inputId?: string | null;
  readonly label: string;
  readonly src?: string | null;
  readonly color?: string | null;
  readonly fill?: boolean;
  readonly outline?: boolean;
  readonly shadow?: boolean;
  readonly rounded?: boolean;
  readonly size?: "small" | "large" | null;
}

/**
 * A link button when `src` is given, an action button otherwise.
 */
export const f7Button = (options: F7ButtonOptions): VElement => {
  const inputId = options.inputId ?? null;
  const src = options.src ?? null;
  const outline = options.outline ?? false;
  const fill = options.fill ?? !outline;
  if (inputId !== null && src !== null) {
    throw invalidArgument("f7Button", "src", "A button cannot have both inputId and src");
  }
  if (fill && outline) {
    throw invalidArgument("f7Button", "outline", "fill and outline cannot be combined");
  }
  const size = options.size ?? null;
  const buttonClass = classNames(
    "button",
    fill && "button-fill",
    outline && "button-outline",
    options.shadow === true && "button-raised",
    options.rounded === true && "button-round",
    size !== null && `button-${size}`,
    colorClass("f7Button", options.color),
  );

  return src !== null
    ? tags.a({ class: classNames(buttonClass, "external"), href: src, target: "_blank" }, options.label)
    : tags.button(
        { class: classNames(buttonClass, "f7-action-button"), id: inputId ?? undefined, type: "button" },
        options.label,
      );
};

export interface F7SegmentOptions {
  /** One segmented control, or buttons spread over a grid row */
  readonly container?: "segment" | "row";
  readonly shadow?: boolean;
  readonly rounded?: boolean;
  readonly strong?: boolean;
}

/**
 * Group `f7Button`s side by side.
 */
export const f7Segment = (options: F7SegmentOptions = {}, ...buttons: VChild[]): VElement => {
  const items = normalizeChildren(buttons);
  if (items.length === 0) {
    throw invalidArgument("f7Segment", "children", "f7Segment needs at least one button");
  }
  const shadow = options.shadow ?? false;
  const rounded = options.rounded ?? false;
  const strong = options.strong ?? false;

  if ((options.container ?? "segment") === "row") {
    if (shadow || rounded || strong) {
      throw invalidArgument("f7Segment", "container", 'Segment styles need container "segment"');
    }
    return tags.div(
      { class: "block" },
      tags.div({ class: "row" }, items.map((button) => appendClass(button, "col"))),
    );
  }
  return tags.div(
    { class: "block" },
    tags.div(
      {
        class: classNames(
          "segmented",
          shadow && "segmented-raised",
          rounded && "segmented-round",
          strong && "segmented-strong",
        ),
      },
      items,
    ),
  );
};

export const f7Badge = (label: string | number, options: { readonly color?: string | null } = {}): VElement =>
  tags.span({ class: classNames("badge", colorClass("f7Badge", options.color)) }, label);
