import { invalidArgument } from "./errors.js";

/**
 * Color names the toolkit ships `color-<name>` classes for.
 */
export const F7_COLORS = [
  "red",
  "green",
  "blue",
  "pink",
  "yellow",
  "orange",
  "purple",
  "deeppurple",
  "lightblue",
  "teal",
  "lime",
  "deeporange",
  "gray",
  "white",
  "black",
] as const;

export type F7Color = (typeof F7_COLORS)[number];

export const getF7Colors = (): ReadonlyArray<F7Color> => F7_COLORS;

export const isF7Color = (value: string): value is F7Color =>
  F7_COLORS.some((color) => color === value);

/**
 * Check `color` and return its class, or `undefined` when no color is set.
 */
export const colorClass = (component: string, color: string | null | undefined): string | undefined => {
  if (color === null || color === undefined) return undefined;
  if (!isF7Color(color)) {
    throw invalidArgument(
      component,
      "color",
      `Unknown color "${color}", expected one of: ${F7_COLORS.join(", ")}`,
    );
  }
  return `color-${color}`;
};
