import * as Data from "effect/Data";

/**
 * Raised synchronously by a builder when it is given an argument it cannot
 * turn into valid toolkit markup.
 *
 * @example
 * ```typescript
 * try {
 *   f7Shadow(card, { intensity: 40 });
 * } catch (e) {
 *   if (e instanceof ComponentArgumentError) console.error(e.component, e.argument);
 * }
 * ```
 */
export class ComponentArgumentError extends Data.TaggedError("ComponentArgumentError")<{
  /** Builder that rejected the call, e.g. "f7Tabs" */
  readonly component: string;
  /** Offending argument name */
  readonly argument: string;
  readonly message: string;
}> {}

export const invalidArgument = (
  component: string,
  argument: string,
  message: string,
): ComponentArgumentError => new ComponentArgumentError({ component, argument, message });
