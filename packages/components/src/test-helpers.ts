import * as Effect from "effect/Effect";
import { type RenderError, type VElement, renderToString } from "@mobile-f7/markup";

/**
 * Render a tree and parse it into a detached container, so tests can
 * walk the resulting DOM hierarchy.
 */
export const renderDom = (element: VElement): Effect.Effect<HTMLDivElement, RenderError> =>
  renderToString(element).pipe(
    Effect.map((html) => {
      const container = document.createElement("div");
      container.innerHTML = html;
      return container;
    }),
  );

/**
 * Class names of an element's direct children, in order.
 */
export const childClasses = (element: Element | null | undefined): string[] =>
  element === null || element === undefined
    ? []
    : Array.from(element.children).map((child) => child.className);
