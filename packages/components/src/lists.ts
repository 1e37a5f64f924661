import { type VChild, type VElement, classNames, normalizeChildren, tags } from "@mobile-f7/markup";

import { invalidArgument } from "./errors.js";

// =============================================================================
// List
// =============================================================================

export type F7ListMode = "simple" | "links" | "media";

const LIST_MODES: ReadonlyArray<F7ListMode> = ["simple", "links", "media"];

export interface F7ListOptions {
  readonly mode?: F7ListMode | null;
  readonly inset?: boolean;
  /** `false` drops the separators between items */
  readonly hairlines?: boolean;
}

/**
 * `div.list > ul` holding `f7ListItem`s.
 */
export const f7List = (options: F7ListOptions = {}, ...items: VChild[]): VElement => {
  const mode = options.mode ?? null;
  if (mode !== null && !LIST_MODES.includes(mode)) {
    throw invalidArgument("f7List", "mode", `Unknown list mode "${String(mode)}"`);
  }
  return tags.div(
    {
      class: classNames(
        "list",
        "chevron-center",
        mode !== null && `${mode}-list`,
        options.inset === true && "inset",
        options.hairlines === false && "no-hairlines",
      ),
    },
    tags.ul({}, ...items),
  );
};

// =============================================================================
// List item
// =============================================================================

export interface F7ListItemOptions {
  readonly title?: string | null;
  readonly subtitle?: string | null;
  /** Small text above the title */
  readonly header?: string | null;
  /** Small text under the title */
  readonly footer?: string | null;
  /** Shown on the right of the title */
  readonly after?: VChild;
  /** Icon or image left of the item */
  readonly media?: VChild;
  /** Turns the item into a link */
  readonly url?: string | null;
}

/**
 * Without a title, the content is the title. With one, the content becomes
 * the item text and the item switches to the media layout (title row,
 * subtitle, text), as it does when a subtitle is given.
 */
export const f7ListItem = (options: F7ListItemOptions = {}, ...content: VChild[]): VElement => {
  const title = options.title ?? null;
  const body = normalizeChildren(content);
  if (title === null && body.length === 0) {
    throw invalidArgument("f7ListItem", "title", "A list item needs a title or content");
  }
  const text = title === null ? [] : body;
  const subtitle = options.subtitle ?? null;
  const media = normalizeChildren(options.media);
  const after = normalizeChildren(options.after);
  const url = options.url ?? null;

  const titleBlock = tags.div(
    { class: "item-title" },
    options.header !== null && options.header !== undefined && tags.div({ class: "item-header" }, options.header),
    title ?? body,
    options.footer !== null && options.footer !== undefined && tags.div({ class: "item-footer" }, options.footer),
  );
  const afterBlock = after.length > 0 && tags.div({ class: "item-after" }, after);

  const inner =
    subtitle !== null || text.length > 0
      ? tags.div(
          { class: "item-inner" },
          tags.div({ class: "item-title-row" }, titleBlock, afterBlock),
          subtitle !== null && tags.div({ class: "item-subtitle" }, subtitle),
          text.length > 0 && tags.div({ class: "item-text" }, text),
        )
      : tags.div({ class: "item-inner" }, titleBlock, afterBlock);

  const parts = [media.length > 0 && tags.div({ class: "item-media" }, media), inner];
  return tags.li(
    url === null
      ? tags.div({ class: "item-content" }, parts)
      : tags.a({ href: url, class: "item-link item-content" }, parts),
  );
};
