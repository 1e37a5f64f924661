import { describe, expect, test } from "vitest";
import { it } from "@effect/vitest";
import * as Effect from "effect/Effect";
import { renderToString } from "@mobile-f7/markup";

import { ComponentArgumentError } from "./errors.js";
import { f7List, f7ListItem } from "./lists.js";
import { f7Icon } from "./navigation.js";

describe("f7List", () => {
  it.effect("renders link items", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(f7List({ mode: "links", inset: true }, f7ListItem({ url: "/a" }, "Home")));
      expect(html).toBe(
        '<div class="list chevron-center links-list inset"><ul><li>' +
          '<a href="/a" class="item-link item-content">' +
          '<div class="item-inner"><div class="item-title">Home</div></div>' +
          "</a></li></ul></div>",
      );
    }),
  );

  it.effect("can drop hairlines", () =>
    Effect.gen(function* () {
      expect(yield* renderToString(f7List({ hairlines: false }))).toBe(
        '<div class="list chevron-center no-hairlines"><ul></ul></div>',
      );
    }),
  );
});

describe("f7ListItem", () => {
  it.effect("puts header and footer around the title", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(f7ListItem({ title: "T", header: "H", footer: "F" }));
      expect(html).toBe(
        '<li><div class="item-content"><div class="item-inner">' +
          '<div class="item-title"><div class="item-header">H</div>T<div class="item-footer">F</div></div>' +
          "</div></div></li>",
      );
    }),
  );

  it.effect("switches to the media layout with a subtitle and text", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(
        f7ListItem(
          { title: "Song", subtitle: "Artist", after: "3:20", media: f7Icon("music_note") },
          "Lyrics",
        ),
      );
      expect(html).toBe(
        '<li><div class="item-content">' +
          '<div class="item-media"><i class="icon f7-icons">music_note</i></div>' +
          '<div class="item-inner">' +
          '<div class="item-title-row"><div class="item-title">Song</div><div class="item-after">3:20</div></div>' +
          '<div class="item-subtitle">Artist</div>' +
          '<div class="item-text">Lyrics</div>' +
          "</div></div></li>",
      );
    }),
  );

  test("needs a title or content", () => {
    expect(() => f7ListItem({})).toThrow(ComponentArgumentError);
  });
});
