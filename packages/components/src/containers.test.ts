import { describe, expect, test } from "vitest";
import { it } from "@effect/vitest";
import * as Effect from "effect/Effect";
import { renderToString } from "@mobile-f7/markup";

import {
  f7Badge,
  f7Block,
  f7BlockFooter,
  f7BlockHeader,
  f7BlockTitle,
  f7Button,
  f7Card,
  f7Segment,
} from "./containers.js";
import { ComponentArgumentError } from "./errors.js";

describe("blocks", () => {
  it.effect("renders header, content and footer", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(
        f7Block({ strong: true, inset: true, hairlines: false }, f7BlockHeader("h"), "x", f7BlockFooter("f")),
      );
      expect(html).toBe(
        '<div class="block block-strong inset no-hairlines">' +
          '<div class="block-header">h</div>x<div class="block-footer">f</div></div>',
      );
    }),
  );

  it.effect("sizes block titles", () =>
    Effect.gen(function* () {
      expect(yield* renderToString(f7BlockTitle({ title: "T", size: "large" }))).toBe(
        '<div class="block-title block-title-large">T</div>',
      );
      expect(yield* renderToString(f7BlockTitle({ title: "T" }))).toBe('<div class="block-title">T</div>');
    }),
  );
});

describe("f7Card", () => {
  it.effect("renders title, scrolling content and footer", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(
        f7Card({ title: "Card", footer: "Foot", outline: true, height: 200 }, "Body"),
      );
      expect(html).toBe(
        '<div class="card card-outline"><div class="card-header">Card</div>' +
          '<div class="card-content card-content-padding" style="height: 200px; overflow-y: auto;">Body</div>' +
          '<div class="card-footer">Foot</div></div>',
      );
    }),
  );

  it.effect("leaves out an empty footer", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(f7Card({ footer: false }, "x"));
      expect(html).toBe('<div class="card"><div class="card-content card-content-padding">x</div></div>');
    }),
  );

  test("rejects a negative height", () => {
    expect(() => f7Card({ height: -1 })).toThrow(ComponentArgumentError);
  });
});

describe("f7Button", () => {
  it.effect("renders a filled action button by default", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(f7Button({ label: "Go", inputId: "go" }));
      expect(html).toBe('<button class="button button-fill f7-action-button" id="go" type="button">Go</button>');
    }),
  );

  it.effect("renders an external link button", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(
        f7Button({
          label: "Docs",
          src: "https://example.com",
          outline: true,
          rounded: true,
          size: "large",
          color: "red",
        }),
      );
      expect(html).toBe(
        '<a class="button button-outline button-round button-large color-red external" ' +
          'href="https://example.com" target="_blank">Docs</a>',
      );
    }),
  );

  test("fill and outline are exclusive", () => {
    expect(() => f7Button({ label: "x", fill: true, outline: true })).toThrow(
      "fill and outline cannot be combined",
    );
  });

  test("an action button cannot link", () => {
    expect(() => f7Button({ label: "x", inputId: "x", src: "/x" })).toThrow(ComponentArgumentError);
  });
});

describe("f7Segment", () => {
  it.effect("groups buttons in a segmented control", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(
        f7Segment(
          { rounded: true, strong: true },
          f7Button({ label: "A", inputId: "a" }),
          f7Button({ label: "B", inputId: "b", outline: true }),
        ),
      );
      expect(html).toBe(
        '<div class="block"><div class="segmented segmented-round segmented-strong">' +
          '<button class="button button-fill f7-action-button" id="a" type="button">A</button>' +
          '<button class="button button-outline f7-action-button" id="b" type="button">B</button>' +
          "</div></div>",
      );
    }),
  );

  it.effect("spreads buttons over a row", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(f7Segment({ container: "row" }, f7Button({ label: "A", src: "/a" })));
      expect(html).toBe(
        '<div class="block"><div class="row">' +
          '<a class="button button-fill external col" href="/a" target="_blank">A</a>' +
          "</div></div>",
      );
    }),
  );

  test("needs buttons", () => {
    expect(() => f7Segment()).toThrow("f7Segment needs at least one button");
  });

  test("segment styles do not apply to rows", () => {
    expect(() => f7Segment({ container: "row", shadow: true }, f7Button({ label: "A" }))).toThrow(
      ComponentArgumentError,
    );
  });
});

describe("f7Badge", () => {
  it.effect("renders a colored badge", () =>
    Effect.gen(function* () {
      expect(yield* renderToString(f7Badge(3, { color: "red" }))).toBe('<span class="badge color-red">3</span>');
    }),
  );
});
