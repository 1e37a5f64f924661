import { describe, expect, test } from "vitest";
import { it } from "@effect/vitest";
import * as Effect from "effect/Effect";
import { renderToString, tags } from "@mobile-f7/markup";

import { ComponentArgumentError } from "./errors.js";
import { f7Appbar, f7Icon, f7Link, f7Navbar, f7SubNavbar, f7Toolbar } from "./navigation.js";

const LEFT_OPENER =
  '<a href="#" class="link icon-only panel-open" data-panel="left"><i class="icon f7-icons">bars</i></a>';
const RIGHT_OPENER =
  '<a href="#" class="link icon-only panel-open" data-panel="right"><i class="icon f7-icons">bars</i></a>';

describe("f7Navbar", () => {
  it.effect("renders background, inner bar and left panel opener", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(
        f7Navbar({ title: "Title", hairline: false, shadow: true, leftPanel: true }),
      );
      expect(html).toBe(
        '<div class="navbar no-hairline"><div class="navbar-bg"></div>' +
          '<div class="navbar-inner sliding">' +
          `<div class="left">${LEFT_OPENER}</div>` +
          '<div class="title">Title</div>' +
          "</div></div>",
      );
    }),
  );

  it.effect("adds subtitle, right items and the large title", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(
        f7Navbar(
          { title: "T", subtitle: "S", bigger: true, rightPanel: true },
          f7Link({ label: "Go", src: "/go" }),
        ),
      );
      expect(html).toBe(
        '<div class="navbar navbar-large"><div class="navbar-bg"></div>' +
          '<div class="navbar-inner sliding">' +
          '<div class="title">T<span class="subtitle">S</span></div>' +
          `<div class="right"><a href="/go" class="link">Go</a>${RIGHT_OPENER}</div>` +
          '<div class="title-large"><div class="title-large-text">T</div></div>' +
          "</div></div>",
      );
    }),
  );

  it.effect("appends the subnavbar last in the inner bar", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(
        f7Navbar({ title: "T", subNavbar: f7SubNavbar(tags.span("x")) }),
      );
      expect(html).toBe(
        '<div class="navbar"><div class="navbar-bg"></div><div class="navbar-inner sliding">' +
          '<div class="title">T</div>' +
          '<div class="subnavbar"><div class="subnavbar-inner"><span>x</span></div></div>' +
          "</div></div>",
      );
    }),
  );

  test("rejects a transparent navbar that is not bigger", () => {
    expect(() => f7Navbar({ transparent: true })).toThrow(ComponentArgumentError);
  });
});

describe("f7Toolbar", () => {
  it.effect("combines position and modifiers", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(f7Toolbar({ position: "bottom", icons: true, shadow: false }));
      expect(html).toBe(
        '<div class="toolbar toolbar-bottom tabbar-labels no-shadow"><div class="toolbar-inner"></div></div>',
      );
    }),
  );

  it.effect("defaults to the top", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(f7Toolbar({}, f7Link({ label: "A" })));
      expect(html).toBe(
        '<div class="toolbar toolbar-top"><div class="toolbar-inner"><a href="#" class="link">A</a></div></div>',
      );
    }),
  );
});

describe("f7Link and f7Icon", () => {
  it.effect("renders an external icon-only link", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(
        f7Link({ icon: f7Icon("house"), external: true, src: "https://example.com" }),
      );
      expect(html).toBe(
        '<a href="https://example.com" class="link external icon-only" target="_blank">' +
          '<i class="icon f7-icons">house</i></a>',
      );
    }),
  );

  it.effect("wraps the label in a span next to an icon", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(f7Link({ label: "Home", icon: f7Icon("house") }));
      expect(html).toBe('<a href="#" class="link"><i class="icon f7-icons">house</i><span>Home</span></a>');
    }),
  );

  test("a link needs a label or an icon", () => {
    expect(() => f7Link({})).toThrow(ComponentArgumentError);
  });

  it.effect("uses material icons for the md theme", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(f7Icon("home", { lib: "md", color: "red" }));
      expect(html).toBe('<i class="icon material-icons md-only color-red">home</i>');
    }),
  );

  it.effect("renders legacy icon markup", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(f7Icon("house", { old: true, color: "blue" }));
      expect(html).toBe('<i class="f7-icons color-blue">house</i>');
    }),
  );

  test("legacy icons take no lib", () => {
    expect(() => f7Icon("house", { old: true, lib: "md" })).toThrow(ComponentArgumentError);
  });

  test("rejects unknown icon colors", () => {
    expect(() => f7Icon("home", { color: "magenta" })).toThrow(/Unknown color "magenta"/);
  });
});

describe("f7Appbar", () => {
  it.effect("renders panel toggles around its content", () =>
    Effect.gen(function* () {
      const html = yield* renderToString(f7Appbar({ leftPanel: true }, f7Link({ label: "Home" })));
      expect(html).toBe(
        '<div class="appbar"><div class="appbar-inner">' +
          '<div class="left"><a href="#" class="button button-small panel-toggle display-flex" data-panel="left">' +
          '<i class="icon f7-icons">bars</i></a></div>' +
          '<a href="#" class="link">Home</a>' +
          "</div></div>",
      );
    }),
  );
});
