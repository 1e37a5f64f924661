import { describe, expect } from "vitest";
import { it } from "@effect/vitest";
import * as Effect from "effect/Effect";
import * as Exit from "effect/Exit";
import * as Logger from "effect/Logger";
import * as Stream from "effect/Stream";
import { h, singleton, tagList, tags } from "./h.js";
import { renderDocument, renderToString } from "./server.js";
import { type VElement, isVElement } from "./shared.js";

// =============================================================================
// Basic HTML Rendering
// =============================================================================

describe("renderToString", () => {
  describe("basic elements", () => {
    it.effect("renders a simple div", () =>
      Effect.gen(function* () {
        const html = yield* renderToString(h("div", {}, []));
        expect(html).toBe("<div></div>");
      }),
    );

    it.effect("renders text content", () =>
      Effect.gen(function* () {
        const html = yield* renderToString(h("p", {}, ["Hello, world!"]));
        expect(html).toBe("<p>Hello, world!</p>");
      }),
    );

    it.effect("renders nested elements", () =>
      Effect.gen(function* () {
        const html = yield* renderToString(h("div", {}, [h("span", {}, ["Nested"])]));
        expect(html).toBe("<div><span>Nested</span></div>");
      }),
    );

    it.effect("renders adjacent text children without separators", () =>
      Effect.gen(function* () {
        const html = yield* renderToString(h("p", {}, ["Count: ", 3]));
        expect(html).toBe("<p>Count: 3</p>");
      }),
    );
  });

  describe("attributes", () => {
    it.effect("renders string attributes", () =>
      Effect.gen(function* () {
        const html = yield* renderToString(h("div", { id: "test", class: "container" }, []));
        expect(html).toBe('<div id="test" class="container"></div>');
      }),
    );

    it.effect("converts className and htmlFor", () =>
      Effect.gen(function* () {
        const html = yield* renderToString(
          h("div", { className: "my-class" }, [h("label", { htmlFor: "input-id" }, [])]),
        );
        expect(html).toBe('<div class="my-class"><label for="input-id"></label></div>');
      }),
    );

    it.effect("renders boolean true as attribute name only and omits false", () =>
      Effect.gen(function* () {
        expect(yield* renderToString(h("input", { disabled: true }, []))).toBe("<input disabled />");
        expect(yield* renderToString(h("input", { disabled: false }, []))).toBe("<input />");
      }),
    );

    it.effect("converts camelCase data attributes to kebab-case", () =>
      Effect.gen(function* () {
        const html = yield* renderToString(h("div", { dataPanel: "left" }, []));
        expect(html).toBe('<div data-panel="left"></div>');
      }),
    );

    it.effect("skips function handlers but keeps inline script attributes", () =>
      Effect.gen(function* () {
        const html = yield* renderToString(
          h("body", { onClick: () => undefined, onload: "start()" }, []),
        );
        expect(html).toBe('<body onload="start()"></body>');
      }),
    );

    it.effect("does not render builder metadata", () =>
      Effect.gen(function* () {
        const html = yield* renderToString(
          h("div", { id: "tab", metadata: { icon: h("i", {}, ["house"]) } }, []),
        );
        expect(html).toBe('<div id="tab"></div>');
      }),
    );

    it.effect("renders data-key for keyed elements", () =>
      Effect.gen(function* () {
        const html = yield* renderToString(h("li", { key: "item-1" }, ["Item 1"]));
        expect(html).toBe('<li data-key="item-1">Item 1</li>');
      }),
    );

    it.effect("escapes attribute values", () =>
      Effect.gen(function* () {
        const html = yield* renderToString(h("div", { title: 'a "quoted" <b>' }, []));
        expect(html).toBe('<div title="a &quot;quoted&quot; &lt;b&gt;"></div>');
      }),
    );
  });

  describe("text handling", () => {
    it.effect("escapes text content", () =>
      Effect.gen(function* () {
        const html = yield* renderToString(h("p", {}, ["<script>alert('x')</script>"]));
        expect(html).toBe("<p>&lt;script&gt;alert(&#039;x&#039;)&lt;/script&gt;</p>");
      }),
    );

    it.effect("keeps script bodies verbatim", () =>
      Effect.gen(function* () {
        const html = yield* renderToString(tags.script("$('#app').addClass('x') && 1 < 2;"));
        expect(html).toBe("<script>$('#app').addClass('x') && 1 < 2;</script>");
      }),
    );

    it.effect("breaks up closing tags inside raw text", () =>
      Effect.gen(function* () {
        const html = yield* renderToString(tags.style("a::after { content: '</style>'; }"));
        expect(html).toBe("<style>a::after { content: '<\\/style>'; }</style>");
      }),
    );
  });

  describe("fragments and singletons", () => {
    it.effect("renders fragment children without a wrapper", () =>
      Effect.gen(function* () {
        const html = yield* renderToString(tagList(tags.span("a"), null, tags.span("b")));
        expect(html).toBe("<span>a</span><span>b</span>");
      }),
    );

    it.effect("emits a singleton once per document", () =>
      Effect.gen(function* () {
        const style = () => singleton("split-css", tags.style(".x{}"));
        const html = yield* renderToString(tags.div(style(), tags.div(style())));
        expect(html).toBe("<div><style>.x{}</style><div></div></div>");
      }),
    );

    it.effect("starts every render with a fresh singleton set", () =>
      Effect.gen(function* () {
        const tree = singleton("once", tags.span("x"));
        expect(yield* renderToString(tree)).toBe("<span>x</span>");
        expect(yield* renderToString(tree)).toBe("<span>x</span>");
      }),
    );
  });

  describe("function components", () => {
    it.effect("renders a component returning an element", () =>
      Effect.gen(function* () {
        const Greeting = (props: VElement["props"]) => h("p", {}, [`Hello ${String(props.name)}`]);
        const html = yield* renderToString(h(Greeting, { name: "Ada" }));
        expect(html).toBe("<p>Hello Ada</p>");
      }),
    );

    it.effect("awaits components returning an Effect", () =>
      Effect.gen(function* () {
        const Deferred = () => Effect.succeed(h("span", {}, ["later"]));
        const html = yield* renderToString(h("div", {}, [h(Deferred)]));
        expect(html).toBe("<div><span>later</span></div>");
      }),
    );

    it.effect("takes the first emission of a Stream component", () =>
      Effect.gen(function* () {
        const Live = () => Stream.make(h("b", {}, ["first"]), h("b", {}, ["second"]));
        const html = yield* renderToString(h(Live));
        expect(html).toBe("<b>first</b>");
      }),
    );

    it.effect("renders nothing for an empty Stream", () =>
      Effect.gen(function* () {
        const Empty = () => Stream.empty;
        const html = yield* renderToString(h("div", {}, [h(Empty)]));
        expect(html).toBe("<div></div>");
      }),
    );

    it.effect("fails with RenderError when a component throws", () =>
      Effect.gen(function* () {
        const Broken = (): VElement => {
          throw new Error("boom");
        };
        const exit = yield* Effect.exit(renderToString(h("div", {}, [h(Broken)])));
        expect(Exit.isFailure(exit)).toBe(true);
        const error = yield* Effect.flip(renderToString(h(Broken)));
        expect(error._tag).toBe("RenderError");
        expect(error.componentName).toBe("Broken");
      }),
    );

    it.effect("fails with RenderError when a component Effect fails", () =>
      Effect.gen(function* () {
        const Failing = () => Effect.fail("no data");
        const error = yield* Effect.flip(renderToString(h(Failing)));
        expect(error.cause).toBe("no data");
      }),
    );
  });

  describe("unknown element types", () => {
    it.effect("skips them and logs a warning", () =>
      Effect.gen(function* () {
        const messages: string[] = [];
        const capture = Logger.make(({ message }) => {
          messages.push(String(message));
        });
        const foreign: unknown = { type: "BOUNDARY", props: { children: [] } };
        if (!isVElement(foreign)) {
          throw new Error("expected a VElement shape");
        }
        const html = yield* renderToString(h("div", {}, [foreign])).pipe(
          Effect.provide(Logger.replace(Logger.defaultLogger, capture)),
        );
        expect(html).toBe("<div></div>");
        expect(messages).toEqual(['Skipping element with unknown type "BOUNDARY"']);
      }),
    );
  });
});

describe("renderDocument", () => {
  it.effect("prefixes the doctype", () =>
    Effect.gen(function* () {
      const html = yield* renderDocument(tags.html(tags.body()));
      expect(html).toBe("<!DOCTYPE html><html><body></body></html>");
    }),
  );
});
