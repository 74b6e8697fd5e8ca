/**
 * Query Unit Tests
 *
 * Each query type is checked against markup placed in document.body;
 * the setup file clears the body after every test.
 */
import { assert, describe, it } from "@effect/vitest";
import { Cause, Effect, Exit, Fiber, Option, TestClock } from "effect";
import { configure } from "../../config.js";
import * as Debug from "../../debug/debug.js";
import { queries } from "../queries/index.js";
import { screen } from "../screen.js";

const failure = <A, E>(exit: Exit.Exit<A, E>): E | null =>
  Exit.isFailure(exit) ? Option.getOrNull(Cause.failureOption(exit.cause)) : null;

const setBody = (html: string) =>
  Effect.sync(() => {
    document.body.innerHTML = html;
  });

// =============================================================================
// Variants
// =============================================================================
// Scope: get / query / find behavior, shown with the text query

describe("getBy", () => {
  it.effect("returns the only match", () =>
    Effect.gen(function* () {
      yield* setBody(`<p>Hello</p><span>Other</span>`);
      const element = yield* screen.getByText("Hello");
      assert.strictEqual(element.tagName, "P");
    }),
  );

  it.effect("fails with ElementNotFoundError when nothing matches", () =>
    Effect.gen(function* () {
      yield* setBody(`<p>Hello</p>`);
      const error = failure(yield* Effect.exit(screen.getByText("Missing")));

      assert.strictEqual(error?._tag, "ElementNotFoundError");
      if (error?._tag === "ElementNotFoundError") {
        assert.strictEqual(error.queryType, "text");
        assert.strictEqual(error.query, '"Missing"');
        assert.strictEqual(
          error.message,
          'Unable to find an element by text: "Missing"\n\n<body>\n  <p>\n    Hello\n  </p>\n</body>',
        );
      }
    }),
  );

  it.effect("fails with MultipleElementsFoundError when several match", () =>
    Effect.gen(function* () {
      yield* setBody(`<p>Hi</p><p>Hi</p>`);
      const error = failure(yield* Effect.exit(screen.getByText("Hi")));

      assert.strictEqual(error?._tag, "MultipleElementsFoundError");
      if (error?._tag === "MultipleElementsFoundError") {
        assert.strictEqual(error.count, 2);
        assert.strictEqual(
          error.message,
          'Found 2 elements by text: "Hi". Use one of the *AllBy* variants if multiple matches are expected.' +
            "\n\n<body>\n  <p>\n    Hi\n  </p>\n  <p>\n    Hi\n  </p>\n</body>",
        );
      }
    }),
  );
});

describe("getAllBy", () => {
  it.effect("returns every match in document order", () =>
    Effect.gen(function* () {
      yield* setBody(`<p id="a">Hi</p><p id="b">Hi</p>`);
      const elements = yield* screen.getAllByText("Hi");
      assert.deepStrictEqual(
        elements.map((element) => element.id),
        ["a", "b"],
      );
    }),
  );

  it.effect("fails when nothing matches", () =>
    Effect.gen(function* () {
      yield* setBody(`<p>Hi</p>`);
      const error = failure(yield* Effect.exit(screen.getAllByText("Bye")));
      assert.strictEqual(error?._tag, "ElementNotFoundError");
    }),
  );
});

describe("queryBy / queryAllBy", () => {
  it.effect("queryBy returns None when nothing matches", () =>
    Effect.gen(function* () {
      yield* setBody(`<p>Hi</p>`);
      const result = yield* screen.queryByText("Bye");
      assert.isTrue(Option.isNone(result));
    }),
  );

  it.effect("queryBy returns Some for a single match", () =>
    Effect.gen(function* () {
      yield* setBody(`<p>Hi</p>`);
      const result = yield* screen.queryByText("Hi");
      assert.strictEqual(Option.getOrNull(result)?.tagName, "P");
    }),
  );

  it.effect("queryBy fails when several match", () =>
    Effect.gen(function* () {
      yield* setBody(`<p>Hi</p><p>Hi</p>`);
      const error = failure(yield* Effect.exit(screen.queryByText("Hi")));
      assert.strictEqual(error?._tag, "MultipleElementsFoundError");
    }),
  );

  it.effect("queryAllBy returns an empty list when nothing matches", () =>
    Effect.gen(function* () {
      yield* setBody(`<p>Hi</p>`);
      const result = yield* screen.queryAllByText("Bye");
      assert.deepStrictEqual(result, []);
    }),
  );
});

describe("findBy", () => {
  it.effect("waits for the element to appear", () =>
    Effect.gen(function* () {
      const fiber = yield* Effect.fork(screen.findByText("Later"));
      yield* TestClock.adjust("1 millis");
      yield* setBody(`<p>Later</p>`);
      yield* TestClock.adjust("100 millis");

      const element = yield* Fiber.join(fiber);
      assert.strictEqual(element.textContent, "Later");
    }),
  );

  it.effect("fails with the last query error after the timeout", () =>
    Effect.gen(function* () {
      const fiber = yield* Effect.fork(
        screen.findByText("Never", undefined, { timeout: 300, interval: 100 }),
      );
      yield* TestClock.adjust("1 second");
      const error = failure(yield* Effect.exit(Fiber.join(fiber)));

      assert.strictEqual(error?._tag, "ElementNotFoundError");
    }),
  );

  it.live("findAllBy resolves with every match", () =>
    Effect.gen(function* () {
      yield* Effect.fork(
        Effect.sleep("20 millis").pipe(Effect.zipRight(setBody(`<li>Row</li><li>Row</li>`))),
      );
      const rows = yield* screen.findAllByText("Row");
      assert.strictEqual(rows.length, 2);
    }),
  );
});

// =============================================================================
// Query types
// =============================================================================

describe("ByText", () => {
  it.effect("matches substrings case-insensitively with exact: false", () =>
    Effect.gen(function* () {
      yield* setBody(`<p>Hello World</p>`);
      const element = yield* screen.getByText("hello", { exact: false });
      assert.strictEqual(element.textContent, "Hello World");
    }),
  );

  it.effect("accepts a RegExp and a matcher function", () =>
    Effect.gen(function* () {
      yield* setBody(`<p>Order #42</p>`);
      const byRegExp = yield* screen.getByText(/#\d+/);
      const byFunction = yield* screen.getByText(
        (content, element) => element?.tagName === "P" && content.endsWith("42"),
      );
      assert.strictEqual(byRegExp, byFunction);
    }),
  );

  it.effect("restricts matches with selector", () =>
    Effect.gen(function* () {
      yield* setBody(`<p>Name</p><label>Name</label>`);
      const element = yield* screen.getByText("Name", { selector: "label" });
      assert.strictEqual(element.tagName, "LABEL");
    }),
  );

  it.effect("skips the configured defaultIgnore elements", () =>
    Effect.gen(function* () {
      yield* setBody(`<style>Hidden</style>`);
      const ignored = yield* screen.queryAllByText("Hidden");

      configure({ defaultIgnore: "script" });
      const included = yield* screen.queryAllByText("Hidden");

      assert.strictEqual(ignored.length, 0);
      assert.strictEqual(included.length, 1);
    }),
  );
});

describe("ByTestId", () => {
  it.effect("reads data-testid by default", () =>
    Effect.gen(function* () {
      yield* setBody(`<div data-testid="card">Card</div>`);
      const element = yield* screen.getByTestId("card");
      assert.strictEqual(element.textContent, "Card");
    }),
  );

  it.effect("reads the configured attribute", () =>
    Effect.gen(function* () {
      yield* setBody(`<div data-qa="card">Card</div>`);
      configure({ testIdAttribute: "data-qa" });
      const element = yield* screen.getByTestId("card");
      assert.strictEqual(element.textContent, "Card");
    }),
  );
});

describe("ByTitle", () => {
  it.effect("matches the title attribute", () =>
    Effect.gen(function* () {
      yield* setBody(`<span title="Delete">x</span>`);
      const element = yield* screen.getByTitle("Delete");
      assert.strictEqual(element.tagName, "SPAN");
    }),
  );

  it.effect("matches the title child of an SVG element", () =>
    Effect.gen(function* () {
      yield* setBody(`<svg><title>Close</title><path d="M0 0" /></svg>`);
      const element = yield* screen.getByTitle("Close");
      assert.strictEqual(element.tagName.toLowerCase(), "title");
      assert.strictEqual(element.parentElement?.tagName.toLowerCase(), "svg");
    }),
  );
});

describe("ByRole", () => {
  it.effect("narrows by accessible name", () =>
    Effect.gen(function* () {
      yield* setBody(`<button>Save</button><button>Cancel</button>`);
      const element = yield* screen.getByRole("button", { name: "Save" });
      assert.strictEqual(element.textContent, "Save");
    }),
  );

  it.effect("describes the role in errors", () =>
    Effect.gen(function* () {
      yield* setBody(`<button>Save</button><button>Cancel</button>`);
      const error = failure(yield* Effect.exit(screen.getByRole("button")));

      assert.strictEqual(error?._tag, "MultipleElementsFoundError");
      if (error?._tag === "MultipleElementsFoundError") {
        assert.strictEqual(error.queryType, "role");
        assert.strictEqual(error.query, '"button"');
      }
    }),
  );

  it.effect("skips inaccessible elements unless hidden is set", () =>
    Effect.gen(function* () {
      yield* setBody(`<button hidden>Secret</button><button>Shown</button>`);
      const visible = yield* screen.queryAllByRole("button");
      const all = yield* screen.queryAllByRole("button", { hidden: true });

      assert.deepStrictEqual(
        visible.map((button) => button.textContent),
        ["Shown"],
      );
      assert.deepStrictEqual(
        all.map((button) => button.textContent),
        ["Secret", "Shown"],
      );
    }),
  );

  it.effect("includes inaccessible elements when defaultHidden is configured", () =>
    Effect.gen(function* () {
      yield* setBody(`<button hidden>Secret</button><button>Shown</button>`);
      configure({ defaultHidden: true });
      const all = yield* screen.queryAllByRole("button");

      assert.strictEqual(all.length, 2);
    }),
  );

  it.effect("getAllByRole returns every element with the role", () =>
    Effect.gen(function* () {
      yield* setBody(`<ul><li>One</li><li>Two</li></ul>`);
      const items = yield* screen.getAllByRole("listitem");
      assert.deepStrictEqual(
        items.map((item) => item.textContent),
        ["One", "Two"],
      );
    }),
  );
});

describe("ByLabelText", () => {
  it.effect("finds the control a label points to", () =>
    Effect.gen(function* () {
      yield* setBody(`<label for="email">Email</label><input id="email" />`);
      const element = yield* screen.getByLabelText("Email");
      assert.strictEqual(element.id, "email");
    }),
  );

  it.effect("finds a control by aria-label", () =>
    Effect.gen(function* () {
      yield* setBody(`<input aria-label="Search" />`);
      const element = yield* screen.getByLabelText("Search");
      assert.strictEqual(element.tagName, "INPUT");
    }),
  );
});

describe("ByAltText", () => {
  it.effect("matches the alt attribute", () =>
    Effect.gen(function* () {
      yield* setBody(`<img alt="Company logo" />`);
      const element = yield* screen.getByAltText("Company logo");
      assert.strictEqual(element.tagName, "IMG");
    }),
  );
});

describe("ByPlaceholderText", () => {
  it.effect("matches the placeholder attribute", () =>
    Effect.gen(function* () {
      yield* setBody(`<input placeholder="Search" />`);
      const element = yield* screen.getByPlaceholderText("Search");
      assert.strictEqual(element.getAttribute("placeholder"), "Search");
    }),
  );
});

describe("ByDisplayValue", () => {
  it.effect("matches the current value of a control", () =>
    Effect.gen(function* () {
      yield* setBody(`<input value="Ada" /><textarea>Notes</textarea>`);
      const input = yield* screen.getByDisplayValue("Ada");
      const textarea = yield* screen.getByDisplayValue("Notes");
      assert.strictEqual(input.tagName, "INPUT");
      assert.strictEqual(textarea.tagName, "TEXTAREA");
    }),
  );
});

// =============================================================================
// Unbound queries and logging
// =============================================================================

describe("queries", () => {
  it.effect("take the container as first argument", () =>
    Effect.gen(function* () {
      yield* setBody(`<section id="a"><p>Hi</p></section><section id="b"><p>Hi</p></section>`);
      const section = document.getElementById("b");
      assert.isNotNull(section);
      if (section !== null) {
        const element = yield* queries.getByText(section, "Hi");
        assert.strictEqual(element.parentElement, section);
      }
    }),
  );

  it.effect("log query.get with the match count", () =>
    Effect.gen(function* () {
      const events: Array<Debug.DebugEvent> = [];
      Debug.registerPlugin(Debug.createCollectorPlugin("collector", events));
      Debug.enable("query");

      yield* setBody(`<p>Hi</p>`);
      yield* screen.queryAllByText("Hi");
      yield* Effect.exit(screen.getByText("Bye"));

      assert.deepStrictEqual(
        events.map((event) => event.event),
        ["query.get", "query.get", "query.get.failed"],
      );
      const first = events[0];
      assert.strictEqual(first?.event === "query.get" ? first.match_count : -1, 1);
    }),
  );
});
