/**
 * fireEvent Unit Tests
 */
import { assert, describe, it } from "@effect/vitest";
import { Cause, Effect, Exit, Option } from "effect";
import * as Debug from "../../debug/debug.js";
import { createEventByName, fireEvent, fireEventByName, isEventName } from "../fire-event.js";

const failure = <A, E>(exit: Exit.Exit<A, E>): E | null =>
  Exit.isFailure(exit) ? Option.getOrNull(Cause.failureOption(exit.cause)) : null;

describe("isEventName", () => {
  it("accepts keys of the event map", () => {
    assert.isTrue(isEventName("click"));
    assert.isTrue(isEventName("keyDown"));
  });

  it("rejects unknown and inherited names", () => {
    assert.isFalse(isEventName("explode"));
    assert.isFalse(isEventName("toString"));
  });
});

describe("fireEventByName", () => {
  it.effect("dispatches the named event with its init", () =>
    Effect.gen(function* () {
      const input = document.createElement("input");
      document.body.appendChild(input);
      const keys: Array<string> = [];
      input.addEventListener("keydown", (event) => keys.push(event.key));

      const dispatched = yield* fireEventByName("keyDown", input, { key: "Enter" });

      assert.isTrue(dispatched);
      assert.deepStrictEqual(keys, ["Enter"]);
    }),
  );

  it.effect("succeeds with false when a listener prevents the default", () =>
    Effect.gen(function* () {
      const link = document.createElement("a");
      document.body.appendChild(link);
      link.addEventListener("click", (event) => event.preventDefault());

      const dispatched = yield* fireEventByName("click", link);

      assert.isFalse(dispatched);
    }),
  );

  it.effect("assigns target properties before dispatching", () =>
    Effect.gen(function* () {
      const input = document.createElement("input");
      document.body.appendChild(input);
      const values: Array<string> = [];
      input.addEventListener("change", () => values.push(input.value));

      yield* fireEventByName("change", input, { target: { value: "hello" } });

      assert.deepStrictEqual(values, ["hello"]);
    }),
  );

  it.effect("fails with UnknownEventError for an unknown name", () =>
    Effect.gen(function* () {
      const error = failure(
        yield* Effect.exit(fireEventByName("explode", document.createElement("div"))),
      );

      assert.strictEqual(error?._tag, "UnknownEventError");
      assert.strictEqual(
        error?.message,
        'Unknown event name "explode". Use one of the keys of the event map, e.g. "click".',
      );
    }),
  );
});

describe("fireEvent", () => {
  it.effect("dispatches a prepared event and logs it", () =>
    Effect.gen(function* () {
      const events: Array<Debug.DebugEvent> = [];
      Debug.registerPlugin(Debug.createCollectorPlugin("collector", events));
      Debug.enable("event");

      const button = document.createElement("button");
      let clicks = 0;
      button.addEventListener("click", () => clicks++);
      const event = yield* createEventByName("click", button);
      yield* fireEvent(button, event);

      assert.strictEqual(clicks, 1);
      assert.strictEqual(event.type, "click");
      const [logged] = events;
      assert.deepStrictEqual(
        logged?.event === "event.fire"
          ? [logged.event_type, logged.element_tag, logged.dispatched]
          : null,
        ["click", "button", true],
      );
    }),
  );

  it.effect("dispatches on the document", () =>
    Effect.gen(function* () {
      let seen = false;
      const listener = () => {
        seen = true;
      };
      document.addEventListener("scroll", listener);
      yield* fireEventByName("scroll", document);
      document.removeEventListener("scroll", listener);

      assert.isTrue(seen);
    }),
  );
});
