/**
 * Observer Service Tests
 *
 * Tests the in-memory implementation and the MutationObserver default.
 */
import { assert, describe, it } from "@effect/vitest";
import { Deferred, Effect, Exit, Scope } from "effect";
import { browser, makeTest, Observer } from "../observer.js";

describe("Observer.mutation (test implementation)", () => {
  it.scoped("mutation registers handler for target", () => {
    const observer = makeTest();
    return Effect.gen(function* () {
      const obs = yield* Observer;
      const received: Array<number> = [];
      const target = document.createElement("div");

      yield* obs.mutation(target, { childList: true }, (mutations) =>
        Effect.sync(() => {
          received.push(mutations.length);
        }),
      );

      yield* observer.triggerMutation(target, []);
      yield* observer.triggerMutation(target);

      assert.deepStrictEqual(received, [0, 0]);
      assert.deepStrictEqual(observer.observedTargets(), [target]);
    }).pipe(Effect.provideService(Observer, observer));
  });

  it.effect("mutation handler removed on scope close", () => {
    const observer = makeTest();
    return Effect.gen(function* () {
      const obs = yield* Observer;
      const received: Array<number> = [];
      const target = document.createElement("div");

      const scope = yield* Scope.make();
      yield* obs
        .mutation(target, { childList: true }, (mutations) =>
          Effect.sync(() => {
            received.push(mutations.length);
          }),
        )
        .pipe(Effect.provideService(Scope.Scope, scope));

      yield* Scope.close(scope, Exit.void);
      yield* observer.triggerMutation(target);

      assert.deepStrictEqual(received, []);
      assert.deepStrictEqual(observer.observedTargets(), []);
    }).pipe(Effect.provideService(Observer, observer));
  });

  it.effect("keeps other handlers on a target when one scope closes", () => {
    const observer = makeTest();
    return Effect.gen(function* () {
      const obs = yield* Observer;
      const received: Array<string> = [];
      const target = document.createElement("div");
      const record = (name: string) => () =>
        Effect.sync(() => {
          received.push(name);
        });

      const first = yield* Scope.make();
      const second = yield* Scope.make();
      yield* obs
        .mutation(target, { childList: true }, record("first"))
        .pipe(Effect.provideService(Scope.Scope, first));
      yield* obs
        .mutation(target, { childList: true }, record("second"))
        .pipe(Effect.provideService(Scope.Scope, second));

      yield* observer.triggerMutation(target);
      yield* Scope.close(second, Exit.void);
      yield* observer.triggerMutation(target);

      assert.deepStrictEqual(received, ["first", "second", "first"]);
      assert.deepStrictEqual(observer.observedTargets(), [target]);

      yield* Scope.close(first, Exit.void);
      assert.deepStrictEqual(observer.observedTargets(), []);
    }).pipe(Effect.provideService(Observer, observer));
  });

  it.effect("triggerMutation on an unobserved target is a no-op", () =>
    Effect.gen(function* () {
      const observer = makeTest();
      yield* observer.triggerMutation(document.createElement("span"));
      assert.deepStrictEqual(observer.observedTargets(), []);
    }),
  );
});

describe("Observer (default)", () => {
  it.effect("defaults to the browser implementation", () =>
    Effect.gen(function* () {
      const obs = yield* Observer;
      assert.strictEqual(obs, browser);
    }),
  );

  it.live("browser implementation reports DOM mutations", () =>
    Effect.gen(function* () {
      const obs = yield* Observer;
      const target = document.createElement("div");
      document.body.appendChild(target);
      const seen = yield* Deferred.make<number>();

      yield* obs.mutation(target, { childList: true }, (mutations) =>
        Deferred.succeed(seen, mutations.length).pipe(Effect.asVoid),
      );
      target.appendChild(document.createElement("span"));

      const count = yield* Deferred.await(seen).pipe(Effect.timeout("1 second"));
      assert.isAtLeast(count, 1);
    }).pipe(Effect.scoped),
  );
});
