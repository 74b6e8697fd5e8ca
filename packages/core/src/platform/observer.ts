/**
 * @since 1.0.0
 * Observer Service
 *
 * Observe DOM mutations with lifecycle.
 * Auto-disconnects on scope close.
 */
import { Context, Effect, Runtime, type Scope } from "effect";

// =============================================================================
// Service interface
// =============================================================================

export interface ObserverService {
  readonly mutation: (
    target: Node,
    options: MutationObserverInit,
    handler: (mutations: ReadonlyArray<MutationRecord>) => Effect.Effect<void>,
  ) => Effect.Effect<void, never, Scope.Scope>;
}

// =============================================================================
// Test-only interface
// =============================================================================

export interface TestObserverService extends ObserverService {
  readonly triggerMutation: (
    target: Node,
    mutations?: ReadonlyArray<MutationRecord>,
  ) => Effect.Effect<void>;
  readonly observedTargets: () => ReadonlyArray<Node>;
}

// =============================================================================
// Browser implementation
// =============================================================================

export const browser: ObserverService = {
  mutation: (target, options, handler) =>
    Effect.gen(function* () {
      const runtime = yield* Effect.runtime<never>();
      const runFork = Runtime.runFork(runtime);

      const observer = new MutationObserver((mutations) => {
        runFork(handler(mutations));
      });

      observer.observe(target, options);

      yield* Effect.addFinalizer(() =>
        Effect.sync(() => {
          observer.disconnect();
        }),
      );
    }),
};

// =============================================================================
// Reference
// =============================================================================

/**
 * Defaults to the browser `MutationObserver`, so the async utilities need
 * no layer. Provide `makeTest()` to trigger mutations by hand.
 * @since 1.0.0
 */
export class Observer extends Context.Reference<Observer>()("domscope/platform/Observer", {
  defaultValue: (): ObserverService => browser,
}) {}

// =============================================================================
// Test implementation
// =============================================================================

export const makeTest = (): TestObserverService => {
  type Handler = (mutations: ReadonlyArray<MutationRecord>) => Effect.Effect<void>;
  // Several scopes may watch one target; each registration is removed on its own
  const mutationHandlers = new Map<Node, Set<Handler>>();

  return {
    mutation: (target, _options, handler) =>
      Effect.gen(function* () {
        // One entry per registration, even for the same function
        const registration: Handler = (mutations) => handler(mutations);
        const handlers = mutationHandlers.get(target) ?? new Set<Handler>();
        handlers.add(registration);
        mutationHandlers.set(target, handlers);

        yield* Effect.addFinalizer(() =>
          Effect.sync(() => {
            handlers.delete(registration);
            if (handlers.size === 0 && mutationHandlers.get(target) === handlers) {
              mutationHandlers.delete(target);
            }
          }),
        );
      }),

    triggerMutation: (target, mutations = []) =>
      Effect.forEach(Array.from(mutationHandlers.get(target) ?? []), (handler) => handler(mutations), {
        discard: true,
      }),

    observedTargets: () => Array.from(mutationHandlers.keys()),
  };
};
