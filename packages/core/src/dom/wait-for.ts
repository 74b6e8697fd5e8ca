/**
 * @since 1.0.0
 * Async utilities
 *
 * `waitFor` re-runs a callback until it succeeds: once immediately, then on
 * every interval tick and on every DOM mutation inside the container.
 * Built on `Effect.sleep` and a `Queue`, so it runs under
 * TestClock: fork the wait, adjust the clock, then join.
 */
import { Duration, Effect, Either, Option, Queue, identity } from "effect";
import { getConfig } from "../config.js";
import * as Debug from "../debug/debug.js";
import { RemovalPreconditionError, WaitForTimeoutError } from "../errors.js";
import { Observer } from "../platform/observer.js";
import { prettyDOM } from "./pretty-dom.js";

/**
 * Nodes an async utility can watch
 * @since 1.0.0
 */
export type AsyncContainer = Element | Document;

/**
 * @since 1.0.0
 */
export interface WaitForOptions<E> {
  /** Node whose mutations trigger a re-check. Defaults to `document`. */
  readonly container?: AsyncContainer;
  /** Defaults to `asyncUtilTimeout` from the config */
  readonly timeout?: number;
  /** Defaults to `asyncUtilInterval` from the config */
  readonly interval?: number;
  readonly mutationObserverOptions?: MutationObserverInit;
  /** Maps the error the wait fails with once time is up */
  readonly onTimeout?: (error: E | WaitForTimeoutError) => E | WaitForTimeoutError;
}

/**
 * @since 1.0.0
 */
export const DEFAULT_MUTATION_OBSERVER_OPTIONS: MutationObserverInit = {
  subtree: true,
  childList: true,
  attributes: true,
  characterData: true,
};

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const poll = <A, E, R>(
  attempt: Effect.Effect<A, E, R>,
  options: WaitForOptions<E>,
): Effect.Effect<A, E | WaitForTimeoutError, R> =>
  Effect.gen(function* () {
    const config = getConfig();
    const container = options.container ?? document;
    const timeout = options.timeout ?? config.asyncUtilTimeout;
    const interval = options.interval ?? config.asyncUtilInterval;
    const onTimeout =
      options.onTimeout ?? ((error: E | WaitForTimeoutError): E | WaitForTimeoutError => error);

    if (!(timeout > 0) || !(interval > 0)) {
      return yield* Effect.dieMessage(
        `waitFor requires a positive timeout and interval (got timeout=${timeout}, interval=${interval})`,
      );
    }

    const observer = yield* Observer;
    const wakeups = yield* Queue.sliding<void>(1);
    yield* observer.mutation(
      container,
      options.mutationObserverOptions ?? DEFAULT_MUTATION_OBSERVER_OPTIONS,
      () => Queue.offer(wakeups, undefined).pipe(Effect.asVoid),
    );

    yield* Debug.log({ event: "wait.start", timeout, interval });

    let lastError: Option.Option<E> = Option.none();
    let attempts = 0;

    const loop: Effect.Effect<A, never, R> = Effect.gen(function* () {
      while (true) {
        attempts++;
        const result = yield* Effect.either(attempt);
        if (Either.isRight(result)) {
          return result.right;
        }
        lastError = Option.some(result.left);
        yield* Debug.log({
          event: "wait.attempt.failed",
          attempt: attempts,
          error_message: errorMessage(result.left),
        });
        // Whichever comes first: a mutation in the container or the next tick
        yield* Effect.raceFirst(Queue.take(wakeups), Effect.sleep(Duration.millis(interval)));
      }
    });

    const value = yield* loop.pipe(
      Effect.timeoutFail({
        duration: Duration.millis(timeout),
        onTimeout: () =>
          onTimeout(
            Option.getOrElse(
              lastError,
              (): E | WaitForTimeoutError =>
                new WaitForTimeoutError({
                  timeout,
                  message: withContainer(`Timed out in waitFor after ${timeout}ms.`, container),
                }),
            ),
          ),
      }),
      Effect.tapError((error) =>
        Debug.log({ event: "wait.timeout", timeout, error_message: errorMessage(error) }),
      ),
    );

    yield* Debug.log({ event: "wait.success", attempts });
    return value;
  }).pipe(Effect.scoped);

const withContainer = (message: string, container: AsyncContainer): string => {
  const dom = prettyDOM(container);
  return dom.length > 0 ? `${message}\n\n${dom}` : message;
};

/**
 * Wait until `callback` succeeds.
 *
 * The callback is either an Effect (its typed failures are retried) or a
 * synchronous function (anything it throws is retried). Defects are never
 * retried. When time runs out the wait fails with the callback's last
 * failure, or with a `WaitForTimeoutError` if it never failed (for example
 * because a slow attempt was still running), after passing it through
 * `onTimeout`.
 *
 * @example
 * ```ts
 * // In a test with TestClock - fork first, then adjust time:
 * const fiber = yield* Effect.fork(waitFor(screen.getByText("Saved")))
 * yield* TestClock.adjust(1000)
 * const element = yield* Fiber.join(fiber)
 * ```
 *
 * @since 1.0.0
 */
export function waitFor<A, E, R>(
  callback: Effect.Effect<A, E, R>,
  options?: WaitForOptions<E>,
): Effect.Effect<A, E | WaitForTimeoutError, R>;
export function waitFor<A>(
  callback: () => A,
  options?: WaitForOptions<unknown>,
): Effect.Effect<A, unknown>;
export function waitFor(
  callback: Effect.Effect<unknown, unknown, unknown> | (() => unknown),
  options: WaitForOptions<unknown> = {},
): Effect.Effect<unknown, unknown, unknown> {
  if (Effect.isEffect(callback)) {
    return poll(callback, options);
  }
  return poll(
    Effect.try({
      try: callback,
      catch: identity,
    }),
    options,
  );
}

// =============================================================================
// Element removal
// =============================================================================

/**
 * Options of the removal utilities
 * @since 1.0.0
 */
export type RemovalOptions = WaitForOptions<WaitForTimeoutError>;

/**
 * @since 1.0.0
 */
export type RemovalTarget<T> = T | null | undefined | (() => T | null | undefined);

const waitForRemoval = (
  plural: boolean,
  resolve: () => ReadonlyArray<Element>,
  options: RemovalOptions,
): Effect.Effect<void, RemovalPreconditionError | WaitForTimeoutError> =>
  Effect.gen(function* () {
    const container = options.container ?? document;
    const timeout = options.timeout ?? getConfig().asyncUtilTimeout;

    const initial = resolve();
    if (initial.length === 0) {
      return yield* new RemovalPreconditionError({ reason: "empty", plural, dom: "" });
    }
    if (!initial.every((element) => container.contains(element))) {
      return yield* new RemovalPreconditionError({
        reason: "not_present",
        plural,
        dom: prettyDOM(container),
      });
    }

    yield* Debug.log({ event: "wait.removal", element_count: initial.length });

    const removed = Effect.suspend(() =>
      resolve().some((element) => container.contains(element))
        ? Effect.fail(
            new WaitForTimeoutError({
              timeout,
              message: withContainer(
                `The element returned from the callback was still present in the container after ${timeout}ms:`,
                container,
              ),
            }),
          )
        : Effect.void,
    );

    yield* waitFor(removed, { ...options, container, timeout });
  });

/**
 * Wait until an element is no longer inside the container.
 *
 * Fails immediately with `RemovalPreconditionError` when the target is
 * missing or not in the container at call time.
 *
 * @example
 * ```ts
 * yield* waitForElementToBeRemoved(() => document.querySelector(".spinner"))
 * ```
 *
 * @since 1.0.0
 */
export const waitForElementToBeRemoved = (
  target: RemovalTarget<Element>,
  options: RemovalOptions = {},
): Effect.Effect<void, RemovalPreconditionError | WaitForTimeoutError> =>
  waitForRemoval(
    false,
    () => {
      const element = typeof target === "function" ? target() : target;
      return element === null || element === undefined ? [] : [element];
    },
    options,
  );

/**
 * Wait until every element is no longer inside the container.
 * @since 1.0.0
 */
export const waitForElementsToBeRemoved = (
  target: RemovalTarget<ReadonlyArray<Element>>,
  options: RemovalOptions = {},
): Effect.Effect<void, RemovalPreconditionError | WaitForTimeoutError> =>
  waitForRemoval(
    true,
    () => (typeof target === "function" ? target() : target) ?? [],
    options,
  );
