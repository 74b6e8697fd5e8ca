/**
 * @since 1.0.0
 * Query factory
 *
 * Derives the get / query / find variants of a query type from its
 * `queryAll` function.
 */
import { Effect, Option } from "effect";
import * as Debug from "../../debug/debug.js";
import {
  ElementNotFoundError,
  MultipleElementsFoundError,
  type QueryError,
  type WaitForTimeoutError,
} from "../../errors.js";
import { prettyDOM } from "../pretty-dom.js";
import { waitFor, type WaitForOptions } from "../wait-for.js";

/**
 * Synchronous lookup of every element matching `matcher` inside `container`.
 * @since 1.0.0
 */
export type QueryAllFn<M, O> = (
  container: HTMLElement,
  matcher: M,
  options?: O,
) => ReadonlyArray<HTMLElement>;

/**
 * The six variants of one query type.
 * @since 1.0.0
 */
export interface BuiltQueries<M, O> {
  /** Every match, possibly none */
  readonly queryAllBy: (
    container: HTMLElement,
    matcher: M,
    options?: O,
  ) => Effect.Effect<ReadonlyArray<HTMLElement>>;
  /** The only match, `None` when absent */
  readonly queryBy: (
    container: HTMLElement,
    matcher: M,
    options?: O,
  ) => Effect.Effect<Option.Option<HTMLElement>, MultipleElementsFoundError>;
  /** Every match, failing when there is none */
  readonly getAllBy: (
    container: HTMLElement,
    matcher: M,
    options?: O,
  ) => Effect.Effect<ReadonlyArray<HTMLElement>, ElementNotFoundError>;
  /** The only match */
  readonly getBy: (
    container: HTMLElement,
    matcher: M,
    options?: O,
  ) => Effect.Effect<HTMLElement, QueryError>;
  /** `getAllBy` retried with `waitFor` */
  readonly findAllBy: (
    container: HTMLElement,
    matcher: M,
    options?: O,
    waitForOptions?: WaitForOptions<ElementNotFoundError>,
  ) => Effect.Effect<ReadonlyArray<HTMLElement>, ElementNotFoundError | WaitForTimeoutError>;
  /** `getBy` retried with `waitFor` */
  readonly findBy: (
    container: HTMLElement,
    matcher: M,
    options?: O,
    waitForOptions?: WaitForOptions<QueryError>,
  ) => Effect.Effect<HTMLElement, QueryError | WaitForTimeoutError>;
}

/**
 * Build the query variants.
 *
 * @param queryType - label used in messages, e.g. `"text"` or `"test id"`
 * @param queryAll - the lookup every variant runs
 * @param describe - renders a matcher for messages
 *
 * @example
 * ```ts
 * const byHref = buildQueries(
 *   "href",
 *   (container, href: string) => Array.from(container.querySelectorAll<HTMLAnchorElement>(`a[href="${href}"]`)),
 *   (href) => `"${href}"`,
 * )
 * const link = yield* byHref.getBy(document.body, "/home")
 * ```
 *
 * @since 1.0.0
 */
export const buildQueries = <M, O>(
  queryType: string,
  queryAll: QueryAllFn<M, O>,
  describe: (matcher: M) => string,
): BuiltQueries<M, O> => {
  const notFound = (container: HTMLElement, matcher: M) =>
    Effect.gen(function* () {
      const query = describe(matcher);
      yield* Debug.log({ event: "query.get.failed", query_type: queryType, query, reason: "not_found" });
      return yield* new ElementNotFoundError({ queryType, query, dom: prettyDOM(container) });
    });

  const multiple = (container: HTMLElement, matcher: M, count: number) =>
    Effect.gen(function* () {
      const query = describe(matcher);
      yield* Debug.log({ event: "query.get.failed", query_type: queryType, query, reason: "multiple" });
      return yield* new MultipleElementsFoundError({
        queryType,
        query,
        count,
        dom: prettyDOM(container),
      });
    });

  const queryAllBy: BuiltQueries<M, O>["queryAllBy"] = (container, matcher, options) =>
    Effect.gen(function* () {
      const found = queryAll(container, matcher, options);
      yield* Debug.log({
        event: "query.get",
        query_type: queryType,
        query: describe(matcher),
        match_count: found.length,
      });
      return found;
    });

  const queryBy: BuiltQueries<M, O>["queryBy"] = (container, matcher, options) =>
    Effect.gen(function* () {
      const found = yield* queryAllBy(container, matcher, options);
      if (found.length > 1) {
        return yield* multiple(container, matcher, found.length);
      }
      return Option.fromNullable(found[0]);
    });

  const getAllBy: BuiltQueries<M, O>["getAllBy"] = (container, matcher, options) =>
    Effect.gen(function* () {
      const found = yield* queryAllBy(container, matcher, options);
      if (found.length === 0) {
        return yield* notFound(container, matcher);
      }
      return found;
    });

  const getBy: BuiltQueries<M, O>["getBy"] = (container, matcher, options) =>
    Effect.gen(function* () {
      const found = yield* queryAllBy(container, matcher, options);
      const [first, ...rest] = found;
      if (first === undefined) {
        return yield* notFound(container, matcher);
      }
      if (rest.length > 0) {
        return yield* multiple(container, matcher, found.length);
      }
      return first;
    });

  const findAllBy: BuiltQueries<M, O>["findAllBy"] = (container, matcher, options, waitForOptions) =>
    Debug.log({ event: "query.find", query_type: queryType, query: describe(matcher) }).pipe(
      Effect.zipRight(
        waitFor(getAllBy(container, matcher, options), { container, ...waitForOptions }),
      ),
    );

  const findBy: BuiltQueries<M, O>["findBy"] = (container, matcher, options, waitForOptions) =>
    Debug.log({ event: "query.find", query_type: queryType, query: describe(matcher) }).pipe(
      Effect.zipRight(waitFor(getBy(container, matcher, options), { container, ...waitForOptions })),
    );

  return { queryAllBy, queryBy, getAllBy, getBy, findAllBy, findBy };
};
