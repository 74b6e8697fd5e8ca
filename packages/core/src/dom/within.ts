/**
 * @since 1.0.0
 * Queries scoped to a subtree
 */
import { Effect } from "effect";
import * as Debug from "../debug/debug.js";
import { InvalidContainerError } from "../errors.js";
import { isOrContains } from "../internal/is-or-contains.js";
import { bindQueries, type BoundQueries } from "./scoped-queries.js";

/**
 * Scope every query to `node`.
 *
 * Fails with `InvalidContainerError` when `node` is missing or not attached
 * to `document.body`.
 *
 * @example
 * ```ts
 * const form = yield* screen.getByRole("form")
 * const scoped = yield* within(form)
 * yield* scoped.getByLabelText("Email")
 * ```
 *
 * @since 1.0.0
 */
export const within = (
  node: HTMLElement | null | undefined,
): Effect.Effect<BoundQueries, InvalidContainerError> =>
  Effect.gen(function* () {
    if (node === null || node === undefined) {
      return yield* new InvalidContainerError({ reason: "missing" });
    }
    if (!isOrContains(document.body, node)) {
      return yield* new InvalidContainerError({ reason: "detached" });
    }
    const container = node;
    yield* Debug.log({ event: "within.bind", element_tag: container.tagName.toLowerCase() });
    return bindQueries(() => container);
  });
