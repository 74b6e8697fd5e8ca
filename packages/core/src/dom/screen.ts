/**
 * @since 1.0.0
 * Queries bound to `document.body`
 *
 * @example
 * ```ts
 * const button = yield* screen.getByRole("button", { name: "Save" })
 * yield* screen.debug()
 * ```
 */
import type { Effect } from "effect";
import { logDOM, type PrintableNode } from "./pretty-dom.js";
import { bindQueries, type BoundQueries } from "./scoped-queries.js";

/**
 * @since 1.0.0
 */
export interface Screen extends BoundQueries {
  /** Log the pretty-printed node, `document.body` by default */
  readonly debug: (node?: PrintableNode, maxLength?: number) => Effect.Effect<string>;
}

/**
 * @since 1.0.0
 */
export const screen: Screen = {
  ...bindQueries(() => document.body),
  debug: (node, maxLength) => logDOM(node ?? document.body, maxLength),
};
