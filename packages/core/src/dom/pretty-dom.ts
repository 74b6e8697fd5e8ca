/**
 * @since 1.0.0
 * Pretty-printing of DOM trees for error messages and debugging.
 */
import { prettyDOM as libraryPrettyDOM } from "@testing-library/dom";
import { Effect } from "effect";
import * as Debug from "../debug/debug.js";

/**
 * Printable roots
 * @since 1.0.0
 */
export type PrintableNode = Element | Document;

/**
 * Pretty-print a node (defaults to `document.body`).
 * Returns an empty string when there is nothing to print.
 * @since 1.0.0
 */
export const prettyDOM = (node?: PrintableNode, maxLength?: number): string => {
  const printed = libraryPrettyDOM(node, maxLength);
  return printed === false ? "" : printed;
};

/**
 * Log a pretty-printed node as a `dom.log` event and return the printed text.
 * `dom.log` is dispatched even while debug logging is disabled.
 * @since 1.0.0
 */
export const logDOM = (node?: PrintableNode, maxLength?: number): Effect.Effect<string> =>
  Effect.gen(function* () {
    const dom = prettyDOM(node, maxLength);
    yield* Debug.log({ event: "dom.log", dom });
    return dom;
  });
