/**
 * @since 1.0.0
 * Result shape shared by the DOM matchers
 */

/**
 * Outcome of a matcher.
 * `expected` describes what was asserted; `mismatch` says why a failing
 * item did not match and is empty when it passed.
 * @since 1.0.0
 */
export interface MatchResult {
  readonly pass: boolean;
  readonly expected: string;
  readonly mismatch: string;
}

/** @internal */
export const notAnElement = (expected: string): MatchResult => ({
  pass: false,
  expected,
  mismatch: "is not a valid Element.",
});

/** @internal */
export const result = (pass: boolean, expected: string, mismatch: string): MatchResult => ({
  pass,
  expected,
  mismatch: pass ? "" : mismatch,
});

/**
 * Short form of an item for failure messages, e.g. `HTMLDivElement:<div>`.
 * @since 1.0.0
 */
export const describeItem = (item: unknown): string =>
  item instanceof Element ? `${item.constructor.name}:<${item.tagName.toLowerCase()}>` : String(item);
