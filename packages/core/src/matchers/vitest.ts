/**
 * @since 1.0.0
 * Vitest integration
 *
 * Importing this module registers the DOM matchers with `expect`:
 *
 * ```ts
 * // vitest.setup.ts
 * import "domscope/vitest"
 *
 * // in a test
 * expect(checkbox).toBeChecked()
 * expect(button).toHaveClasses("btn btn-primary")
 * expect(link).not.toHaveAttributeValue("target")
 * ```
 */
import { expect } from "vitest";
import {
  excludesClasses,
  hasClasses,
  hasExactClasses,
  type ClassNames,
} from "./class-names.js";
import { hasAttribute, type AttributeExpectation, type AttributePredicate } from "./has-attribute.js";
import { hasValue } from "./has-value.js";
import { isChecked } from "./is-checked.js";
import { isPartiallyChecked } from "./is-partially-checked.js";
import { describeItem, type MatchResult } from "./match-result.js";

/**
 * @since 1.0.0
 */
export interface DomMatchers<R = unknown> {
  toBeChecked(): R;
  toBePartiallyChecked(): R;
  /** Compares with `expect`'s equality, so asymmetric matchers work */
  toHaveValue(expected?: unknown): R;
  toHaveClasses(classes: ClassNames): R;
  toHaveExactClasses(classes: ClassNames): R;
  toExcludeClasses(classes: ClassNames): R;
  /**
   * `expected` is a string, a `RegExp`, an `AttributePredicate`, or an
   * asymmetric matcher such as `expect.stringContaining("x")`
   */
  toHaveAttributeValue(name: string, expected?: unknown): R;
}

declare module "vitest" {
  interface Assertion<T> extends DomMatchers<void> {}
  interface AsymmetricMatchersContaining extends DomMatchers {}
}

/**
 * Failure message of a matcher:
 * `Expected: ...`, `  Actual: ...` and, for a failed positive assertion,
 * `   Which: ...`.
 * @since 1.0.0
 */
export const formatMessage = (result: MatchResult, isNot: boolean, received: unknown): string => {
  const lines = [`Expected: ${isNot ? "not " : ""}${result.expected}`, `  Actual: ${describeItem(received)}`];
  if (!isNot && result.mismatch.length > 0) {
    lines.push(`   Which: ${result.mismatch}`);
  }
  return lines.join("\n");
};

const toExpectation = (result: MatchResult, isNot: boolean, received: unknown) => ({
  pass: result.pass,
  message: () => formatMessage(result, isNot, received),
});

const isPredicate = (value: unknown): value is AttributePredicate =>
  typeof value === "object" &&
  value !== null &&
  "test" in value &&
  typeof value.test === "function" &&
  "description" in value &&
  typeof value.description === "string";

expect.extend({
  toBeChecked(received: unknown) {
    return toExpectation(isChecked(received), this.isNot, received);
  },

  toBePartiallyChecked(received: unknown) {
    return toExpectation(isPartiallyChecked(received), this.isNot, received);
  },

  toHaveValue(received: unknown, expected?: unknown) {
    const result = hasValue(received, expected, (actual, wanted) => this.equals(actual, wanted));
    return toExpectation(result, this.isNot, received);
  },

  toHaveClasses(received: unknown, classes: ClassNames) {
    return toExpectation(hasClasses(received, classes), this.isNot, received);
  },

  toHaveExactClasses(received: unknown, classes: ClassNames) {
    return toExpectation(hasExactClasses(received, classes), this.isNot, received);
  },

  toExcludeClasses(received: unknown, classes: ClassNames) {
    return toExpectation(excludesClasses(received, classes), this.isNot, received);
  },

  toHaveAttributeValue(received: unknown, name: string, expected?: unknown) {
    const expectation: AttributeExpectation | undefined =
      expected === undefined ||
      typeof expected === "string" ||
      expected instanceof RegExp ||
      isPredicate(expected)
        ? expected
        : {
            test: (value: string) => this.equals(value, expected),
            description: `matches ${this.utils.printExpected(expected)}`,
          };
    return toExpectation(hasAttribute(received, name, expectation), this.isNot, received);
  },
});
