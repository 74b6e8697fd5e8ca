/**
 * @since 1.0.0
 * Attribute values
 */
import { testRegExp } from "../internal/regexp.js";
import { notAnElement, result, type MatchResult } from "./match-result.js";

/**
 * A custom check of an attribute value, described for failure messages.
 * @since 1.0.0
 */
export interface AttributePredicate {
  readonly test: (value: string) => boolean;
  /** Completes "Element with "x" attribute that ...", e.g. `"contains 'foo'"` */
  readonly description: string;
}

/**
 * @since 1.0.0
 */
export type AttributeExpectation = string | RegExp | AttributePredicate;

const describeExpectation = (expected: AttributeExpectation): string => {
  if (typeof expected === "string") return `equals '${expected}'`;
  if (expected instanceof RegExp) return `matches ${String(expected)}`;
  return expected.description;
};

const satisfies = (value: string, expected: AttributeExpectation): boolean => {
  if (typeof expected === "string") return value === expected;
  if (expected instanceof RegExp) return testRegExp(expected, value);
  return expected.test(value);
};

/**
 * Whether the element has attribute `name`, optionally with a value
 * equal to a string, matching a `RegExp`, or passing a predicate.
 *
 * @example
 * ```ts
 * hasAttribute(link, "href", "/home").pass
 * hasAttribute(link, "href", /^\//).pass
 * hasAttribute(button, "disabled").pass
 * ```
 *
 * @since 1.0.0
 */
export const hasAttribute = (
  item: unknown,
  name: string,
  expected?: AttributeExpectation,
): MatchResult => {
  const description =
    expected === undefined
      ? `Element with "${name}" attribute`
      : `Element with "${name}" attribute that ${describeExpectation(expected)}`;

  if (!(item instanceof Element)) return notAnElement(description);

  const value = item.getAttribute(name);
  if (value === null) {
    return result(false, description, `does not have the "${name}" attribute.`);
  }
  if (expected === undefined) return result(true, description, "");

  return result(
    satisfies(value, expected),
    description,
    `has attributes with value '${value}' which is different.`,
  );
};
