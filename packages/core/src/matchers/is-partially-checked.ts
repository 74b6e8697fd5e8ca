/**
 * @since 1.0.0
 * Indeterminate ("mixed") state of checkboxes
 */
import { notAnElement, result, type MatchResult } from "./match-result.js";

const EXPECTED = "An element that is partially checked";

/**
 * Whether `item` is an indeterminate checkbox input, or an element with
 * role `checkbox` and `aria-checked="mixed"`.
 * @since 1.0.0
 */
export const isPartiallyChecked = (item: unknown): MatchResult => {
  if (!(item instanceof Element)) return notAnElement(EXPECTED);

  if (item instanceof HTMLInputElement && item.getAttribute("type") === "checkbox") {
    return result(item.indeterminate, EXPECTED, "is not partially checked.");
  }

  if (item.getAttribute("role") === "checkbox") {
    return result(
      item.getAttribute("aria-checked") === "mixed",
      EXPECTED,
      "is not partially checked.",
    );
  }

  return result(false, EXPECTED, "is not a type of HTML element that can be checked.");
};
