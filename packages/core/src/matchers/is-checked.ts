/**
 * @since 1.0.0
 * Checked state of checkboxes, radios and their ARIA counterparts
 */
import { notAnElement, result, type MatchResult } from "./match-result.js";

const CHECKABLE_INPUT_TYPES: ReadonlySet<string> = new Set(["checkbox", "radio"]);
const CHECKABLE_ROLES: ReadonlySet<string> = new Set(["checkbox", "radio", "switch"]);

const EXPECTED = "An element that is checked";

/**
 * Whether `item` is a checked checkbox / radio input, or an element with
 * role `checkbox`, `radio` or `switch` and `aria-checked="true"`.
 *
 * @example
 * ```ts
 * isChecked(yield* screen.getByRole("switch")).pass
 * ```
 *
 * @since 1.0.0
 */
export const isChecked = (item: unknown): MatchResult => {
  if (!(item instanceof Element)) return notAnElement(EXPECTED);

  const type = item.getAttribute("type");
  if (item instanceof HTMLInputElement && type !== null && CHECKABLE_INPUT_TYPES.has(type)) {
    return result(item.checked, EXPECTED, "is not checked.");
  }

  const role = item.getAttribute("role");
  if (role !== null && CHECKABLE_ROLES.has(role)) {
    return result(item.getAttribute("aria-checked") === "true", EXPECTED, "is not checked.");
  }

  return result(false, EXPECTED, "is not a type of HTML Element that can be checked.");
};
