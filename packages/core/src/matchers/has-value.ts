/**
 * @since 1.0.0
 * Values of form controls
 */
import { notAnElement, result, type MatchResult } from "./match-result.js";

/**
 * What `getValueOf` reads from an element.
 * @since 1.0.0
 */
export type ElementValue = string | number | ReadonlyArray<string> | null;

const isCheckableInput = (element: Element): boolean => {
  if (!(element instanceof HTMLInputElement)) return false;
  const type = element.getAttribute("type");
  return type === "checkbox" || type === "radio";
};

const parseNumber = (value: string): number | null => {
  if (value.trim() === "") return null;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? null : parsed;
};

/**
 * The current value of a form control.
 *
 * - `<input type="number">`: a number, or `null` when empty
 * - other inputs and `<textarea>`: the `value`
 * - `<select>`: the selected value, `null` when nothing is selected, or a
 *   list when `multiple` is set or several options are selected
 * - anything else: the `value` attribute
 *
 * Throws a `TypeError` for checkbox and radio inputs.
 *
 * @since 1.0.0
 */
export const getValueOf = (element: Element): ElementValue => {
  if (element instanceof HTMLInputElement) {
    if (isCheckableInput(element)) {
      throw new TypeError("getValueOf() does not support checkbox / radio inputs.");
    }
    return element.getAttribute("type") === "number"
      ? parseNumber(element.value)
      : element.value;
  }

  if (element instanceof HTMLSelectElement) {
    const selected = Array.from(element.options)
      .filter((option) => option.selected)
      .map((option) => option.value);
    const [only, ...rest] = selected;
    if (only === undefined) return element.multiple ? [] : null;
    if (rest.length === 0) return element.multiple ? [only] : only;
    return selected;
  }

  if (element instanceof HTMLTextAreaElement) {
    return element.value;
  }

  return element.getAttribute("value");
};

const isEmptyValue = (value: ElementValue): boolean =>
  value === null || (typeof value !== "number" && value.length === 0);

const formatValue = (value: unknown): string => JSON.stringify(value) ?? String(value);

const defaultEquals = (a: unknown, b: unknown): boolean => {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, index) => defaultEquals(item, b[index]));
  }
  return Object.is(a, b);
};

/**
 * Whether a form control has the `expected` value.
 *
 * With no `expected` value it passes when the control has no value:
 * `null`, an empty string or an empty selection.
 *
 * @example
 * ```ts
 * hasValue(numberInput, 5).pass
 * hasValue(multiSelect, ["second", "third"]).pass
 * hasValue(emptyInput).pass
 * ```
 *
 * @since 1.0.0
 */
export const hasValue = (
  item: unknown,
  expected?: unknown,
  equals: (actual: unknown, expected: unknown) => boolean = defaultEquals,
): MatchResult => {
  const description =
    expected === undefined
      ? "An element with no value"
      : `An element with a value of ${formatValue(expected)}`;

  if (!(item instanceof Element)) return notAnElement(description);

  if (isCheckableInput(item)) {
    throw new TypeError(
      "The hasValue matcher does not support checkbox / radio inputs. " +
        "Use the isChecked matcher instead.",
    );
  }

  const actual = getValueOf(item);
  const pass = expected === undefined ? isEmptyValue(actual) : equals(actual, expected);
  return result(pass, description, `has value ${formatValue(actual)}`);
};
