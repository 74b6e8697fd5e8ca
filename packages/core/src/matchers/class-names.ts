/**
 * @since 1.0.0
 * CSS class matchers
 *
 * Classes are given either as a space separated string or as a list whose
 * entries may themselves hold several classes; `null` / `undefined`
 * entries are skipped.
 */
import { notAnElement, result, type MatchResult } from "./match-result.js";

/**
 * @since 1.0.0
 */
export type ClassNames = string | ReadonlyArray<string | null | undefined>;

/**
 * What a class matcher expects.
 * @since 1.0.0
 */
export interface ClassNameSpec {
  readonly expected: ReadonlySet<string>;
  readonly unexpected: ReadonlySet<string>;
  /** Whether classes outside `expected` are tolerated */
  readonly allowExtraneous: boolean;
}

/**
 * Outcome of comparing a `class` value with a spec.
 * @since 1.0.0
 */
export interface ClassNameMatch {
  readonly pass: boolean;
  readonly missing: ReadonlySet<string>;
  readonly unwanted: ReadonlySet<string>;
  /** In `class` order; a duplicated class appears once per extra copy */
  readonly extraneous: ReadonlyArray<string>;
}

/**
 * Split a `class` value on spaces, ignoring empty tokens.
 *
 * @example
 * ```ts
 * splitClassNames("   foo bar     baz") // ["foo", "bar", "baz"]
 * ```
 *
 * @since 1.0.0
 */
export const splitClassNames = (value: string): ReadonlyArray<string> =>
  value.split(" ").filter((token) => token.length > 0);

const toClassList = (classes: ClassNames): ReadonlyArray<string> =>
  typeof classes === "string"
    ? splitClassNames(classes)
    : classes.flatMap((entry) =>
        entry === null || entry === undefined ? [] : splitClassNames(entry),
      );

/**
 * @since 1.0.0
 */
export const classNameMatcher = {
  /** Every class must be present; with `allowExtraneous: false` nothing else may be */
  expected: (
    classes: ClassNames,
    options: { readonly allowExtraneous?: boolean } = {},
  ): ClassNameSpec => ({
    expected: new Set(toClassList(classes)),
    unexpected: new Set<string>(),
    allowExtraneous: options.allowExtraneous ?? true,
  }),
  /** None of the classes may be present */
  unexpected: (classes: ClassNames): ClassNameSpec => ({
    expected: new Set<string>(),
    unexpected: new Set(toClassList(classes)),
    allowExtraneous: true,
  }),
};

/**
 * Compare a `class` attribute value with a spec.
 * @since 1.0.0
 */
export const matchClassNames = (className: string, spec: ClassNameSpec): ClassNameMatch => {
  const actual = splitClassNames(className);
  const actualSet = new Set(actual);

  const missing = new Set([...spec.expected].filter((name) => !actualSet.has(name)));
  const unwanted = new Set([...spec.unexpected].filter((name) => actualSet.has(name)));

  const remaining = [...spec.expected];
  const extraneous = actual.filter((name) => {
    const index = remaining.indexOf(name);
    if (index === -1) return true;
    remaining.splice(index, 1);
    return false;
  });

  const pass = spec.allowExtraneous
    ? missing.size === 0 && unwanted.size === 0
    : missing.size === 0 && extraneous.length === 0;

  return { pass, missing, unwanted, extraneous };
};

const formatSet = (names: ReadonlySet<string>): string => `{${[...names].join(", ")}}`;

/**
 * @since 1.0.0
 */
export const describeClassNameSpec = (spec: ClassNameSpec): string => {
  if (!spec.allowExtraneous) {
    return `has ONLY the classes: ${formatSet(spec.expected)}`;
  }
  const parts: Array<string> = [];
  if (spec.expected.size > 0) parts.push(`has the classes: ${formatSet(spec.expected)}`);
  if (spec.unexpected.size > 0) {
    parts.push(`does not have the classes: ${formatSet(spec.unexpected)}`);
  }
  return parts.join(" and ");
};

/**
 * @since 1.0.0
 */
export const describeClassNameMismatch = (spec: ClassNameSpec, match: ClassNameMatch): string => {
  const parts: Array<string> = [];
  if (spec.allowExtraneous) {
    if (match.unwanted.size > 0) parts.push(`has unwanted classes: ${formatSet(match.unwanted)}`);
  } else if (match.extraneous.length > 0) {
    parts.push(`has extraneous classes: [${match.extraneous.join(", ")}]`);
  }
  if (match.missing.size > 0) parts.push(`is missing classes: ${formatSet(match.missing)}`);
  return parts.join("; ");
};

const matchElementClasses = (item: unknown, spec: ClassNameSpec): MatchResult => {
  const expected = `Element that ${describeClassNameSpec(spec)}`;
  if (!(item instanceof Element)) return notAnElement(expected);

  // The attribute rather than `className`, which is an object on SVG elements
  const match = matchClassNames(item.getAttribute("class") ?? "", spec);
  return result(match.pass, expected, describeClassNameMismatch(spec, match));
};

/**
 * Whether the element has every class (others are allowed).
 * @since 1.0.0
 */
export const hasClasses = (item: unknown, classes: ClassNames): MatchResult =>
  matchElementClasses(item, classNameMatcher.expected(classes));

/**
 * Whether the element has exactly these classes, each once.
 * @since 1.0.0
 */
export const hasExactClasses = (item: unknown, classes: ClassNames): MatchResult =>
  matchElementClasses(item, classNameMatcher.expected(classes, { allowExtraneous: false }));

/**
 * Whether the element has none of the classes.
 * @since 1.0.0
 */
export const excludesClasses = (item: unknown, classes: ClassNames): MatchResult =>
  matchElementClasses(item, classNameMatcher.unexpected(classes));
