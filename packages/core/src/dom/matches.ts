/**
 * @since 1.0.0
 * Text matching
 *
 * Types describing how a query compares text, and a standalone check that
 * follows the same rules as `@testing-library/dom` queries.
 */
import { getDefaultNormalizer as libraryDefaultNormalizer } from "@testing-library/dom";
import { testRegExp } from "../internal/regexp.js";

/**
 * Custom predicate over the text content and its element.
 * @since 1.0.0
 */
export type MatcherFunction = (content: string, element: Element | null) => boolean;

/**
 * What a text query looks for.
 * @since 1.0.0
 */
export type TextMatch = string | RegExp | MatcherFunction;

/**
 * @since 1.0.0
 */
export type NormalizerFn = (text: string) => string;

/**
 * @since 1.0.0
 */
export interface MatcherOptions {
  /**
   * `true` (default) compares full, case-sensitive strings.
   * `false` is a case-insensitive substring match. Has no effect on
   * `RegExp` and function matchers.
   */
  readonly exact?: boolean;
  /** Replaces the default normalizer; combine with `getDefaultNormalizer` to extend it */
  readonly normalizer?: NormalizerFn;
  readonly collapseWhitespace?: boolean;
  readonly trim?: boolean;
}

/**
 * @since 1.0.0
 */
export interface SelectorMatcherOptions extends MatcherOptions {
  /** Only consider elements matching this selector */
  readonly selector?: string;
  /** Skip elements matching this selector, or `false` to skip nothing */
  readonly ignore?: string | false;
}

/**
 * @since 1.0.0
 */
export interface DefaultNormalizerOptions {
  readonly trim?: boolean;
  readonly collapseWhitespace?: boolean;
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/**
 * Copy the options, leaving out keys set to `undefined`.
 * @since 1.0.0
 */
export const buildMatcherOptions = (options: MatcherOptions = {}): MatcherOptions => {
  const built: Mutable<MatcherOptions> = {};
  if (options.exact !== undefined) built.exact = options.exact;
  if (options.normalizer !== undefined) built.normalizer = options.normalizer;
  if (options.collapseWhitespace !== undefined) {
    built.collapseWhitespace = options.collapseWhitespace;
  }
  if (options.trim !== undefined) built.trim = options.trim;
  return built;
};

/**
 * Like `buildMatcherOptions`, keeping `selector` and `ignore` too.
 * @since 1.0.0
 */
export const buildSelectorMatcherOptions = (
  options: SelectorMatcherOptions = {},
): SelectorMatcherOptions => {
  const built: Mutable<SelectorMatcherOptions> = { ...buildMatcherOptions(options) };
  if (options.selector !== undefined) built.selector = options.selector;
  if (options.ignore !== undefined) built.ignore = options.ignore;
  return built;
};

/**
 * The normalizer queries use when none is given: trims and collapses
 * whitespace unless told otherwise.
 * @since 1.0.0
 */
export const getDefaultNormalizer = (options: DefaultNormalizerOptions = {}): NormalizerFn =>
  libraryDefaultNormalizer(buildMatcherOptions(options));

/**
 * Check a single string against a matcher the way queries do.
 * The text is normalized first; `exact: false` turns a string matcher into
 * a case-insensitive substring check.
 *
 * @example
 * ```ts
 * matchesText("  Hello   World ", null, "Hello World") // true
 * matchesText("Hello World", null, "hello", { exact: false }) // true
 * ```
 *
 * @since 1.0.0
 */
export const matchesText = (
  text: string,
  node: HTMLElement | null,
  matcher: TextMatch,
  options: MatcherOptions = {},
): boolean => {
  const normalizer =
    options.normalizer ??
    getDefaultNormalizer({ trim: options.trim, collapseWhitespace: options.collapseWhitespace });
  const normalized = normalizer(text);

  if (typeof matcher === "function") return matcher(normalized, node);
  if (matcher instanceof RegExp) return testRegExp(matcher, normalized);
  if (options.exact ?? true) return normalized === matcher;
  return normalized.toLowerCase().includes(matcher.toLowerCase());
};

/**
 * Human readable form of a matcher for error messages.
 * @since 1.0.0
 */
export const describeMatcher = (matcher: TextMatch): string => {
  if (typeof matcher === "string") return `"${matcher}"`;
  if (matcher instanceof RegExp) return String(matcher);
  return "custom matcher function";
};
