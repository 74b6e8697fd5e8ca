/**
 * @since 1.0.0
 * DOM matchers as plain functions returning a `MatchResult`.
 * `domscope/vitest` registers them with `expect`.
 */
export * from "./class-names.js";
export * from "./has-attribute.js";
export * from "./has-value.js";
export * from "./is-checked.js";
export * from "./is-partially-checked.js";
export { describeItem, type MatchResult } from "./match-result.js";
