/**
 * @since 1.0.0
 * All queries, each taking the container as first argument.
 */
import * as altText from "./by-alt-text.js";
import * as displayValue from "./by-display-value.js";
import * as labelText from "./by-label-text.js";
import * as placeholderText from "./by-placeholder-text.js";
import * as role from "./by-role.js";
import * as testId from "./by-test-id.js";
import * as text from "./by-text.js";
import * as title from "./by-title.js";

export * from "./by-alt-text.js";
export * from "./by-display-value.js";
export * from "./by-label-text.js";
export * from "./by-placeholder-text.js";
export * from "./by-role.js";
export * from "./by-test-id.js";
export * from "./by-text.js";
export * from "./by-title.js";
export { buildQueries, type BuiltQueries, type QueryAllFn } from "./build-queries.js";

/**
 * Every query function keyed by name, used to bind them to a container.
 * @since 1.0.0
 */
export const queries = {
  ...text,
  ...testId,
  ...title,
  ...role,
  ...labelText,
  ...altText,
  ...placeholderText,
  ...displayValue,
};

/**
 * @since 1.0.0
 */
export type Queries = typeof queries;
