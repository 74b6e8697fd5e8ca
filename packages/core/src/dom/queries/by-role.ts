/**
 * @since 1.0.0
 * Queries by ARIA role, optionally narrowed by accessible name and state.
 *
 * Inaccessible elements are skipped unless `hidden: true` is passed or
 * `defaultHidden` is configured.
 */
import {
  queryAllByRole as queryAll,
  type ByRoleMatcher,
  type ByRoleOptions,
} from "@testing-library/dom";
import { buildQueries } from "./build-queries.js";

export type { ByRoleMatcher, ByRoleOptions };

const describeRole = (role: ByRoleMatcher): string =>
  typeof role === "string" ? `"${role}"` : "custom matcher function";

export const {
  queryAllBy: queryAllByRole,
  queryBy: queryByRole,
  getAllBy: getAllByRole,
  getBy: getByRole,
  findAllBy: findAllByRole,
  findBy: findByRole,
} = buildQueries<ByRoleMatcher, ByRoleOptions>(
  "role",
  (container, role, options) => queryAll(container, role, options),
  describeRole,
);
