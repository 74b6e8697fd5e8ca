/**
 * @since 1.0.0
 * Queries by text content.
 * Elements matching the configured `defaultIgnore` selector are skipped.
 */
import { queryAllByText as queryAll } from "@testing-library/dom";
import {
  buildSelectorMatcherOptions,
  describeMatcher,
  type SelectorMatcherOptions,
  type TextMatch,
} from "../matches.js";
import { buildQueries } from "./build-queries.js";

export const {
  queryAllBy: queryAllByText,
  queryBy: queryByText,
  getAllBy: getAllByText,
  getBy: getByText,
  findAllBy: findAllByText,
  findBy: findByText,
} = buildQueries<TextMatch, SelectorMatcherOptions>(
  "text",
  (container, matcher, options) =>
    queryAll(container, matcher, buildSelectorMatcherOptions(options)),
  describeMatcher,
);
