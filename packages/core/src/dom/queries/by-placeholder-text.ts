/**
 * @since 1.0.0
 * Queries by `placeholder` attribute.
 */
import { queryAllByPlaceholderText as queryAll } from "@testing-library/dom";
import {
  buildMatcherOptions,
  describeMatcher,
  type MatcherOptions,
  type TextMatch,
} from "../matches.js";
import { buildQueries } from "./build-queries.js";

export const {
  queryAllBy: queryAllByPlaceholderText,
  queryBy: queryByPlaceholderText,
  getAllBy: getAllByPlaceholderText,
  getBy: getByPlaceholderText,
  findAllBy: findAllByPlaceholderText,
  findBy: findByPlaceholderText,
} = buildQueries<TextMatch, MatcherOptions>(
  "placeholder text",
  (container, matcher, options) =>
    queryAll(container, matcher, buildMatcherOptions(options)),
  describeMatcher,
);
