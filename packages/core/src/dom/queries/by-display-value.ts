/**
 * @since 1.0.0
 * Queries `input`, `select` and `textarea` elements by their current value.
 */
import { queryAllByDisplayValue as queryAll } from "@testing-library/dom";
import {
  buildMatcherOptions,
  describeMatcher,
  type MatcherOptions,
  type TextMatch,
} from "../matches.js";
import { buildQueries } from "./build-queries.js";

export const {
  queryAllBy: queryAllByDisplayValue,
  queryBy: queryByDisplayValue,
  getAllBy: getAllByDisplayValue,
  getBy: getByDisplayValue,
  findAllBy: findAllByDisplayValue,
  findBy: findByDisplayValue,
} = buildQueries<TextMatch, MatcherOptions>(
  "display value",
  (container, matcher, options) =>
    queryAll(container, matcher, buildMatcherOptions(options)),
  describeMatcher,
);
