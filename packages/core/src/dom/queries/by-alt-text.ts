/**
 * @since 1.0.0
 * Queries `img`, `input` and `area` elements by `alt` attribute.
 */
import { queryAllByAltText as queryAll } from "@testing-library/dom";
import {
  buildMatcherOptions,
  describeMatcher,
  type MatcherOptions,
  type TextMatch,
} from "../matches.js";
import { buildQueries } from "./build-queries.js";

export const {
  queryAllBy: queryAllByAltText,
  queryBy: queryByAltText,
  getAllBy: getAllByAltText,
  getBy: getByAltText,
  findAllBy: findAllByAltText,
  findBy: findByAltText,
} = buildQueries<TextMatch, MatcherOptions>(
  "alt text",
  (container, matcher, options) =>
    queryAll(container, matcher, buildMatcherOptions(options)),
  describeMatcher,
);
