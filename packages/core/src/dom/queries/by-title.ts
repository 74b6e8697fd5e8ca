/**
 * @since 1.0.0
 * Queries by `title` attribute, or by the `<title>` of an SVG element.
 */
import { queryAllByTitle as queryAll } from "@testing-library/dom";
import {
  buildMatcherOptions,
  describeMatcher,
  type MatcherOptions,
  type TextMatch,
} from "../matches.js";
import { buildQueries } from "./build-queries.js";

export const {
  queryAllBy: queryAllByTitle,
  queryBy: queryByTitle,
  getAllBy: getAllByTitle,
  getBy: getByTitle,
  findAllBy: findAllByTitle,
  findBy: findByTitle,
} = buildQueries<TextMatch, MatcherOptions>(
  "title",
  (container, matcher, options) =>
    queryAll(container, matcher, buildMatcherOptions(options)),
  describeMatcher,
);
