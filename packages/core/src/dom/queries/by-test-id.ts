/**
 * @since 1.0.0
 * Queries by the configured test id attribute (`data-testid` by default).
 */
import { queryAllByTestId as queryAll } from "@testing-library/dom";
import {
  buildMatcherOptions,
  describeMatcher,
  type MatcherOptions,
  type TextMatch,
} from "../matches.js";
import { buildQueries } from "./build-queries.js";

export const {
  queryAllBy: queryAllByTestId,
  queryBy: queryByTestId,
  getAllBy: getAllByTestId,
  getBy: getByTestId,
  findAllBy: findAllByTestId,
  findBy: findByTestId,
} = buildQueries<TextMatch, MatcherOptions>(
  "test id",
  (container, matcher, options) =>
    queryAll(container, matcher, buildMatcherOptions(options)),
  describeMatcher,
);
