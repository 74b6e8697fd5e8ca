/**
 * @since 1.0.0
 * Queries form controls by the text of their label
 * (`<label>`, `aria-labelledby` or `aria-label`).
 */
import { queryAllByLabelText as queryAll } from "@testing-library/dom";
import {
  buildSelectorMatcherOptions,
  describeMatcher,
  type SelectorMatcherOptions,
  type TextMatch,
} from "../matches.js";
import { buildQueries } from "./build-queries.js";

export const {
  queryAllBy: queryAllByLabelText,
  queryBy: queryByLabelText,
  getAllBy: getAllByLabelText,
  getBy: getByLabelText,
  findAllBy: findAllByLabelText,
  findBy: findByLabelText,
} = buildQueries<TextMatch, SelectorMatcherOptions>(
  "label text",
  (container, matcher, options) =>
    queryAll(container, matcher, buildSelectorMatcherOptions(options)),
  describeMatcher,
);
