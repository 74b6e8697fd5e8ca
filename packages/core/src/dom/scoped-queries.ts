/**
 * @since 1.0.0
 * Queries bound to a container
 */
import { Effect } from "effect";
import { queries, type Queries } from "./queries/index.js";

type Bound<F> = F extends (container: HTMLElement, ...args: infer Args) => infer R
  ? (...args: Args) => R
  : never;

/**
 * Every query with its container argument already applied.
 * @since 1.0.0
 */
export type BoundQueries = { readonly [K in keyof Queries]: Bound<Queries[K]> };

const bind =
  <Args extends ReadonlyArray<unknown>, A, E>(
    query: (container: HTMLElement, ...args: Args) => Effect.Effect<A, E>,
    getContainer: () => HTMLElement,
  ) =>
  (...args: Args): Effect.Effect<A, E> =>
    Effect.suspend(() => query(getContainer(), ...args));

/**
 * Bind every query to a container.
 *
 * The container is read each time a query runs, so `() => document.body`
 * keeps working after the body is replaced.
 *
 * @since 1.0.0
 */
export const bindQueries = (getContainer: () => HTMLElement): BoundQueries => ({
  queryAllByText: bind(queries.queryAllByText, getContainer),
  queryByText: bind(queries.queryByText, getContainer),
  getAllByText: bind(queries.getAllByText, getContainer),
  getByText: bind(queries.getByText, getContainer),
  findAllByText: bind(queries.findAllByText, getContainer),
  findByText: bind(queries.findByText, getContainer),

  queryAllByTestId: bind(queries.queryAllByTestId, getContainer),
  queryByTestId: bind(queries.queryByTestId, getContainer),
  getAllByTestId: bind(queries.getAllByTestId, getContainer),
  getByTestId: bind(queries.getByTestId, getContainer),
  findAllByTestId: bind(queries.findAllByTestId, getContainer),
  findByTestId: bind(queries.findByTestId, getContainer),

  queryAllByTitle: bind(queries.queryAllByTitle, getContainer),
  queryByTitle: bind(queries.queryByTitle, getContainer),
  getAllByTitle: bind(queries.getAllByTitle, getContainer),
  getByTitle: bind(queries.getByTitle, getContainer),
  findAllByTitle: bind(queries.findAllByTitle, getContainer),
  findByTitle: bind(queries.findByTitle, getContainer),

  queryAllByRole: bind(queries.queryAllByRole, getContainer),
  queryByRole: bind(queries.queryByRole, getContainer),
  getAllByRole: bind(queries.getAllByRole, getContainer),
  getByRole: bind(queries.getByRole, getContainer),
  findAllByRole: bind(queries.findAllByRole, getContainer),
  findByRole: bind(queries.findByRole, getContainer),

  queryAllByLabelText: bind(queries.queryAllByLabelText, getContainer),
  queryByLabelText: bind(queries.queryByLabelText, getContainer),
  getAllByLabelText: bind(queries.getAllByLabelText, getContainer),
  getByLabelText: bind(queries.getByLabelText, getContainer),
  findAllByLabelText: bind(queries.findAllByLabelText, getContainer),
  findByLabelText: bind(queries.findByLabelText, getContainer),

  queryAllByAltText: bind(queries.queryAllByAltText, getContainer),
  queryByAltText: bind(queries.queryByAltText, getContainer),
  getAllByAltText: bind(queries.getAllByAltText, getContainer),
  getByAltText: bind(queries.getByAltText, getContainer),
  findAllByAltText: bind(queries.findAllByAltText, getContainer),
  findByAltText: bind(queries.findByAltText, getContainer),

  queryAllByPlaceholderText: bind(queries.queryAllByPlaceholderText, getContainer),
  queryByPlaceholderText: bind(queries.queryByPlaceholderText, getContainer),
  getAllByPlaceholderText: bind(queries.getAllByPlaceholderText, getContainer),
  getByPlaceholderText: bind(queries.getByPlaceholderText, getContainer),
  findAllByPlaceholderText: bind(queries.findAllByPlaceholderText, getContainer),
  findByPlaceholderText: bind(queries.findByPlaceholderText, getContainer),

  queryAllByDisplayValue: bind(queries.queryAllByDisplayValue, getContainer),
  queryByDisplayValue: bind(queries.queryByDisplayValue, getContainer),
  getAllByDisplayValue: bind(queries.getAllByDisplayValue, getContainer),
  getByDisplayValue: bind(queries.getByDisplayValue, getContainer),
  findAllByDisplayValue: bind(queries.findAllByDisplayValue, getContainer),
  findByDisplayValue: bind(queries.findByDisplayValue, getContainer),
});
