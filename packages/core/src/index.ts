/**
 * @since 1.0.0
 * domscope - Effect-native DOM testing utilities
 *
 * ## Quick Start
 *
 * ```ts
 * import { it } from "@effect/vitest"
 * import { Effect } from "effect"
 * import { render, UserEvent, waitFor } from "domscope"
 *
 * it.scoped("saves", () =>
 *   Effect.gen(function* () {
 *     const { getByRole, findByText } = yield* render(`<form>...</form>`)
 *     yield* UserEvent.click(yield* getByRole("button", { name: "Save" }))
 *     yield* findByText("Saved")
 *   }).pipe(Effect.provide(UserEvent.layer()))
 * )
 * ```
 *
 * ## Key Concepts
 *
 * - **Queries return Effects**: `getBy*` fail with tagged errors, `queryBy*` succeed with `Option`
 * - **find = get + waitFor**: `findBy*` retry on every interval tick and DOM mutation
 * - **Scoped containers**: `render` removes its container when the scope closes
 *
 * @module domscope
 */

// Configuration
export {
  configure,
  getConfig,
  resetConfig,
  DEFAULT_CONFIG,
  type DomscopeConfig,
} from "./config.js";

// Errors
export {
  ElementNotFoundError,
  MultipleElementsFoundError,
  WaitForTimeoutError,
  InvalidContainerError,
  RemovalPreconditionError,
  UnknownEventError,
  UserEventError,
  type QueryError,
} from "./errors.js";

// Queries
export * from "./dom/queries/index.js";
export {
  buildMatcherOptions,
  buildSelectorMatcherOptions,
  describeMatcher,
  getDefaultNormalizer,
  matchesText,
  type DefaultNormalizerOptions,
  type MatcherFunction,
  type MatcherOptions,
  type NormalizerFn,
  type SelectorMatcherOptions,
  type TextMatch,
} from "./dom/matches.js";
export { bindQueries, type BoundQueries } from "./dom/scoped-queries.js";
export { screen, type Screen } from "./dom/screen.js";
export { within } from "./dom/within.js";

// Async utilities
export {
  waitFor,
  waitForElementToBeRemoved,
  waitForElementsToBeRemoved,
  DEFAULT_MUTATION_OBSERVER_OPTIONS,
  type AsyncContainer,
  type RemovalOptions,
  type RemovalTarget,
  type WaitForOptions,
} from "./dom/wait-for.js";

// Events
export {
  createEventByName,
  fireEvent,
  fireEventByName,
  isEventName,
  type EventType,
  type FireEventInit,
  type FireEventTarget,
} from "./dom/fire-event.js";
export * as UserEvent from "./user-event/user-event.js";

// Pretty printing
export { logDOM, prettyDOM, type PrintableNode } from "./dom/pretty-dom.js";

// Matchers
export * as Matchers from "./matchers/index.js";

// Rendering
export { render, type RenderResult } from "./testing/index.js";

// Platform
export * as Observer from "./platform/observer.js";

// Debug
export * as Debug from "./debug/debug.js";
