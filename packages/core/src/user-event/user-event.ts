/**
 * @since 1.0.0
 * User interactions
 *
 * Wraps `@testing-library/user-event`: each interaction dispatches the
 * whole sequence of events a real user would cause (pointer, focus,
 * keyboard, input), unlike `fireEvent`.
 *
 * @example
 * ```ts
 * import { UserEvent } from "domscope"
 *
 * it.scoped("submits", () =>
 *   Effect.gen(function* () {
 *     yield* UserEvent.type(yield* screen.getByLabelText("Name"), "Ada")
 *     yield* UserEvent.click(yield* screen.getByRole("button"))
 *   }).pipe(Effect.provide(UserEvent.layer()))
 * )
 * ```
 */
import { userEvent } from "@testing-library/user-event";
import { Context, Effect, Layer } from "effect";
import * as Debug from "../debug/debug.js";
import { UserEventError } from "../errors.js";

/**
 * A set-up user-event instance
 * @since 1.0.0
 */
export type UserEventInstance = ReturnType<typeof userEvent.setup>;

/**
 * Options of `userEvent.setup`, e.g. `delay`, `skipHover`, `pointerEventsCheck`
 * @since 1.0.0
 */
export type UserEventOptions = NonNullable<Parameters<typeof userEvent.setup>[0]>;

/**
 * Values accepted by `selectOptions` / `deselectOptions`: option values,
 * labels or option elements
 * @since 1.0.0
 */
export type SelectValues = Parameters<UserEventInstance["selectOptions"]>[1];

/**
 * @since 1.0.0
 */
export type UploadFiles = Parameters<UserEventInstance["upload"]>[1];

/**
 * @since 1.0.0
 */
export interface TypeOptions {
  /** Do not click the element before typing */
  readonly skipClick?: boolean;
  /** Do not close `{Shift>}`-style pressed keys at the end */
  readonly skipAutoClose?: boolean;
  readonly initialSelectionStart?: number;
  readonly initialSelectionEnd?: number;
}

/**
 * @since 1.0.0
 */
export interface TabOptions {
  /** Move focus backwards */
  readonly shift?: boolean;
}

// =============================================================================
// Service
// =============================================================================

/**
 * The user-event instance interactions run on.
 * @since 1.0.0
 */
export class UserEvent extends Context.Tag("domscope/UserEvent")<UserEvent, UserEventInstance>() {}

/**
 * Layer providing a fresh instance, set up with `options`.
 * @since 1.0.0
 */
export const layer = (options?: UserEventOptions): Layer.Layer<UserEvent> =>
  Layer.sync(UserEvent, () => userEvent.setup(options));

// =============================================================================
// Interactions
// =============================================================================

const errorMessage = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

const perform = (
  action: string,
  element: Element | undefined,
  run: (user: UserEventInstance) => Promise<void>,
): Effect.Effect<void, UserEventError, UserEvent> =>
  Effect.gen(function* () {
    const user = yield* UserEvent;
    yield* Effect.tryPromise({
      try: () => run(user),
      catch: (cause) => new UserEventError({ action, cause }),
    }).pipe(
      Effect.tapError((error) =>
        Debug.log({ event: "user.action.failed", action, error_message: errorMessage(error.cause) }),
      ),
    );
    yield* Debug.log({
      event: "user.action",
      action,
      ...(element === undefined ? {} : { element_tag: element.tagName.toLowerCase() }),
    });
  });

/**
 * @since 1.0.0
 */
export const click = (element: Element): Effect.Effect<void, UserEventError, UserEvent> =>
  perform("click", element, (user) => user.click(element));

/**
 * @since 1.0.0
 */
export const dblClick = (element: Element): Effect.Effect<void, UserEventError, UserEvent> =>
  perform("dblClick", element, (user) => user.dblClick(element));

/**
 * @since 1.0.0
 */
export const tripleClick = (element: Element): Effect.Effect<void, UserEventError, UserEvent> =>
  perform("tripleClick", element, (user) => user.tripleClick(element));

/**
 * @since 1.0.0
 */
export const hover = (element: Element): Effect.Effect<void, UserEventError, UserEvent> =>
  perform("hover", element, (user) => user.hover(element));

/**
 * @since 1.0.0
 */
export const unhover = (element: Element): Effect.Effect<void, UserEventError, UserEvent> =>
  perform("unhover", element, (user) => user.unhover(element));

/**
 * Click the element, then type `text` into it.
 *
 * `text` follows the keyboard syntax: `{Enter}`, `{Shift>}A{/Shift}`,
 * `{{` for a literal brace.
 *
 * @since 1.0.0
 */
export const type = (
  element: Element,
  text: string,
  options: TypeOptions = {},
): Effect.Effect<void, UserEventError, UserEvent> =>
  perform("type", element, (user) => user.type(element, text, { ...options }));

/**
 * Select the content of an editable element and delete it.
 * @since 1.0.0
 */
export const clear = (element: Element): Effect.Effect<void, UserEventError, UserEvent> =>
  perform("clear", element, (user) => user.clear(element));

/**
 * Select options of a `<select>` or listbox by value, label or element.
 * Fails when a value matches no option.
 * @since 1.0.0
 */
export const selectOptions = (
  element: Element,
  values: SelectValues,
): Effect.Effect<void, UserEventError, UserEvent> =>
  perform("selectOptions", element, (user) => user.selectOptions(element, values));

/**
 * Deselect options of a `<select multiple>` or multiselectable listbox.
 * @since 1.0.0
 */
export const deselectOptions = (
  element: Element,
  values: SelectValues,
): Effect.Effect<void, UserEventError, UserEvent> =>
  perform("deselectOptions", element, (user) => user.deselectOptions(element, values));

/**
 * Pick files in a file input, or in the input a label points to.
 * @since 1.0.0
 */
export const upload = (
  element: HTMLElement,
  files: UploadFiles,
): Effect.Effect<void, UserEventError, UserEvent> =>
  perform("upload", element, (user) => user.upload(element, files));

/**
 * Move focus like the Tab key does.
 * @since 1.0.0
 */
export const tab = (options: TabOptions = {}): Effect.Effect<void, UserEventError, UserEvent> =>
  perform("tab", undefined, (user) => user.tab({ ...options }));

/**
 * Press keys on the focused element, e.g. `"abc{Enter}"`.
 * @since 1.0.0
 */
export const keyboard = (text: string): Effect.Effect<void, UserEventError, UserEvent> =>
  perform("keyboard", undefined, (user) => user.keyboard(text).then(() => undefined));

/**
 * Paste text (or clipboard data) into the focused element.
 * @since 1.0.0
 */
export const paste = (
  data: Parameters<UserEventInstance["paste"]>[0],
): Effect.Effect<void, UserEventError, UserEvent> =>
  perform("paste", undefined, (user) => user.paste(data));
