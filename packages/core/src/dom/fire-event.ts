/**
 * @since 1.0.0
 * Low-level event dispatch
 *
 * Prefer the user-event module for interactions; these helpers dispatch a
 * single event with no side effects such as focus or input changes.
 */
import {
  createEvent as libraryCreateEvent,
  fireEvent as libraryFireEvent,
  type EventType,
} from "@testing-library/dom";
import { Effect } from "effect";
import * as Debug from "../debug/debug.js";
import { UnknownEventError } from "../errors.js";

export type { EventType };

/**
 * Anything events can be dispatched on
 * @since 1.0.0
 */
export type FireEventTarget = Element | Document | Window;

/**
 * Extra properties set on the created event (`key`, `clientX`, `target`, ...).
 * @since 1.0.0
 */
export type FireEventInit = Readonly<Record<string, unknown>>;

const describeTarget = (target: FireEventTarget): string => {
  if (target instanceof Element) return target.tagName.toLowerCase();
  if (target instanceof Document) return "#document";
  return "window";
};

/**
 * Whether `name` is a key of the event map, e.g. `"click"` or `"keyDown"`.
 * @since 1.0.0
 */
export const isEventName = (name: string): name is EventType =>
  Object.prototype.hasOwnProperty.call(libraryFireEvent, name) &&
  typeof Reflect.get(libraryFireEvent, name) === "function";

/**
 * Dispatch a prepared event.
 * Succeeds with `false` when a listener called `preventDefault()`.
 * @since 1.0.0
 */
export const fireEvent = (target: FireEventTarget, event: Event): Effect.Effect<boolean> =>
  Effect.gen(function* () {
    const dispatched = libraryFireEvent(target, event);
    yield* Debug.log({
      event: "event.fire",
      event_type: event.type,
      element_tag: describeTarget(target),
      dispatched,
    });
    return dispatched;
  });

/**
 * Create and dispatch an event by its name in the event map.
 *
 * @example
 * ```ts
 * yield* fireEventByName("keyDown", input, { key: "Enter" })
 * ```
 *
 * @since 1.0.0
 */
export const fireEventByName = (
  eventName: string,
  target: FireEventTarget,
  init?: FireEventInit,
): Effect.Effect<boolean, UnknownEventError> =>
  Effect.gen(function* () {
    const event = yield* createEventByName(eventName, target, init);
    return yield* fireEvent(target, event);
  });

/**
 * Create an event by its name in the event map without dispatching it.
 * @since 1.0.0
 */
export const createEventByName = (
  eventName: string,
  target: FireEventTarget,
  init?: FireEventInit,
): Effect.Effect<Event, UnknownEventError> => {
  if (!isEventName(eventName)) {
    return Effect.fail(new UnknownEventError({ eventName }));
  }
  const name: EventType = eventName;
  return Effect.sync(() => libraryCreateEvent[name](target, init));
};
