/**
 * @since 1.0.0
 * Tagged errors produced by domscope
 *
 * Every expected failure travels in the Effect error channel so tests can
 * match on `_tag` instead of parsing messages.
 */
import { Data } from "effect";

const withDom = (message: string, dom: string): string =>
  dom.length > 0 ? `${message}\n\n${dom}` : message;

/**
 * A `getBy*` / `getAllBy*` query matched nothing.
 * @since 1.0.0
 */
export class ElementNotFoundError extends Data.TaggedError("ElementNotFoundError")<{
  readonly queryType: string;
  readonly query: string;
  readonly dom: string;
}> {
  override get message() {
    return withDom(`Unable to find an element by ${this.queryType}: ${this.query}`, this.dom);
  }
}

/**
 * A singular query matched more than one element.
 * @since 1.0.0
 */
export class MultipleElementsFoundError extends Data.TaggedError("MultipleElementsFoundError")<{
  readonly queryType: string;
  readonly query: string;
  readonly count: number;
  readonly dom: string;
}> {
  override get message() {
    return withDom(
      `Found ${this.count} elements by ${this.queryType}: ${this.query}. ` +
        `Use one of the *AllBy* variants if multiple matches are expected.`,
      this.dom,
    );
  }
}

/**
 * Failure of any singular query.
 * @since 1.0.0
 */
export type QueryError = ElementNotFoundError | MultipleElementsFoundError;

/**
 * An async utility ran out of time.
 *
 * The message is a plain field so `onTimeout` handlers can replace it.
 * @since 1.0.0
 */
export class WaitForTimeoutError extends Data.TaggedError("WaitForTimeoutError")<{
  readonly timeout: number;
  readonly message: string;
}> {}

/**
 * `within()` received a node it cannot scope queries to.
 * @since 1.0.0
 */
export class InvalidContainerError extends Data.TaggedError("InvalidContainerError")<{
  readonly reason: "missing" | "detached";
}> {
  override get message() {
    switch (this.reason) {
      case "missing":
        return "You must provide a non-null element as the single argument to within().";
      case "detached":
        return (
          "The element you provide as the single argument to within() must exist in the DOM. " +
          "Did you forget to append the element to the body?"
        );
    }
  }
}

/**
 * `waitForElement(s)ToBeRemoved` was called with nothing to wait on.
 * @since 1.0.0
 */
export class RemovalPreconditionError extends Data.TaggedError("RemovalPreconditionError")<{
  readonly reason: "empty" | "not_present";
  readonly plural: boolean;
  readonly dom: string;
}> {
  override get message() {
    switch (this.reason) {
      case "empty":
        return this.plural
          ? "The callback must return one or more non-null Elements."
          : "The callback must return a non-null Element.";
      case "not_present":
        return withDom(
          this.plural
            ? "One of the elements returned from the callback was not present in the container " +
                "at the time waitForElementsToBeRemoved() was called:"
            : "The element returned from the callback was not present in the container " +
                "at the time waitForElementToBeRemoved() was called:",
          this.dom,
        );
    }
  }
}

/**
 * `fireEventByName` received a name that is not in the event map.
 * @since 1.0.0
 */
export class UnknownEventError extends Data.TaggedError("UnknownEventError")<{
  readonly eventName: string;
}> {
  override get message() {
    return `Unknown event name "${this.eventName}". Use one of the keys of the event map, e.g. "click".`;
  }
}

/**
 * A user-event interaction rejected.
 * @since 1.0.0
 */
export class UserEventError extends Data.TaggedError("UserEventError")<{
  readonly action: string;
  readonly cause: unknown;
}> {
  override get message() {
    const detail = this.cause instanceof Error ? this.cause.message : String(this.cause);
    return `User event "${this.action}" failed: ${detail}`;
  }
}
