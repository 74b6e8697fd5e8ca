/**
 * @since 1.0.0
 * Debug logging for domscope
 *
 * Uses wide event pattern - one structured log per operation with full context.
 * Disabled by default; enable it while investigating a flaky test.
 *
 * @example
 * ```ts
 * import { Debug } from "domscope"
 *
 * Debug.enable("wait")
 * // ... run the test, every waitFor attempt is logged
 * Debug.disable()
 * ```
 */

import { Effect, Layer } from "effect";

/** Base fields for all events */
interface BaseEvent {
  readonly timestamp: string;
  readonly duration_ms?: number;
}

/** Query events */
type QueryGetEvent = BaseEvent & {
  readonly event: "query.get";
  readonly query_type: string;
  readonly query: string;
  readonly match_count: number;
};

type QueryGetFailedEvent = BaseEvent & {
  readonly event: "query.get.failed";
  readonly query_type: string;
  readonly query: string;
  readonly reason: string;
};

type QueryFindEvent = BaseEvent & {
  readonly event: "query.find";
  readonly query_type: string;
  readonly query: string;
};

/** Async utility events */
type WaitStartEvent = BaseEvent & {
  readonly event: "wait.start";
  readonly timeout: number;
  readonly interval: number;
};

type WaitAttemptFailedEvent = BaseEvent & {
  readonly event: "wait.attempt.failed";
  readonly attempt: number;
  readonly error_message: string;
};

type WaitSuccessEvent = BaseEvent & {
  readonly event: "wait.success";
  readonly attempts: number;
};

type WaitTimeoutEvent = BaseEvent & {
  readonly event: "wait.timeout";
  readonly timeout: number;
  readonly error_message: string;
};

type WaitRemovalEvent = BaseEvent & {
  readonly event: "wait.removal";
  readonly element_count: number;
};

/** Event dispatch */
type EventFireEvent = BaseEvent & {
  readonly event: "event.fire";
  readonly event_type: string;
  readonly element_tag: string;
  readonly dispatched: boolean;
};

/** User-event interactions */
type UserActionEvent = BaseEvent & {
  readonly event: "user.action";
  readonly action: string;
  readonly element_tag?: string;
};

type UserActionFailedEvent = BaseEvent & {
  readonly event: "user.action.failed";
  readonly action: string;
  readonly error_message: string;
};

/** Containers */
type RenderMountEvent = BaseEvent & {
  readonly event: "render.mount";
  readonly child_count: number;
};

type RenderCleanupEvent = BaseEvent & {
  readonly event: "render.cleanup";
};

type WithinBindEvent = BaseEvent & {
  readonly event: "within.bind";
  readonly element_tag: string;
};

type DomLogEvent = BaseEvent & {
  readonly event: "dom.log";
  readonly dom: string;
};

/**
 * All debug events
 * @since 1.0.0
 */
export type DebugEvent =
  | QueryGetEvent
  | QueryGetFailedEvent
  | QueryFindEvent
  | WaitStartEvent
  | WaitAttemptFailedEvent
  | WaitSuccessEvent
  | WaitTimeoutEvent
  | WaitRemovalEvent
  | EventFireEvent
  | UserActionEvent
  | UserActionFailedEvent
  | RenderMountEvent
  | RenderCleanupEvent
  | WithinBindEvent
  | DomLogEvent;

/**
 * @since 1.0.0
 */
export type EventType = DebugEvent["event"];

/**
 * Event without the fields `log` stamps itself.
 * @since 1.0.0
 */
export type LogInput = WithoutTimestamp<DebugEvent>;

type WithoutTimestamp<E> = E extends DebugEvent ? Omit<E, "timestamp"> : never;

// --- Plugin System ---

/**
 * Debug plugin interface.
 * Plugins receive structured events and can output them to any destination.
 * @since 1.0.0
 */
export interface DebugPlugin {
  /** Unique plugin identifier */
  readonly name: string;

  /**
   * Handle a debug event.
   * Errors thrown here are caught and reported on console.error
   * so one plugin cannot break the others.
   */
  readonly handle: (event: DebugEvent) => void;
}

/**
 * Create a debug plugin.
 * @since 1.0.0
 */
export const createPlugin = (name: string, handle: (event: DebugEvent) => void): DebugPlugin => ({
  name,
  handle,
});

// --- Internal State ---

let _enabled = false;
let _filter: Set<string> | null = null;
const _plugins: Map<string, DebugPlugin> = new Map();

// --- Enable/Disable API ---

/**
 * Enable debug logging.
 *
 * @param filter - Optional filter for event types
 *   - undefined: log all events
 *   - string: log events matching prefix (e.g., "wait" matches "wait.timeout")
 *   - string[]: log events matching any prefix
 * @since 1.0.0
 */
export const enable = (filter?: string | ReadonlyArray<string>): void => {
  _enabled = true;
  if (filter === undefined) {
    _filter = null;
  } else if (typeof filter === "string") {
    _filter = new Set([filter]);
  } else {
    _filter = new Set(filter);
  }
};

/**
 * Disable debug logging.
 * @since 1.0.0
 */
export const disable = (): void => {
  _enabled = false;
  _filter = null;
};

/**
 * @since 1.0.0
 */
export const isEnabled = (): boolean => _enabled;

/**
 * Get current filter configuration.
 * @since 1.0.0
 */
export const getFilter = (): ReadonlyArray<string> | null => {
  return _filter !== null ? Array.from(_filter) : null;
};

// --- Plugin Registration ---

/**
 * Register a debug plugin.
 * Multiple plugins can be registered; each receives events independently.
 * @since 1.0.0
 */
export const registerPlugin = (plugin: DebugPlugin): void => {
  _plugins.set(plugin.name, plugin);
};

/**
 * @since 1.0.0
 */
export const unregisterPlugin = (name: string): void => {
  _plugins.delete(name);
};

/**
 * @since 1.0.0
 */
export const getPlugins = (): ReadonlyArray<string> => {
  return Array.from(_plugins.keys());
};

/**
 * @since 1.0.0
 */
export const hasPlugin = (name: string): boolean => {
  return _plugins.has(name);
};

// --- Logging ---

// Explicit output requests (`screen.debug()`) bypass the enable gate and filter
const ALWAYS_LOGGED: ReadonlySet<EventType> = new Set(["dom.log"]);

const shouldLog = (event: EventType): boolean => {
  if (ALWAYS_LOGGED.has(event)) return true;
  if (!_enabled) return false;
  if (_filter === null) return true;

  for (const prefix of _filter) {
    if (event === prefix || event.startsWith(prefix + ".")) {
      return true;
    }
  }
  return false;
};

// --- Console Formatting ---

const formatDetails = (event: DebugEvent): string => {
  const parts: Array<string> = [];
  const e: Record<string, unknown> = { ...event };

  if ("element_tag" in e) parts.push(`<${String(e.element_tag)}>`);
  if ("query_type" in e && "query" in e) parts.push(`${String(e.query_type)}=${String(e.query)}`);
  if ("match_count" in e) parts.push(`matches:${String(e.match_count)}`);
  if ("action" in e) parts.push(`${String(e.action)}`);
  if ("event_type" in e) parts.push(`${String(e.event_type)}`);
  if ("attempt" in e) parts.push(`attempt:${String(e.attempt)}`);
  if ("attempts" in e) parts.push(`attempts:${String(e.attempts)}`);
  if ("timeout" in e) parts.push(`timeout:${String(e.timeout)}ms`);
  if ("reason" in e) parts.push(`${String(e.reason)}`);
  if ("error_message" in e) parts.push(`err:${String(e.error_message)}`);

  return parts.join("  ");
};

const formatEvent = (event: DebugEvent): void => {
  const details = formatDetails(event);
  const duration = event.duration_ms !== undefined ? ` ${event.duration_ms.toFixed(2)}ms` : "";
  const line = `[domscope] ${event.event}${details ? `  ${details}` : ""}${duration}`;

  if (event.event === "dom.log") {
    console.log(`${line}\n${event.dom}`);
  } else {
    console.log(line);
  }
};

// --- Built-in Plugins ---

/**
 * Console plugin - one line per event.
 * This is the default plugin used when no custom plugins are registered.
 * @since 1.0.0
 */
export const consolePlugin: DebugPlugin = createPlugin("console", formatEvent);

/**
 * Create a plugin that collects events into an array.
 * Useful for testing or building custom event processors.
 * @since 1.0.0
 */
export const createCollectorPlugin = (name: string, events: DebugEvent[]): DebugPlugin =>
  createPlugin(name, (event) => {
    events.push(event);
  });

const dispatchToPlugins = (fullEvent: DebugEvent): void => {
  if (_plugins.size > 0) {
    for (const plugin of _plugins.values()) {
      try {
        plugin.handle(fullEvent);
      } catch (error) {
        console.error(`[domscope] Plugin "${plugin.name}" error:`, error);
      }
    }
  } else {
    consolePlugin.handle(fullEvent);
  }
};

/**
 * Log a wide event.
 * No-op if debug is disabled or event is filtered out, except for `dom.log`,
 * which is always dispatched.
 * @since 1.0.0
 */
export const log = (event: LogInput): Effect.Effect<void> =>
  Effect.sync(() => {
    if (!shouldLog(event.event)) return;
    const fullEvent: DebugEvent = { timestamp: new Date().toISOString(), ...event };
    dispatchToPlugins(fullEvent);
  });

/**
 * Measure duration of an effect and log it on success.
 * No-op if debug is disabled or event is filtered out.
 * @since 1.0.0
 */
export const measure = <A, E, R>(
  event: LogInput,
  effect: Effect.Effect<A, E, R>,
): Effect.Effect<A, E, R> =>
  Effect.gen(function* () {
    if (!shouldLog(event.event)) {
      return yield* effect;
    }

    const start = performance.now();
    const result = yield* effect;
    const duration_ms = performance.now() - start;

    yield* log({ ...event, duration_ms });
    return result;
  });

// --- Layers ---

/**
 * Layer that enables logging and registers the console plugin for its lifetime.
 *
 * ```ts
 * Effect.provide(myTest, Debug.defaultLayer)
 * ```
 *
 * @since 1.0.0
 */
export const defaultLayer: Layer.Layer<never> = Layer.scopedDiscard(
  Effect.gen(function* () {
    enable();
    registerPlugin(consolePlugin);

    yield* Effect.addFinalizer(() =>
      Effect.sync(() => {
        unregisterPlugin(consolePlugin.name);
        disable();
      }),
    );
  }),
);
