/**
 * @since 1.0.0
 * Configuration for domscope
 *
 * Config functions are sync since they only read/write module-level state
 * with no failure modes. Keys owned by @testing-library/dom are forwarded
 * to its `configure` so both layers agree.
 */
import { configure as configureLibrary } from "@testing-library/dom";

/**
 * domscope configuration
 * @since 1.0.0
 */
export interface DomscopeConfig {
  /** Default timeout (ms) for `waitFor` and `findBy*` queries */
  readonly asyncUtilTimeout: number;
  /** Default polling interval (ms) for the async utilities */
  readonly asyncUtilInterval: number;
  /** Attribute read by the `*ByTestId` queries */
  readonly testIdAttribute: string;
  /** Whether `*ByRole` queries include inaccessible elements by default */
  readonly defaultHidden: boolean;
  /** Selector of elements skipped by the text queries */
  readonly defaultIgnore: string;
}

/**
 * @since 1.0.0
 */
export const DEFAULT_CONFIG: DomscopeConfig = {
  asyncUtilTimeout: 1000,
  asyncUtilInterval: 50,
  testIdAttribute: "data-testid",
  defaultHidden: false,
  defaultIgnore: "script, style",
};

let _config: DomscopeConfig = DEFAULT_CONFIG;

const forward = (config: DomscopeConfig): void => {
  configureLibrary({
    asyncUtilTimeout: config.asyncUtilTimeout,
    testIdAttribute: config.testIdAttribute,
    defaultHidden: config.defaultHidden,
    defaultIgnore: config.defaultIgnore,
  });
};

/**
 * Get the current configuration.
 * @since 1.0.0
 */
export const getConfig = (): DomscopeConfig => _config;

/**
 * Merge a partial configuration into the current one.
 *
 * @example
 * ```ts
 * configure({ testIdAttribute: "data-test", asyncUtilTimeout: 2000 })
 * ```
 *
 * @since 1.0.0
 */
export const configure = (delta: Partial<DomscopeConfig>): void => {
  _config = { ..._config, ...delta };
  forward(_config);
};

/**
 * Reset configuration to defaults.
 * Useful for testing.
 * @since 1.0.0
 */
export const resetConfig = (): void => {
  _config = DEFAULT_CONFIG;
  forward(_config);
};
