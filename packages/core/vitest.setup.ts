/**
 * Vitest setup for domscope tests
 *
 * Configures custom equality testers for Effect data types and registers
 * the DOM matchers.
 */
import { afterEach, expect, vi } from "vitest";
import * as Equal from "effect/Equal";
import * as Utils from "effect/Utils";
import type { Tester, TesterContext } from "@vitest/expect";
import { resetConfig } from "./src/config.js";
import * as Debug from "./src/debug/debug.js";
import "./src/matchers/vitest.js";

/**
 * Custom equality tester for Effect's Equal trait
 * Allows vitest assertions to work with Effect data types
 */
function customTester(this: TesterContext, a: unknown, b: unknown, customTesters: Array<Tester>) {
  if (!Equal.isEqual(a) || !Equal.isEqual(b)) {
    return undefined;
  }
  return Utils.structuralRegion(
    () => Equal.equals(a, b),
    (x, y) =>
      this.equals(
        x,
        y,
        customTesters.filter((t) => t !== customTester),
      ),
  );
}

expect.addEqualityTesters([customTester]);

afterEach(() => {
  document.body.innerHTML = "";
  resetConfig();
  Debug.disable();
  for (const name of Debug.getPlugins()) {
    Debug.unregisterPlugin(name);
  }
  vi.restoreAllMocks();
});
