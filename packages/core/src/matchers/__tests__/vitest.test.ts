/**
 * expect integration tests
 *
 * The matchers are registered by the setup file.
 */
import { assert, describe, it } from "@effect/vitest";
import { expect } from "vitest";
import { formatMessage } from "../vitest.js";

describe("formatMessage", () => {
  const checkbox = () => {
    const input = document.createElement("input");
    input.setAttribute("type", "checkbox");
    return input;
  };

  it("adds the mismatch for a failed assertion", () => {
    const message = formatMessage(
      { pass: false, expected: "An element that is checked", mismatch: "is not checked." },
      false,
      checkbox(),
    );
    assert.strictEqual(
      message,
      "Expected: An element that is checked\n  Actual: HTMLInputElement:<input>\n   Which: is not checked.",
    );
  });

  it("prefixes negated expectations", () => {
    const message = formatMessage(
      { pass: true, expected: "An element that is checked", mismatch: "" },
      true,
      checkbox(),
    );
    assert.strictEqual(
      message,
      "Expected: not An element that is checked\n  Actual: HTMLInputElement:<input>",
    );
  });
});

describe("expect", () => {
  it("toBeChecked and toBePartiallyChecked", () => {
    const input = document.createElement("input");
    input.setAttribute("type", "checkbox");
    expect(input).not.toBeChecked();
    input.checked = true;
    expect(input).toBeChecked();

    input.indeterminate = true;
    expect(input).toBePartiallyChecked();
  });

  it("reports the mismatch when an assertion fails", () => {
    const input = document.createElement("input");
    input.setAttribute("type", "checkbox");
    expect(() => expect(input).toBeChecked()).toThrow("   Which: is not checked.");
  });

  it("toHaveValue uses expect equality", () => {
    const select = document.createElement("select");
    select.multiple = true;
    select.innerHTML = `<option value="a" selected>A</option><option value="b" selected>B</option>`;

    expect(select).toHaveValue(["a", "b"]);
    expect(select).toHaveValue(expect.arrayContaining(["b"]));
    expect(document.createElement("input")).toHaveValue();
  });

  it("class matchers", () => {
    const button = document.createElement("button");
    button.setAttribute("class", "btn btn-primary");

    expect(button).toHaveClasses("btn");
    expect(button).toHaveExactClasses(["btn-primary", "btn"]);
    expect(button).toExcludeClasses("disabled");
    expect(button).not.toHaveExactClasses("btn");
  });

  it("toHaveAttributeValue accepts strings, patterns and asymmetric matchers", () => {
    const link = document.createElement("a");
    link.setAttribute("href", "/home");

    expect(link).toHaveAttributeValue("href");
    expect(link).toHaveAttributeValue("href", "/home");
    expect(link).toHaveAttributeValue("href", /^\/h/);
    expect(link).toHaveAttributeValue("href", expect.stringContaining("om"));
    expect(link).not.toHaveAttributeValue("target");
  });
});
