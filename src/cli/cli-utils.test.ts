import { beforeEach, describe, expect, it } from "vitest";
import { ConfigValidationError } from "../config/io.js";
import { formatCliError, runCommandWithRuntime } from "./cli-utils.js";
import { createCliRuntimeCapture } from "./runtime-capture.test-helpers.js";

const capture = createCliRuntimeCapture();

describe("runCommandWithRuntime", () => {
  beforeEach(() => {
    capture.resetRuntimeCapture();
  });

  it("runs the action and leaves the exit code alone on success", async () => {
    let ran = false;
    await runCommandWithRuntime(capture.runtime, async () => {
      ran = true;
    });
    expect(ran).toBe(true);
    expect(capture.runtimeErrors).toEqual([]);
    expect(capture.exitCodes()).toEqual([]);
  });

  it("prints the error message and exits 1", async () => {
    await runCommandWithRuntime(capture.runtime, () => {
      throw new ConfigValidationError("/tmp/gc.json5", [{ path: "output", message: "bad" }]);
    });
    expect(capture.runtimeErrors).toEqual(["Invalid config at /tmp/gc.json5:\n- output: bad"]);
    expect(capture.exitCodes()).toEqual([1]);
  });
});

describe("formatCliError", () => {
  it("uses the message of errors and stringifies anything else", () => {
    expect(formatCliError(new Error("nope"))).toBe("nope");
    expect(formatCliError(42)).toBe("42");
  });
});
