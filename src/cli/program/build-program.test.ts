import { beforeEach, describe, expect, it } from "vitest";
import { createCliRuntimeCapture } from "../runtime-capture.test-helpers.js";
import { buildProgram } from "./build-program.js";

const capture = createCliRuntimeCapture();

function buildTestProgram() {
  const program = buildProgram({ runtime: capture.runtime });
  program.exitOverride();
  for (const command of program.commands) {
    command.exitOverride();
  }
  return program;
}

describe("buildProgram", () => {
  beforeEach(() => {
    capture.resetRuntimeCapture();
  });

  it("registers the ipv4 and sudoku commands", () => {
    const names = buildTestProgram()
      .commands.map((command) => command.name())
      .filter((name) => name !== "help");
    expect(names).toEqual(["ipv4", "sudoku"]);
  });

  it("prints the package version", async () => {
    await expect(
      buildTestProgram().parseAsync(["--version"], { from: "user" }),
    ).rejects.toMatchObject({ code: "commander.version" });
    expect(capture.runtimeLogs).toEqual(["0.3.0"]);
  });

  it("shows command help with examples", async () => {
    await expect(
      buildTestProgram().parseAsync(["ipv4", "--help"], { from: "user" }),
    ).rejects.toMatchObject({ code: "commander.helpDisplayed" });
    const help = capture.runtimeLogs.join("\n");
    expect(help).toContain("Usage: gridcheck ipv4 [options] <candidate...>");
    expect(help).toContain("gridcheck ipv4 10.01.0.1");
  });

  it("rejects an unknown --log-level", async () => {
    await expect(
      buildTestProgram().parseAsync(["--log-level", "loud", "ipv4", "1.2.3.4"], { from: "user" }),
    ).rejects.toMatchObject({ code: "commander.invalidArgument" });
    expect(capture.runtimeErrors.join("\n")).toContain("Invalid --log-level");
    expect(capture.runtimeLogs).toEqual([]);
  });

  it("requires at least one candidate", async () => {
    await expect(
      buildTestProgram().parseAsync(["ipv4"], { from: "user" }),
    ).rejects.toMatchObject({ code: "commander.missingArgument" });
  });
});
