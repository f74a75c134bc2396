import { describe, expect, it } from "vitest";
import { CancelledError, ExternalToolError } from "../infra/errors.js";
import type { RuntimeEnv } from "../runtime.js";
import { failCommand, narrativeRuntime } from "./output.js";
import { buildProgram } from "./program.js";
import { isAffirmative } from "./prompt.js";

function quietProgram() {
  const program = buildProgram();
  for (const command of program.commands) {
    command.exitOverride().configureOutput({ writeErr: () => {}, writeOut: () => {} });
  }
  return program;
}

function createTestRuntime() {
  const out: string[] = [];
  const err: string[] = [];
  const runtime: RuntimeEnv = {
    log: (message) => {
      out.push(message);
    },
    error: (message) => {
      err.push(message);
    },
    exit: (code) => {
      throw new Error(`exit ${code}`);
    },
  };
  return { out, err, runtime };
}

describe("buildProgram", () => {
  it("registers both commands", () => {
    const program = buildProgram();
    expect(program.name()).toBe("rescaffold");
    expect(program.commands.map((command) => command.name())).toEqual(["relocate", "reconcile"]);
  });

  it("declares the command options", () => {
    const program = buildProgram();
    const longs = (name: string) =>
      program.commands.find((command) => command.name() === name)?.options.map((o) => o.long);
    expect(longs("relocate")).toEqual(["--config", "--yes", "--no-tidy", "--json"]);
    expect(longs("reconcile")).toEqual(["--config", "--json"]);
  });

  it("requires the positional arguments", async () => {
    await expect(quietProgram().parseAsync(["node", "rescaffold", "relocate"])).rejects.toMatchObject({
      code: "commander.missingArgument",
    });
    await expect(
      quietProgram().parseAsync(["node", "rescaffold", "reconcile", "repo"]),
    ).rejects.toMatchObject({ code: "commander.missingArgument" });
  });
});

describe("isAffirmative", () => {
  it.each([
    ["y", true],
    ["Yes", true],
    ["  y", true],
    ["n", false],
    ["", false],
    ["ok", false],
  ])("%j -> %s", (answer, expected) => {
    expect(isAffirmative(answer)).toBe(expected);
  });
});

describe("failCommand", () => {
  it("prints the message and tool output, then exits 1", () => {
    const { err, runtime } = createTestRuntime();
    expect(() =>
      failCommand(new ExternalToolError("go mod tidy", 1, "missing go.sum entry\n"), runtime),
    ).toThrow("exit 1");
    expect(err).toHaveLength(2);
    expect(err[0]).toContain("go mod tidy exited with code 1");
    expect(err[1]).toContain("missing go.sum entry");
  });

  it("reports a cancellation without the error prefix", () => {
    const { out, err, runtime } = createTestRuntime();
    expect(() => failCommand(new CancelledError("Migration cancelled"), runtime)).toThrow("exit 1");
    expect(out).toEqual(["Migration cancelled"]);
    expect(err).toEqual([]);
  });
});

describe("narrativeRuntime", () => {
  it("sends progress to stderr in JSON mode", () => {
    const { out, err, runtime } = createTestRuntime();
    narrativeRuntime(true, runtime).log("Step 1");
    narrativeRuntime(false, runtime).log("Step 2");
    expect(err).toEqual(["Step 1"]);
    expect(out).toEqual(["Step 2"]);
  });
});
