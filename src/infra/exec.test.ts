import os from "node:os";
import { describe, expect, it } from "vitest";
import { ExternalToolError } from "./errors.js";
import { runChecked, runCommand } from "./exec.js";

const node = process.execPath;

describe("runCommand", () => {
  it("captures stdout and stderr with the exit code", async () => {
    const result = await runCommand(
      node,
      ["-e", "process.stdout.write('to-out'); process.stderr.write('to-err'); process.exit(3)"],
      { cwd: os.tmpdir() },
    );
    expect(result.code).toBe(3);
    expect(result.output).toContain("to-out");
    expect(result.output).toContain("to-err");
  });

  it("rejects when the command cannot be started", async () => {
    await expect(
      runCommand("rescaffold-no-such-binary", [], { cwd: os.tmpdir() }),
    ).rejects.toMatchObject({ code: "ENOENT" });
  });
});

describe("runChecked", () => {
  it("returns the output of a successful command", async () => {
    await expect(
      runChecked(runCommand, node, ["-e", "process.stdout.write('hello')"], os.tmpdir()),
    ).resolves.toBe("hello");
  });

  it("turns a non-zero exit into an ExternalToolError", async () => {
    const script = "process.stderr.write('boom'); process.exit(3)";
    const failure = runChecked(runCommand, node, ["-e", script], os.tmpdir());
    await expect(failure).rejects.toBeInstanceOf(ExternalToolError);
    await expect(failure).rejects.toMatchObject({
      command: `${node} -e ${script}`,
      exitCode: 3,
      output: "boom",
      message: `${node} -e ${script} exited with code 3`,
    });
  });
});
