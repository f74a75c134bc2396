import { spawn } from "node:child_process";
import { ExternalToolError } from "./errors.js";

export type CommandResult = { code: number; output: string };

/** Runs one external command to completion. Implementations must not throw on non-zero exit. */
export type CommandRunner = (
  command: string,
  args: string[],
  opts: { cwd: string },
) => Promise<CommandResult>;

/** Run a command and capture combined stdout/stderr. */
export const runCommand: CommandRunner = (command, args, opts) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: opts.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      env: { ...process.env, NO_COLOR: "1" },
    });

    let output = "";
    child.stdout?.on("data", (chunk: Buffer) => {
      output += chunk.toString();
    });
    child.stderr?.on("data", (chunk: Buffer) => {
      output += chunk.toString();
    });

    child.on("error", (err) => {
      reject(err);
    });

    child.on("close", (code) => {
      resolve({ code: code ?? 1, output });
    });
  });

/** Run through `runner`; a non-zero exit becomes an ExternalToolError. */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: string[],
  cwd: string,
): Promise<string> {
  const { code, output } = await runner(command, args, { cwd });
  if (code !== 0) {
    throw new ExternalToolError([command, ...args].join(" "), code, output);
  }
  return output;
}
