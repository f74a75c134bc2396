/**
 * Fatal error taxonomy. Anything that is not one of these (scaffold file missing,
 * marker not found) is a logged warning and the run keeps going.
 */

export class RescaffoldError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad or missing input: descriptor fields, directories, config file. Raised before any mutation. */
export class ConfigError extends RescaffoldError {}

/** The user declined a destructive prompt. */
export class CancelledError extends RescaffoldError {}

/** An external tool (generator, go toolchain, git) exited non-zero. */
export class ExternalToolError extends RescaffoldError {
  readonly command: string;
  readonly exitCode: number;
  readonly output: string;

  constructor(command: string, exitCode: number, output: string) {
    super(`${command} exited with code ${exitCode}`);
    this.command = command;
    this.exitCode = exitCode;
    this.output = output;
  }
}

export function formatError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
