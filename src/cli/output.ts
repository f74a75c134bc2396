import { CancelledError, ExternalToolError, formatError } from "../infra/errors.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { theme } from "../terminal/theme.js";

/** Progress goes to stderr under --json so stdout carries only the summary. */
export function narrativeRuntime(json: boolean, base: RuntimeEnv = defaultRuntime): RuntimeEnv {
  return json ? { ...base, log: base.error } : base;
}

/** Print a command failure and exit 1. */
export function failCommand(err: unknown, runtime: RuntimeEnv = defaultRuntime): never {
  if (err instanceof CancelledError) {
    runtime.log(err.message);
    return runtime.exit(1);
  }
  runtime.error(`${theme.error("Error:")} ${formatError(err)}`);
  if (err instanceof ExternalToolError && err.output.trim()) {
    runtime.error(theme.muted(err.output.trimEnd()));
  }
  return runtime.exit(1);
}
