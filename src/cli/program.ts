import { Command } from "commander";
import { registerReconcileCli } from "./reconcile-cli.js";
import { registerRelocateCli } from "./relocate-cli.js";

export const PROGRAM_NAME = "rescaffold";

export function buildProgram(): Command {
  const program = new Command();
  program
    .name(PROGRAM_NAME)
    .description("Migrate go/v3 operator projects to the go/v4 layout");
  registerRelocateCli(program);
  registerReconcileCli(program);
  return program;
}
