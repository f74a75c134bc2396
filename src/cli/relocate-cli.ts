/**
 * CLI registration for the relocation run.
 *
 * Commands:
 *   rescaffold relocate <project-dir> [options]
 */

import type { Command } from "commander";
import { loadConfig } from "../config/config.js";
import { runRelocation } from "../relocate/run.js";
import { defaultRuntime } from "../runtime.js";
import { failCommand, narrativeRuntime } from "./output.js";
import { askForConfirmation } from "./prompt.js";

export type RelocateCliOptions = {
  config?: string;
  yes: boolean;
  tidy: boolean;
  json: boolean;
};

export function registerRelocateCli(program: Command): void {
  program
    .command("relocate")
    .description("Scaffold a go/v4 project next to <project-dir> and transplant its code")
    .argument("<project-dir>", "go/v3 operator project (contains PROJECT)")
    .option("--config <path>", "Path to a rescaffold.yaml")
    .option("-y, --yes", "Replace an existing target directory without asking", false)
    .option("--no-tidy", "Skip go mod tidy")
    .option("--json", "Print the summary as JSON", false)
    .action(async (projectDir: string, opts: RelocateCliOptions) => {
      try {
        const config = loadConfig({ configPath: opts.config, cwd: process.cwd() });
        const summary = await runRelocation({
          projectDir,
          config,
          confirm: askForConfirmation,
          runtime: narrativeRuntime(opts.json),
          tidy: opts.tidy,
          assumeYes: opts.yes,
        });
        if (opts.json) {
          defaultRuntime.log(JSON.stringify(summary, null, 2));
        }
      } catch (err) {
        failCommand(err);
      }
    });
}
