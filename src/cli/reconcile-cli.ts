/**
 * CLI registration for tree reconciliation.
 *
 * Commands:
 *   rescaffold reconcile <target-repo> <reference-dir> [options]
 */

import type { Command } from "commander";
import { loadConfig } from "../config/config.js";
import { createGitClient } from "../reconcile/git.js";
import { reconcileTree } from "../reconcile/sync.js";
import { defaultRuntime } from "../runtime.js";
import { failCommand, narrativeRuntime } from "./output.js";

export type ReconcileCliOptions = {
  config?: string;
  json: boolean;
};

export function registerReconcileCli(program: Command): void {
  program
    .command("reconcile")
    .description("Sync a git working tree with a regenerated reference directory")
    .argument("<target-repo>", "Git repository to update")
    .argument("<reference-dir>", "Directory to sync from")
    .option("--config <path>", "Path to a rescaffold.yaml")
    .option("--json", "Print the summary as JSON", false)
    .action((targetRepo: string, referenceDir: string, opts: ReconcileCliOptions) => {
      try {
        const config = loadConfig({ configPath: opts.config, cwd: process.cwd() });
        const summary = reconcileTree({
          repoDir: targetRepo,
          referenceDir,
          git: createGitClient(targetRepo),
          config,
          runtime: narrativeRuntime(opts.json),
        });
        if (opts.json) {
          defaultRuntime.log(JSON.stringify(summary, null, 2));
        }
      } catch (err) {
        failCommand(err);
      }
    });
}
