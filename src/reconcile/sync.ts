/**
 * Reconcile a git working tree against a freshly regenerated reference tree:
 * structural moves, removal of stale tracked files, overlay, stage.
 */

import fs from "node:fs";
import path from "node:path";
import type { RescaffoldConfig } from "../config/zod-schema.js";
import { ConfigError } from "../infra/errors.js";
import {
  copyFileWithParents,
  isDirectory,
  listFiles,
  pruneEmptyDirs,
  removeIfEmpty,
} from "../infra/fs-walk.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { GO_FILE } from "../relocate/mappings.js";
import { renamePackageClause } from "../relocate/relocator.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { RULE, theme } from "../terminal/theme.js";
import type { GitClient } from "./git.js";
import { buildReconciliationRules, classifyPath, type ReconciliationRule } from "./rules.js";

const log = createSubsystemLogger("reconcile");

export type ReconcileOptions = {
  repoDir: string;
  referenceDir: string;
  git: GitClient;
  config: RescaffoldConfig;
  /** Defaults to the table built from `config` */
  rules?: ReconciliationRule[];
  runtime?: RuntimeEnv;
};

export type MovedPath = { from: string; to: string };

export type ReconcileSummary = {
  repoDir: string;
  referenceDir: string;
  moved: MovedPath[];
  /** Tracked paths removed from version control */
  removed: string[];
  /** Tracked paths left alone by a rule */
  kept: string[];
  /** Reference files copied over the working tree */
  copied: string[];
  /** Reference files the overlay skipped */
  skipped: string[];
  /** `git status --short` after staging */
  status: string;
};

/** Repository basename with the operator suffix stripped: glance-operator → glance. */
export function operatorName(repoDir: string, suffix: string): string {
  const base = path.basename(path.resolve(repoDir));
  return suffix && base.endsWith(suffix) && base.length > suffix.length
    ? base.slice(0, -suffix.length)
    : base;
}

function checkPreconditions(repoDir: string, referenceDir: string): void {
  if (!isDirectory(repoDir)) {
    throw new ConfigError(`Git repository directory does not exist: ${repoDir}`);
  }
  if (!isDirectory(referenceDir)) {
    throw new ConfigError(`Source directory does not exist: ${referenceDir}`);
  }
  if (!fs.existsSync(path.join(repoDir, ".git"))) {
    throw new ConfigError(`Not a git repository: ${repoDir}`);
  }
}

type MoveContext = {
  repoDir: string;
  git: GitClient;
  runtime: RuntimeEnv;
};

/** Move every tracked file under `fromDir` to `toDir`, keeping sub-paths. */
function moveTrackedTree(
  ctx: MoveContext,
  fromDir: string,
  toDir: string,
  packageRename?: { from: string; to: string },
): MovedPath[] {
  const moved: MovedPath[] = [];
  for (const file of ctx.git.listTracked(`${fromDir}/`)) {
    const target = path.posix.join(toDir, file.slice(fromDir.length + 1));
    ctx.runtime.log(`  Moving: ${file} -> ${target}`);
    ctx.git.move(file, target);
    moved.push({ from: file, to: target });

    if (packageRename && GO_FILE.test(target)) {
      const abs = path.join(ctx.repoDir, target);
      const content = fs.readFileSync(abs, "utf-8");
      const next = renamePackageClause(content, packageRename.from, packageRename.to);
      if (next !== content) {
        fs.writeFileSync(abs, next);
      }
    }
  }
  if (pruneEmptyDirs(path.join(ctx.repoDir, fromDir))) {
    ctx.runtime.log(`  Removed empty ${fromDir} directory`);
  }
  return moved;
}

function structuralMoves(ctx: MoveContext, config: RescaffoldConfig): MovedPath[] {
  const { layout, reconcile } = config;
  const moved: MovedPath[] = [];
  const at = (rel: string) => path.join(ctx.repoDir, rel);

  const fixtures = reconcile.fixturesDir;
  if (isDirectory(at(fixtures.from)) && !fs.existsSync(at(fixtures.to))) {
    ctx.runtime.log(`Migrating ${fixtures.from} directory to ${fixtures.to}...`);
    ctx.git.move(fixtures.from, fixtures.to);
    moved.push({ from: fixtures.from, to: fixtures.to });
  }

  if (isDirectory(at(layout.oldControllerDir))) {
    ctx.runtime.log(
      `Migrating ${layout.oldControllerDir} directory to ${layout.newControllerDir}...`,
    );
    moved.push(
      ...moveTrackedTree(ctx, layout.oldControllerDir, layout.newControllerDir, {
        from: layout.oldPackage,
        to: layout.newPackage,
      }),
    );
  }

  const name = operatorName(ctx.repoDir, reconcile.operatorSuffix);
  const sharedFrom = path.posix.join(layout.oldSharedDir, name);
  const sharedTo = path.posix.join(layout.newSharedDir, name);
  if (isDirectory(at(sharedFrom))) {
    ctx.runtime.log(`Migrating ${sharedFrom} directory to ${sharedTo}...`);
    moved.push(...moveTrackedTree(ctx, sharedFrom, sharedTo));
    if (removeIfEmpty(at(layout.oldSharedDir))) {
      ctx.runtime.log(`  Removed empty ${layout.oldSharedDir} directory`);
    }
  }

  return moved;
}

export function reconcileTree(opts: ReconcileOptions): ReconcileSummary {
  const runtime = opts.runtime ?? defaultRuntime;
  const repoDir = path.resolve(opts.repoDir);
  const referenceDir = path.resolve(opts.referenceDir);
  checkPreconditions(repoDir, referenceDir);

  const rules =
    opts.rules ?? buildReconciliationRules(opts.config.reconcile, opts.config.snapshotSuffix);
  const { git } = opts;

  runtime.log(theme.heading(`Syncing git repository: ${repoDir}`));
  runtime.log(`From source directory: ${referenceDir}`);
  runtime.log(
    `Operator name: ${operatorName(repoDir, opts.config.reconcile.operatorSuffix)}`,
  );
  runtime.log("");

  // 1. structural moves
  const moved = structuralMoves({ repoDir, git, runtime }, opts.config);

  // 2. removal pass
  runtime.log("");
  runtime.log(theme.heading("Finding files to remove..."));
  const removed: string[] = [];
  const kept: string[] = [];
  for (const file of git.listTracked()) {
    const { action, rule } = classifyPath(rules, file);
    if (action !== "normal") {
      log.debug("Keeping tracked path", { file, rule });
      kept.push(file);
      continue;
    }
    if (!fs.existsSync(path.join(referenceDir, file))) {
      runtime.log(`  Removing: ${file}`);
      git.remove(file);
      removed.push(file);
    }
  }

  // 3. overlay
  runtime.log("");
  runtime.log(theme.heading("Copying files from source directory..."));
  const copied: string[] = [];
  const skipped: string[] = [];
  for (const file of listFiles(referenceDir, new Set([".git"]))) {
    if (classifyPath(rules, file).action !== "normal") {
      skipped.push(file);
      continue;
    }
    copyFileWithParents(path.join(referenceDir, file), path.join(repoDir, file));
    copied.push(file);
  }
  runtime.log(`  Copied ${copied.length} file(s), skipped ${skipped.length}`);

  // 4. stage
  runtime.log("");
  runtime.log(theme.heading("Adding new/modified files to git..."));
  git.stageAll();
  const status = git.statusShort();

  runtime.log("");
  runtime.log(RULE);
  runtime.log(theme.success("Sync complete!"));
  runtime.log(RULE);
  if (status.trim()) {
    runtime.log("Summary of changes:");
    runtime.log(status.trimEnd());
  }

  return { repoDir, referenceDir, moved, removed, kept, copied, skipped, status };
}
