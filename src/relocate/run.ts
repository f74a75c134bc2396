/**
 * The relocation run: scaffold a fresh go/v4 project next to the old one and
 * carry the old project's hand-written code into it.
 */

import fs from "node:fs";
import path from "node:path";
import type { RescaffoldConfig } from "../config/zod-schema.js";
import { formatResources, readProjectDescriptor } from "../descriptor/parser.js";
import type { ProjectDescriptor } from "../descriptor/types.js";
import { CancelledError, ConfigError } from "../infra/errors.js";
import { runCommand, type CommandRunner } from "../infra/exec.js";
import { copyDir, copyFileWithParents, isDirectory, isFile } from "../infra/fs-walk.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { createScaffoldGenerator } from "../scaffold/generator.js";
import { migrateEntryPoint, type EntryPointMigration } from "../splice/entry-point.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { RULE, theme } from "../terminal/theme.js";
import {
  MANIFEST_FILENAME,
  readModuleAt,
  transplantApiManifest,
  transplantRootManifest,
  type ApiManifestResult,
  type RootManifestResult,
} from "./manifest.js";
import { buildPathMappings, mappingByName, type PathMapping } from "./mappings.js";
import { relocateFragments, type RelocationEntry } from "./relocator.js";
import { buildReport, writeRelocationReport } from "./report.js";
import { buildImportRenames, rewriteTreeReferences } from "./rewriter.js";

const log = createSubsystemLogger("relocate").child("run");

export const OVERWRITE_PROMPT = "Remove and continue? (y/n): ";

export type RelocationOptions = {
  projectDir: string;
  config: RescaffoldConfig;
  /** Asked before an existing target directory is deleted */
  confirm: (question: string) => Promise<boolean>;
  runner?: CommandRunner;
  runtime?: RuntimeEnv;
  /** Run `go mod tidy` (default true) */
  tidy?: boolean;
  /** Delete an existing target directory without asking */
  assumeYes?: boolean;
};

export type RelocationSummary = {
  sourceDir: string;
  targetDir: string;
  project: Omit<ProjectDescriptor, "resources">;
  resources: number;
  /** Kinds that got a webhook scaffold */
  webhooks: string[];
  oldModule: string;
  newModule: string;
  relocations: RelocationEntry[];
  apiManifest?: ApiManifestResult;
  /** Files whose import paths were rewritten, relative to the target */
  rewritten: string[];
  rootManifest?: RootManifestResult;
  entryPoint?: EntryPointMigration;
  tidied: boolean;
  /** Extra files and directories copied from the old project */
  copied: string[];
  /** Unneeded paths deleted from the new project */
  removed: string[];
  warnings: string[];
  reportPath: string;
};

function stepHeader(runtime: RuntimeEnv, step: string, title: string): void {
  runtime.log("");
  runtime.log(theme.heading(`Step ${step}: ${title}`));
  runtime.log(RULE);
}

async function prepareTargetDir(
  targetDir: string,
  opts: RelocationOptions,
  runtime: RuntimeEnv,
): Promise<void> {
  if (!fs.existsSync(targetDir)) {
    return;
  }
  runtime.log("");
  runtime.log(theme.warn(`Warning: Directory '${targetDir}' already exists`));
  const proceed = opts.assumeYes || (await opts.confirm(OVERWRITE_PROMPT));
  if (!proceed) {
    throw new CancelledError("Migration cancelled");
  }
  runtime.log(`Removing existing directory: ${targetDir}`);
  fs.rmSync(targetDir, { recursive: true, force: true });
}

export async function runRelocation(opts: RelocationOptions): Promise<RelocationSummary> {
  const runtime = opts.runtime ?? defaultRuntime;
  const { config } = opts;
  const { layout } = config;

  // Validate inputs before touching anything.
  const sourceDir = path.resolve(opts.projectDir);
  if (!isDirectory(sourceDir)) {
    throw new ConfigError(`Directory '${opts.projectDir}' does not exist`);
  }
  const descriptor = readProjectDescriptor(sourceDir);
  const targetDir = `${sourceDir}-${config.targetSuffix}`;

  runtime.log(RULE);
  runtime.log(theme.heading("Operator Migration: v3 to v4"));
  runtime.log(`Source: ${sourceDir}`);
  runtime.log(RULE);
  runtime.log(`Project Name: ${descriptor.projectName}`);
  runtime.log(`Repository: ${descriptor.repoModule}`);
  runtime.log(`Domain: ${descriptor.domain}`);
  runtime.log(`Multigroup: ${descriptor.multigroup}`);
  runtime.log("Extracted resources:");
  for (const row of formatResources(descriptor.resources)) {
    runtime.log(`  ${row}`);
  }

  await prepareTargetDir(targetDir, opts, runtime);

  const generator = createScaffoldGenerator(opts.runner ?? runCommand, config.toolchain);
  const warnings: string[] = [];
  const mappings = buildPathMappings(layout);

  stepHeader(runtime, "1", `Initializing new go/v4 project in: ${targetDir}`);
  fs.mkdirSync(targetDir, { recursive: true });
  await generator.initModule(targetDir, descriptor.repoModule);
  await generator.initProject(targetDir, descriptor);
  if (descriptor.multigroup) {
    runtime.log("Enabling multigroup layout...");
    await generator.enableMultigroup(targetDir);
  }
  runtime.log(theme.success(`✓ Operator initialized with ${config.toolchain.plugins}`));

  stepHeader(runtime, "2", "Scaffolding APIs and Controllers");
  for (const resource of descriptor.resources) {
    runtime.log(`Scaffolding API: ${resource.group}/${resource.version} Kind=${resource.kind}`);
    await generator.createApi(targetDir, resource);
  }

  stepHeader(runtime, "3", "Scaffolding Webhooks");
  const webhooks: string[] = [];
  for (const resource of descriptor.resources) {
    if (await generator.createWebhook(targetDir, resource)) {
      runtime.log(`Scaffolded webhook for: ${resource.group}/${resource.version} Kind=${resource.kind}`);
      webhooks.push(resource.kind);
    }
  }
  if (webhooks.length === 0) {
    runtime.log(theme.muted("No webhooks found in original project"));
  }

  const oldModule = readModuleAt(sourceDir) ?? descriptor.repoModule;
  const newModule = readModuleAt(targetDir) ?? descriptor.repoModule;
  const manifestCtx = { oldRoot: sourceDir, newRoot: targetDir, oldModule, newModule };

  const relocations: RelocationEntry[] = [];
  const relocate = (selected: PathMapping[]) => {
    const entries = relocateFragments(sourceDir, targetDir, selected, {
      snapshotSuffix: config.snapshotSuffix,
      onFile: (entry) => {
        const note = entry.snapshot ? theme.muted(` (scaffold kept as ${entry.snapshot})`) : "";
        runtime.log(`  ${entry.source} -> ${entry.target}${note}`);
      },
    });
    if (entries.length === 0) {
      runtime.log(theme.muted("Nothing to migrate"));
    }
    for (const entry of entries) {
      const mapping = selected.find((m) => m.name === entry.mapping);
      if (mapping?.expectScaffold && !entry.snapshot) {
        warnings.push(`Scaffolded file not found, copied directly: ${entry.target}`);
      }
    }
    relocations.push(...entries);
  };

  stepHeader(runtime, "4", "Migrating API Definitions");
  relocate([...mappingByName(mappings, "api-types"), ...mappingByName(mappings, "api-support")]);

  stepHeader(runtime, "5", "Setting up api/ as Go Submodule");
  const apiManifest = transplantApiManifest(manifestCtx, config.api.defaultRequires);
  if (apiManifest) {
    runtime.log(`  api/go.mod ${apiManifest.origin}; module ${apiManifest.apiModule}`);
  } else {
    runtime.log(theme.muted("No api/ directory found in converted project"));
  }

  stepHeader(runtime, "6", "Migrating Controller Logic");
  relocate(mappingByName(mappings, "controllers"));

  stepHeader(runtime, "7", "Migrating Webhook Definitions");
  relocate(mappingByName(mappings, "webhooks"));

  stepHeader(runtime, "8", `Migrating ${layout.oldSharedDir}/ to ${layout.newSharedDir}/`);
  relocate(mappingByName(mappings, "shared-packages"));

  stepHeader(runtime, "9", "Updating Import Paths");
  runtime.log(`Old module: ${oldModule}`);
  runtime.log(`New module: ${newModule}`);
  const renames = buildImportRenames(oldModule, newModule, layout);
  const rewritten = rewriteTreeReferences(targetDir, renames);
  for (const file of rewritten) {
    runtime.log(`  Updated: ${file}`);
  }

  stepHeader(runtime, "10", "Copying go.mod from original project");
  const rootManifest = transplantRootManifest(manifestCtx, layout, config.snapshotSuffix);
  if (!rootManifest) {
    warnings.push("Old go.mod not found; generated manifest kept");
  }

  stepHeader(runtime, "11", `Migrating ${layout.oldEntryPoint}`);
  const entryPoint = migrateEntryPoint(sourceDir, targetDir, {
    entryPoint: config.entryPoint,
    layout,
    oldModule,
    snapshotSuffix: config.snapshotSuffix,
    renames,
  });
  if (entryPoint) {
    runtime.log(`  Added ${entryPoint.imports.length} import(s)`);
    if (entryPoint.scalarValue !== undefined) {
      runtime.log(`  ${config.entryPoint.scalarField}: ${entryPoint.scalarValue}`);
    }
    for (const name of entryPoint.reconcilers.fallbacks) {
      warnings.push(
        `${name}: SetupWithManager argument not found, defaulted to (${config.entryPoint.defaultSetupArgs})`,
      );
    }
    for (const name of entryPoint.reconcilers.untouched) {
      warnings.push(`${name}: not registered in ${layout.oldEntryPoint}, left as generated`);
    }
  } else {
    runtime.log(theme.muted(`No ${layout.oldEntryPoint} migrated`));
  }

  stepHeader(runtime, "12", "Syncing Go Dependencies");
  const tidy = opts.tidy ?? true;
  if (tidy) {
    if (isFile(path.join(targetDir, "api", MANIFEST_FILENAME))) {
      runtime.log("Running go mod tidy in api/ directory...");
      await generator.tidy(path.join(targetDir, "api"));
    }
    runtime.log("Running go mod tidy in main directory...");
    await generator.tidy(targetDir);
  } else {
    runtime.log(theme.muted("Skipped (--no-tidy)"));
  }

  stepHeader(runtime, "13", "Copying Additional Configuration Files");
  const copied: string[] = [];
  for (const file of config.extras.copyFiles) {
    if (isFile(path.join(sourceDir, file))) {
      runtime.log(`  Copying ${file}`);
      copyFileWithParents(path.join(sourceDir, file), path.join(targetDir, file));
      copied.push(file);
    }
  }
  for (const dir of config.extras.copyDirs) {
    if (isDirectory(path.join(sourceDir, dir))) {
      runtime.log(`  Copying ${dir}/ directory`);
      copyDir(path.join(sourceDir, dir), path.join(targetDir, dir));
      copied.push(`${dir}/`);
    }
  }

  stepHeader(runtime, "14", "Removing Unnecessary Directories and Files");
  const removed: string[] = [];
  for (const rel of config.extras.removePaths) {
    const abs = path.join(targetDir, rel);
    if (fs.existsSync(abs)) {
      runtime.log(`  Removing ${rel}`);
      fs.rmSync(abs, { recursive: true, force: true });
      removed.push(rel);
    }
  }

  stepHeader(runtime, "15", "Verifying migration");
  const staleRef = `${oldModule}/${layout.oldControllerDir}`;
  for (const rel of [layout.newEntryPoint, MANIFEST_FILENAME]) {
    const abs = path.join(targetDir, rel);
    if (isFile(abs) && fs.readFileSync(abs, "utf-8").includes(staleRef)) {
      warnings.push(`Old controller path still found in ${rel}`);
    }
  }
  for (const warning of warnings) {
    runtime.log(theme.warn(`⚠ ${warning}`));
    log.warn(warning);
  }

  const report = buildReport(sourceDir, targetDir, relocations, {
    snapshots: [rootManifest?.snapshot, entryPoint?.snapshot].filter(
      (snapshot): snapshot is string => snapshot !== undefined,
    ),
    rewritten,
    warnings,
  });
  const reportPath = writeRelocationReport(targetDir, report);

  printNextSteps(runtime, targetDir, config.snapshotSuffix, reportPath);

  const { resources, ...project } = descriptor;
  return {
    sourceDir,
    targetDir,
    project,
    resources: resources.length,
    webhooks,
    oldModule,
    newModule,
    relocations,
    apiManifest,
    rewritten,
    rootManifest,
    entryPoint,
    tidied: tidy,
    copied,
    removed,
    warnings,
    reportPath,
  };
}

function printNextSteps(
  runtime: RuntimeEnv,
  targetDir: string,
  snapshotSuffix: string,
  reportPath: string,
): void {
  runtime.log("");
  runtime.log(RULE);
  runtime.log(theme.success("Migration Completed Successfully!"));
  runtime.log(RULE);
  runtime.log("");
  runtime.log(`New go/v4 operator created at: ${theme.path(targetDir)}`);
  runtime.log(`Relocation report: ${theme.path(reportPath)}`);
  runtime.log("");
  runtime.log("Next Steps:");
  runtime.log(`1. Review the migrated code in ${targetDir}`);
  runtime.log(`2. Compare against the scaffolded originals (${snapshotSuffix} files):`);
  runtime.log(`   ${theme.command(`find ${targetDir} -name '*${snapshotSuffix}'`)}`);
  runtime.log("3. Review and update the Makefile for any custom targets");
  runtime.log("4. Test the build:");
  runtime.log(`   ${theme.command(`cd ${targetDir} && make manifests generate build`)}`);
  runtime.log(`5. Run tests: ${theme.command("make test")}`);
}
