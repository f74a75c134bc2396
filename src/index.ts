export { loadConfig, parseConfig, CONFIG_FILENAME } from "./config/config.js";
export type { RescaffoldConfig } from "./config/zod-schema.js";
export {
  DESCRIPTOR_FILENAME,
  parseProjectDescriptor,
  parseResources,
  readProjectDescriptor,
} from "./descriptor/parser.js";
export type { ProjectDescriptor, ResourceDescriptor } from "./descriptor/types.js";
export { CancelledError, ConfigError, ExternalToolError, RescaffoldError } from "./infra/errors.js";
export { runCommand, type CommandRunner } from "./infra/exec.js";
export { buildPathMappings, type PathMapping } from "./relocate/mappings.js";
export { locateFragments, relocateFile, relocateFragments } from "./relocate/relocator.js";
export { buildImportRenames, cleanManifest, rewriteReferences } from "./relocate/rewriter.js";
export { runRelocation, type RelocationOptions, type RelocationSummary } from "./relocate/run.js";
export { createScaffoldGenerator, type ScaffoldGenerator } from "./scaffold/generator.js";
export { spliceEntryPoint, migrateEntryPoint } from "./splice/entry-point.js";
export { rewriteReconcilerRegistrations } from "./splice/reconciler-args.js";
export { createGitClient, type GitClient } from "./reconcile/git.js";
export { buildReconciliationRules, classifyPath } from "./reconcile/rules.js";
export { reconcileTree, type ReconcileOptions, type ReconcileSummary } from "./reconcile/sync.js";
