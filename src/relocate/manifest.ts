/**
 * Go module manifests (go.mod) for the new tree: the root manifest is taken from
 * the old project, and api/ becomes its own `<module>/api` submodule.
 */

import fs from "node:fs";
import path from "node:path";
import type { LayoutConfig } from "../config/zod-schema.js";
import { escapeRegExp } from "../infra/text.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { cleanManifest, replaceModulePath } from "./rewriter.js";

const log = createSubsystemLogger("relocate").child("manifest");

export const MANIFEST_FILENAME = "go.mod";

export function readModulePath(manifest: string): string | undefined {
  const match = manifest.match(/^module\s+"?([^\s"]+)"?/m);
  return match?.[1];
}

export function readGoVersion(manifest: string): string | undefined {
  const match = manifest.match(/^go\s+(\S+)/m);
  return match?.[1];
}

/** Module path declared by `<dir>/go.mod`, or undefined when the file is missing. */
export function readModuleAt(dir: string): string | undefined {
  const file = path.join(dir, MANIFEST_FILENAME);
  if (!fs.existsSync(file)) {
    return undefined;
  }
  return readModulePath(fs.readFileSync(file, "utf-8"));
}

export function setModuleDirective(manifest: string, modulePath: string): string {
  if (/^module\s/m.test(manifest)) {
    return manifest.replace(/^module\s.*$/m, `module ${modulePath}`);
  }
  return `module ${modulePath}\n\n${manifest}`;
}

/** Append `replace <apiModule> => ./api` unless a replace for that module exists. */
export function ensureReplaceDirective(manifest: string, apiModule: string): string {
  if (new RegExp(`^replace\\s+${escapeRegExp(apiModule)}(\\s|$)`, "m").test(manifest)) {
    return manifest;
  }
  const base = manifest.endsWith("\n") ? manifest : `${manifest}\n`;
  return `${base}\nreplace ${apiModule} => ./api\n`;
}

export function renderApiManifest(
  apiModule: string,
  goVersion: string | undefined,
  requires: Record<string, string>,
): string {
  const lines = [`module ${apiModule}`, ""];
  if (goVersion) {
    lines.push(`go ${goVersion}`, "");
  }
  const entries = Object.entries(requires);
  if (entries.length > 0) {
    lines.push("require (");
    for (const [mod, version] of entries) {
      lines.push(`\t${mod} ${version}`);
    }
    lines.push(")");
  }
  return `${lines.join("\n")}\n`;
}

export type ManifestContext = {
  oldRoot: string;
  newRoot: string;
  oldModule: string;
  newModule: string;
};

export type ApiManifestResult = {
  apiModule: string;
  origin: "copied" | "created";
};

/**
 * Set up `newRoot/api/go.mod` as the `<newModule>/api` submodule and point the
 * root manifest at it. Skipped when the new tree has no api/ directory.
 */
export function transplantApiManifest(
  ctx: ManifestContext,
  defaultRequires: Record<string, string>,
): ApiManifestResult | undefined {
  const newApiDir = path.join(ctx.newRoot, "api");
  if (!fs.existsSync(newApiDir)) {
    log.info("No api/ directory in the new tree; submodule skipped");
    return undefined;
  }

  const apiModule = `${ctx.newModule}/api`;
  const rootFile = path.join(ctx.newRoot, MANIFEST_FILENAME);
  const rootManifest = fs.existsSync(rootFile) ? fs.readFileSync(rootFile, "utf-8") : "";
  const oldApiFile = path.join(ctx.oldRoot, "api", MANIFEST_FILENAME);

  let content: string;
  let origin: ApiManifestResult["origin"];
  if (fs.existsSync(oldApiFile)) {
    content = fs.readFileSync(oldApiFile, "utf-8");
    if (ctx.oldModule !== ctx.newModule) {
      content = replaceModulePath(content, ctx.oldModule, ctx.newModule);
    }
    content = setModuleDirective(content, apiModule);
    origin = "copied";
  } else {
    content = renderApiManifest(apiModule, readGoVersion(rootManifest), defaultRequires);
    origin = "created";
  }
  fs.writeFileSync(path.join(newApiDir, MANIFEST_FILENAME), content);

  if (rootManifest) {
    fs.writeFileSync(rootFile, ensureReplaceDirective(rootManifest, apiModule));
  } else {
    log.warn("Root go.mod missing; api replace directive not written");
  }
  return { apiModule, origin };
}

export type RootManifestResult = {
  /** Relative to the new root */
  snapshot?: string;
};

/**
 * Copy the old root go.mod over the generated one: module directive set to the
 * new module, stale sub-path lines dropped, old module references rewritten.
 * The api replace directive is kept when api/go.mod exists.
 */
export function transplantRootManifest(
  ctx: ManifestContext,
  layout: LayoutConfig,
  snapshotSuffix: string,
): RootManifestResult | undefined {
  const oldFile = path.join(ctx.oldRoot, MANIFEST_FILENAME);
  if (!fs.existsSync(oldFile)) {
    log.warn("Old go.mod not found; keeping the generated manifest");
    return undefined;
  }

  const newFile = path.join(ctx.newRoot, MANIFEST_FILENAME);
  const result: RootManifestResult = {};
  if (fs.existsSync(newFile)) {
    fs.copyFileSync(newFile, `${newFile}${snapshotSuffix}`);
    result.snapshot = `${MANIFEST_FILENAME}${snapshotSuffix}`;
  }

  let content = cleanManifest(fs.readFileSync(oldFile, "utf-8"), ctx.oldModule, ctx.newModule, [
    layout.oldControllerDir,
    layout.oldSharedDir,
  ]);
  content = setModuleDirective(content, ctx.newModule);
  if (fs.existsSync(path.join(ctx.newRoot, "api", MANIFEST_FILENAME))) {
    content = ensureReplaceDirective(content, `${ctx.newModule}/api`);
  }
  fs.writeFileSync(newFile, content);
  return result;
}
