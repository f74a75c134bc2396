/**
 * Import-path rewriting after relocation. Purely textual: only quoted import
 * prefixes are touched, so a second pass over rewritten text is a no-op.
 */

import fs from "node:fs";
import path from "node:path";
import type { LayoutConfig } from "../config/zod-schema.js";
import { listFiles } from "../infra/fs-walk.js";
import { escapeRegExp } from "../infra/text.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { GENERATED_FILE, GO_FILE } from "./mappings.js";

const log = createSubsystemLogger("relocate").child("rewriter");

export type ImportRename = {
  from: string;
  to: string;
};

export type RewriteResult = {
  text: string;
  changed: boolean;
};

/**
 * Ordered rename rules. Sub-path rules come before the bare module rule; the
 * bare rule only matches the fully quoted module path.
 */
export function buildImportRenames(
  oldModule: string,
  newModule: string,
  layout: LayoutConfig,
): ImportRename[] {
  return [
    {
      from: `"${oldModule}/${layout.oldSharedDir}/`,
      to: `"${newModule}/${layout.newSharedDir}/`,
    },
    {
      from: `"${oldModule}/${layout.oldControllerDir}`,
      to: `"${newModule}/${layout.newControllerDir}`,
    },
    { from: `"${oldModule}/api/`, to: `"${newModule}/api/` },
    { from: `"${oldModule}"`, to: `"${newModule}"` },
  ];
}

export function rewriteReferences(text: string, renames: ImportRename[]): RewriteResult {
  const lines = text.split("\n");
  let changed = false;
  for (let i = 0; i < lines.length; i += 1) {
    let line = lines[i];
    for (const rename of renames) {
      if (rename.from !== rename.to && line.includes(rename.from)) {
        line = line.split(rename.from).join(rename.to);
      }
    }
    if (line !== lines[i]) {
      lines[i] = line;
      changed = true;
    }
  }
  return { text: changed ? lines.join("\n") : text, changed };
}

/**
 * Rewrite every non-generated `.go` file under `root`.
 * Returns the modified paths, relative to `root`.
 */
export function rewriteTreeReferences(root: string, renames: ImportRename[]): string[] {
  const modified: string[] = [];
  for (const rel of listFiles(root, new Set([".git"]))) {
    const name = path.posix.basename(rel);
    if (!GO_FILE.test(name) || GENERATED_FILE.test(name)) {
      continue;
    }
    const file = path.join(root, rel);
    const result = rewriteReferences(fs.readFileSync(file, "utf-8"), renames);
    if (result.changed) {
      fs.writeFileSync(file, result.text);
      modified.push(rel);
      log.debug("Rewrote import paths", { file: rel });
    }
  }
  return modified;
}

/**
 * Clean a module manifest after the module moved:
 * drop lines naming `<oldModule>/<subpath>` for the relocated sub-paths, drop
 * requirements on the old module itself when the module changed, then
 * substitute the old module path with the new one.
 */
export function cleanManifest(
  text: string,
  oldModule: string,
  newModule: string,
  renamedSubpaths: string[],
): string {
  const old = escapeRegExp(oldModule);
  const stale = renamedSubpaths.map(
    (sub) => new RegExp(`${old}/${escapeRegExp(sub)}(?=[/\\s"]|$)`),
  );
  const moduleChanged = oldModule !== newModule;
  const selfRequire = new RegExp(`^\\s*(?:require\\s+)?${old}\\s+v\\S*\\s*(?://.*)?$`);

  const kept = text.split("\n").filter((line) => {
    if (stale.some((pattern) => pattern.test(line))) {
      log.debug("Dropped stale manifest line", { line: line.trim() });
      return false;
    }
    if (moduleChanged && selfRequire.test(line)) {
      log.debug("Dropped requirement on the old module", { line: line.trim() });
      return false;
    }
    return true;
  });

  const joined = kept.join("\n");
  return moduleChanged ? replaceModulePath(joined, oldModule, newModule) : joined;
}

/** Replace whole-module occurrences of `oldModule`; longer paths that merely share its prefix are kept. */
export function replaceModulePath(text: string, oldModule: string, newModule: string): string {
  const pattern = new RegExp(`(?<![\\w./-])${escapeRegExp(oldModule)}(?=[/\\s"@]|$)`, "gm");
  return text.replace(pattern, newModule);
}
