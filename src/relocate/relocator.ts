/**
 * Fragment relocation: whole-file replace with a snapshot of whatever the
 * generator put at the target. There is no merge; only the scaffold's location
 * is trusted, never its content.
 */

import fs from "node:fs";
import path from "node:path";
import type { PathMapping } from "./mappings.js";
import { copyFileWithParents, isDirectory, listFiles } from "../infra/fs-walk.js";
import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("relocate").child("fragments");

export type RelocationEntry = {
  mapping: string;
  /** Relative to the old root */
  source: string;
  /** Relative to the new root */
  target: string;
  /** Relative to the new root; set when a scaffolded file was overwritten */
  snapshot?: string;
  /** Whether overwriting changed the target's bytes (false when no target existed) */
  changed: boolean;
};

export type RelocateOptions = {
  snapshotSuffix: string;
  /** Progress line per relocated file */
  onFile?: (entry: RelocationEntry) => void;
};

/** Files under `oldRoot/mapping.oldPrefix` that the mapping selects, relative to the prefix. */
export function locateFragments(oldRoot: string, mapping: PathMapping): string[] {
  const base = path.join(oldRoot, mapping.oldPrefix);
  if (!isDirectory(base)) {
    return [];
  }
  return listFiles(base).filter((rel) => {
    const name = path.posix.basename(rel);
    return mapping.include.test(name) && !mapping.exclude.some((pattern) => pattern.test(name));
  });
}

export function targetPathFor(mapping: PathMapping, relPath: string): string {
  const rel = mapping.flatten ? path.posix.basename(relPath) : relPath;
  return path.posix.join(mapping.newPrefix, rel);
}

/**
 * Rewrite the topmost `package` clause when it names `from`.
 * Other `package` lines (comments, later text) are left alone.
 */
export function renamePackageClause(content: string, from: string, to: string): string {
  const lines = content.split("\n");
  const index = lines.findIndex((line) => /^package\s+\S+/.test(line));
  if (index === -1) {
    return content;
  }
  const match = lines[index].match(/^package\s+(\S+)(\s*(?:\/\/.*)?)$/);
  if (!match || match[1] !== from) {
    return content;
  }
  lines[index] = `package ${to}${match[2]}`;
  return lines.join("\n");
}

function sameBytes(a: Buffer, b: Buffer): boolean {
  return a.length === b.length && a.equals(b);
}

/** Relocate one file. Returns the report entry. */
export function relocateFile(
  oldRoot: string,
  newRoot: string,
  mapping: PathMapping,
  relPath: string,
  opts: RelocateOptions,
): RelocationEntry {
  const sourceRel = path.posix.join(mapping.oldPrefix, relPath);
  const targetRel = targetPathFor(mapping, relPath);
  const source = path.join(oldRoot, sourceRel);
  const target = path.join(newRoot, targetRel);

  let content = fs.readFileSync(source);
  if (mapping.packageRename) {
    const { from, to } = mapping.packageRename;
    content = Buffer.from(renamePackageClause(content.toString("utf-8"), from, to), "utf-8");
  }

  const entry: RelocationEntry = {
    mapping: mapping.name,
    source: sourceRel,
    target: targetRel,
    changed: false,
  };

  if (fs.existsSync(target)) {
    const previous = fs.readFileSync(target);
    const snapshot = `${target}${opts.snapshotSuffix}`;
    fs.copyFileSync(target, snapshot);
    fs.writeFileSync(target, content);
    entry.snapshot = `${targetRel}${opts.snapshotSuffix}`;
    entry.changed = !sameBytes(previous, content);
  } else {
    if (mapping.expectScaffold) {
      log.warn("Scaffolded file not found, copying original directly", { target: targetRel });
    }
    if (mapping.packageRename) {
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, content);
    } else {
      copyFileWithParents(source, target);
    }
  }

  opts.onFile?.(entry);
  return entry;
}

/** Apply every mapping in order. */
export function relocateFragments(
  oldRoot: string,
  newRoot: string,
  mappings: PathMapping[],
  opts: RelocateOptions,
): RelocationEntry[] {
  const entries: RelocationEntry[] = [];
  for (const mapping of mappings) {
    const files = locateFragments(oldRoot, mapping);
    if (files.length === 0) {
      log.info("Nothing to relocate", { mapping: mapping.name, from: mapping.oldPrefix });
      continue;
    }
    for (const rel of files) {
      entries.push(relocateFile(oldRoot, newRoot, mapping, rel, opts));
    }
  }
  return entries;
}
