/**
 * One ordered rule table, evaluated first-match, drives both the removal pass
 * and the overlay pass. Both passes act only on paths classified "normal", so
 * a path the overlay skips can never be removed without being restored.
 */

import type { ReconcileConfig } from "../config/zod-schema.js";

export type ReconcileAction = "protect" | "exclude-from-overlay" | "normal";

export type ReconciliationRule = {
  name: string;
  match: (relPath: string) => boolean;
  action: ReconcileAction;
};

export type Classification = {
  action: ReconcileAction;
  /** Name of the matching rule; undefined for the "normal" fallthrough */
  rule?: string;
};

function isUnder(relPath: string, dir: string): boolean {
  return relPath === dir || relPath.startsWith(`${dir}/`);
}

export function buildReconciliationRules(
  cfg: ReconcileConfig,
  snapshotSuffix: string,
): ReconciliationRule[] {
  const protectedFiles = new Set(cfg.protectedFiles);
  const overlayExcludes = new Set(cfg.overlayExcludes);
  return [
    {
      name: "snapshot",
      match: (p) => p.endsWith(snapshotSuffix),
      action: "protect",
    },
    {
      name: "git-metadata",
      match: (p) => isUnder(p, ".git"),
      action: "protect",
    },
    {
      name: "protected-file",
      match: (p) => protectedFiles.has(p),
      action: "protect",
    },
    {
      name: "protected-dir",
      match: (p) => cfg.protectedDirs.some((dir) => isUnder(p, dir)),
      action: "protect",
    },
    {
      name: "hidden-top-level",
      match: (p) => p.startsWith(".") && !p.includes("/"),
      action: "protect",
    },
    {
      name: "overlay-exclude",
      match: (p) => overlayExcludes.has(p),
      action: "exclude-from-overlay",
    },
  ];
}

export function classifyPath(rules: ReconciliationRule[], relPath: string): Classification {
  for (const rule of rules) {
    if (rule.match(relPath)) {
      return { action: rule.action, rule: rule.name };
    }
  }
  return { action: "normal" };
}
