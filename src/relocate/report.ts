import fs from "node:fs";
import path from "node:path";
import type { RelocationEntry } from "./relocator.js";

export const REPORT_FILENAME = ".rescaffold-report.json";

export type RelocationReport = {
  /** ISO 8601 */
  timestamp: string;
  sourceDir: string;
  targetDir: string;
  relocations: RelocationEntry[];
  /** Snapshots of files the migration overwrote, relative to the target */
  snapshots: string[];
  /** Paths whose import references were rewritten */
  rewritten: string[];
  warnings: string[];
};

export function buildReport(
  sourceDir: string,
  targetDir: string,
  relocations: RelocationEntry[],
  extra: { snapshots?: string[]; rewritten?: string[]; warnings?: string[] } = {},
): RelocationReport {
  const snapshots = relocations.flatMap((entry) => (entry.snapshot ? [entry.snapshot] : []));
  return {
    timestamp: new Date().toISOString(),
    sourceDir,
    targetDir,
    relocations,
    snapshots: [...snapshots, ...(extra.snapshots ?? [])],
    rewritten: extra.rewritten ?? [],
    warnings: extra.warnings ?? [],
  };
}

/** Atomic write: write to .tmp, then rename */
export function writeRelocationReport(targetDir: string, report: RelocationReport): string {
  const file = path.join(targetDir, REPORT_FILENAME);
  const tmp = `${file}.tmp`;
  fs.writeFileSync(tmp, `${JSON.stringify(report, null, 2)}\n`, "utf-8");
  fs.renameSync(tmp, file);
  return file;
}
