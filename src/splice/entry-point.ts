/**
 * Entry-point migration: splice the old main.go's hand-written regions into
 * the scaffolded cmd/main.go, then rebuild reconciler registrations.
 */

import fs from "node:fs";
import path from "node:path";
import type { EntryPointConfig, LayoutConfig } from "../config/zod-schema.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { rewriteReferences, type ImportRename } from "../relocate/rewriter.js";
import {
  collectNewImports,
  extractInitBody,
  extractScalarField,
  extractSetupRegion,
  injectImports,
  injectSetupRegion,
  replaceInitBody,
  replaceScalarField,
} from "./regions.js";
import { captureSetupArguments, rewriteReconcilerRegistrations } from "./reconciler-args.js";

const log = createSubsystemLogger("splice").child("entry-point");

export type EntryPointSummary = {
  /** Import lines added to the new file */
  imports: string[];
  init: boolean;
  /** Value carried over for the scalar field, when one was found */
  scalarValue?: string;
  setup: boolean;
  reconcilers: {
    rewritten: string[];
    fallbacks: string[];
    untouched: string[];
  };
};

export type SpliceOptions = {
  entryPoint: EntryPointConfig;
  layout: LayoutConfig;
  /** Module path of the old project; its controller imports are not carried over */
  oldModule: string;
  /** Applied to the old file before splicing, so carried-over imports use the new paths */
  renames?: ImportRename[];
};

/** Pure text transform; `newText` is the scaffolded entry point. */
export function spliceEntryPoint(
  originalText: string,
  newText: string,
  opts: SpliceOptions,
): { text: string; summary: EntryPointSummary } {
  const { entryPoint, layout } = opts;
  const renames = opts.renames ?? [];
  const oldText = rewriteReferences(originalText, renames).text;
  let text = newText;

  // The old controller package, under its old path or its renamed one.
  const controllerImport = `"${opts.oldModule}/${layout.oldControllerDir}`;
  const imports = collectNewImports(oldText, newText, [
    controllerImport,
    rewriteReferences(controllerImport, renames).text,
  ]);
  const importStep = injectImports(text, imports);
  text = importStep.text;
  if (imports.length > 0 && !importStep.applied) {
    log.warn("No import block in the new entry point; imports not carried over");
  }

  const initBody = extractInitBody(oldText);
  const initStep = initBody ? replaceInitBody(text, initBody) : { text, applied: false };
  text = initStep.text;
  if (!initBody) {
    log.info("No init() body in the old entry point");
  }

  const scalarValue = extractScalarField(oldText, entryPoint.scalarField);
  if (scalarValue !== undefined) {
    text = replaceScalarField(text, entryPoint.scalarField, scalarValue).text;
  } else {
    log.info("Scalar field not found in the old entry point", { field: entryPoint.scalarField });
  }

  const setupBlock = extractSetupRegion(oldText, {
    start: entryPoint.setupStart,
    end: entryPoint.setupEnd,
  });
  const setupStep = setupBlock
    ? injectSetupRegion(text, setupBlock, entryPoint.managerStart)
    : { text, applied: false };
  text = setupStep.text;
  if (!setupBlock) {
    log.info("Setup region not found in the old entry point");
  }

  const reconcilers = rewriteReconcilerRegistrations(text, {
    newPackage: layout.newPackage,
    captured: captureSetupArguments(oldText, layout.oldPackage),
    fields: entryPoint.reconcilerFields,
    defaultArgs: entryPoint.defaultSetupArgs,
  });
  for (const name of reconcilers.fallbacks) {
    log.warn("SetupWithManager argument not captured; using the default", {
      reconciler: name,
      args: entryPoint.defaultSetupArgs,
    });
  }
  for (const name of reconcilers.untouched) {
    log.warn("Reconciler not registered in the old entry point; left as generated", {
      reconciler: name,
    });
  }

  return {
    text: reconcilers.text,
    summary: {
      imports: importStep.applied ? imports : [],
      init: initStep.applied,
      scalarValue,
      setup: setupStep.applied,
      reconcilers: {
        rewritten: reconcilers.rewritten,
        fallbacks: reconcilers.fallbacks,
        untouched: reconcilers.untouched,
      },
    },
  };
}

export type MigrateEntryPointOptions = SpliceOptions & {
  snapshotSuffix: string;
  renames: ImportRename[];
};

export type EntryPointMigration = EntryPointSummary & {
  /** Relative to the new root */
  snapshot: string;
};

/**
 * Splice `<oldRoot>/<oldEntryPoint>` into `<newRoot>/<newEntryPoint>`.
 * Returns undefined when either file is missing.
 */
export function migrateEntryPoint(
  oldRoot: string,
  newRoot: string,
  opts: MigrateEntryPointOptions,
): EntryPointMigration | undefined {
  const { oldEntryPoint, newEntryPoint } = opts.layout;
  const oldFile = path.join(oldRoot, oldEntryPoint);
  const newFile = path.join(newRoot, newEntryPoint);
  if (!fs.existsSync(oldFile)) {
    log.info("No entry point in the old project", { file: oldEntryPoint });
    return undefined;
  }
  if (!fs.existsSync(newFile)) {
    log.warn("Scaffolded entry point not found", { file: newEntryPoint });
    return undefined;
  }

  const snapshot = `${newEntryPoint}${opts.snapshotSuffix}`;
  fs.copyFileSync(newFile, path.join(newRoot, snapshot));

  const spliced = spliceEntryPoint(
    fs.readFileSync(oldFile, "utf-8"),
    fs.readFileSync(newFile, "utf-8"),
    opts,
  );
  fs.writeFileSync(newFile, spliced.text);
  return { ...spliced.summary, snapshot };
}
