/**
 * Path mappings between the go/v3 and go/v4 layouts.
 */

import type { LayoutConfig } from "../config/zod-schema.js";

export type PathMapping = {
  /** Label used in logs and the relocation report */
  name: string;
  /** Directory in the old tree, relative to its root */
  oldPrefix: string;
  /** Directory in the new tree, relative to its root */
  newPrefix: string;
  /** Tested against the file's base name */
  include: RegExp;
  /** Base-name patterns that veto `include` */
  exclude: RegExp[];
  /** Drop the sub-path below `oldPrefix`; the target keeps only the base name */
  flatten?: boolean;
  /** Rewrite the topmost `package` line after copying */
  packageRename?: { from: string; to: string };
  /** The generator normally scaffolds the target, so its absence is worth a warning */
  expectScaffold?: boolean;
};

/** Generated deepcopy code: regenerated by the new toolchain, never transplanted. */
export const GENERATED_FILE = /^zz_generated/;
export const TYPES_FILE = /_types\.go$/;
export const WEBHOOK_FILE = /_webhook\.go$/;
export const CONTROLLER_FILE = /_controller\.go$/;
export const GO_FILE = /\.go$/;

export function buildPathMappings(layout: LayoutConfig): PathMapping[] {
  return [
    {
      name: "api-types",
      oldPrefix: "api",
      newPrefix: "api",
      include: TYPES_FILE,
      exclude: [GENERATED_FILE, WEBHOOK_FILE],
      expectScaffold: true,
    },
    {
      name: "api-support",
      oldPrefix: "api",
      newPrefix: "api",
      include: GO_FILE,
      exclude: [GENERATED_FILE, TYPES_FILE, WEBHOOK_FILE],
    },
    {
      name: "controllers",
      oldPrefix: layout.oldControllerDir,
      newPrefix: layout.newControllerDir,
      include: CONTROLLER_FILE,
      exclude: [GENERATED_FILE],
      flatten: true,
      packageRename: { from: layout.oldPackage, to: layout.newPackage },
      expectScaffold: true,
    },
    {
      name: "webhooks",
      oldPrefix: "api",
      newPrefix: "api",
      include: WEBHOOK_FILE,
      exclude: [GENERATED_FILE],
      expectScaffold: true,
    },
    {
      name: "shared-packages",
      oldPrefix: layout.oldSharedDir,
      newPrefix: layout.newSharedDir,
      include: /./,
      exclude: [GENERATED_FILE],
    },
  ];
}

export function mappingByName(mappings: PathMapping[], name: string): PathMapping[] {
  return mappings.filter((mapping) => mapping.name === name);
}
