import fs from "node:fs";
import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parseConfig } from "../config/config.js";
import { buildPathMappings, mappingByName } from "./mappings.js";
import {
  locateFragments,
  relocateFragments,
  renamePackageClause,
  targetPathFor,
} from "./relocator.js";

const layout = parseConfig({}).layout;
const mappings = buildPathMappings(layout);
const opts = { snapshotSuffix: ".snapshot" };

async function write(root: string, rel: string, content: string) {
  const file = path.join(root, rel);
  await fsp.mkdir(path.dirname(file), { recursive: true });
  await fsp.writeFile(file, content);
}

describe("relocator", () => {
  let oldRoot: string;
  let newRoot: string;

  beforeEach(async () => {
    oldRoot = await fsp.mkdtemp(path.join(os.tmpdir(), "rescaffold-old-"));
    newRoot = await fsp.mkdtemp(path.join(os.tmpdir(), "rescaffold-new-"));
  });

  afterEach(async () => {
    await fsp.rm(oldRoot, { recursive: true, force: true });
    await fsp.rm(newRoot, { recursive: true, force: true });
  });

  describe("locateFragments", () => {
    it("keeps webhook and generated files out of the api-types mapping", async () => {
      await write(oldRoot, "api/v1beta1/keystoneapi_types.go", "package v1beta1\n");
      await write(oldRoot, "api/v1beta1/keystoneapi_webhook.go", "package v1beta1\n");
      await write(oldRoot, "api/v1beta1/zz_generated.deepcopy.go", "package v1beta1\n");
      await write(oldRoot, "api/v1beta1/common_types.go", "package v1beta1\n");

      const [apiTypes] = mappingByName(mappings, "api-types");
      expect(locateFragments(oldRoot, apiTypes)).toEqual([
        "v1beta1/common_types.go",
        "v1beta1/keystoneapi_types.go",
      ]);

      const [webhooks] = mappingByName(mappings, "webhooks");
      expect(locateFragments(oldRoot, webhooks)).toEqual(["v1beta1/keystoneapi_webhook.go"]);
    });

    it("returns nothing when the old prefix is missing", () => {
      const [controllers] = mappingByName(mappings, "controllers");
      expect(locateFragments(oldRoot, controllers)).toEqual([]);
    });
  });

  describe("targetPathFor", () => {
    it("flattens controller paths into the new controller directory", () => {
      const [controllers] = mappingByName(mappings, "controllers");
      expect(targetPathFor(controllers, "nested/foo_controller.go")).toBe(
        "internal/controller/foo_controller.go",
      );
    });

    it("keeps the sub-path for shared packages", () => {
      const [shared] = mappingByName(mappings, "shared-packages");
      expect(targetPathFor(shared, "keystone/const.go")).toBe("internal/keystone/const.go");
    });
  });

  describe("relocateFragments", () => {
    it("copies byte-for-byte when no target exists", async () => {
      const content = "package keystone\n\nconst Name = \"keystone\"\n";
      await write(oldRoot, "pkg/keystone/const.go", content);

      const entries = relocateFragments(
        oldRoot,
        newRoot,
        mappingByName(mappings, "shared-packages"),
        opts,
      );

      expect(entries).toEqual([
        {
          mapping: "shared-packages",
          source: "pkg/keystone/const.go",
          target: "internal/keystone/const.go",
          changed: false,
        },
      ]);
      expect(fs.readFileSync(path.join(newRoot, "internal/keystone/const.go"), "utf-8")).toBe(
        content,
      );
      expect(fs.existsSync(path.join(newRoot, "internal/keystone/const.go.snapshot"))).toBe(false);
    });

    it("snapshots the scaffolded target before overwriting it", async () => {
      const scaffold = "package v1beta1\n\n// scaffold\n";
      const original = "package v1beta1\n\ntype KeystoneAPISpec struct{}\n";
      await write(oldRoot, "api/v1beta1/keystoneapi_types.go", original);
      await write(newRoot, "api/v1beta1/keystoneapi_types.go", scaffold);

      const entries = relocateFragments(
        oldRoot,
        newRoot,
        mappingByName(mappings, "api-types"),
        opts,
      );

      expect(entries[0]).toMatchObject({
        snapshot: "api/v1beta1/keystoneapi_types.go.snapshot",
        changed: true,
      });
      const dir = path.join(newRoot, "api/v1beta1");
      expect(fs.readFileSync(path.join(dir, "keystoneapi_types.go"), "utf-8")).toBe(original);
      expect(fs.readFileSync(path.join(dir, "keystoneapi_types.go.snapshot"), "utf-8")).toBe(
        scaffold,
      );
      expect(fs.readdirSync(dir).filter((f) => f.endsWith(".snapshot"))).toEqual([
        "keystoneapi_types.go.snapshot",
      ]);
    });

    it("rewrites the package clause of relocated controllers", async () => {
      await write(
        oldRoot,
        "controllers/keystoneapi_controller.go",
        "/*\nLicense\n*/\n\npackage controllers\n\nimport \"fmt\"\n",
      );
      await write(newRoot, "internal/controller/keystoneapi_controller.go", "package controller\n");

      relocateFragments(oldRoot, newRoot, mappingByName(mappings, "controllers"), opts);

      expect(
        fs.readFileSync(path.join(newRoot, "internal/controller/keystoneapi_controller.go"), "utf-8"),
      ).toBe("/*\nLicense\n*/\n\npackage controller\n\nimport \"fmt\"\n");
      expect(
        fs.readFileSync(
          path.join(newRoot, "internal/controller/keystoneapi_controller.go.snapshot"),
          "utf-8",
        ),
      ).toBe("package controller\n");
    });

    it("reports an identical overwrite as unchanged", async () => {
      await write(oldRoot, "api/v1beta1/groupversion_info.go", "package v1beta1\n");
      await write(newRoot, "api/v1beta1/groupversion_info.go", "package v1beta1\n");

      const [entry] = relocateFragments(
        oldRoot,
        newRoot,
        mappingByName(mappings, "api-support"),
        opts,
      );
      expect(entry.changed).toBe(false);
      expect(entry.snapshot).toBe("api/v1beta1/groupversion_info.go.snapshot");
    });
  });

  describe("renamePackageClause", () => {
    it("only touches the topmost package clause", () => {
      expect(renamePackageClause("package controllers\n\npackage controllers\n", "controllers", "controller")).toBe(
        "package controller\n\npackage controllers\n",
      );
    });

    it("leaves other packages alone", () => {
      const text = "package helpers\n";
      expect(renamePackageClause(text, "controllers", "controller")).toBe(text);
    });

    it("keeps a trailing comment", () => {
      expect(renamePackageClause("package controllers // import\n", "controllers", "controller")).toBe(
        "package controller // import\n",
      );
    });
  });
});
