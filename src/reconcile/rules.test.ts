import { describe, expect, it } from "vitest";
import { parseConfig } from "../config/config.js";
import { buildReconciliationRules, classifyPath } from "./rules.js";

const config = parseConfig({});
const rules = buildReconciliationRules(config.reconcile, config.snapshotSuffix);

describe("classifyPath", () => {
  it.each([
    ["cmd/main.go.snapshot", "snapshot"],
    [".git/HEAD", "git-metadata"],
    ["OWNERS", "protected-file"],
    ["Makefile", "protected-file"],
    ["zuul.d/jobs.yaml", "protected-dir"],
    ["config/samples/keystone_v1beta1_keystoneapi.yaml", "protected-dir"],
    ["internal/controller/foo_controller.go", "protected-dir"],
    ["test/kuttl/common/assert.yaml", "protected-dir"],
    [".gitignore", "hidden-top-level"],
    [".golangci.yml", "hidden-top-level"],
  ])("protects %s (%s)", (file, rule) => {
    expect(classifyPath(rules, file)).toEqual({ action: "protect", rule });
  });

  it.each([
    "README.md",
    "api/v1beta1/keystoneapi_types.go",
    "config/rbac/role.yaml",
    "hack/.keep",
    "testdata/x",
    "docs/OWNERS",
  ])("treats %s as normal", (file) => {
    expect(classifyPath(rules, file)).toEqual({ action: "normal" });
  });

  it("excludes overlay-only paths without protecting them", () => {
    const custom = buildReconciliationRules(
      { ...config.reconcile, overlayExcludes: ["docs/generated.md"] },
      ".snapshot",
    );
    expect(classifyPath(custom, "docs/generated.md")).toEqual({
      action: "exclude-from-overlay",
      rule: "overlay-exclude",
    });
  });

  it("uses the configured snapshot suffix", () => {
    const custom = buildReconciliationRules(config.reconcile, ".scaffold");
    expect(classifyPath(custom, "cmd/main.go.scaffold").action).toBe("protect");
    expect(classifyPath(custom, "cmd/main.go.snapshot").action).toBe("normal");
  });
});
