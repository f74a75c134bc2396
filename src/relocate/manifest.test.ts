import fs from "node:fs";
import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parseConfig } from "../config/config.js";
import {
  ensureReplaceDirective,
  readGoVersion,
  readModulePath,
  renderApiManifest,
  setModuleDirective,
  transplantApiManifest,
  transplantRootManifest,
} from "./manifest.js";

const config = parseConfig({});
const OLD = "github.com/example/glance-operator";
const NEW = "github.com/example/glance";

describe("manifest text helpers", () => {
  it("reads the module and go directives", () => {
    const text = `// comment\nmodule ${OLD}\n\ngo 1.21\n`;
    expect(readModulePath(text)).toBe(OLD);
    expect(readGoVersion(text)).toBe("1.21");
    expect(readModulePath("go 1.21\n")).toBeUndefined();
  });

  it("sets the module directive in place or prepends it", () => {
    expect(setModuleDirective(`module ${OLD}\n\ngo 1.21\n`, NEW)).toBe(`module ${NEW}\n\ngo 1.21\n`);
    expect(setModuleDirective("go 1.21\n", NEW)).toBe(`module ${NEW}\n\ngo 1.21\n`);
  });

  it("appends the replace directive once", () => {
    const once = ensureReplaceDirective(`module ${NEW}\n`, `${NEW}/api`);
    expect(once).toBe(`module ${NEW}\n\nreplace ${NEW}/api => ./api\n`);
    expect(ensureReplaceDirective(once, `${NEW}/api`)).toBe(once);
  });

  it("renders a fresh api manifest", () => {
    expect(renderApiManifest(`${NEW}/api`, "1.22", config.api.defaultRequires)).toBe(
      [
        `module ${NEW}/api`,
        "",
        "go 1.22",
        "",
        "require (",
        "\tk8s.io/apimachinery v0.31.0",
        "\tsigs.k8s.io/controller-runtime v0.19.0",
        ")",
        "",
      ].join("\n"),
    );
  });
});

describe("manifest transplant", () => {
  let oldRoot: string;
  let newRoot: string;

  beforeEach(async () => {
    oldRoot = await fsp.mkdtemp(path.join(os.tmpdir(), "rescaffold-mod-old-"));
    newRoot = await fsp.mkdtemp(path.join(os.tmpdir(), "rescaffold-mod-new-"));
  });

  afterEach(async () => {
    await fsp.rm(oldRoot, { recursive: true, force: true });
    await fsp.rm(newRoot, { recursive: true, force: true });
  });

  const ctx = () => ({ oldRoot, newRoot, oldModule: OLD, newModule: NEW });

  it("creates api/go.mod when the old project has none", async () => {
    await fsp.mkdir(path.join(newRoot, "api"));
    await fsp.writeFile(path.join(newRoot, "go.mod"), `module ${NEW}\n\ngo 1.22.0\n`);

    const result = transplantApiManifest(ctx(), { "k8s.io/apimachinery": "v0.31.0" });

    expect(result).toEqual({ apiModule: `${NEW}/api`, origin: "created" });
    expect(fs.readFileSync(path.join(newRoot, "api/go.mod"), "utf-8")).toBe(
      `module ${NEW}/api\n\ngo 1.22.0\n\nrequire (\n\tk8s.io/apimachinery v0.31.0\n)\n`,
    );
    expect(fs.readFileSync(path.join(newRoot, "go.mod"), "utf-8")).toBe(
      `module ${NEW}\n\ngo 1.22.0\n\nreplace ${NEW}/api => ./api\n`,
    );
  });

  it("copies the old api/go.mod under the new module path", async () => {
    await fsp.mkdir(path.join(oldRoot, "api"));
    await fsp.mkdir(path.join(newRoot, "api"));
    await fsp.writeFile(
      path.join(oldRoot, "api/go.mod"),
      `module ${OLD}/api\n\ngo 1.21\n\nrequire ${OLD}/shared v0.1.0\n`,
    );
    await fsp.writeFile(path.join(newRoot, "go.mod"), `module ${NEW}\n`);

    expect(transplantApiManifest(ctx(), {})).toEqual({ apiModule: `${NEW}/api`, origin: "copied" });
    expect(fs.readFileSync(path.join(newRoot, "api/go.mod"), "utf-8")).toBe(
      `module ${NEW}/api\n\ngo 1.21\n\nrequire ${NEW}/shared v0.1.0\n`,
    );
  });

  it("skips the submodule without an api directory", () => {
    expect(transplantApiManifest(ctx(), {})).toBeUndefined();
  });

  it("copies the root manifest, snapshotting the generated one", async () => {
    const generated = `module ${NEW}\n\ngo 1.22.0\n`;
    await fsp.writeFile(path.join(newRoot, "go.mod"), generated);
    await fsp.mkdir(path.join(newRoot, "api"));
    await fsp.writeFile(path.join(newRoot, "api/go.mod"), `module ${NEW}/api\n`);
    await fsp.writeFile(
      path.join(oldRoot, "go.mod"),
      [
        `module ${OLD}`,
        "",
        "go 1.21",
        "",
        `require ${OLD}/api v0.0.0`,
        "",
        `replace ${OLD}/controllers => ./controllers`,
        "",
      ].join("\n"),
    );

    const result = transplantRootManifest(ctx(), config.layout, ".snapshot");

    expect(result).toEqual({ snapshot: "go.mod.snapshot" });
    expect(fs.readFileSync(path.join(newRoot, "go.mod.snapshot"), "utf-8")).toBe(generated);
    expect(fs.readFileSync(path.join(newRoot, "go.mod"), "utf-8")).toBe(
      [
        `module ${NEW}`,
        "",
        "go 1.21",
        "",
        `require ${NEW}/api v0.0.0`,
        "",
        "",
        `replace ${NEW}/api => ./api`,
        "",
      ].join("\n"),
    );
  });

  it("handles a new module path that extends the old one", async () => {
    const prefixed = { oldRoot, newRoot, oldModule: "example.com/op", newModule: "example.com/op/v2" };
    await fsp.mkdir(path.join(oldRoot, "api"));
    await fsp.mkdir(path.join(newRoot, "api"));
    await fsp.writeFile(path.join(oldRoot, "api/go.mod"), "module example.com/op/api\n\ngo 1.21\n");
    await fsp.writeFile(path.join(newRoot, "go.mod"), "module example.com/op/v2\n");
    await fsp.writeFile(
      path.join(oldRoot, "go.mod"),
      [
        "module example.com/op",
        "",
        "go 1.21",
        "",
        "require example.com/op/api v0.0.0",
        "require example.com/operator-lib v1.0.0",
        "",
      ].join("\n"),
    );

    transplantApiManifest(prefixed, {});
    transplantRootManifest(prefixed, config.layout, ".snapshot");

    expect(fs.readFileSync(path.join(newRoot, "api/go.mod"), "utf-8")).toBe(
      "module example.com/op/v2/api\n\ngo 1.21\n",
    );
    expect(fs.readFileSync(path.join(newRoot, "go.mod"), "utf-8")).toBe(
      [
        "module example.com/op/v2",
        "",
        "go 1.21",
        "",
        "require example.com/op/v2/api v0.0.0",
        "require example.com/operator-lib v1.0.0",
        "",
        "replace example.com/op/v2/api => ./api",
        "",
      ].join("\n"),
    );
  });

  it("keeps the generated manifest when the old one is missing", async () => {
    await fsp.writeFile(path.join(newRoot, "go.mod"), `module ${NEW}\n`);
    expect(transplantRootManifest(ctx(), config.layout, ".snapshot")).toBeUndefined();
    expect(fs.existsSync(path.join(newRoot, "go.mod.snapshot"))).toBe(false);
  });
});
