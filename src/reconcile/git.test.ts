import { execFileSync } from "node:child_process";
import fs from "node:fs";
import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ExternalToolError } from "../infra/errors.js";
import { createGitClient } from "./git.js";

function hasGit(): boolean {
  try {
    execFileSync("git", ["--version"], { stdio: "ignore" });
    return true;
  } catch {
    return false;
  }
}

const git = (cwd: string, args: string[]) =>
  execFileSync(
    "git",
    ["-c", "user.name=test", "-c", "user.email=test@example.com", "-c", "commit.gpgsign=false", ...args],
    { cwd, stdio: "ignore" },
  );

describe.skipIf(!hasGit())("createGitClient", () => {
  let repo: string;

  beforeEach(async () => {
    repo = await fsp.mkdtemp(path.join(os.tmpdir(), "rescaffold-git-"));
    await fsp.mkdir(path.join(repo, "controllers"));
    await fsp.writeFile(path.join(repo, "README.md"), "# demo\n");
    await fsp.writeFile(path.join(repo, "controllers", "nova_controller.go"), "package controllers\n");
    git(repo, ["init", "-q"]);
    git(repo, ["add", "-A"]);
    git(repo, ["commit", "-q", "-m", "initial"]);
  });

  afterEach(async () => {
    await fsp.rm(repo, { recursive: true, force: true });
  });

  it("lists tracked files, optionally under a prefix", () => {
    const client = createGitClient(repo);
    expect(client.listTracked()).toEqual(["README.md", "controllers/nova_controller.go"]);
    expect(client.listTracked("controllers")).toEqual(["controllers/nova_controller.go"]);
  });

  it("moves into a directory that does not exist yet", () => {
    const client = createGitClient(repo);
    client.move("controllers/nova_controller.go", "internal/controller/nova_controller.go");
    expect(client.listTracked()).toEqual(["README.md", "internal/controller/nova_controller.go"]);
    expect(fs.existsSync(path.join(repo, "internal/controller/nova_controller.go"))).toBe(true);
  });

  it("removes, stages and reports status", () => {
    const client = createGitClient(repo);
    client.remove("README.md");
    fs.writeFileSync(path.join(repo, "NOTES.md"), "notes\n");
    client.stageAll();
    expect(client.statusShort()).toBe("A  NOTES.md\nD  README.md\n");
  });

  it("raises ExternalToolError when git fails", () => {
    const client = createGitClient(repo);
    let caught: unknown;
    try {
      client.move("missing.go", "other.go");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ExternalToolError);
    expect(caught).toMatchObject({ command: "git mv -- missing.go other.go", exitCode: 128 });
  });
});
