import { execFileSync } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { ExternalToolError } from "../infra/errors.js";

/** The version-control operations the reconciler needs. Paths are repository-relative. */
export type GitClient = {
  /** Tracked files in lexical order, optionally limited to a directory prefix */
  listTracked: (prefix?: string) => string[];
  /** Move a file or directory, keeping history; parent directories are created */
  move: (from: string, to: string) => void;
  remove: (relPath: string) => void;
  stageAll: () => void;
  statusShort: () => string;
};

function failure(err: unknown): { code: number; output: string } {
  if (typeof err !== "object" || err === null) {
    return { code: 1, output: String(err) };
  }
  const code = "status" in err && typeof err.status === "number" ? err.status : 1;
  const stderr = "stderr" in err ? String(err.stderr ?? "") : "";
  const message = err instanceof Error ? err.message : "";
  return { code, output: stderr || message };
}

export function createGitClient(repoDir: string, gitBin = "git"): GitClient {
  const git = (args: string[]): string => {
    try {
      return execFileSync(gitBin, args, {
        cwd: repoDir,
        encoding: "utf-8",
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (err) {
      const { code, output } = failure(err);
      throw new ExternalToolError([gitBin, ...args].join(" "), code, output);
    }
  };

  return {
    listTracked: (prefix) => {
      const args = ["ls-files", "-z"];
      if (prefix) {
        args.push("--", prefix);
      }
      return git(args)
        .split("\0")
        .filter(Boolean)
        .sort();
    },
    move: (from, to) => {
      fs.mkdirSync(path.dirname(path.join(repoDir, to)), { recursive: true });
      git(["mv", "--", from, to]);
    },
    remove: (relPath) => {
      git(["rm", "-q", "--", relPath]);
    },
    stageAll: () => {
      git(["add", "-A"]);
    },
    statusShort: () => git(["status", "--short"]),
  };
}
