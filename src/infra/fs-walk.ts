import fs from "node:fs";
import path from "node:path";

/** Forward-slash relative path, whatever the platform separator. */
export function toPosix(relPath: string): string {
  return relPath.split(path.sep).join("/");
}

/**
 * Every regular file under `dir`, as sorted forward-slash paths relative to `dir`.
 * Directories named in `skipDirs` (matched on the relative path) are not descended.
 */
export function listFiles(dir: string, skipDirs: ReadonlySet<string> = new Set()): string[] {
  const results: string[] = [];
  if (!fs.existsSync(dir)) {
    return results;
  }

  const walk = (current: string) => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      const rel = toPosix(path.relative(dir, full));
      if (entry.isDirectory()) {
        if (!skipDirs.has(rel)) {
          walk(full);
        }
      } else if (entry.isFile() || entry.isSymbolicLink()) {
        results.push(rel);
      }
    }
  };

  walk(dir);
  return results.sort();
}

/** Copy one file, creating parent directories. Symlinks are recreated, not followed. */
export function copyFileWithParents(source: string, target: string): void {
  fs.mkdirSync(path.dirname(target), { recursive: true });
  const stat = fs.lstatSync(source);
  if (stat.isSymbolicLink()) {
    fs.rmSync(target, { force: true });
    fs.symlinkSync(fs.readlinkSync(source), target);
    return;
  }
  fs.copyFileSync(source, target);
}

/** Recursive directory copy. */
export function copyDir(source: string, target: string): void {
  for (const rel of listFiles(source)) {
    copyFileWithParents(path.join(source, rel), path.join(target, rel));
  }
}

export function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

export function isFile(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}

/** Remove `dir` if it exists and is empty. Returns true when removed. */
export function removeIfEmpty(dir: string): boolean {
  if (!isDirectory(dir) || fs.readdirSync(dir).length > 0) {
    return false;
  }
  fs.rmdirSync(dir);
  return true;
}

/** Remove empty directories below and including `dir`, deepest first. */
export function pruneEmptyDirs(dir: string): boolean {
  if (!isDirectory(dir)) {
    return false;
  }
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    if (entry.isDirectory()) {
      pruneEmptyDirs(path.join(dir, entry.name));
    }
  }
  return removeIfEmpty(dir);
}
