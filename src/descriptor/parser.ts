/**
 * PROJECT file parser.
 *
 * A line scanner over the documented subset of keys rather than a YAML load:
 * records are flushed one list item behind, and a record missing group, kind or
 * version is dropped.
 */

import fs from "node:fs";
import path from "node:path";
import type { ProjectDescriptor, ResourceDescriptor } from "./types.js";
import { ConfigError } from "../infra/errors.js";

export const DESCRIPTOR_FILENAME = "PROJECT";

type PendingResource = {
  group: string;
  kind: string;
  version: string;
  domain: string;
  defaulting: string;
  validation: string;
};

type PendingKey = keyof PendingResource;

const RESOURCE_KEY = /^ {2}(group|kind|version|domain):\s*(.*)$/;
const WEBHOOK_KEY = /^ {4}(defaulting|validation):\s*(.*)$/;
const PENDING_KEYS: ReadonlySet<string> = new Set<PendingKey>([
  "group",
  "kind",
  "version",
  "domain",
  "defaulting",
  "validation",
]);

function isPendingKey(key: string): key is PendingKey {
  return PENDING_KEYS.has(key);
}

function unquote(value: string): string {
  const trimmed = value.trim();
  if (
    trimmed.length >= 2 &&
    ((trimmed.startsWith('"') && trimmed.endsWith('"')) ||
      (trimmed.startsWith("'") && trimmed.endsWith("'")))
  ) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

function emptyResource(): PendingResource {
  return { group: "", kind: "", version: "", domain: "", defaulting: "", validation: "" };
}

function toDescriptor(pending: PendingResource): ResourceDescriptor | null {
  if (!pending.group || !pending.kind || !pending.version) {
    return null;
  }
  return {
    group: pending.group,
    kind: pending.kind,
    version: pending.version,
    ...(pending.domain ? { domain: pending.domain } : {}),
    webhookDefaulting: pending.defaulting === "true",
    webhookValidation: pending.validation === "true",
  };
}

/** Value of a top-level `key:` line, or undefined when absent. */
function readTopLevel(lines: string[], key: string): string | undefined {
  const prefix = `${key}:`;
  for (const line of lines) {
    if (line.startsWith(prefix)) {
      return unquote(line.slice(prefix.length));
    }
  }
  return undefined;
}

export function parseResources(content: string): ResourceDescriptor[] {
  const resources: ResourceDescriptor[] = [];
  let inResources = false;
  let started = false;
  let current = emptyResource();

  const flush = () => {
    if (!started) {
      return;
    }
    const descriptor = toDescriptor(current);
    if (descriptor) {
      resources.push(descriptor);
    }
  };

  for (const rawLine of content.split("\n")) {
    let line = rawLine.replace(/\r$/, "");

    if (/^resources:/.test(line)) {
      inResources = true;
      continue;
    }
    if (inResources && /^[a-zA-Z]/.test(line)) {
      inResources = false;
    }
    if (!inResources) {
      continue;
    }

    if (line.startsWith("- ")) {
      flush();
      started = true;
      current = emptyResource();
      // `- group: x` carries a key on the marker line itself
      line = `  ${line.slice(2)}`;
    }
    if (!started) {
      continue;
    }

    const match = line.match(RESOURCE_KEY) ?? line.match(WEBHOOK_KEY);
    const key = match?.[1];
    if (match && key && isPendingKey(key)) {
      current[key] = unquote(match[2]);
    }
  }

  flush();
  return resources;
}

/** Parse PROJECT file content. Throws ConfigError when a required global field is missing. */
export function parseProjectDescriptor(content: string): ProjectDescriptor {
  const lines = content.split("\n").map((line) => line.replace(/\r$/, ""));

  const projectName = readTopLevel(lines, "projectName") ?? "";
  const repoModule = readTopLevel(lines, "repo") ?? "";
  const domain = readTopLevel(lines, "domain") ?? "";

  const missing = [
    ["projectName", projectName],
    ["repo", repoModule],
    ["domain", domain],
  ]
    .filter(([, value]) => !value)
    .map(([key]) => key);
  if (missing.length > 0) {
    throw new ConfigError(`PROJECT file is missing required field(s): ${missing.join(", ")}`);
  }

  return {
    projectName,
    repoModule,
    domain,
    multigroup: readTopLevel(lines, "multigroup") === "true",
    resources: parseResources(content),
  };
}

export function readProjectDescriptor(projectDir: string): ProjectDescriptor {
  const file = path.join(projectDir, DESCRIPTOR_FILENAME);
  if (!fs.existsSync(file)) {
    throw new ConfigError(`PROJECT file not found at '${file}'`);
  }
  return parseProjectDescriptor(fs.readFileSync(file, "utf-8"));
}

/** One `group|kind|version|domain|defaulting|validation` row per resource. */
export function formatResources(resources: ResourceDescriptor[]): string[] {
  return resources.map((r) =>
    [
      r.group,
      r.kind,
      r.version,
      r.domain ?? "",
      String(r.webhookDefaulting),
      String(r.webhookValidation),
    ].join("|"),
  );
}
