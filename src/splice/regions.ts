/**
 * Region extraction and injection for the entry-point file.
 *
 * Regions are found by line scanning with brace/paren token counting; nothing
 * here parses Go. Every extractor returns undefined (or an empty list) on a
 * miss, and callers then leave the scaffolded region alone.
 */

import { escapeRegExp } from "../infra/text.js";

export type SpliceResult = {
  text: string;
  applied: boolean;
};

// ---------------------------------------------------------------------------
// Token counting
// ---------------------------------------------------------------------------

function countChar(line: string, ch: string): number {
  let n = 0;
  for (const c of line) {
    if (c === ch) {
      n += 1;
    }
  }
  return n;
}

/** Net `{` minus `}` on the line. */
export function braceDelta(line: string): number {
  return countChar(line, "{") - countChar(line, "}");
}

/** Net `(` minus `)` on the line. */
export function parenDelta(line: string): number {
  return countChar(line, "(") - countChar(line, ")");
}

const BLOCK_CLOSE = /^\t\}$/;

function splitLines(text: string): string[] {
  return text.split("\n");
}

// ---------------------------------------------------------------------------
// ImportRegion
// ---------------------------------------------------------------------------

const IMPORT_OPEN = /^import \(/;
const IMPORT_CLOSE = /^\)/;

type ImportBlock = { open: number; close: number };

function findImportBlock(lines: string[]): ImportBlock | undefined {
  const open = lines.findIndex((line) => IMPORT_OPEN.test(line));
  if (open === -1) {
    return undefined;
  }
  for (let i = open + 1; i < lines.length; i += 1) {
    if (IMPORT_CLOSE.test(lines[i])) {
      return { open, close: i };
    }
  }
  return undefined;
}

function isImportNoise(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === "" || trimmed.startsWith("//");
}

/** Trimmed, non-blank, non-comment lines of the import block. */
export function readImports(text: string): string[] {
  const lines = splitLines(text);
  const block = findImportBlock(lines);
  if (!block) {
    return [];
  }
  return lines
    .slice(block.open + 1, block.close)
    .filter((line) => !isImportNoise(line))
    .map((line) => line.trim());
}

/**
 * Import lines of `oldText` that `newText` lacks, verbatim and in order.
 * Lines containing any of `excluded` are dropped.
 */
export function collectNewImports(oldText: string, newText: string, excluded: string[]): string[] {
  const existing = new Set(readImports(newText));
  const lines = splitLines(oldText);
  const block = findImportBlock(lines);
  if (!block) {
    return [];
  }
  return lines.slice(block.open + 1, block.close).filter((line) => {
    if (isImportNoise(line)) {
      return false;
    }
    if (existing.has(line.trim())) {
      return false;
    }
    return !excluded.some((fragment) => line.includes(fragment));
  });
}

/** Insert `imports` right before the closing `)` of the import block. */
export function injectImports(text: string, imports: string[]): SpliceResult {
  if (imports.length === 0) {
    return { text, applied: false };
  }
  const lines = splitLines(text);
  const block = findImportBlock(lines);
  if (!block) {
    return { text, applied: false };
  }
  lines.splice(block.close, 0, ...imports);
  return { text: lines.join("\n"), applied: true };
}

// ---------------------------------------------------------------------------
// InitRegion
// ---------------------------------------------------------------------------

const INIT_INLINE = /^func init\(\)\s*\{/;
const INIT_BARE = /^func init\(\)\s*$/;

type InitBlock = {
  /** The `func init()` line */
  header: number;
  /** First body line */
  bodyStart: number;
  /** The line that brings the depth back to zero */
  close: number;
  /** `func init() {}` on one line */
  inlineEmpty?: boolean;
};

function findInitBlock(lines: string[]): InitBlock | undefined {
  const header = lines.findIndex((line) => INIT_INLINE.test(line) || INIT_BARE.test(line));
  if (header === -1) {
    return undefined;
  }

  const inline = INIT_INLINE.test(lines[header]);
  let depth = inline ? braceDelta(lines[header]) : 0;
  if (inline && depth <= 0) {
    return depth === 0 && lines[header].trimEnd().endsWith("}")
      ? { header, bodyStart: header + 1, close: header, inlineEmpty: true }
      : undefined;
  }
  let bodyStart = inline ? header + 1 : -1;
  for (let i = header + 1; i < lines.length; i += 1) {
    depth += braceDelta(lines[i]);
    if (bodyStart === -1) {
      // brace on its own line belongs to the shell
      if (depth > 0) {
        bodyStart = i + 1;
      }
      continue;
    }
    if (depth <= 0) {
      return { header, bodyStart, close: i };
    }
  }
  return undefined;
}

/** Body lines of `func init()`, shell excluded. Undefined when absent or unterminated. */
export function extractInitBody(text: string): string[] | undefined {
  const lines = splitLines(text);
  const block = findInitBlock(lines);
  if (!block || block.inlineEmpty) {
    return undefined;
  }
  return lines.slice(block.bodyStart, block.close);
}

/** Replace the body of `func init()` wholesale; the header is normalized to `func init() {`. */
export function replaceInitBody(text: string, body: string[]): SpliceResult {
  if (body.length === 0) {
    return { text, applied: false };
  }
  const lines = splitLines(text);
  const block = findInitBlock(lines);
  if (!block) {
    return { text, applied: false };
  }
  const rest = block.inlineEmpty ? ["}", ...lines.slice(block.header + 1)] : lines.slice(block.close);
  const next = [...lines.slice(0, block.header), "func init() {", ...body, ...rest];
  return { text: next.join("\n"), applied: true };
}

// ---------------------------------------------------------------------------
// ScalarField
// ---------------------------------------------------------------------------

/** Quoted value following `<label>:`. */
export function extractScalarField(text: string, label: string): string | undefined {
  const match = text.match(new RegExp(`${escapeRegExp(label)}:\\s*"([^"]*)"`));
  return match?.[1];
}

/** Substitute the quoted value after `<label>:`, keeping the target's own spacing. */
export function replaceScalarField(text: string, label: string, value: string): SpliceResult {
  const pattern = new RegExp(`(${escapeRegExp(label)}:\\s*)"[^"]*"`, "g");
  if (!pattern.test(text)) {
    return { text, applied: false };
  }
  pattern.lastIndex = 0;
  const next = text.replace(pattern, (_match, prefix: string) => `${prefix}"${value}"`);
  return { text: next, applied: true };
}

// ---------------------------------------------------------------------------
// SetupRegion
// ---------------------------------------------------------------------------

export type SetupMarkers = {
  /** Line that opens the region */
  start: string;
  /** Last statement of the region; its error check is included */
  end: string;
};

/**
 * Lines from the start marker through the error check that follows the end
 * marker. Undefined when either marker is missing or depth goes negative
 * before the end marker.
 */
export function extractSetupRegion(text: string, markers: SetupMarkers): string[] | undefined {
  const lines = splitLines(text);
  const start = lines.findIndex((line) => line.includes(markers.start));
  if (start === -1) {
    return undefined;
  }

  let braces = 0;
  let parens = 0;
  for (let i = start; i < lines.length; i += 1) {
    const line = lines[i];
    braces += braceDelta(line);
    parens += parenDelta(line);
    if (braces < 0) {
      return undefined;
    }
    if (!line.includes(markers.end)) {
      continue;
    }

    const follow = lines[i + 1];
    if (follow === undefined || braceDelta(follow) <= 0) {
      return lines.slice(start, i + 1);
    }
    for (let j = i + 1; j < lines.length; j += 1) {
      braces += braceDelta(lines[j]);
      parens += parenDelta(lines[j]);
      if (braces < 0 || (BLOCK_CLOSE.test(lines[j]) && parens === 0)) {
        return lines.slice(start, j + 1);
      }
    }
    return undefined;
  }
  return undefined;
}

/**
 * Insert `block`, preceded by a blank line, after the statement that starts at
 * `anchor` (including its error check). A target that already contains
 * `block[0]` is left as is.
 */
export function injectSetupRegion(text: string, block: string[], anchor: string): SpliceResult {
  if (block.length === 0) {
    return { text, applied: false };
  }
  const lines = splitLines(text);
  const first = block[0].trim();
  if (lines.some((line) => line.trim() === first)) {
    return { text, applied: false };
  }
  const start = lines.findIndex((line) => line.includes(anchor));
  if (start === -1) {
    return { text, applied: false };
  }

  let braces = 0;
  let parens = 0;
  for (let i = start; i < lines.length; i += 1) {
    braces += braceDelta(lines[i]);
    parens += parenDelta(lines[i]);
    if (braces < 0 || (BLOCK_CLOSE.test(lines[i]) && parens === 0)) {
      lines.splice(i + 1, 0, "", ...block);
      return { text: lines.join("\n"), applied: true };
    }
  }
  return { text, applied: false };
}
