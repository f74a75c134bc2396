/**
 * Reconciler registrations in the entry point:
 *
 *   if err = (&controllers.FooReconciler{
 *       ...
 *   }).SetupWithManager(mgr, context.Background()); err != nil {
 *
 * The old file supplies each reconciler's SetupWithManager argument; the new
 * file's registrations are rebuilt with a fixed field set and that argument.
 */

import type { ReconcilerField } from "../config/zod-schema.js";
import { escapeRegExp } from "../infra/text.js";

const SETUP_CALL = /\}\)\.SetupWithManager\(/;
const DEFAULT_SUFFIX = "; err != nil {";

function openerPattern(pkg: string): RegExp {
  return new RegExp(`^(\\s*)if err (:?=) \\(&${escapeRegExp(pkg)}\\.([A-Za-z0-9_]*Reconciler)\\{`);
}

type SetupCall = {
  /** Argument text, verbatim */
  args: string;
  /** Text after the call's closing paren */
  suffix: string;
};

/** Split `...}).SetupWithManager(<args>)<suffix>` with paren matching. */
function parseSetupCall(line: string): SetupCall | undefined {
  const match = SETUP_CALL.exec(line);
  if (!match) {
    return undefined;
  }
  const start = match.index + match[0].length;
  let depth = 1;
  for (let i = start; i < line.length; i += 1) {
    if (line[i] === "(") {
      depth += 1;
    } else if (line[i] === ")") {
      depth -= 1;
      if (depth === 0) {
        return { args: line.slice(start, i), suffix: line.slice(i + 1) };
      }
    }
  }
  return undefined;
}

/**
 * Reconciler type name → verbatim SetupWithManager argument.
 * A registration whose call cannot be read maps to undefined.
 */
export function captureSetupArguments(
  oldText: string,
  oldPackage: string,
): Map<string, string | undefined> {
  const opener = openerPattern(oldPackage);
  const captured = new Map<string, string | undefined>();
  let pending: string | undefined;

  for (const line of oldText.split("\n")) {
    const open = opener.exec(line);
    if (open) {
      if (pending !== undefined && !captured.has(pending)) {
        captured.set(pending, undefined);
      }
      pending = open[3];
    }
    if (pending !== undefined && SETUP_CALL.test(line)) {
      const call = parseSetupCall(line);
      captured.set(pending, call?.args);
      pending = undefined;
    }
  }
  if (pending !== undefined && !captured.has(pending)) {
    captured.set(pending, undefined);
  }
  return captured;
}

export type ReconcilerRewrite = {
  text: string;
  /** Registrations rebuilt with a captured argument */
  rewritten: string[];
  /** Registrations rebuilt with the default argument */
  fallbacks: string[];
  /** Registrations left as generated (type unknown in the old file, or no closing call) */
  untouched: string[];
};

export type ReconcilerRewriteOptions = {
  newPackage: string;
  captured: Map<string, string | undefined>;
  fields: ReconcilerField[];
  defaultArgs: string;
};

function renderFields(indent: string, fields: ReconcilerField[]): string[] {
  const width = Math.max(...fields.map((field) => field.name.length)) + 1;
  return fields.map((field) => `${indent}\t${`${field.name}:`.padEnd(width)} ${field.value},`);
}

export function rewriteReconcilerRegistrations(
  newText: string,
  opts: ReconcilerRewriteOptions,
): ReconcilerRewrite {
  const opener = openerPattern(opts.newPackage);
  const lines = newText.split("\n");
  const out: string[] = [];
  const result: Omit<ReconcilerRewrite, "text"> = { rewritten: [], fallbacks: [], untouched: [] };

  let i = 0;
  while (i < lines.length) {
    const open = opener.exec(lines[i]);
    if (!open) {
      out.push(lines[i]);
      i += 1;
      continue;
    }
    const [, indent, op, name] = open;
    let close = -1;
    for (let j = i; j < lines.length; j += 1) {
      if (j > i && opener.test(lines[j])) {
        // next registration starts before this one closes
        break;
      }
      if (SETUP_CALL.test(lines[j])) {
        close = j;
        break;
      }
    }
    if (!opts.captured.has(name) || close === -1) {
      result.untouched.push(name);
      out.push(lines[i]);
      i += 1;
      continue;
    }

    const capturedArgs = opts.captured.get(name);
    if (capturedArgs === undefined) {
      result.fallbacks.push(name);
    } else {
      result.rewritten.push(name);
    }
    const suffix = parseSetupCall(lines[close])?.suffix ?? DEFAULT_SUFFIX;
    out.push(
      `${indent}if err ${op} (&${opts.newPackage}.${name}{`,
      ...renderFields(indent, opts.fields),
      `${indent}}).SetupWithManager(${capturedArgs ?? opts.defaultArgs})${suffix}`,
    );
    i = close + 1;
  }

  return { text: out.join("\n"), ...result };
}
