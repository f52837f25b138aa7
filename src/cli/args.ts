// src/cli/args.ts

import { InvalidArgumentError } from "commander";
import { isTemplateForgeError, ManifestError } from "../core/errors";

/**
 * Commander argument parser for repeatable `-D key=value`.
 */
export function collectDefine(value: string, previous: string[]): string[] {
  if (!value.includes("=") || value.startsWith("=")) {
    throw new InvalidArgumentError(`expected key=value, got "${value}"`);
  }
  return [...previous, value];
}

/**
 * Split `key=value` pairs; later pairs win. Values stay strings; boolean
 * options accept "true"/"false".
 */
export function parseDefines(pairs: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const pair of pairs) {
    const idx = pair.indexOf("=");
    if (idx <= 0) {
      throw new InvalidArgumentError(`expected key=value, got "${pair}"`);
    }
    out[pair.slice(0, idx).trim()] = pair.slice(idx + 1);
  }
  return out;
}

/**
 * Kind, code and message of an error, on one line.
 */
export function describeError(err: unknown): string {
  if (err instanceof ManifestError) return `${err.name}: ${err.message}`;
  if (isTemplateForgeError(err)) return `${err.name} [${err.code}]: ${err.message}`;
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
