import { promises as fsp } from "node:fs";
import path from "node:path";

import { parse as parseYAML } from "yaml";

import type { InterpreterOptions } from "./interpreter/index";

/** Options that can come from a config file; the rest are code-only. */
export type InterpreterConfig = Pick<InterpreterOptions, "maxRecursionDepth" | "traceErrors">;

const KNOWN_KEYS = new Set(["max_recursion_depth", "trace_errors"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value && typeof value === "object" && !Array.isArray(value));
}

function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Validates YAML text of the form
 *
 *   max_recursion_depth: 256
 *   trace_errors: true
 *
 * `source` only labels error messages.
 */
export function parseInterpreterConfig(contents: string, source = "<config>"): InterpreterConfig {
  let parsed: unknown;
  try {
    parsed = parseYAML(contents) ?? {};
  } catch (error) {
    throw new Error(`failed to parse config ${source}: ${extractErrorMessage(error)}`);
  }
  if (!isRecord(parsed)) {
    throw new Error(`config ${source} must be a mapping`);
  }
  for (const key of Object.keys(parsed)) {
    if (!KNOWN_KEYS.has(key)) throw new Error(`config ${source}: unknown key ${key}`);
  }

  const config: InterpreterConfig = {};
  const depth = parsed.max_recursion_depth;
  if (depth !== undefined) {
    if (typeof depth !== "number" || !Number.isInteger(depth) || depth < 1) {
      throw new Error(`config ${source}: max_recursion_depth must be a positive integer`);
    }
    config.maxRecursionDepth = depth;
  }
  const trace = parsed.trace_errors;
  if (trace !== undefined) {
    if (typeof trace !== "boolean") {
      throw new Error(`config ${source}: trace_errors must be a boolean`);
    }
    config.traceErrors = trace;
  }
  return config;
}

export async function loadInterpreterConfig(configPath: string): Promise<InterpreterConfig> {
  const abs = path.resolve(configPath);
  let contents: string;
  try {
    contents = await fsp.readFile(abs, "utf8");
  } catch (error) {
    throw new Error(`failed to read config ${abs}: ${extractErrorMessage(error)}`);
  }
  return parseInterpreterConfig(contents, abs);
}
