/**
 * Context file loading.
 *
 * A context file is a JSON or YAML document whose top level is a mapping of
 * variable names to values:
 *
 *   treeplate.json                 treeplate.yml
 *   {                              project_name: demo
 *     "project_name": "demo",      version: 0.1.0
 *     "version": "0.1.0"
 *   }
 *
 * Both formats are read through the YAML document model so key order comes
 * from the document itself rather than from a JavaScript object. JSON input
 * is still checked with JSON.parse first, so a .json file that is only
 * valid as YAML counts as a JSON failure and falls through to the YAML
 * attempt.
 */

import { existsSync, readFileSync } from "node:fs";
import { extname, join } from "node:path";
import {
  isAlias,
  isMap,
  isScalar,
  isSeq,
  parseDocument,
  type Document,
} from "yaml";

import {
  DEFAULT_CONTEXT_FILE,
  FALLBACK_CONTEXT_FILE,
} from "../config/index.js";
import { createConfiguredLogger, type Logger } from "../logging/index.js";
import { Context, type ContextInput, type ContextValue } from "./context.js";
import { ContextLoadError } from "./errors.js";
import { ContextScalarSchema } from "./schema.js";

// ---------------------------------------------------------------------------
// Formats
// ---------------------------------------------------------------------------

export type ContextFormat = "json" | "yaml";

type ParseResult =
  | { success: true; context: Context }
  | { success: false; reason: string };

const YAML_EXTENSIONS = new Set([".yml", ".yaml"]);

/**
 * Order in which formats are tried for a given file name.
 * The extension picks the first attempt; the other format is the fallback.
 */
export function formatsFor(fileName: string): ContextFormat[] {
  return YAML_EXTENSIONS.has(extname(fileName).toLowerCase())
    ? ["yaml", "json"]
    : ["json", "yaml"];
}

/** Thrown while walking a document; turned into a parse failure reason. */
class UnsupportedValueError extends Error {}

function keyOf(key: unknown, path: string): string {
  if (isScalar(key)) {
    return String(key.value);
  }
  throw new UnsupportedValueError(`${path || "(root)"}: mapping keys must be scalars`);
}

function toContextValue(node: unknown, doc: Document, path: string): ContextValue {
  if (isAlias(node)) {
    return toContextValue(node.resolve(doc), doc, path);
  }

  if (isMap(node)) {
    return new Context(
      node.items.map((pair) => {
        const key = keyOf(pair.key, path);
        const childPath = path ? `${path}.${key}` : key;
        return [key, toContextValue(pair.value, doc, childPath)] as const;
      })
    );
  }

  if (isSeq(node)) {
    return node.items.map((item, index) => toContextValue(item, doc, `${path}[${index}]`));
  }

  if (isScalar(node)) {
    const scalar = ContextScalarSchema.safeParse(node.value);
    if (!scalar.success) {
      throw new UnsupportedValueError(`${path}: unsupported value ${String(node.value)}`);
    }
    return scalar.data;
  }

  // `key:` with nothing after it
  if (node === null || node === undefined) {
    return null;
  }

  throw new UnsupportedValueError(`${path}: unsupported node`);
}

function documentToContext(doc: Document): ParseResult {
  if (doc.errors.length > 0) {
    return { success: false, reason: doc.errors[0].message };
  }
  if (!isMap(doc.contents)) {
    return { success: false, reason: "top level is not a mapping" };
  }

  try {
    const context = toContextValue(doc.contents, doc, "");
    if (context instanceof Context) {
      return { success: true, context };
    }
    return { success: false, reason: "top level is not a mapping" };
  } catch (err) {
    if (err instanceof UnsupportedValueError) {
      return { success: false, reason: err.message };
    }
    throw err;
  }
}

const PARSERS: Record<ContextFormat, (text: string) => ParseResult> = {
  json(text) {
    try {
      JSON.parse(text);
    } catch (err) {
      return { success: false, reason: err instanceof Error ? err.message : String(err) };
    }
    // JSON allows repeated keys (last wins); the Context constructor keeps
    // the first position and the last value, matching JSON.parse.
    return documentToContext(parseDocument(text, { schema: "json", uniqueKeys: false }));
  },
  yaml(text) {
    return documentToContext(parseDocument(text));
  },
};

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Parse context source text, trying each supported format in turn.
 *
 * @param text       - File contents
 * @param sourceName - File name; its extension picks the first format tried
 * @throws ContextLoadError if no format yields a mapping
 */
export function parseContextSource(text: string, sourceName: string): Context {
  const reasons: string[] = [];

  for (const format of formatsFor(sourceName)) {
    const result = PARSERS[format](text);
    if (result.success) {
      return result.context;
    }
    reasons.push(`${format}: ${result.reason}`);
  }

  throw new ContextLoadError(sourceName, reasons);
}

/**
 * Read and parse one context file.
 *
 * @throws ContextLoadError if the file is missing, unreadable or unparseable
 */
export function loadContextFile(filePath: string): Context {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ContextLoadError(
      filePath,
      [reason],
      `Cannot read context file ${filePath}: ${reason}`,
      { cause: err }
    );
  }

  return parseContextSource(text, filePath);
}

/**
 * Pick the default context file under baseDir: treeplate.json (or the
 * given primary name), or treeplate.yml when only that one exists.
 */
export function defaultContextFile(
  baseDir = ".",
  primaryName: string = DEFAULT_CONTEXT_FILE
): string {
  const primary = join(baseDir, primaryName);
  const fallback = join(baseDir, FALLBACK_CONTEXT_FILE);
  if (!existsSync(primary) && existsSync(fallback)) {
    return fallback;
  }
  return primary;
}

export interface ResolveContextOptions {
  /** Directory searched for the default context file (default ".") */
  baseDir?: string;
  logger?: Logger;
}

/**
 * Load a context file and apply caller-supplied values on top of it.
 *
 * @param contextFile - Path to a JSON or YAML file; defaults to
 *                      treeplate.json (or treeplate.yml) under baseDir
 * @param overlay     - Values that replace loaded ones key by key
 * @throws ContextLoadError if the file cannot be loaded or the overlay holds
 *         unsupported values
 */
export function resolveContext(
  contextFile?: string,
  overlay?: ContextInput,
  options: ResolveContextOptions = {}
): Context {
  const logger = options.logger ?? createConfiguredLogger();
  const filePath = contextFile ?? defaultContextFile(options.baseDir);

  let context = loadContextFile(filePath);

  if (overlay !== undefined) {
    context = context.withOverlay(Context.from(overlay, "(overlay)"));
  }

  logger.debug("Context generated", { file: filePath, context: context.toJSON() });
  return context;
}
