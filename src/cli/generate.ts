#!/usr/bin/env node
/**
 * CLI: generate a project from a template repository.
 *
 * USAGE
 *
 *   treeplate <repoDir> [options]
 *
 * Options:
 *   -c, --context <file>    Context file (default: <repoDir>/treeplate.json,
 *                           or <repoDir>/treeplate.yml when only that exists)
 *   -d, --defaults <file>   Context file applied on top of --context
 *   -s, --set <key=value>   Override one variable; repeatable, applied last
 *   -o, --output <dir>      Where the project directory is created (default: .)
 *   --no-hooks              Skip pre/post generation hooks
 *   --print-context         Print the resolved context as JSON and exit
 *   --log-level <level>     debug, info, warn or error (default: LOG_LEVEL)
 *   -h, --help              Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Generation failed (context, template, hook or filesystem error)
 *   2 - Usage error
 */

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";

import { config, validateConfig, DEFAULT_CONTEXT_FILE } from "../config/index.js";
import {
  Context,
  defaultContextFile,
  formatContextJson,
  loadContextFile,
  resolveContext,
} from "../context/index.js";
import { generate } from "../generator/index.js";
import { createConfiguredLogger, initRunId, isLogLevel } from "../logging/index.js";

// ============================================================
// Output
// ============================================================

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

const CONSOLE_IO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const COLORS = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
} as const;

const useColors = process.stderr.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

const HELP = `
Usage: treeplate <repoDir> [options]

Options:
  -c, --context <file>    Context file (default: <repoDir>/${DEFAULT_CONTEXT_FILE})
  -d, --defaults <file>   Context file applied on top of --context
  -s, --set <key=value>   Override one variable (repeatable)
  -o, --output <dir>      Output directory (default: .)
  --no-hooks              Skip pre/post generation hooks
  --print-context         Print the resolved context as JSON and exit
  --log-level <level>     debug, info, warn or error
  -h, --help              Show this help message
`;

// ============================================================
// CLI Parsing
// ============================================================

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Split a `--set key=value` argument. The value may itself contain "=".
 * Keys name top-level variables, so a dot (the nested lookup separator in
 * templates) is refused.
 *
 * @throws UsageError if there is no "=" or the key is empty or dotted
 */
export function parseSetOption(raw: string): [string, string] {
  const separator = raw.indexOf("=");
  if (separator < 0) {
    throw new UsageError(`Invalid --set value "${raw}": expected key=value`);
  }
  const key = raw.slice(0, separator).trim();
  if (key === "") {
    throw new UsageError(`Invalid --set value "${raw}": the key is empty`);
  }
  if (key.includes(".")) {
    throw new UsageError(`Invalid --set key "${key}": nested keys cannot be set`);
  }
  return [key, raw.slice(separator + 1)];
}

function parseCliArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        context: { type: "string", short: "c" },
        defaults: { type: "string", short: "d" },
        set: { type: "string", short: "s", multiple: true, default: [] },
        output: { type: "string", short: "o", default: "." },
        "no-hooks": { type: "boolean", default: false },
        "print-context": { type: "boolean", default: false },
        "log-level": { type: "string" },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

// ============================================================
// Main
// ============================================================

/**
 * Run the CLI with the given arguments (without node and script path).
 *
 * @returns Process exit code
 */
export function runCli(argv: string[], io: CliIO = CONSOLE_IO): number {
  let parsed: ReturnType<typeof parseCliArgs>;
  let overrides: Context;
  try {
    parsed = parseCliArgs(argv);
    overrides = new Context((parsed.values.set ?? []).map(parseSetOption));
  } catch (err) {
    if (err instanceof UsageError) {
      io.err(c("red", `Error: ${err.message}`));
      io.err(HELP);
      return 2;
    }
    throw err;
  }

  const { values, positionals } = parsed;

  if (values.help) {
    io.out(HELP);
    return 0;
  }

  if (positionals.length !== 1) {
    io.err(c("red", "Error: expected exactly one template repository directory"));
    io.err(HELP);
    return 2;
  }

  const level = values["log-level"] ?? config.logLevel;
  if (!isLogLevel(level)) {
    io.err(c("red", `Error: invalid log level "${level}"`));
    return 2;
  }

  const [repoDir] = positionals;
  const logger = createConfiguredLogger({ level });

  try {
    validateConfig();

    const contextFile = values.context ?? defaultContextFile(repoDir, config.contextFile);
    const overlay = values.defaults
      ? loadContextFile(values.defaults).withOverlay(overrides)
      : overrides;
    const context = resolveContext(contextFile, overlay, { logger });

    if (values["print-context"]) {
      io.out(formatContextJson(context));
      return 0;
    }

    const projectDir = generate(repoDir, context, values.output, {
      logger,
      hooks: !values["no-hooks"],
    });

    io.err(c("green", `Generated ${projectDir}`));
    io.out(projectDir);
    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    io.err(c("red", `Error: ${message}`));
    return 1;
  }
}

// Only run when executed directly (not imported by tests). The entry path
// is resolved through symlinks so an npm bin link counts as direct.
function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isDirectExecution()) {
  initRunId();
  process.exitCode = runCli(process.argv.slice(2));
}
