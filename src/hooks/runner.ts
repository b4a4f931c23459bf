/**
 * Pre/post generation hooks.
 *
 * A hook is an optional script at the template repository root named after
 * its hook point, bare or with a .sh, .py, .js, .mjs or .cjs extension:
 *
 *   pre_gen_project       runs after the project root is created, before
 *   pre_gen_project.sh    any template file is written
 *
 *   post_gen_project      runs after every file has been written
 *   post_gen_project.js
 *
 * The script runs with the generated project directory as its working
 * directory and as its only argument; it is also exported as
 * TREEPLATE_PROJECT_DIR. A nonzero exit or a signal aborts generation.
 */

import { spawnSync } from "node:child_process";
import { readdirSync } from "node:fs";
import { basename, extname, join, resolve } from "node:path";

import { fsAction } from "../generator/errors.js";
import { createConfiguredLogger, type Logger } from "../logging/index.js";

export const HOOK_NAMES = ["pre_gen_project", "post_gen_project"] as const;

export type HookName = (typeof HOOK_NAMES)[number];

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class HookExecutionError extends Error {
  constructor(
    public readonly hookName: HookName,
    public readonly scriptPath: string,
    /** Exit status, or null when the hook did not exit normally */
    public readonly exitCode: number | null,
    /** Terminating signal, if any */
    public readonly signal: string | null,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "HookExecutionError";
  }
}

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

/**
 * Interpreters for hook scripts by extension. A hook with no extension is
 * executed directly and must carry an execute bit (and a shebang, for
 * scripts).
 */
const INTERPRETERS: Readonly<Record<string, string>> = {
  ".sh": "sh",
  ".py": "python3",
  ".js": process.execPath,
  ".mjs": process.execPath,
  ".cjs": process.execPath,
};

function isHookFile(name: string, hookName: HookName): boolean {
  if (name === hookName) return true;
  const extension = extname(name);
  return (
    basename(name, extension) === hookName &&
    Object.hasOwn(INTERPRETERS, extension.toLowerCase())
  );
}

function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Locate a hook script in `dir`.
 *
 * Candidates are the bare hook name and the hook name with one of the
 * interpreter extensions above; other files such as `pre_gen_project.md`
 * are ignored. An exact name match wins, then the first by code-unit order.
 *
 * @returns Absolute script path, or undefined when there is no hook
 */
export function findHook(hookName: HookName, dir: string = process.cwd()): string | undefined {
  const candidates = fsAction(dir, "list", () => readdirSync(dir, { withFileTypes: true }))
    .filter((entry) => entry.isFile() || entry.isSymbolicLink())
    .map((entry) => entry.name)
    .filter((name) => isHookFile(name, hookName))
    .sort((a, b) => (a === hookName ? -1 : b === hookName ? 1 : byCodeUnit(a, b)));

  return candidates.length > 0 ? join(resolve(dir), candidates[0]) : undefined;
}

/**
 * Command line used to run a hook script.
 */
export function hookCommand(
  scriptPath: string,
  projectDir: string
): { command: string; args: string[] } {
  const interpreter = INTERPRETERS[extname(scriptPath).toLowerCase()];
  return interpreter
    ? { command: interpreter, args: [scriptPath, projectDir] }
    : { command: scriptPath, args: [projectDir] };
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

export interface RunHookOptions {
  /** Directory searched for the hook (default: current working directory) */
  dir?: string;
  logger?: Logger;
}

/**
 * Run a hook if one exists; a missing hook is a no-op.
 *
 * Blocks until the script exits. There is no timeout.
 *
 * @throws HookExecutionError if the script cannot be started, exits
 *         nonzero, or is killed by a signal
 */
export function runHook(
  hookName: HookName,
  projectDir: string,
  options: RunHookOptions = {}
): void {
  const logger = options.logger ?? createConfiguredLogger();
  const scriptPath = findHook(hookName, options.dir);

  if (scriptPath === undefined) {
    logger.debug("No hook found", { hookName });
    return;
  }

  const { command, args } = hookCommand(scriptPath, projectDir);
  logger.info("Running hook", { hookName, script: scriptPath });

  const result = spawnSync(command, args, {
    cwd: projectDir,
    stdio: "inherit",
    env: { ...process.env, TREEPLATE_PROJECT_DIR: projectDir },
  });

  if (result.error) {
    throw new HookExecutionError(
      hookName,
      scriptPath,
      null,
      null,
      `Hook ${hookName} could not be started: ${result.error.message}`,
      { cause: result.error }
    );
  }

  if (result.signal !== null) {
    throw new HookExecutionError(
      hookName,
      scriptPath,
      null,
      result.signal,
      `Hook ${hookName} was terminated by ${result.signal}`
    );
  }

  if (result.status !== 0) {
    throw new HookExecutionError(
      hookName,
      scriptPath,
      result.status,
      null,
      `Hook ${hookName} exited with status ${result.status}`
    );
  }
}
