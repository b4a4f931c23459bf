/**
 * Project generation.
 *
 * Linear pipeline, no branching back:
 *
 *   Located → RootRendered → PreHookRun
 *     → (directories created, files materialized)*
 *     → PostHookRun → Done
 *
 * Any error aborts the remaining steps. Output already written stays on
 * disk; callers needing atomicity should generate into a temporary
 * directory and move the result into place.
 *
 * The project root is created before the pre-generation hook runs, so a
 * failing pre hook leaves an empty project directory and nothing else.
 */

import { readdirSync, statSync, type Dirent } from "node:fs";
import { basename, join, resolve } from "node:path";

import { Context, type ContextInput } from "../context/index.js";
import { runHook } from "../hooks/index.js";
import { createConfiguredLogger, type Logger } from "../logging/index.js";
import { BraceTemplateEngine, type TemplateEngine } from "../template/index.js";
import { RenderEnvironment } from "./environment.js";
import { fsAction } from "./errors.js";
import { ensureDirIsTemplated, findTemplate } from "./locator.js";
import { generateFile } from "./materializer.js";
import { renderAndCreateDir } from "./paths.js";
import { workIn } from "./work-in.js";

// ---------------------------------------------------------------------------
// Tree walk
// ---------------------------------------------------------------------------

export interface TreeEntry {
  kind: "directory" | "file";
  /** Path relative to the walk root, still templated */
  path: string;
}

function byName(a: Dirent, b: Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Walk a template tree top-down.
 *
 * At each level every child directory is yielded first, then every file,
 * then the walk descends into the child directories. Entries are visited in
 * code-unit order of their names. A symbolic link to a directory is yielded
 * as a directory but not descended into; a symbolic link to a file is
 * yielded as a file.
 */
export function* walkTemplate(root = "."): Generator<TreeEntry> {
  function* visit(relative: string): Generator<TreeEntry> {
    const dirPath = join(root, relative);
    const entries = fsAction(dirPath, "list", () =>
      readdirSync(dirPath, { withFileTypes: true })
    ).sort(byName);

    const descend: string[] = [];
    const directories: string[] = [];
    const files: string[] = [];

    for (const entry of entries) {
      const entryPath = join(relative, entry.name);
      if (entry.isDirectory()) {
        directories.push(entryPath);
        descend.push(entryPath);
      } else if (entry.isSymbolicLink()) {
        const target = join(root, entryPath);
        const stats = fsAction(target, "stat", () => statSync(target));
        if (stats.isDirectory()) {
          directories.push(entryPath);
        } else if (stats.isFile()) {
          files.push(entryPath);
        }
      } else if (entry.isFile()) {
        files.push(entryPath);
      }
    }

    for (const path of directories) yield { kind: "directory", path };
    for (const path of files) yield { kind: "file", path };
    for (const path of descend) yield* visit(path);
  }

  yield* visit("");
}

// ---------------------------------------------------------------------------
// Generation
// ---------------------------------------------------------------------------

export interface GenerateOptions {
  /** Engine for names and contents (default: BraceTemplateEngine) */
  engine?: TemplateEngine;
  logger?: Logger;
  /** Run pre/post generation hooks (default: true) */
  hooks?: boolean;
}

/**
 * Generate a project from the template repository at `repoDir`.
 *
 * @param repoDir   - Repository holding one templated directory and hooks
 * @param context   - Values to substitute (default: empty)
 * @param outputDir - Where the project directory is created (default ".")
 * @returns Absolute path of the generated project directory
 *
 * @throws NonTemplatedInputDirError if the template directory name has no markers
 * @throws ContextLoadError          if `context` holds unsupported values
 * @throws TemplateRenderError       if a name or file fails to render
 * @throws HookExecutionError        if a hook fails
 * @throws FilesystemError           if reading or writing fails
 */
export function generate(
  repoDir: string,
  context?: ContextInput,
  outputDir = ".",
  options: GenerateOptions = {}
): string {
  const logger = options.logger ?? createConfiguredLogger();
  const engine = options.engine ?? new BraceTemplateEngine();
  const runHooks = options.hooks ?? true;
  const values = context === undefined ? Context.empty : Context.from(context, "(context)");

  // Located
  const templateDir = findTemplate(repoDir);
  logger.debug("Generating project from template", { templateDir });

  const unrenderedDir = basename(templateDir);
  ensureDirIsTemplated(unrenderedDir);

  // RootRendered
  const projectDir = resolve(renderAndCreateDir(unrenderedDir, values, outputDir, engine));
  logger.debug("Project directory created", { projectDir });

  // PreHookRun
  if (runHooks) {
    workIn(repoDir, () => runHook("pre_gen_project", projectDir, { logger }));
  }

  // Directories and files
  const env = new RenderEnvironment(templateDir, engine);
  let fileCount = 0;

  workIn(templateDir, () => {
    for (const entry of walkTemplate()) {
      if (entry.kind === "directory") {
        renderAndCreateDir(entry.path, values, projectDir, engine);
      } else {
        generateFile(projectDir, entry.path, values, env, logger);
        fileCount++;
      }
    }
  });

  // PostHookRun
  if (runHooks) {
    workIn(repoDir, () => runHook("post_gen_project", projectDir, { logger }));
  }

  logger.info("Project generated", { projectDir, files: fileCount });
  return projectDir;
}
