/**
 * Rendering of file and directory names.
 */

import { mkdirSync } from "node:fs";
import { join, normalize } from "node:path";

import type { Context } from "../context/index.js";
import { BraceTemplateEngine, type TemplateEngine } from "../template/index.js";
import { fsAction } from "./errors.js";

/**
 * Render a templated path and normalize it for the current platform.
 *
 * @throws TemplateRenderError if a referenced variable is missing
 */
export function renderPath(
  template: string,
  context: Context,
  engine: TemplateEngine = new BraceTemplateEngine()
): string {
  return normalize(engine.render(template, context, template));
}

/**
 * Render a directory name, create it (with any missing ancestors) under
 * `outputDir`, and return its path. An existing directory is left as is.
 *
 * @throws TemplateRenderError if the name cannot be rendered
 * @throws FilesystemError if the directory cannot be created
 */
export function renderAndCreateDir(
  dirname: string,
  context: Context,
  outputDir: string,
  engine: TemplateEngine = new BraceTemplateEngine()
): string {
  const dirToCreate = normalize(join(outputDir, renderPath(dirname, context, engine)));
  fsAction(dirToCreate, "create directory", () => mkdirSync(dirToCreate, { recursive: true }));
  return dirToCreate;
}
