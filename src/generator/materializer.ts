/**
 * Per-file generation.
 *
 * 1. Render the file's path (relative to the template root) into its
 *    output path under the project directory.
 * 2. Binary files are copied byte for byte, never rendered.
 * 3. Text files are rendered through the run's RenderEnvironment and
 *    written as UTF-8.
 * 4. The input file's permission bits are applied to the output file.
 *
 * The output file's parent directory must already exist; the generator
 * creates directories before the files they contain.
 */

import { chmodSync, copyFileSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import type { Context } from "../context/index.js";
import { createConfiguredLogger, type Logger } from "../logging/index.js";
import { isBinaryFile } from "./binary.js";
import type { RenderEnvironment } from "./environment.js";
import { fsAction } from "./errors.js";
import { renderPath } from "./paths.js";

/**
 * Generate one output file from one template file.
 *
 * @param projectDir - Absolute path of the generated project root
 * @param infile     - Input path relative to the template root
 * @param context    - Values to substitute
 * @param env        - Render environment rooted at the template root
 * @returns The output file path
 *
 * @throws TemplateRenderError if the name or (text) contents fail to render
 * @throws FilesystemError     if reading, writing or chmod fails
 */
export function generateFile(
  projectDir: string,
  infile: string,
  context: Context,
  env: RenderEnvironment,
  logger: Logger = createConfiguredLogger()
): string {
  logger.debug("Generating file", { infile });

  const inputPath = join(env.baseDir, infile);
  const outfile = join(projectDir, renderPath(infile, context, env.engine));

  if (isBinaryFile(inputPath)) {
    logger.debug("Copying binary file without rendering", { infile, outfile });
    fsAction(outfile, "copy to", () => copyFileSync(inputPath, outfile));
  } else {
    const rendered = env.renderFile(infile, context);
    logger.debug("Writing rendered file", { outfile });
    fsAction(outfile, "write", () => writeFileSync(outfile, rendered, "utf-8"));
  }

  const mode = fsAction(inputPath, "stat", () => statSync(inputPath).mode) & 0o7777;
  fsAction(outfile, "set permissions on", () => chmodSync(outfile, mode));

  return outfile;
}
