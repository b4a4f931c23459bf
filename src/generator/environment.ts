/**
 * Render environment for one generation run.
 *
 * Binds a TemplateEngine to the template root so file contents and names
 * go through the same engine. File templates are loaded by path relative to
 * the root and named with forward slashes in error messages, whatever the
 * platform separator:
 *
 *   const env = new RenderEnvironment("/repo/{{project_name}}");
 *   env.renderFile("docs/index.md", context);
 *   // a syntax error reports "docs/index.md:3:5: …"
 */

import { existsSync, readFileSync } from "node:fs";
import { join, resolve, sep } from "node:path";
import { TextDecoder } from "node:util";

import type { Context } from "../context/index.js";
import {
  BraceTemplateEngine,
  TemplateRenderError,
  type TemplateEngine,
} from "../template/index.js";
import { FilesystemError, fsAction } from "./errors.js";

/**
 * Error-message name for a path relative to the template root.
 */
export function templateNameFor(relativePath: string): string {
  return relativePath.split(sep).join("/").replace(/^(\.\/)+/, "");
}

// ignoreBOM keeps a leading byte order mark in the rendered output
const UTF8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Decode file contents, refusing bytes that are not UTF-8.
 * Binary sniffing only samples the head of a file, so this is where a
 * later invalid sequence is caught.
 *
 * @throws TemplateRenderError naming the template
 */
function decodeTemplateSource(bytes: Uint8Array, templateName: string): string {
  try {
    return UTF8.decode(bytes);
  } catch (err) {
    throw new TemplateRenderError(templateName, undefined, "file is not valid UTF-8 text", {
      cause: err,
    });
  }
}

export class RenderEnvironment {
  readonly baseDir: string;

  /**
   * @param baseDir - Template root directory
   * @param engine  - Engine used for every render
   */
  constructor(
    baseDir: string,
    readonly engine: TemplateEngine = new BraceTemplateEngine()
  ) {
    this.baseDir = resolve(baseDir);

    if (!existsSync(this.baseDir)) {
      throw new FilesystemError(
        this.baseDir,
        "open template directory",
        "ENOENT",
        new Error("directory does not exist")
      );
    }
  }

  /**
   * Load a file under the template root as UTF-8 text and render it.
   *
   * @throws FilesystemError     if the file cannot be read
   * @throws TemplateRenderError if its contents are not UTF-8 or fail to render
   */
  renderFile(relativePath: string, context: Context): string {
    const filePath = join(this.baseDir, relativePath);
    const name = templateNameFor(relativePath);
    const bytes = fsAction(filePath, "read", () => readFileSync(filePath));
    return this.engine.render(decodeTemplateSource(bytes, name), context, name);
  }
}
