/**
 * The seam between the generator and the templating language.
 *
 * The generator only ever calls TemplateEngine.render(), for names and for
 * file contents alike, so another engine can be dropped in through
 * GenerateOptions.engine without touching the walk.
 */

import type { Context } from "../context/index.js";
import { renderTemplate } from "./renderer.js";
import { parseTemplate, type ParsedTemplate } from "./syntax.js";

export interface TemplateEngine {
  /**
   * @param template - Template text
   * @param context  - Values to substitute
   * @param name     - Template name used in error messages
   * @throws TemplateRenderError (or a subclass) on syntax or lookup failure
   */
  render(template: string, context: Context, name?: string): string;
}

/**
 * Built-in `{{ … }}` engine.
 *
 * Stateless: each call parses its template afresh and nothing is retained
 * between calls.
 */
export class BraceTemplateEngine implements TemplateEngine {
  render(template: string, context: Context, name = template): string {
    return renderTemplate(this.parse(template, name), context);
  }

  /**
   * Parse without rendering; useful for validating a template up front.
   *
   * @throws TemplateSyntaxError on malformed tags
   */
  parse(template: string, name = template): ParsedTemplate {
    return parseTemplate(template, name);
  }
}
