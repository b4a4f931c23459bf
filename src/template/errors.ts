/**
 * Template errors.
 *
 * Every error names the template it came from. For file contents that name
 * is the file path relative to the template root, and the line and column
 * (both 1-based) point at the opening `{{` of the offending tag.
 */

export interface SourceLocation {
  line: number;
  column: number;
}

export class TemplateRenderError extends Error {
  public readonly line?: number;
  public readonly column?: number;

  constructor(
    public readonly templateName: string,
    location: SourceLocation | undefined,
    public readonly detail: string,
    options?: { cause?: unknown }
  ) {
    const where = location
      ? `${templateName}:${location.line}:${location.column}`
      : templateName;
    super(`${where}: ${detail}`, options);
    this.name = "TemplateRenderError";
    this.line = location?.line;
    this.column = location?.column;
  }
}

/** Malformed tag, unknown construct, or unbalanced {{#if}}/{{/if}}. */
export class TemplateSyntaxError extends TemplateRenderError {
  constructor(templateName: string, location: SourceLocation, detail: string) {
    super(templateName, location, detail);
    this.name = "TemplateSyntaxError";
  }
}

/** A {{variable}} whose path does not resolve in the context. */
export class UndefinedVariableError extends TemplateRenderError {
  constructor(
    templateName: string,
    location: SourceLocation,
    public readonly variable: string
  ) {
    super(templateName, location, `"${variable}" is undefined`);
    this.name = "UndefinedVariableError";
  }
}
