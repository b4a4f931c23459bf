/**
 * Raised when a context source cannot be turned into a Context: the file is
 * missing or unreadable, it parses under neither supported format, or the
 * data it holds is not a string-keyed mapping of supported values.
 */
export class ContextLoadError extends Error {
  constructor(
    /** File path, or a label such as "(overlay)" for in-memory input */
    public readonly source: string,
    /** One entry per failed attempt or invalid value */
    public readonly reasons: readonly string[],
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(
      message ??
        `Cannot load context from ${source}:\n  - ${reasons.join("\n  - ")}`,
      options
    );
    this.name = "ContextLoadError";
  }
}
