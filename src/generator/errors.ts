/**
 * Generator errors.
 */

export class NonTemplatedInputDirError extends Error {
  constructor(
    public readonly dirname: string,
    message?: string
  ) {
    super(
      message ??
        `Template directory "${dirname}" is not templated: its name must contain "{{" and "}}"`
    );
    this.name = "NonTemplatedInputDirError";
  }
}

/**
 * A filesystem call failed while reading the template or writing output.
 * The original system error is kept as `cause`.
 */
export class FilesystemError extends Error {
  constructor(
    public readonly path: string,
    /** What was being attempted, e.g. "write", "copy", "mkdir" */
    public readonly operation: string,
    /** System error code such as EACCES, when one was reported */
    public readonly code: string | undefined,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} ${path}: ${reason}`, { cause });
    this.name = "FilesystemError";
  }
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Run a synchronous filesystem call, re-throwing failures as FilesystemError.
 */
export function fsAction<T>(path: string, operation: string, action: () => T): T {
  try {
    return action();
  } catch (err) {
    throw new FilesystemError(path, operation, errorCode(err), err);
  }
}
