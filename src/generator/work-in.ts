/**
 * Scoped working-directory change.
 *
 * The template walk and the hooks resolve relative paths against the
 * process working directory, so each runs inside workIn(). The previous
 * directory is restored on every exit path, including a throw.
 */

import { fsAction } from "./errors.js";

export function workIn<T>(dir: string, fn: () => T): T {
  const previous = process.cwd();
  fsAction(dir, "change directory to", () => process.chdir(dir));
  try {
    return fn();
  } finally {
    process.chdir(previous);
  }
}
