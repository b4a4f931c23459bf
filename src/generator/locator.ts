/**
 * Template root discovery.
 *
 * A template repository holds exactly one directory whose name is itself a
 * template, e.g. `{{project_name}}/`. Its rendered name becomes the
 * generated project's root directory.
 */

import { readdirSync } from "node:fs";
import { join } from "node:path";

import { containsTemplateMarkers } from "../template/index.js";
import { NonTemplatedInputDirError, fsAction } from "./errors.js";

/**
 * Throw unless `dirname` contains both template markers.
 *
 * @throws NonTemplatedInputDirError
 */
export function ensureDirIsTemplated(dirname: string): void {
  if (!containsTemplateMarkers(dirname)) {
    throw new NonTemplatedInputDirError(dirname);
  }
}

/**
 * Find the template root among the immediate children of `repoDir`.
 *
 * Returns the first child directory whose name carries template markers.
 * When none does, the first child directory is returned so the caller's
 * ensureDirIsTemplated() check reports it by name.
 *
 * @throws NonTemplatedInputDirError if `repoDir` has no child directory at all
 * @throws FilesystemError if `repoDir` cannot be listed
 */
export function findTemplate(repoDir: string): string {
  const children = fsAction(repoDir, "list", () =>
    readdirSync(repoDir, { withFileTypes: true })
  )
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();

  const templated = children.find(containsTemplateMarkers);
  if (templated !== undefined) {
    return join(repoDir, templated);
  }

  if (children.length > 0) {
    return join(repoDir, children[0]);
  }

  throw new NonTemplatedInputDirError(
    repoDir,
    `No template directory found in ${repoDir}`
  );
}
