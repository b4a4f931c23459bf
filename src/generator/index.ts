/**
 * Project generation from a templated directory tree.
 */

export { generate, walkTemplate, type GenerateOptions, type TreeEntry } from "./generate.js";
export { findTemplate, ensureDirIsTemplated } from "./locator.js";
export { renderPath, renderAndCreateDir } from "./paths.js";
export { generateFile } from "./materializer.js";
export { isBinaryFile, looksBinary } from "./binary.js";
export { RenderEnvironment, templateNameFor } from "./environment.js";
export { workIn } from "./work-in.js";
export { NonTemplatedInputDirError, FilesystemError } from "./errors.js";
