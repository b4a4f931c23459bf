/**
 * Context: the ordered variable mapping every render call reads from.
 */

export {
  Context,
  formatContextJson,
  isSequence,
  type ContextEntry,
  type ContextInput,
  type ContextScalar,
  type ContextValue,
} from "./context.js";
export { ContextLoadError } from "./errors.js";
export {
  resolveContext,
  loadContextFile,
  parseContextSource,
  defaultContextFile,
  formatsFor,
  type ContextFormat,
  type ResolveContextOptions,
} from "./loader.js";
