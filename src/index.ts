/**
 * treeplate: generate a project directory tree from a templated directory.
 *
 *   import { resolveContext, generate } from "treeplate";
 *
 *   const context = resolveContext("template/treeplate.json", { project_name: "demo" });
 *   const projectDir = generate("template", context, "out");
 */

export {
  Context,
  ContextLoadError,
  formatContextJson,
  loadContextFile,
  resolveContext,
  type ContextInput,
  type ContextValue,
  type ResolveContextOptions,
} from "./context/index.js";
export {
  FilesystemError,
  NonTemplatedInputDirError,
  RenderEnvironment,
  generate,
  generateFile,
  findTemplate,
  isBinaryFile,
  renderAndCreateDir,
  renderPath,
  type GenerateOptions,
} from "./generator/index.js";
export { HookExecutionError, runHook, type HookName } from "./hooks/index.js";
export {
  BraceTemplateEngine,
  TemplateRenderError,
  TemplateSyntaxError,
  UndefinedVariableError,
  type TemplateEngine,
} from "./template/index.js";
export { ConfigError, config, validateConfig } from "./config/index.js";
export { createLogger, type Logger, type LogLevel } from "./logging/index.js";
