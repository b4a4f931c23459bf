/**
 * Pre/post generation hook discovery and execution.
 */

export {
  HOOK_NAMES,
  HookExecutionError,
  findHook,
  hookCommand,
  runHook,
  type HookName,
  type RunHookOptions,
} from "./runner.js";
