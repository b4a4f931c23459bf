import type { ContextValue } from "../context/index.js";

/**
 * Text written in place of a {{variable}}.
 * Strings verbatim; numbers and booleans via String(); null as "";
 * sequences and mappings as compact JSON.
 */
export function stringifyValue(value: ContextValue): string {
  if (typeof value === "string") return value;
  if (value === null) return "";
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}
