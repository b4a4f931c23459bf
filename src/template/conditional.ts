/**
 * Conditional block expressions.
 *
 *   BOOLEAN (truthy) check:
 *
 *     {{#if license}}
 *     Licensed under {{license}}.
 *     {{/if}}
 *
 *   EQUALITY / INEQUALITY check against a quoted literal:
 *
 *     {{#if ci == "github"}}
 *     ...
 *     {{/if}}
 *
 *     {{#if ci != 'none'}}
 *     ...
 *     {{/if}}
 *
 * No arbitrary expressions: only a variable path, optionally compared with
 * a string literal. The comparison is made against the value's rendered
 * text, so `{{#if port == "8080"}}` matches the number 8080.
 */

import { Context, isSequence, type ContextValue } from "../context/index.js";
import { stringifyValue } from "./stringify.js";

export type ConditionalOperator = "==" | "!=" | "truthy";

export interface Condition {
  /** Dotted variable path as written */
  variable: string;
  operator: ConditionalOperator;
  /** Literal for == / != comparisons */
  value?: string;
}

/**
 * Groups:
 *   1: variable path
 *   2: operator (== or !=), optional
 *   3: double-quoted literal, optional
 *   4: single-quoted literal, optional
 */
const CONDITION_RE =
  /^([a-zA-Z_][a-zA-Z0-9_]*(?:\.[a-zA-Z0-9_]+)*)(?:\s*(==|!=)\s*(?:"([^"]*)"|'([^']*)'))?$/;

/**
 * Parse the expression part of `{{#if …}}`.
 * Returns null when the expression is not a supported condition.
 */
export function parseCondition(expression: string): Condition | null {
  const match = CONDITION_RE.exec(expression.trim());
  if (!match) return null;

  const [, variable, operator, doubleQuoted, singleQuoted] = match;
  if (operator === "==" || operator === "!=") {
    return { variable, operator, value: doubleQuoted ?? singleQuoted ?? "" };
  }
  return { variable, operator: "truthy" };
}

/**
 * Falsy values: missing, null, false, 0, "", empty sequence, empty mapping.
 */
export function isTruthy(value: ContextValue | undefined): boolean {
  if (value === undefined || value === null) return false;
  if (value instanceof Context) return value.size > 0;
  if (isSequence(value)) return value.length > 0;
  return Boolean(value);
}

/**
 * Rules:
 *   - missing variables → false for truthy, false for ==, true for !=
 *   - ==: exact match of the rendered value
 *   - !=: anything else
 */
export function evaluateCondition(condition: Condition, context: Context): boolean {
  const value = context.lookup(condition.variable.split("."));

  switch (condition.operator) {
    case "truthy":
      return isTruthy(value);

    case "==":
      return value !== undefined && stringifyValue(value) === condition.value;

    case "!=":
      return value === undefined || stringifyValue(value) !== condition.value;
  }
}
