/**
 * Zod schemas for context values supplied as plain data.
 */

import { z, type ZodIssue } from "zod";

/** Leaf values a context may hold. */
export const ContextScalarSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
]);

export type ContextScalar = z.infer<typeof ContextScalarSchema>;

/** A context value written as plain JSON-like data. */
export type PlainContextValue =
  | ContextScalar
  | PlainContextValue[]
  | { [key: string]: PlainContextValue };

export const PlainContextValueSchema: z.ZodType<PlainContextValue> = z.lazy(
  () =>
    z.union([
      ContextScalarSchema,
      z.array(PlainContextValueSchema),
      z.record(PlainContextValueSchema),
    ])
);

/** Top level of a plain context: always a mapping. */
export const PlainContextSchema = z.record(PlainContextValueSchema);

/**
 * Render zod issues as "path: message" lines.
 */
export function formatContextIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}
