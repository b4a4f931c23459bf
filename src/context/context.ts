/**
 * Ordered, immutable variable mapping used for every render call.
 *
 * Entries are kept as an explicit list of [key, value] pairs so iteration
 * order is the order in which keys were first declared, including keys that
 * look like integers (a plain object would hoist those to the front).
 *
 * Overlay semantics:
 *
 *   base    { project_name: "app", version: "0.1.0" }
 *   overlay { version: "1.0.0", author: "someone" }
 *   result  { project_name: "app", version: "1.0.0", author: "someone" }
 *
 * A replaced key keeps its original position; new keys are appended. Nested
 * mappings are replaced wholesale, never merged.
 */

import { ContextLoadError } from "./errors.js";
import {
  PlainContextSchema,
  formatContextIssues,
  type ContextScalar,
  type PlainContextValue,
} from "./schema.js";

export type { ContextScalar } from "./schema.js";

export type ContextValue = ContextScalar | readonly ContextValue[] | Context;

export type ContextEntry = readonly [string, ContextValue];

/** Anything resolveContext() and generate() accept as a context. */
export type ContextInput = Context | Record<string, unknown>;

export function isSequence(value: unknown): value is readonly ContextValue[] {
  return Array.isArray(value);
}

export class Context implements Iterable<ContextEntry> {
  private readonly pairs: readonly ContextEntry[];
  private readonly positions: ReadonlyMap<string, number>;

  constructor(entries: Iterable<ContextEntry> = []) {
    const pairs: ContextEntry[] = [];
    const positions = new Map<string, number>();

    for (const [key, value] of entries) {
      const existing = positions.get(key);
      if (existing === undefined) {
        positions.set(key, pairs.length);
        pairs.push(Object.freeze([key, value] as const));
      } else {
        pairs[existing] = Object.freeze([key, value] as const);
      }
    }

    this.pairs = Object.freeze(pairs);
    this.positions = positions;
    Object.freeze(this);
  }

  static readonly empty = new Context();

  /**
   * Build a Context from plain data, validating every value.
   *
   * @param input  - A Context (returned as is) or a string-keyed object
   * @param source - Label used in error messages
   * @throws ContextLoadError if the data holds unsupported values
   */
  static from(input: unknown, source = "(inline)"): Context {
    if (input instanceof Context) {
      return input;
    }

    const result = PlainContextSchema.safeParse(input);
    if (!result.success) {
      throw new ContextLoadError(source, formatContextIssues(result.error.issues));
    }

    return fromPlainMapping(result.data);
  }

  get size(): number {
    return this.pairs.length;
  }

  has(key: string): boolean {
    return this.positions.has(key);
  }

  get(key: string): ContextValue | undefined {
    const position = this.positions.get(key);
    return position === undefined ? undefined : this.pairs[position][1];
  }

  /**
   * Resolve a dotted variable path such as ["author", "email"].
   * Numeric segments index into sequences.
   */
  lookup(path: readonly string[]): ContextValue | undefined {
    let current: ContextValue | undefined = this;
    for (const segment of path) {
      if (current instanceof Context) {
        current = current.get(segment);
      } else if (isSequence(current) && /^\d+$/.test(segment)) {
        current = current[Number(segment)];
      } else {
        return undefined;
      }
    }
    return current;
  }

  keys(): string[] {
    return this.pairs.map(([key]) => key);
  }

  entries(): readonly ContextEntry[] {
    return this.pairs;
  }

  [Symbol.iterator](): Iterator<ContextEntry> {
    return this.pairs[Symbol.iterator]();
  }

  /**
   * Return a new Context with overlay keys replacing this context's values.
   */
  withOverlay(overlay: Context): Context {
    return new Context([...this.pairs, ...overlay.pairs]);
  }

  /**
   * Plain-object view. Key order follows JavaScript object rules, so use
   * formatContextJson() when the declared order must survive.
   */
  toJSON(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [key, value] of this.pairs) {
      out[key] = toPlainValue(value);
    }
    return out;
  }
}

function fromPlainMapping(mapping: { [key: string]: PlainContextValue }): Context {
  return new Context(
    Object.entries(mapping).map(([key, value]) => [key, fromPlainValue(value)] as const)
  );
}

function fromPlainValue(value: PlainContextValue): ContextValue {
  if (Array.isArray(value)) {
    return value.map(fromPlainValue);
  }
  if (value !== null && typeof value === "object") {
    return fromPlainMapping(value);
  }
  return value;
}

function toPlainValue(value: ContextValue): unknown {
  if (value instanceof Context) {
    return value.toJSON();
  }
  if (isSequence(value)) {
    return value.map(toPlainValue);
  }
  return value;
}

/**
 * Serialize a context value as JSON, keeping context key order.
 */
export function formatContextJson(value: ContextValue, indent = 2, depth = 0): string {
  const pad = " ".repeat(indent * (depth + 1));
  const closePad = " ".repeat(indent * depth);

  if (value instanceof Context) {
    if (value.size === 0) return "{}";
    const members = value
      .entries()
      .map(([key, item]) => `${pad}${JSON.stringify(key)}: ${formatContextJson(item, indent, depth + 1)}`);
    return `{\n${members.join(",\n")}\n${closePad}}`;
  }

  if (isSequence(value)) {
    if (value.length === 0) return "[]";
    const items = value.map((item) => `${pad}${formatContextJson(item, indent, depth + 1)}`);
    return `[\n${items.join(",\n")}\n${closePad}]`;
  }

  return JSON.stringify(value);
}
