/**
 * Template parsing.
 *
 * A template is plain text containing `{{…}}` tags. Used both for file
 * contents and for file and directory names.
 *
 * TEMPLATE FORMAT:
 *
 *   VARIABLE SUBSTITUTION:
 *     {{project_name}}             simple variable
 *     {{ author.email }}           nested mapping path, whitespace trimmed
 *     {{keywords.0}}               sequence index
 *
 *   CONDITIONAL BLOCKS (may nest):
 *     {{#if license}}
 *     ...
 *     {{/if}}
 *
 *   RAW BLOCKS (contents copied verbatim, tags included):
 *     run: echo ${{{{raw}}}}{{ github.ref }}{{{{/raw}}}}
 *     renders as
 *     run: echo ${{ github.ref }}
 *
 * Rules:
 *   - Every `{{` must be closed by `}}` and hold one of the forms above
 *   - Anything else inside braces is a syntax error
 *   - Every {{#if}} needs a matching {{/if}}
 *   - Every {{{{raw}}}} needs a matching {{{{/raw}}}}; raw blocks do not nest
 *   - Errors carry the line and column of the offending tag
 */

import { parseCondition, type Condition } from "./conditional.js";
import { TemplateSyntaxError, type SourceLocation } from "./errors.js";

// ---------------------------------------------------------------------------
// Parsed template
// ---------------------------------------------------------------------------

export type TemplateNode =
  | { kind: "text"; value: string }
  | { kind: "variable"; variable: string; path: string[]; location: SourceLocation }
  | { kind: "if"; condition: Condition; body: TemplateNode[]; location: SourceLocation };

export interface ParsedTemplate {
  /** The raw template source string (with tags intact). */
  source: string;
  /** Name used in error messages. */
  name: string;
  nodes: TemplateNode[];
}

// ---------------------------------------------------------------------------
// Lexical helpers
// ---------------------------------------------------------------------------

const OPEN = "{{";
const CLOSE = "}}";

/** Dotted variable path; segments after the first may be numeric. */
const VARIABLE_RE = /^[a-zA-Z_][a-zA-Z0-9_]*(?:\.[a-zA-Z0-9_]+)*$/;

const IF_RE = /^#if\s+([\s\S]+)$/;

const RAW_OPEN = "{{{{raw}}}}";
const RAW_CLOSE = "{{{{/raw}}}}";

/**
 * Quick check for marker presence without parsing.
 * Used to recognise templated directory names.
 */
export function containsTemplateMarkers(text: string): boolean {
  return text.includes(OPEN) && text.includes(CLOSE);
}

/**
 * Map string offsets to 1-based line/column pairs.
 */
function createLocator(source: string): (offset: number) => SourceLocation {
  const lineStarts = [0];
  for (let i = 0; i < source.length; i++) {
    if (source[i] === "\n") lineStarts.push(i + 1);
  }

  return (offset) => {
    // last line start at or before offset
    let low = 0;
    let high = lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { line: low + 1, column: offset - lineStarts[low] + 1 };
  };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

interface OpenBlock {
  node: Extract<TemplateNode, { kind: "if" }>;
  parent: TemplateNode[];
}

/**
 * Parse template source into a node tree.
 *
 * @param source - The raw template text
 * @param name   - Template name for error messages
 * @throws TemplateSyntaxError on malformed or unbalanced tags
 */
export function parseTemplate(source: string, name = "(anonymous)"): ParsedTemplate {
  const locate = createLocator(source);
  const root: TemplateNode[] = [];
  const stack: OpenBlock[] = [];
  let current = root;
  let cursor = 0;

  while (cursor < source.length) {
    const open = source.indexOf(OPEN, cursor);
    if (open === -1) {
      current.push({ kind: "text", value: source.slice(cursor) });
      break;
    }

    if (open > cursor) {
      current.push({ kind: "text", value: source.slice(cursor, open) });
    }

    const location = locate(open);

    if (source.startsWith(RAW_OPEN, open)) {
      const bodyStart = open + RAW_OPEN.length;
      const rawEnd = source.indexOf(RAW_CLOSE, bodyStart);
      if (rawEnd === -1) {
        throw new TemplateSyntaxError(name, location, `${RAW_OPEN} is never closed`);
      }
      if (rawEnd > bodyStart) {
        current.push({ kind: "text", value: source.slice(bodyStart, rawEnd) });
      }
      cursor = rawEnd + RAW_CLOSE.length;
      continue;
    }

    if (source.startsWith(RAW_CLOSE, open)) {
      throw new TemplateSyntaxError(name, location, `${RAW_CLOSE} without a matching ${RAW_OPEN}`);
    }

    const close = source.indexOf(CLOSE, open + OPEN.length);
    if (close === -1) {
      throw new TemplateSyntaxError(name, location, `unclosed tag, expected "${CLOSE}"`);
    }

    const tag = source.slice(open + OPEN.length, close).trim();
    cursor = close + CLOSE.length;

    const ifMatch = IF_RE.exec(tag);
    if (ifMatch) {
      const condition = parseCondition(ifMatch[1]);
      if (!condition) {
        throw new TemplateSyntaxError(name, location, `invalid condition "${ifMatch[1].trim()}"`);
      }
      const node: OpenBlock["node"] = { kind: "if", condition, body: [], location };
      current.push(node);
      stack.push({ node, parent: current });
      current = node.body;
      continue;
    }

    if (tag === "/if") {
      const block = stack.pop();
      if (!block) {
        throw new TemplateSyntaxError(name, location, "{{/if}} without a matching {{#if}}");
      }
      current = block.parent;
      continue;
    }

    if (VARIABLE_RE.test(tag)) {
      current.push({ kind: "variable", variable: tag, path: tag.split("."), location });
      continue;
    }

    throw new TemplateSyntaxError(name, location, `unexpected tag "${OPEN}${tag}${CLOSE}"`);
  }

  const unclosed = stack.pop();
  if (unclosed) {
    throw new TemplateSyntaxError(name, unclosed.node.location, "{{#if}} is never closed");
  }

  return { source, name, nodes: root };
}
