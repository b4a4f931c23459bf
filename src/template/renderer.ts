/**
 * Template renderer.
 *
 * Walks a ParsedTemplate against a Context and produces the final text.
 * Purely mechanical: substitution plus conditional inclusion. Every
 * {{variable}} that survives conditional evaluation MUST resolve; a
 * variable inside an excluded block is never looked up.
 */

import type { Context } from "../context/index.js";
import { evaluateCondition } from "./conditional.js";
import { UndefinedVariableError } from "./errors.js";
import { stringifyValue } from "./stringify.js";
import type { ParsedTemplate, TemplateNode } from "./syntax.js";

function renderNodes(nodes: readonly TemplateNode[], context: Context, templateName: string): string {
  let out = "";

  for (const node of nodes) {
    switch (node.kind) {
      case "text":
        out += node.value;
        break;

      case "variable": {
        const value = context.lookup(node.path);
        if (value === undefined) {
          throw new UndefinedVariableError(templateName, node.location, node.variable);
        }
        out += stringifyValue(value);
        break;
      }

      case "if":
        if (evaluateCondition(node.condition, context)) {
          out += renderNodes(node.body, context, templateName);
        }
        break;
    }
  }

  return out;
}

/**
 * Render a parsed template.
 *
 * @throws UndefinedVariableError if a rendered {{variable}} is not in the context
 */
export function renderTemplate(template: ParsedTemplate, context: Context): string {
  return renderNodes(template.nodes, context, template.name);
}
