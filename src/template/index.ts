/**
 * Templating: `{{variable}}` substitution and `{{#if}}` blocks.
 */

export { BraceTemplateEngine, type TemplateEngine } from "./engine.js";
export { parseTemplate, containsTemplateMarkers, type ParsedTemplate, type TemplateNode } from "./syntax.js";
export { renderTemplate } from "./renderer.js";
export {
  parseCondition,
  evaluateCondition,
  isTruthy,
  type Condition,
  type ConditionalOperator,
} from "./conditional.js";
export { stringifyValue } from "./stringify.js";
export {
  TemplateRenderError,
  TemplateSyntaxError,
  UndefinedVariableError,
  type SourceLocation,
} from "./errors.js";
