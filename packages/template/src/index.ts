// Template package
//
// Scanner, parser, AST model, walker and canonical printer for Jinja-like
// templates. Parsing is purely syntactic; nothing is evaluated.

export * from "./model/ast.js";

export { Scanner, TokenType, type Token, type TokenValue } from "./parsing/scanner.js";
export { lexTemplate, type Region } from "./parsing/lexer.js";
export { ExpressionParser, type TupleOptions, type AssignTargetOptions } from "./parsing/expression-parser.js";
export {
  parseTemplate,
  defaultTemplateParser,
  type ParseTemplateOptions,
  type TemplateParser,
} from "./parsing/template-parser.js";
export { TemplateSyntaxError } from "./parsing/errors.js";

export { childNodes, findAll, collectCalls } from "./walk.js";
export { printExpression, printConst } from "./printer.js";
