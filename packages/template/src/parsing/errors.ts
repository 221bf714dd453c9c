import { ErrorCode, MacroDepsError, locationAt } from "@macro-deps/shared";

/**
 * Template text is not syntactically valid.
 *
 * `line` and `column` are 1-based; `offset` points into the template that
 * failed to parse.
 */
export class TemplateSyntaxError extends MacroDepsError {
  public readonly line: number;
  public readonly column: number;

  constructor(
    public readonly reason: string,
    public readonly offset: number,
    source: string,
    public readonly templateName?: string,
  ) {
    const { line, column } = locationAt(source, offset);
    const where = templateName ? `${templateName}:${line}:${column}` : `line ${line}, column ${column}`;
    super(`${reason} (${where})`, ErrorCode.TEMPLATE_SYNTAX);
    this.name = "TemplateSyntaxError";
    this.line = line;
    this.column = column;
  }
}
