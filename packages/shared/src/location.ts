import { TextDocument } from "vscode-languageserver-textdocument";

/** 1-based line/column position, the way template errors are reported. */
export interface SourceLocation {
  line: number;
  column: number;
}

const TEMPLATE_LANGUAGE_ID = "jinja";

/**
 * Map an offset into `text` to a 1-based line/column.
 * Offsets past the end clamp to the last position.
 */
export function locationAt(text: string, offset: number, uri = "untitled:template"): SourceLocation {
  const doc = TextDocument.create(uri, TEMPLATE_LANGUAGE_ID, 0, text);
  const position = doc.positionAt(offset);
  return { line: position.line + 1, column: position.character + 1 };
}
