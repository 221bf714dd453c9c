import { TemplateSyntaxError } from "./errors.js";

/**
 * Top-level template regions.
 *
 * - `data`     : literal template text (after whitespace control), including `{% raw %}` bodies
 * - `variable` : a `{{ ... }}` tag; `innerStart..innerEnd` is the expression source
 * - `block`    : a `{% ... %}` tag; `innerStart..innerEnd` is the statement source
 *
 * Comments (`{# ... #}`) produce no region.
 */
export type Region =
  | { kind: "data"; start: number; end: number; text: string }
  | { kind: "variable" | "block"; start: number; end: number; innerStart: number; innerEnd: number };

type TagKind = "variable" | "block" | "comment";

const OPENERS: Record<string, TagKind> = {
  "{{": "variable",
  "{%": "block",
  "{#": "comment",
};

const CLOSERS: Record<TagKind, string> = {
  variable: "}}",
  block: "%}",
  comment: "#}",
};

const RAW_END = /\{%[-+]?\s*endraw\s*[-+]?%\}/g;

/**
 * Split a template into data and tag regions.
 *
 * Tag ends are searched outside string literals and only at bracket depth
 * zero, so `{{ {'a': 1} }}` and `{{ "}}" }}` close where they should.
 */
export function lexTemplate(source: string, templateName?: string): Region[] {
  const regions: Region[] = [];
  let pos = 0;
  let stripNextData = false;

  while (pos < source.length) {
    const open = findNextOpener(source, pos);
    const dataEnd = open === -1 ? source.length : open;

    if (dataEnd > pos) {
      let text = source.slice(pos, dataEnd);
      if (stripNextData) text = text.replace(/^\s+/, "");
      if (open !== -1 && source[open + 2] === "-") text = text.replace(/\s+$/, "");
      if (text.length > 0) {
        regions.push({ kind: "data", start: pos, end: dataEnd, text });
      }
    }
    stripNextData = false;
    if (open === -1) break;

    const kind = OPENERS[source.slice(open, open + 2)];
    if (kind === undefined) break;

    let innerStart = open + 2;
    if (source[innerStart] === "-" || source[innerStart] === "+") innerStart++;

    const close = kind === "comment"
      ? source.indexOf(CLOSERS.comment, innerStart)
      : findTagEnd(source, innerStart, CLOSERS[kind]);
    if (close === -1) {
      const what = kind === "comment" ? "Missing end of comment tag" : `Unexpected end of template, expected '${CLOSERS[kind]}'`;
      throw new TemplateSyntaxError(what, open, source, templateName);
    }

    let innerEnd = close;
    if (source[close - 1] === "-" && close - 1 >= innerStart) {
      innerEnd = close - 1;
      stripNextData = true;
    } else if (source[close - 1] === "+" && close - 1 >= innerStart) {
      innerEnd = close - 1;
    }
    const end = close + 2;

    if (kind === "block" && source.slice(innerStart, innerEnd).trim() === "raw") {
      RAW_END.lastIndex = end;
      const endRaw = RAW_END.exec(source);
      if (endRaw === null) {
        throw new TemplateSyntaxError("Missing end of raw directive", open, source, templateName);
      }
      const rawText = source.slice(end, endRaw.index);
      if (rawText.length > 0) {
        regions.push({ kind: "data", start: end, end: endRaw.index, text: rawText });
      }
      pos = endRaw.index + endRaw[0].length;
      continue;
    }

    if (kind !== "comment") {
      regions.push({ kind, start: open, end, innerStart, innerEnd });
    }
    pos = end;
  }

  return regions;
}

function findNextOpener(source: string, from: number): number {
  let i = source.indexOf("{", from);
  while (i !== -1) {
    const next = source[i + 1];
    if (next === "{" || next === "%" || next === "#") return i;
    i = source.indexOf("{", i + 1);
  }
  return -1;
}

function findTagEnd(source: string, from: number, closer: string): number {
  let depth = 0;
  let quote: string | null = null;

  for (let i = from; i < source.length; i++) {
    const ch = source[i];

    if (quote !== null) {
      if (ch === "\\") {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }

    switch (ch) {
      case "'":
      case '"':
        quote = ch;
        break;
      case "(":
      case "[":
      case "{":
        depth++;
        break;
      case ")":
      case "]":
      case "}":
        if (depth === 0 && source.startsWith(closer, i)) return i;
        if (depth > 0) depth--;
        break;
      case "%":
        if (depth === 0 && source.startsWith(closer, i)) return i;
        break;
      default:
        break;
    }
  }
  return -1;
}
