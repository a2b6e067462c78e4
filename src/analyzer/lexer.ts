import type { Issue, RuleId } from "./types";

export type QuoteChar = "'" | '"';

export type LexedLine = {
  line: number;
  chars: string[];
  /** Parallel to `chars`: true for code points inside a quoted region, quotes included. */
  quoted: boolean[];
  /** Set when a quote opened on this line is still open at its end. */
  openQuote?: { char: QuoteChar; column: number };
};

export function splitLines(source: string): string[] {
  return source.split(/\r?\n/);
}

function isQuote(ch: string | undefined): ch is QuoteChar {
  return ch === "'" || ch === '"';
}

/**
 * Classifies quoted regions of one line. A backslash inside a quoted region
 * escapes the next code point; outside one it only escapes a quote, so `\'`
 * never opens a string. Quoted state does not carry over to the next line.
 */
export function lexLine(text: string, line: number): LexedLine {
  const chars = Array.from(text);
  const quoted = new Array<boolean>(chars.length).fill(false);
  let open: { char: QuoteChar; column: number } | null = null;

  let i = 0;
  while (i < chars.length) {
    const ch = chars[i];
    if (ch === "\\" && (open !== null || isQuote(chars[i + 1]))) {
      const inside = open !== null;
      quoted[i] = inside;
      if (i + 1 < chars.length) quoted[i + 1] = inside;
      i += 2;
      continue;
    }
    if (open !== null) {
      quoted[i] = true;
      if (ch === open.char) open = null;
    } else if (isQuote(ch)) {
      open = { char: ch, column: i + 1 };
      quoted[i] = true;
    }
    i += 1;
  }

  return open ? { line, chars, quoted, openQuote: open } : { line, chars, quoted };
}

export function lexSource(source: string): LexedLine[] {
  return splitLines(source).map((text, idx) => lexLine(text, idx + 1));
}

export function formatCodePoint(ch: string): string {
  const cp = ch.codePointAt(0) ?? 0;
  return `U+${cp.toString(16).toUpperCase().padStart(4, "0")}`;
}

export function makeIssue(fields: {
  line: number;
  column: number;
  char: string;
  message: string;
  rule: RuleId;
  suggestion?: string;
}): Issue {
  const single = Array.from(fields.char).length === 1;
  return Object.freeze({
    ...fields,
    ...(single ? { codePoint: formatCodePoint(fields.char) } : {}),
  });
}
