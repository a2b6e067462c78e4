import { lexSource, makeIssue } from "../lexer";
import type { Issue } from "../types";

const BRACKET_PAIRS: Readonly<Record<string, string>> = {
  "(": ")",
  "[": "]",
  "{": "}",
};

const CLOSING = new Set(Object.values(BRACKET_PAIRS));

type OpenBracket = { char: string; line: number; column: number };

/**
 * Stack-based pairing of (), [] and {} outside quoted regions. A closer of the
 * wrong kind consumes its opener. Anything still open at the end is reported
 * once, at the outermost opener: every later bracket is nested inside it, so
 * which of them is really missing a closer cannot be told lexically.
 */
export function checkBrackets(source: string): Issue[] {
  const issues: Issue[] = [];
  const stack: OpenBracket[] = [];

  for (const lexed of lexSource(source)) {
    lexed.chars.forEach((ch, idx) => {
      if (lexed.quoted[idx]) return;
      const column = idx + 1;

      if (BRACKET_PAIRS[ch] !== undefined) {
        stack.push({ char: ch, line: lexed.line, column });
        return;
      }
      if (!CLOSING.has(ch)) return;

      const opener = stack.pop();
      if (!opener) {
        issues.push(
          makeIssue({
            line: lexed.line,
            column,
            char: ch,
            rule: "brackets",
            message: `Unmatched closing bracket "${ch}"`,
          })
        );
        return;
      }

      const expected = BRACKET_PAIRS[opener.char];
      if (expected !== undefined && expected !== ch) {
        issues.push(
          makeIssue({
            line: lexed.line,
            column,
            char: ch,
            suggestion: expected,
            rule: "brackets",
            message: `Mismatched bracket kind: "${opener.char}" at line ${opener.line}, column ${opener.column} expects "${expected}" but found "${ch}"`,
          })
        );
      }
    });
  }

  const outermost = stack[0];
  if (outermost) {
    const extra = stack.length > 1 ? ` (${stack.length} brackets are never closed)` : "";
    issues.push(
      makeIssue({
        line: outermost.line,
        column: outermost.column,
        char: outermost.char,
        rule: "brackets",
        message: `Unmatched opening bracket "${outermost.char}"${extra}`,
      })
    );
  }

  return issues;
}
