import { lexSource, makeIssue } from "../lexer";
import type { Issue } from "../types";

export function checkQuotes(source: string): Issue[] {
  const issues: Issue[] = [];
  for (const lexed of lexSource(source)) {
    const open = lexed.openQuote;
    if (!open) continue;
    const kind = open.char === "'" ? "single" : "double";
    issues.push(
      makeIssue({
        line: lexed.line,
        column: open.column,
        char: open.char,
        rule: "quotes",
        message: `Unterminated quote: ${kind}-quoted string opened here is not closed on this line`,
      })
    );
  }
  return issues;
}
