import { z } from "zod";
import rawConfusables from "../data/confusables.json";
import { formatCodePoint, makeIssue, splitLines } from "../lexer";
import type { Issue } from "../types";

const ConfusableEntrySchema = z
  .object({
    codePoint: z.string().regex(/^[0-9A-F]{4,6}$/),
    suggestion: z.string(),
    name: z.string().min(1),
  })
  .strict();

type ConfusableEntry = z.infer<typeof ConfusableEntrySchema> & { char: string };

const CONFUSABLES: ReadonlyMap<string, ConfusableEntry> = new Map(
  z
    .array(ConfusableEntrySchema)
    .parse(rawConfusables)
    .map((entry): [string, ConfusableEntry] => {
      const char = String.fromCodePoint(parseInt(entry.codePoint, 16));
      return [char, { ...entry, char }];
    })
);

export function lookupConfusable(ch: string): { suggestion: string; name: string } | undefined {
  const entry = CONFUSABLES.get(ch);
  return entry ? { suggestion: entry.suggestion, name: entry.name } : undefined;
}

function describe(entry: ConfusableEntry): string {
  const label = `${entry.name} (${formatCodePoint(entry.char)})`;
  if (entry.suggestion === "") return `${label} is invisible; delete it`;
  if (entry.suggestion.trim() === "") return `${label} looks like a plain space; use " " instead`;
  return `${label} looks like "${entry.suggestion}"; use "${entry.suggestion}" instead`;
}

export function checkConfusable(source: string): Issue[] {
  const issues: Issue[] = [];
  splitLines(source).forEach((text, idx) => {
    let column = 0;
    for (const ch of text) {
      column += 1;
      const entry = CONFUSABLES.get(ch);
      if (!entry) continue;
      issues.push(
        makeIssue({
          line: idx + 1,
          column,
          char: ch,
          suggestion: entry.suggestion,
          rule: "confusable",
          message: describe(entry),
        })
      );
    }
  });
  return issues;
}
