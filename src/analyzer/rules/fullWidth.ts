import { formatCodePoint, makeIssue, splitLines } from "../lexer";
import type { Issue } from "../types";

const FULL_WIDTH_FIRST = 0xff01;
const FULL_WIDTH_LAST = 0xff5e;
const FULL_WIDTH_OFFSET = 0xfee0;

// CJK punctuation outside the full-width forms block.
const CJK_PUNCTUATION: Readonly<Record<string, string>> = {
  "　": " ",
  "、": ",",
  "。": ".",
  "「": '"',
  "」": '"',
  "【": "[",
  "】": "]",
  "《": "<",
  "》": ">",
  "〈": "<",
  "〉": ">",
};

function isFullWidthAlphanumeric(cp: number): boolean {
  return (
    (cp >= 0xff10 && cp <= 0xff19) ||
    (cp >= 0xff21 && cp <= 0xff3a) ||
    (cp >= 0xff41 && cp <= 0xff5a)
  );
}

export function asciiCounterpart(ch: string): string | undefined {
  const mapped = CJK_PUNCTUATION[ch];
  if (mapped !== undefined) return mapped;
  const cp = ch.codePointAt(0);
  if (cp === undefined || cp < FULL_WIDTH_FIRST || cp > FULL_WIDTH_LAST) return undefined;
  if (isFullWidthAlphanumeric(cp)) return undefined;
  return String.fromCodePoint(cp - FULL_WIDTH_OFFSET);
}

export function checkFullWidth(source: string): Issue[] {
  const issues: Issue[] = [];
  splitLines(source).forEach((text, idx) => {
    let column = 0;
    for (const ch of text) {
      column += 1;
      const suggestion = asciiCounterpart(ch);
      if (suggestion === undefined) continue;
      issues.push(
        makeIssue({
          line: idx + 1,
          column,
          char: ch,
          suggestion,
          rule: "full_width",
          message: `Full-width symbol "${ch}" (${formatCodePoint(ch)}) found; use "${suggestion}" instead`,
        })
      );
    }
  });
  return issues;
}
