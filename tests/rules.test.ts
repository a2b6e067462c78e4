import { describe, expect, it } from "vitest";
import { lexLine } from "../src/analyzer/lexer";
import { getRuleById, listRuleIds, RULE_REGISTRY } from "../src/analyzer/registry";
import { checkBrackets } from "../src/analyzer/rules/brackets";
import { checkConfusable, lookupConfusable } from "../src/analyzer/rules/confusable";
import { asciiCounterpart, checkFullWidth } from "../src/analyzer/rules/fullWidth";
import { checkQuotes } from "../src/analyzer/rules/quotes";

describe("full_width", () => {
  it("maps full-width punctuation and CJK punctuation to ASCII", () => {
    expect(asciiCounterpart("（")).toBe("(");
    expect(asciiCounterpart("；")).toBe(";");
    expect(asciiCounterpart("＝")).toBe("=");
    expect(asciiCounterpart("。")).toBe(".");
    expect(asciiCounterpart("　")).toBe(" ");
    expect(asciiCounterpart("【")).toBe("[");
  });

  it("leaves full-width letters, digits and ASCII alone", () => {
    expect(asciiCounterpart("Ａ")).toBeUndefined();
    expect(asciiCounterpart("ｚ")).toBeUndefined();
    expect(asciiCounterpart("５")).toBeUndefined();
    expect(asciiCounterpart(",")).toBeUndefined();
    expect(checkFullWidth("ＡＢＣ１２３")).toEqual([]);
  });

  it("reports every occurrence with its position", () => {
    const issues = checkFullWidth("f（x）；");
    expect(issues.map((i) => [i.column, i.char, i.suggestion])).toEqual([
      [2, "（", "("],
      [4, "）", ")"],
      [5, "；", ";"],
    ]);
  });
});

describe("brackets", () => {
  it("accepts balanced brackets across lines", () => {
    expect(checkBrackets("f(a[0], {\n  b: (c)\n})")).toEqual([]);
  });

  it("reports a mismatched closer once and consumes its opener", () => {
    const issues = checkBrackets("(]");
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({
      line: 1,
      column: 2,
      char: "]",
      suggestion: ")",
      message: 'Mismatched bracket kind: "(" at line 1, column 1 expects ")" but found "]"',
    });
  });

  it("reports leftover openers once at the outermost one", () => {
    const issues = checkBrackets("((");
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({
      line: 1,
      column: 1,
      char: "(",
      message: 'Unmatched opening bracket "(" (2 brackets are never closed)',
    });
    expect(issues[0]?.suggestion).toBeUndefined();
  });

  it("reports a closer with nothing open", () => {
    expect(checkBrackets("x)")).toEqual([
      expect.objectContaining({ line: 1, column: 2, message: 'Unmatched closing bracket ")"' }),
    ]);
  });

  it("ignores brackets inside string literals", () => {
    expect(checkBrackets('s = "(["; t = \')\'')).toEqual([]);
  });

  it("anchors an opener left open on an earlier line", () => {
    expect(checkBrackets("int main() {\n  return 0;\n")).toEqual([
      expect.objectContaining({ line: 1, column: 12, char: "{" }),
    ]);
  });
});

describe("quotes", () => {
  it("reports an unterminated quote at its opening column", () => {
    expect(checkQuotes("print('hello)")).toEqual([
      expect.objectContaining({
        line: 1,
        column: 7,
        char: "'",
        rule: "quotes",
        message: "Unterminated quote: single-quoted string opened here is not closed on this line",
      }),
    ]);
  });

  it("honors backslash escapes inside strings", () => {
    expect(checkQuotes("s = 'it\\'s'")).toEqual([]);
    expect(checkQuotes('s = "say \\"hi\\""')).toEqual([]);
  });

  it("lets the other quote kind appear inside a string", () => {
    expect(checkQuotes(`s = "don't"`)).toEqual([]);
  });

  it("does not carry quoted state across lines", () => {
    const issues = checkQuotes('a = "x\nb = 1');
    expect(issues.map((i) => [i.line, i.column])).toEqual([[1, 5]]);
  });
});

describe("lexLine", () => {
  it("marks quoted regions including the quotes", () => {
    const lexed = lexLine('a"b"c', 1);
    expect(lexed.quoted).toEqual([false, true, true, true, false]);
    expect(lexed.openQuote).toBeUndefined();
  });

  it("records a quote still open at the end of the line", () => {
    expect(lexLine("x = 'y", 3).openQuote).toEqual({ char: "'", column: 5 });
  });
});

describe("confusable", () => {
  it("flags a Cyrillic homoglyph", () => {
    expect(checkConfusable("v\u0430r")).toEqual([
      {
        line: 1,
        column: 2,
        char: "\u0430",
        suggestion: "a",
        rule: "confusable",
        message: 'Cyrillic small letter a (U+0430) looks like "a"; use "a" instead',
        codePoint: "U+0430",
      },
    ]);
  });

  it("suggests deleting invisible characters", () => {
    expect(checkConfusable("a\u200Bb")[0]).toMatchObject({
      column: 2,
      suggestion: "",
      message: "Zero-width space (U+200B) is invisible; delete it",
    });
  });

  it("describes look-alike spaces", () => {
    expect(checkConfusable("a\u00A0b")[0]?.message).toBe(
      'No-break space (U+00A0) looks like a plain space; use " " instead'
    );
  });

  it("exposes the lookup table", () => {
    expect(lookupConfusable("\u03BF")).toEqual({ suggestion: "o", name: "Greek small letter omicron" });
    expect(lookupConfusable("o")).toBeUndefined();
  });
});

describe("registry", () => {
  it("is frozen and ordered", () => {
    expect(Object.isFrozen(RULE_REGISTRY)).toBe(true);
    expect(listRuleIds()).toEqual(["full_width", "brackets", "quotes", "confusable"]);
  });

  it("finds rules by id", () => {
    expect(getRuleById("quotes")?.label).toBe("Quote closure");
    expect(getRuleById("assignment_vs_comparison")).toBeUndefined();
  });

  it("keeps every rule total on tiny inputs", () => {
    for (const rule of RULE_REGISTRY) {
      for (const source of ["", "(", "'", "\\", "\n", "\r\n"]) {
        expect(() => rule.check(source)).not.toThrow();
      }
    }
  });
});
