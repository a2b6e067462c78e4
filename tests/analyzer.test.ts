import { describe, expect, it } from "vitest";
import { analyze, formatAnalysis, listRules, summarizeIssues } from "../src/analyzer";

describe("analyze", () => {
  it("reports a full-width comma with its ASCII counterpart", () => {
    const result = analyze("a，b");

    expect(result.totalIssues).toBe(1);
    expect(result.clean).toBe(false);
    expect(result.issues[0]).toEqual({
      line: 1,
      column: 2,
      char: "，",
      suggestion: ",",
      rule: "full_width",
      message: 'Full-width symbol "，" (U+FF0C) found; use "," instead',
      codePoint: "U+FF0C",
    });
  });

  it("treats empty and whitespace-only input as clean", () => {
    for (const source of ["", " ", "\n\n", "x"]) {
      const result = analyze(source);
      expect(result.clean).toBe(true);
      expect(result.issues).toEqual([]);
      expect(result.summary).toBe("No issues found! Code looks good.");
    }
  });

  it("orders issues by line, column, then rule registration", () => {
    const result = analyze("print('hello)\nx = 1，");

    expect(result.issues.map((i) => [i.line, i.column, i.rule])).toEqual([
      [1, 6, "brackets"],
      [1, 7, "quotes"],
      [2, 6, "full_width"],
    ]);
  });

  it("runs only the selected rules and ignores unknown ids", () => {
    const result = analyze("print('hello)", ["quotes", "no_such_rule", "quotes"]);

    expect(result.totalIssues).toBe(1);
    expect(result.issues[0]).toMatchObject({ line: 1, column: 7, rule: "quotes" });
    expect(result.issuesByRule).toEqual({ quotes: 1 });
  });

  it("runs nothing for an empty selection", () => {
    const result = analyze("((", []);
    expect(result.clean).toBe(true);
    expect(result.issuesByRule).toEqual({});
  });

  it("counts issues per executed rule and summarizes them", () => {
    const result = analyze("a，b(");

    expect(result.issuesByRule).toEqual({ full_width: 1, brackets: 1, quotes: 0, confusable: 0 });
    expect(result.summary).toBe("Found 2 issue(s):\n  - full_width: 1 issue(s)\n  - brackets: 1 issue(s)");
  });

  it("is deterministic", () => {
    const source = "if (x）{\n  s = 'open\n  v\u0430r = 1\n}";
    expect(analyze(source)).toEqual(analyze(source));
  });

  it("freezes the result and its issues", () => {
    const result = analyze("a，b");
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.issues)).toBe(true);
    expect(Object.isFrozen(result.issues[0])).toBe(true);
  });

  it("counts columns in code points and ignores CRLF line endings", () => {
    const result = analyze("😀，\r\n；");

    expect(result.issues.map((i) => [i.line, i.column, i.suggestion])).toEqual([
      [1, 2, ","],
      [2, 1, ";"],
    ]);
  });
});

describe("summarizeIssues", () => {
  it("skips rules without findings", () => {
    expect(summarizeIssues({ quotes: 0, confusable: 3 }, 3)).toBe("Found 3 issue(s):\n  - confusable: 3 issue(s)");
  });
});

describe("listRules", () => {
  it("lists every rule in registration order", () => {
    const rules = listRules();
    expect(rules.map((r) => r.id)).toEqual(["full_width", "brackets", "quotes", "confusable"]);
    expect(rules[0]).toMatchObject({ label: "Full-width symbols", examples: ["（", "）", "；", "，"] });
  });
});

describe("formatAnalysis", () => {
  it("renders the clean verdict", () => {
    expect(formatAnalysis(analyze("print(1)"))).toBe("✓ No issues found! Code looks good.");
  });

  it("groups findings by rule with suggested fixes", () => {
    expect(formatAnalysis(analyze("a，b("))).toBe(
      [
        "⚠ Found 2 issue(s):",
        "",
        "FULL-WIDTH SYMBOLS:",
        '  Line 1, Column 2: Full-width symbol "，" (U+FF0C) found; use "," instead',
        "    → Suggested fix: use ','",
        "",
        "BRACKET PAIRING:",
        '  Line 1, Column 4: Unmatched opening bracket "("',
      ].join("\n")
    );
  });

  it("asks to delete invisible characters", () => {
    const report = formatAnalysis(analyze("a\u200Bb"));
    expect(report.split("\n").slice(-2)).toEqual([
      "  Line 1, Column 2: Zero-width space (U+200B) is invisible; delete it",
      "    → Suggested fix: delete this character",
    ]);
  });
});
