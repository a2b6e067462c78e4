import { RULE_REGISTRY, type RuleRegistry } from "./registry";
import type { AnalysisResult, Issue, RuleDescriptor, RuleId, RuleSelection, RuleSummary } from "./types";

export type { AnalysisResult, Issue, RuleId, RuleSelection, RuleSummary } from "./types";
export { RULE_REGISTRY, getRuleById, listRuleIds } from "./registry";

function selectRules(selection: RuleSelection, registry: RuleRegistry): RuleDescriptor[] {
  if (selection === "all") return [...registry];
  // Unknown ids are dropped so callers can ask for rules this build lacks.
  const wanted = new Set(selection);
  return registry.filter((r) => wanted.has(r.id));
}

export function summarizeIssues(
  issuesByRule: Readonly<Partial<Record<RuleId, number>>>,
  totalIssues: number
): string {
  if (totalIssues === 0) return "No issues found! Code looks good.";
  const parts = [`Found ${totalIssues} issue(s):`];
  for (const [rule, count] of Object.entries(issuesByRule)) {
    if (count) parts.push(`  - ${rule}: ${count} issue(s)`);
  }
  return parts.join("\n");
}

/**
 * Runs the selected lexical rules over `source` and merges their findings,
 * ordered by line, then column, then rule registration order.
 *
 * Advisory only: nothing downstream refuses to run code because of it.
 */
export function analyze(
  source: string,
  rules: RuleSelection = "all",
  registry: RuleRegistry = RULE_REGISTRY
): AnalysisResult {
  const selected = selectRules(rules, registry);
  const rank = new Map<RuleId, number>(registry.map((r, idx) => [r.id, idx]));

  const issues: Issue[] = [];
  const issuesByRule: Partial<Record<RuleId, number>> = {};
  for (const rule of selected) {
    const found = rule.check(source);
    issuesByRule[rule.id] = found.length;
    issues.push(...found);
  }

  issues.sort(
    (a, b) =>
      a.line - b.line ||
      a.column - b.column ||
      (rank.get(a.rule) ?? 0) - (rank.get(b.rule) ?? 0)
  );

  const totalIssues = issues.length;
  return Object.freeze({
    issues: Object.freeze(issues),
    totalIssues,
    clean: totalIssues === 0,
    issuesByRule: Object.freeze(issuesByRule),
    summary: summarizeIssues(issuesByRule, totalIssues),
  });
}

export function listRules(registry: RuleRegistry = RULE_REGISTRY): RuleSummary[] {
  return registry.map((r) => ({
    id: r.id,
    label: r.label,
    description: r.description,
    examples: [...r.examples],
  }));
}

function formatSuggestion(suggestion: string): string {
  if (suggestion === "") return "delete this character";
  return `use '${suggestion}'`;
}

/** Plain-text report for terminals and the formatted endpoint. */
export function formatAnalysis(result: AnalysisResult, registry: RuleRegistry = RULE_REGISTRY): string {
  if (result.clean) return "✓ No issues found! Code looks good.";

  const out = [`⚠ Found ${result.totalIssues} issue(s):`];
  for (const rule of registry) {
    const issues = result.issues.filter((i) => i.rule === rule.id);
    if (issues.length === 0) continue;
    out.push("", `${rule.label.toUpperCase()}:`);
    for (const issue of issues) {
      out.push(`  Line ${issue.line}, Column ${issue.column}: ${issue.message}`);
      if (issue.suggestion !== undefined) {
        out.push(`    → Suggested fix: ${formatSuggestion(issue.suggestion)}`);
      }
    }
  }
  return out.join("\n");
}
