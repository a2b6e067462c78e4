import { checkBrackets } from "./rules/brackets";
import { checkConfusable } from "./rules/confusable";
import { checkFullWidth } from "./rules/fullWidth";
import { checkQuotes } from "./rules/quotes";
import type { RuleDescriptor, RuleId } from "./types";

export type RuleRegistry = readonly RuleDescriptor[];

function defineRules(rules: RuleDescriptor[]): RuleRegistry {
  const seen = new Set<string>();
  for (const rule of rules) {
    if (seen.has(rule.id)) throw new Error(`Duplicate rule id "${rule.id}".`);
    seen.add(rule.id);
  }
  return Object.freeze(rules.map((r) => Object.freeze({ ...r, examples: Object.freeze([...r.examples]) })));
}

// Registration order doubles as the tie-breaker when two issues share a position.
export const RULE_REGISTRY: RuleRegistry = defineRules([
  {
    id: "full_width",
    label: "Full-width symbols",
    description: "Detects full-width or CJK punctuation that should be its ASCII counterpart",
    examples: ["（", "）", "；", "，"],
    check: checkFullWidth,
  },
  {
    id: "brackets",
    label: "Bracket pairing",
    description: "Detects unmatched or mismatched (), [] and {} outside string literals",
    examples: ["Unclosed (", "Mismatched [}"],
    check: checkBrackets,
  },
  {
    id: "quotes",
    label: "Quote closure",
    description: "Detects single or double quotes left open at the end of a line",
    examples: ["Unclosed '", 'Unclosed "'],
    check: checkQuotes,
  },
  {
    id: "confusable",
    label: "Confusable characters",
    description: "Detects look-alike characters from other scripts and invisible characters",
    examples: ["Cyrillic а vs Latin a", "Greek ο vs Latin o", "Zero-width space"],
    check: checkConfusable,
  },
]);

export function getRuleById(id: string, registry: RuleRegistry = RULE_REGISTRY): RuleDescriptor | undefined {
  return registry.find((r) => r.id === id);
}

export function listRuleIds(registry: RuleRegistry = RULE_REGISTRY): RuleId[] {
  return registry.map((r) => r.id);
}
