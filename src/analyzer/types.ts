export type RuleId = "full_width" | "brackets" | "quotes" | "confusable";

/**
 * A single finding. Positions are 1-based and count Unicode code points, so a
 * column stays correct on lines that contain astral-plane characters.
 */
export type Issue = Readonly<{
  line: number;
  column: number;
  char: string;
  message: string;
  rule: RuleId;
  suggestion?: string;
  codePoint?: string;
}>;

export type RuleCheck = (source: string) => Issue[];

export type RuleDescriptor = Readonly<{
  id: RuleId;
  label: string;
  description: string;
  examples: readonly string[];
  check: RuleCheck;
}>;

export type RuleSummary = {
  id: RuleId;
  label: string;
  description: string;
  examples: string[];
};

export type RuleSelection = readonly string[] | "all";

export type AnalysisResult = Readonly<{
  issues: readonly Issue[];
  totalIssues: number;
  clean: boolean;
  issuesByRule: Readonly<Partial<Record<RuleId, number>>>;
  summary: string;
}>;
