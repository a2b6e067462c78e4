export { analyze, formatAnalysis, listRules, summarizeIssues, RULE_REGISTRY } from "./analyzer";
export type { AnalysisResult, Issue, RuleId, RuleSelection, RuleSummary } from "./analyzer";
export { ConfigError, loadConfig } from "./config";
export type { JudgeConfig, ToolchainConfig } from "./config";
export { compareOutput, normalizeOutput } from "./judge/compare";
export type { LineDifference, OutputComparison } from "./judge/compare";
export { InvalidLanguageError } from "./judge/errors";
export { ExecutionRunner, createExecutionRunner } from "./judge/runner";
export type {
  BatchOptions,
  BatchResult,
  ExecutionRequest,
  ExecutionResult,
  ExecutionStage,
  ExecutionStatus,
  RunnerOptions,
  TestCase,
} from "./judge/runner";
export {
  LANGUAGE_PROFILES,
  buildLanguageProfiles,
  getLanguageProfile,
  isSupportedLanguage,
  listLanguages,
} from "./languages/profiles";
export type { LanguageId, LanguageProfile, LanguageProfileTable } from "./languages/types";
export { createApp } from "./app";
