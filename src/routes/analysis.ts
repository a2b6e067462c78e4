import { Router } from "express";
import { analyze, formatAnalysis, listRules } from "../analyzer";
import { AnalyzeRequestSchema, describeZodError } from "../contracts/requests";
import { trace } from "../utils/trace";

export const analysisRouter = Router();

analysisRouter.get("/rules", (_req, res) => {
  res.json({ rules: listRules() });
});

analysisRouter.post("/analyze", (req, res) => {
  const parsed = AnalyzeRequestSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    return res.status(400).json({ error: "Invalid request body.", details: describeZodError(parsed.error) });
  }
  const result = analyze(parsed.data.code, parsed.data.rules ?? "all");
  trace("analyze.result", { totalIssues: result.totalIssues, codeLen: parsed.data.code.length });
  return res.json({ success: true, data: result });
});

analysisRouter.post("/analyze/formatted", (req, res) => {
  const parsed = AnalyzeRequestSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    return res.status(400).json({ error: "Invalid request body.", details: describeZodError(parsed.error) });
  }
  const result = analyze(parsed.data.code, parsed.data.rules ?? "all");
  return res.json({ success: true, formatted_output: formatAnalysis(result) });
});
