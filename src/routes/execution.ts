import { Router, type Response } from "express";
import type { JudgeConfig } from "../config";
import { createExecutionSchemas, describeZodError } from "../contracts/requests";
import { InvalidLanguageError } from "../judge/errors";
import type { ExecutionRunner } from "../judge/runner";

function sendFailure(res: Response, route: string, err: unknown) {
  if (err instanceof InvalidLanguageError) {
    return res.status(400).json({ error: "Invalid language.", language: err.language, supported: err.supported });
  }
  console.error(`Error in ${route}:`, err);
  return res.status(500).json({
    error: `Failed to ${route === "/run" ? "run code" : "run test cases"}.`,
    detail: err instanceof Error ? err.message : String(err),
  });
}

export function createExecutionRouter(runner: ExecutionRunner, config: Pick<JudgeConfig, "maxTimeoutMs">): Router {
  const router = Router();
  const { RunRequestSchema, TestRequestSchema } = createExecutionSchemas(config.maxTimeoutMs);

  router.get("/languages", (_req, res) => {
    res.json({ languages: runner.listLanguages() });
  });

  // Single run: optional stdin, optional expected output.
  router.post("/run", async (req, res) => {
    const parsed = RunRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid request body.", details: describeZodError(parsed.error) });
    }
    const body = parsed.data;
    try {
      const result = await runner.execute({
        source: body.code,
        language: body.language,
        ...(body.stdin !== undefined ? { stdin: body.stdin } : {}),
        ...(typeof body.expected_output === "string" ? { expectedOutput: body.expected_output } : {}),
        ...(body.timeout_ms !== undefined ? { timeoutMs: body.timeout_ms } : {}),
      });
      return res.json({ success: true, data: result });
    } catch (err) {
      return sendFailure(res, "/run", err);
    }
  });

  // Graded batch: one compile, one process per test case.
  router.post("/test", async (req, res) => {
    const parsed = TestRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid request body.", details: describeZodError(parsed.error) });
    }
    const body = parsed.data;

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const result = await runner.executeBatch(
        body.code,
        body.language,
        body.test_cases.map((tc) => ({ stdin: tc.input, expectedOutput: tc.expected_output })),
        {
          signal: controller.signal,
          ...(body.timeout_ms !== undefined ? { timeoutMs: body.timeout_ms } : {}),
        }
      );
      return res.json({ success: true, data: result });
    } catch (err) {
      return sendFailure(res, "/test", err);
    }
  });

  return router;
}
