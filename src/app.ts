import { randomUUID } from "crypto";
import cors from "cors";
import express, { type Express } from "express";
import type { JudgeConfig } from "./config";
import type { ExecutionRunner } from "./judge/runner";
import { analysisRouter } from "./routes/analysis";
import { createExecutionRouter } from "./routes/execution";
import { withTraceContext } from "./utils/traceContext";

export const SERVICE_NAME = "Mini Judge API";
export const SERVICE_VERSION = "1.0.0";

export function createApp(deps: { runner: ExecutionRunner; config: Pick<JudgeConfig, "maxTimeoutMs"> }): Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  app.use((req, _res, next) => {
    const header = req.header("x-request-id");
    const requestId = header && header.length <= 128 ? header : randomUUID();
    withTraceContext({ requestId }, async () => next()).catch(next);
  });

  app.get("/", (_req, res) => {
    res.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: {
        analyze: "/analyze - Analyze code for lexical issues",
        analyzeFormatted: "/analyze/formatted - Analysis as a plain-text report",
        run: "/run - Execute code",
        test: "/test - Run multiple test cases",
        rules: "/rules - List available rules",
        languages: "/languages - List supported languages",
      },
    });
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy" });
  });

  app.use(analysisRouter);
  app.use(createExecutionRouter(deps.runner, deps.config));

  return app;
}
