import { z } from "zod";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  PORT: positiveInt(8000),
  JUDGE_RUN_TIMEOUT_MS: positiveInt(5000),
  JUDGE_COMPILE_TIMEOUT_MS: positiveInt(10_000),
  JUDGE_MAX_TIMEOUT_MS: positiveInt(30_000),
  JUDGE_OUTPUT_LIMIT_BYTES: positiveInt(64 * 1024),
  JUDGE_BATCH_CONCURRENCY: z.coerce.number().int().positive().max(64).default(4),
  JUDGE_PYTHON_BIN: z.string().trim().min(1).default("python3"),
  JUDGE_GCC_BIN: z.string().trim().min(1).default("gcc"),
  JUDGE_GXX_BIN: z.string().trim().min(1).default("g++"),
  JUDGE_JAVAC_BIN: z.string().trim().min(1).default("javac"),
  JUDGE_JAVA_BIN: z.string().trim().min(1).default("java"),
});

export type ToolchainConfig = {
  python: string;
  gcc: string;
  gxx: string;
  javac: string;
  java: string;
};

export type JudgeConfig = {
  port: number;
  runTimeoutMs: number;
  compileTimeoutMs: number;
  maxTimeoutMs: number;
  outputLimitBytes: number;
  batchConcurrency: number;
  toolchain: ToolchainConfig;
};

export class ConfigError extends Error {
  keys: string[];

  constructor(message: string, keys: string[]) {
    super(message);
    this.name = "ConfigError";
    this.keys = keys;
  }
}

/**
 * Reads judge settings from the environment. Empty strings count as unset so
 * a blank line in `.env` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): JudgeConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === "string" && value.trim() !== "") present[key] = value;
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const keys = Array.from(new Set(parsed.error.issues.map((i) => i.path.join("."))));
    throw new ConfigError(`Invalid environment variables: ${keys.join(", ")}`, keys);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    runTimeoutMs: Math.min(e.JUDGE_RUN_TIMEOUT_MS, e.JUDGE_MAX_TIMEOUT_MS),
    compileTimeoutMs: e.JUDGE_COMPILE_TIMEOUT_MS,
    maxTimeoutMs: e.JUDGE_MAX_TIMEOUT_MS,
    outputLimitBytes: e.JUDGE_OUTPUT_LIMIT_BYTES,
    batchConcurrency: e.JUDGE_BATCH_CONCURRENCY,
    toolchain: {
      python: e.JUDGE_PYTHON_BIN,
      gcc: e.JUDGE_GCC_BIN,
      gxx: e.JUDGE_GXX_BIN,
      javac: e.JUDGE_JAVAC_BIN,
      java: e.JUDGE_JAVA_BIN,
    },
  };
}
