import { existsSync, writeFileSync } from "fs";
import { basename, join } from "path";
import type { JudgeConfig } from "../config";
import {
  LANGUAGE_PROFILES,
  buildLanguageProfiles,
  getLanguageProfile,
  listLanguages,
  resolveTemplate,
} from "../languages/profiles";
import type { LanguageId, LanguageProfile, LanguageProfileTable, TemplateVars } from "../languages/types";
import { mapWithConcurrency } from "../utils/concurrency";
import { trace, traceText } from "../utils/trace";
import { compareOutput, type OutputComparison } from "./compare";
import { runProcess, type ProcessLauncher, type ProcessOutcome } from "./exec";
import { withScratchDir } from "./scratch";

export type ExecutionStatus = "completed" | "failed" | "timed_out" | "cancelled";
export type ExecutionStage = "compile" | "run";

export type ExecutionRequest = {
  source: string;
  language: string;
  stdin?: string;
  expectedOutput?: string;
  timeoutMs?: number;
};

export type ExecutionResult = {
  status: ExecutionStatus;
  stage: ExecutionStage;
  exitCode: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
  elapsedMs: number;
  /** null when the request carried no expected output. */
  matched: boolean | null;
  stdoutTruncated: boolean;
  stderrTruncated: boolean;
  comparison?: OutputComparison;
};

export type TestCase = {
  stdin?: string;
  expectedOutput?: string;
};

export type BatchResult = {
  results: ExecutionResult[];
  passed: number;
  total: number;
};

export type BatchOptions = {
  timeoutMs?: number;
  /** Aborting stops new cases from starting and kills the ones in flight. */
  signal?: AbortSignal;
};

export type RunnerOptions = {
  profiles?: LanguageProfileTable;
  runTimeoutMs?: number;
  compileTimeoutMs?: number;
  maxTimeoutMs?: number;
  outputLimitBytes?: number;
  batchConcurrency?: number;
  scratchRoot?: string;
  launcher?: ProcessLauncher;
};

type Build =
  | { kind: "ready"; vars: TemplateVars }
  | { kind: "failed"; result: ExecutionResult };

function appendLine(text: string, line: string): string {
  if (!text) return line;
  return text.endsWith("\n") ? `${text}${line}` : `${text}\n${line}`;
}

function expectationOf(testCase: TestCase): boolean | null {
  return testCase.expectedOutput === undefined ? null : false;
}

function cancelledResult(testCase: TestCase): ExecutionResult {
  return {
    status: "cancelled",
    stage: "run",
    exitCode: null,
    signal: null,
    stdout: "",
    stderr: "",
    elapsedMs: 0,
    matched: expectationOf(testCase),
    stdoutTruncated: false,
    stderrTruncated: false,
  };
}

function runStatus(outcome: ProcessOutcome): ExecutionStatus {
  if (outcome.aborted) return "cancelled";
  if (outcome.timedOut) return "timed_out";
  if (outcome.spawnError !== undefined) return "failed";
  return "completed";
}

export class ExecutionRunner {
  private readonly profiles: LanguageProfileTable;
  private readonly runTimeoutMs: number;
  private readonly compileTimeoutMs: number;
  private readonly maxTimeoutMs: number;
  private readonly outputLimitBytes: number;
  private readonly batchConcurrency: number;
  private readonly scratchRoot: string | undefined;
  private readonly launcher: ProcessLauncher;

  constructor(options: RunnerOptions = {}) {
    this.profiles = options.profiles ?? LANGUAGE_PROFILES;
    this.maxTimeoutMs = options.maxTimeoutMs ?? 30_000;
    this.runTimeoutMs = Math.min(options.runTimeoutMs ?? 5000, this.maxTimeoutMs);
    this.compileTimeoutMs = options.compileTimeoutMs ?? 10_000;
    this.outputLimitBytes = options.outputLimitBytes ?? 64 * 1024;
    this.batchConcurrency = options.batchConcurrency ?? 4;
    this.scratchRoot = options.scratchRoot;
    this.launcher = options.launcher ?? runProcess;
  }

  listLanguages(): LanguageId[] {
    return listLanguages(this.profiles);
  }

  /** Request deadline, falling back to the default and clamped to [1, max]. */
  resolveTimeout(requested?: number): number {
    const ms = requested ?? this.runTimeoutMs;
    if (!Number.isFinite(ms)) return this.runTimeoutMs;
    return Math.min(Math.max(1, Math.floor(ms)), this.maxTimeoutMs);
  }

  /**
   * Materializes, compiles when the language needs it, runs once and grades.
   * Throws InvalidLanguageError before touching the filesystem.
   */
  async execute(request: ExecutionRequest): Promise<ExecutionResult> {
    const profile = getLanguageProfile(request.language, this.profiles);
    const timeoutMs = this.resolveTimeout(request.timeoutMs);
    const testCase: TestCase = {
      ...(request.stdin !== undefined ? { stdin: request.stdin } : {}),
      ...(request.expectedOutput !== undefined ? { expectedOutput: request.expectedOutput } : {}),
    };

    return this.withScratch(async (dir) => {
      const build = await this.build(dir, profile, request.source);
      if (build.kind === "failed") return this.forCase(build.result, testCase);
      return this.runCase(profile, build.vars, testCase, timeoutMs);
    });
  }

  /**
   * Compiles once, then runs every case against the same artifact with up to
   * `batchConcurrency` processes at a time. Results follow input order.
   */
  async executeBatch(
    source: string,
    language: string,
    cases: readonly TestCase[],
    options: BatchOptions = {}
  ): Promise<BatchResult> {
    const profile = getLanguageProfile(language, this.profiles);
    const timeoutMs = this.resolveTimeout(options.timeoutMs);
    const signal = options.signal;

    const results = await this.withScratch(async (dir) => {
      const build = await this.build(dir, profile, source, signal);
      if (build.kind === "failed") {
        const failed = build.result;
        return cases.map((c) => this.forCase(failed, c));
      }
      return mapWithConcurrency(cases, this.batchConcurrency, async (testCase) => {
        if (signal?.aborted) return cancelledResult(testCase);
        return this.runCase(profile, build.vars, testCase, timeoutMs, signal);
      });
    });

    const passed = results.filter((r) => r.status === "completed" && r.matched === true).length;
    trace("judge.batch", { language, total: results.length, passed });
    return { results, passed, total: results.length };
  }

  private withScratch<T>(fn: (dir: string) => Promise<T>): Promise<T> {
    return this.scratchRoot === undefined ? withScratchDir(fn) : withScratchDir(fn, this.scratchRoot);
  }

  private forCase(result: ExecutionResult, testCase: TestCase): ExecutionResult {
    return { ...result, matched: expectationOf(testCase) };
  }

  private async build(
    dir: string,
    profile: LanguageProfile,
    source: string,
    signal?: AbortSignal
  ): Promise<Build> {
    const entry = profile.entryName(source);
    const sourcePath = join(dir, `${entry}${profile.extension}`);
    writeFileSync(sourcePath, source, "utf8");

    const artifactName = (profile.artifact ?? `{entry}${profile.extension}`).replace("{entry}", entry);
    const vars: TemplateVars = { source: sourcePath, artifact: join(dir, artifactName), dir, entry };
    trace("judge.materialized", { language: profile.language, file: basename(sourcePath) });

    if (!profile.compile) return { kind: "ready", vars };

    const outcome = await this.launcher({
      argv: resolveTemplate(profile.compile, vars),
      cwd: dir,
      timeoutMs: this.compileTimeoutMs,
      outputLimitBytes: this.outputLimitBytes,
      ...(signal ? { signal } : {}),
    });
    trace("judge.compile", {
      language: profile.language,
      exitCode: outcome.exitCode,
      timedOut: outcome.timedOut,
      elapsedMs: outcome.elapsedMs,
    });

    let stderr = outcome.stderr;
    if (outcome.aborted) {
      stderr = appendLine(stderr, "Compilation cancelled");
    } else if (outcome.spawnError !== undefined) {
      stderr = appendLine(stderr, `Failed to start compiler: ${outcome.spawnError}`);
    } else if (outcome.timedOut) {
      stderr = appendLine(stderr, `Compilation timed out after ${this.compileTimeoutMs} ms`);
    } else if (outcome.exitCode === 0 && !existsSync(vars.artifact)) {
      stderr = appendLine(stderr, `Compiler exited cleanly but produced no "${artifactName}"`);
    } else if (outcome.exitCode === 0) {
      return { kind: "ready", vars };
    }

    traceText("judge.compile_stderr", stderr, { extra: { language: profile.language } });
    return {
      kind: "failed",
      result: {
        status: outcome.aborted ? "cancelled" : "failed",
        stage: "compile",
        exitCode: outcome.exitCode,
        signal: outcome.signal,
        stdout: outcome.stdout,
        stderr,
        elapsedMs: outcome.elapsedMs,
        matched: null,
        stdoutTruncated: outcome.stdoutTruncated,
        stderrTruncated: outcome.stderrTruncated,
      },
    };
  }

  private async runCase(
    profile: LanguageProfile,
    vars: TemplateVars,
    testCase: TestCase,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<ExecutionResult> {
    const outcome = await this.launcher({
      argv: resolveTemplate(profile.run, vars),
      cwd: vars.dir,
      stdin: testCase.stdin ?? "",
      timeoutMs,
      outputLimitBytes: this.outputLimitBytes,
      ...(signal ? { signal } : {}),
    });

    const status = runStatus(outcome);
    trace("judge.run", {
      language: profile.language,
      status,
      exitCode: outcome.exitCode,
      elapsedMs: outcome.elapsedMs,
      stdoutLen: outcome.stdout.length,
      stderrLen: outcome.stderr.length,
    });

    const stderr =
      outcome.spawnError !== undefined
        ? appendLine(outcome.stderr, `Failed to start program: ${outcome.spawnError}`)
        : outcome.stderr;

    const result: ExecutionResult = {
      status,
      stage: "run",
      exitCode: outcome.exitCode,
      signal: outcome.signal,
      stdout: outcome.stdout,
      stderr,
      elapsedMs: outcome.elapsedMs,
      matched: expectationOf(testCase),
      stdoutTruncated: outcome.stdoutTruncated,
      stderrTruncated: outcome.stderrTruncated,
    };

    if (status === "completed" && testCase.expectedOutput !== undefined) {
      const comparison = compareOutput(outcome.stdout, testCase.expectedOutput);
      // Output past the cap was never compared, so a matching prefix is not a pass.
      const matched = comparison.matched && !outcome.stdoutTruncated;
      return { ...result, matched, comparison };
    }
    return result;
  }
}

export function createExecutionRunner(
  config: JudgeConfig,
  overrides: Omit<RunnerOptions, "profiles"> = {}
): ExecutionRunner {
  return new ExecutionRunner({
    profiles: buildLanguageProfiles(config.toolchain),
    runTimeoutMs: config.runTimeoutMs,
    compileTimeoutMs: config.compileTimeoutMs,
    maxTimeoutMs: config.maxTimeoutMs,
    outputLimitBytes: config.outputLimitBytes,
    batchConcurrency: config.batchConcurrency,
    ...overrides,
  });
}
