import { spawn, type ChildProcess } from "child_process";
import { performance } from "perf_hooks";
import { trace } from "../utils/trace";

export type ProcessSpec = {
  /** argv[0] is the executable; no shell is involved. */
  argv: readonly string[];
  cwd: string;
  stdin?: string;
  timeoutMs: number;
  outputLimitBytes: number;
  signal?: AbortSignal;
};

export type ProcessOutcome = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  stdoutTruncated: boolean;
  stderrTruncated: boolean;
  timedOut: boolean;
  aborted: boolean;
  spawnError?: string;
  elapsedMs: number;
};

export type ProcessLauncher = (spec: ProcessSpec) => Promise<ProcessOutcome>;

// Length of `buf` without a trailing UTF-8 sequence that the cap cut short.
function completeUtf8Length(buf: Buffer): number {
  let start = buf.length - 1;
  while (start > 0 && buf.length - start < 4 && ((buf[start] ?? 0) & 0xc0) === 0x80) start -= 1;
  if (start < 0) return 0;
  const lead = buf[start] ?? 0;
  const width = lead >= 0xf0 ? 4 : lead >= 0xe0 ? 3 : lead >= 0xc0 ? 2 : 1;
  return start + width > buf.length ? start : buf.length;
}

class OutputCollector {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (chunk.length > room) {
      this.truncated = true;
      if (room <= 0) return;
      this.chunks.push(chunk.subarray(0, room));
      this.size += room;
      return;
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  text(): string {
    const buf = Buffer.concat(this.chunks);
    return (this.truncated ? buf.subarray(0, completeUtf8Length(buf)) : buf).toString("utf8");
  }
}

// Children are spawned detached, so on POSIX each one leads its own process
// group and a negative pid reaches everything it forked.
const USE_PROCESS_GROUPS = process.platform !== "win32";

function killProcessTree(child: ChildProcess): void {
  const pid = child.pid;
  if (pid === undefined) return;
  try {
    if (USE_PROCESS_GROUPS) {
      process.kill(-pid, "SIGKILL");
    } else {
      child.kill("SIGKILL");
    }
  } catch (err) {
    // ESRCH: the group is already gone.
    trace("judge.kill_failed", { pid, message: err instanceof Error ? err.message : String(err) });
    child.kill("SIGKILL");
  }
}

export function runProcess(spec: ProcessSpec): Promise<ProcessOutcome> {
  return new Promise((resolve) => {
    const start = performance.now();
    const stdout = new OutputCollector(spec.outputLimitBytes);
    const stderr = new OutputCollector(spec.outputLimitBytes);
    let timedOut = false;
    let aborted = false;
    let settled = false;

    const settle = (exitCode: number | null, signal: NodeJS.Signals | null, spawnError?: string) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      spec.signal?.removeEventListener("abort", onAbort);
      resolve({
        exitCode,
        signal,
        stdout: stdout.text(),
        stderr: stderr.text(),
        stdoutTruncated: stdout.truncated,
        stderrTruncated: stderr.truncated,
        timedOut,
        aborted,
        ...(spawnError !== undefined ? { spawnError } : {}),
        elapsedMs: Math.round(performance.now() - start),
      });
    };

    const [command, ...args] = spec.argv;
    let child: ChildProcess | null = null;
    const onAbort = () => {
      aborted = true;
      if (child) killProcessTree(child);
    };
    const timer = setTimeout(() => {
      timedOut = true;
      if (child) killProcessTree(child);
    }, spec.timeoutMs);

    if (!command) {
      settle(null, null, "empty command");
      return;
    }

    try {
      child = spawn(command, args, {
        cwd: spec.cwd,
        stdio: ["pipe", "pipe", "pipe"],
        detached: USE_PROCESS_GROUPS,
        windowsHide: true,
      });
    } catch (err) {
      settle(null, null, err instanceof Error ? err.message : String(err));
      return;
    }

    if (spec.signal) {
      if (spec.signal.aborted) onAbort();
      else spec.signal.addEventListener("abort", onAbort, { once: true });
    }

    child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.on("error", (err) => settle(null, null, err.message));
    child.on("close", (code, signal) => settle(code, signal));

    // EPIPE here only means the program exited without draining its input.
    child.stdin?.on("error", (err) => trace("judge.stdin_error", { message: err.message }));
    child.stdin?.end(spec.stdin ?? "");
  });
}
