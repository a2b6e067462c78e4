import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { trace } from "../utils/trace";

export const SCRATCH_PREFIX = "minijudge-";

function removeScratchDir(dir: string): void {
  try {
    rmSync(dir, { recursive: true, force: true });
  } catch (err) {
    console.warn(`Failed to remove scratch dir ${dir}:`, err);
    trace("judge.cleanup_failed", { dir, message: err instanceof Error ? err.message : String(err) });
  }
}

/**
 * Creates a fresh directory owned by one execution attempt and removes it
 * once `fn` settles, whether it returned or threw. Creation failures
 * propagate; removal failures are logged and never replace the result.
 */
export async function withScratchDir<T>(
  fn: (dir: string) => Promise<T>,
  root: string = tmpdir()
): Promise<T> {
  const dir = mkdtempSync(join(root, SCRATCH_PREFIX));
  try {
    return await fn(dir);
  } finally {
    removeScratchDir(dir);
  }
}
