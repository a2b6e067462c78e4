import { describe, expect, it } from "vitest";
import { mapWithConcurrency } from "../src/utils/concurrency";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("mapWithConcurrency", () => {
  it("keeps input order regardless of completion order", async () => {
    const results = await mapWithConcurrency([40, 5, 20, 0], 4, async (ms, index) => {
      await sleep(ms);
      return `${index}:${ms}`;
    });
    expect(results).toEqual(["0:40", "1:5", "2:20", "3:0"]);
  });

  it("never exceeds the limit", async () => {
    let inFlight = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await sleep(5);
      inFlight -= 1;
    });
    expect(peak).toBe(2);
  });

  it("stops starting work after a failure and rethrows it", async () => {
    const started: number[] = [];
    await expect(
      mapWithConcurrency([1, 2, 3], 1, async (n) => {
        started.push(n);
        if (n === 2) throw new Error("boom");
        return n;
      })
    ).rejects.toThrow("boom");
    expect(started).toEqual([1, 2]);
  });

  it("handles an empty list", async () => {
    await expect(mapWithConcurrency([], 3, async (n: number) => n)).resolves.toEqual([]);
  });
});
