import { describe, expect, it } from "vitest";
import { runConcurrent } from "../concurrent";
import { concatSuccesses, err, ok, toCatalogResult } from "../result";
import { CatalogError } from "../errors";

const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("runConcurrent", () => {
  it("returns results in task order", async () => {
    const results = await runConcurrent(
      [30, 10, 20].map((ms) => async () => {
        await wait(ms);
        return ms;
      }),
      2
    );
    expect(results).toEqual([ok(30), ok(10), ok(20)]);
  });

  it("keeps a rejected task in its own slot", async () => {
    const failure = new Error("nope");
    const results = await runConcurrent(
      [async () => 1, async () => Promise.reject(failure), async () => 3],
      1
    );
    expect(results).toEqual([ok(1), err(failure), ok(3)]);
  });

  it("never runs more tasks at once than allowed", async () => {
    let active = 0;
    let peak = 0;
    await runConcurrent(
      Array.from({ length: 6 }, () => async () => {
        active++;
        peak = Math.max(peak, active);
        await wait(5);
        active--;
      }),
      2
    );
    expect(peak).toBe(2);
  });

  it("handles an empty task list", async () => {
    await expect(runConcurrent([], 4)).resolves.toEqual([]);
  });
});

describe("result helpers", () => {
  it("wraps unknown rejections in a CatalogError", async () => {
    const result = await toCatalogResult(async () => {
      throw new TypeError("socket hang up");
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(CatalogError);
      expect(result.error.message).toBe("socket hang up");
    }
  });

  it("concatenates successes and reports failures by index", () => {
    const seen: Array<[string, number]> = [];
    const values = concatSuccesses<number, string>(
      [ok([1, 2]), err("down"), ok([3])],
      (error, index) => seen.push([error, index])
    );
    expect(values).toEqual([1, 2, 3]);
    expect(seen).toEqual([["down", 1]]);
  });
});
