import { describe, expect, it, vi } from "vitest";
import { retry } from "../../src/utils/retry";

const noSleep = () => Promise.resolve();

describe("retry.ts", () => {
  it("returns the first successful result", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValueOnce("ok");

    await expect(retry(fn, { sleep: noSleep })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("rethrows the last error after the final attempt", async () => {
    const onError = vi.fn();
    let call = 0;
    const fn = () => Promise.reject(new Error(`fail ${++call}`));

    await expect(retry(fn, { attempts: 3, sleep: noSleep, onError })).rejects.toThrow("fail 3");
    expect(onError).toHaveBeenCalledTimes(3);
    expect(onError).toHaveBeenLastCalledWith(expect.any(Error), 3);
  });

  it("backs off within an exponentially growing window", async () => {
    const sleep = vi.fn((_ms: number) => Promise.resolve());
    const fn = () => Promise.reject(new Error("down"));

    await expect(retry(fn, { attempts: 4, baseDelayMs: 100, sleep })).rejects.toThrow("down");

    const waits = sleep.mock.calls.map(([ms]) => ms);
    expect(waits).toHaveLength(3);
    [100, 200, 400].forEach((max, i) => {
      expect(waits[i]).toBeGreaterThanOrEqual(0);
      expect(waits[i]).toBeLessThan(max);
    });
  });

  it("always makes at least one attempt", async () => {
    const fn = vi.fn(() => Promise.resolve(1));
    await expect(retry(fn, { attempts: 0 })).resolves.toBe(1);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
