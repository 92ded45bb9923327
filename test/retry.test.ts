import { describe, expect, it, vi } from "vitest";
import { formatRetryError, isTransientReadError, retryAsync } from "../src/lib/retry";
import { LoadError } from "../src/lib/errors";

function makeError(status: number, message: string) {
  return { status, message };
}

describe("retryAsync", () => {
  it("retries transient errors and succeeds", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(makeError(500, "internal error"))
      .mockRejectedValueOnce(makeError(502, "bad gateway"))
      .mockResolvedValueOnce("ok");

    const result = await retryAsync(fn, {
      retries: 3,
      delaysMs: [0, 0, 0],
      shouldRetry: isTransientReadError,
    });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("gives up after the retry budget", async () => {
    const fn = vi.fn().mockRejectedValue(makeError(503, "unavailable"));
    const onRetry = vi.fn();

    await expect(
      retryAsync(fn, { retries: 2, delaysMs: [0], shouldRetry: isTransientReadError, onRetry })
    ).rejects.toEqual(makeError(503, "unavailable"));
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });
});

describe("isTransientReadError", () => {
  it("uses the status when one is present", () => {
    expect(isTransientReadError(new LoadError("admob_network", "read", "boom", 504))).toBe(true);
    expect(isTransientReadError(new LoadError("admob_network", "read", "boom", 400))).toBe(false);
  });

  it("falls back to the message for connection failures", () => {
    expect(isTransientReadError(new Error("TypeError: fetch failed"))).toBe(true);
    expect(isTransientReadError(new Error("read ECONNRESET"))).toBe(true);
    expect(isTransientReadError(new Error("permission denied"))).toBe(false);
    expect(isTransientReadError("nope")).toBe(false);
  });
});

describe("formatRetryError", () => {
  it("joins status and message", () => {
    expect(formatRetryError(makeError(502, "bad gateway"))).toBe("status 502 bad gateway");
    expect(formatRetryError({})).toBe("unknown error");
  });
});
