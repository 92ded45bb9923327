export type RetryOptions = {
  retries: number;
  delaysMs: number[];
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; error: unknown; delayMs: number }) => void;
};

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function retryAsync<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { retries, delaysMs, shouldRetry, onRetry } = options;
  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (err) {
      attempt += 1;
      const canRetry = attempt <= retries && shouldRetry(err);
      if (!canRetry) throw err;
      const delayMs = delaysMs[Math.min(attempt - 1, delaysMs.length - 1)] ?? 0;
      if (onRetry) onRetry({ attempt, error: err, delayMs });
      if (delayMs > 0) await sleep(delayMs);
    }
  }
}

type ErrorLike = { status?: number; message?: string };

function asErrorLike(err: unknown): ErrorLike | null {
  if (!err || typeof err !== "object") return null;
  const candidate: ErrorLike = {};
  if ("status" in err && typeof err.status === "number") candidate.status = err.status;
  if ("message" in err && typeof err.message === "string") candidate.message = err.message;
  return candidate;
}

/** True for 5xx responses and, when no status came back, connection-level failures. */
export function isTransientReadError(err: unknown): boolean {
  const errLike = asErrorLike(err);
  if (!errLike) return false;
  if (errLike.status) return errLike.status >= 500;
  const msg = (errLike.message ?? "").toLowerCase();
  if (msg.includes("timeout")) return true;
  if (msg.includes("timed out")) return true;
  if (msg.includes("network")) return true;
  if (msg.includes("fetch failed")) return true;
  if (msg.includes("econnreset") || msg.includes("econnrefused")) return true;
  return false;
}

export function formatRetryError(err: unknown): string {
  const errLike = asErrorLike(err);
  if (!errLike) return String(err);
  const status = errLike.status ? `status ${errLike.status}` : "";
  const message = errLike.message ?? "";
  return [status, message].filter(Boolean).join(" ").trim() || "unknown error";
}
