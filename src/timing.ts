import { ReconnectPolicy } from "./config.js";
import { TimeoutError } from "./errors.js";

const MIN_DELAY_MS = 100;

export class Backoff {
  private delayMs: number;

  constructor(private readonly policy: Pick<ReconnectPolicy, "initialDelayMs" | "factor" | "maxDelayMs">) {
    this.delayMs = policy.initialDelayMs;
  }

  /**
   * Grow the delay by the policy factor up to the ceiling. Time already spent
   * in the failed attempt is deducted.
   */
  next(elapsedMs = 0): number {
    this.delayMs = Math.min(this.policy.maxDelayMs, this.delayMs * this.policy.factor);
    const floor = Math.min(MIN_DELAY_MS, this.policy.initialDelayMs);
    return Math.max(floor, this.delayMs - elapsedMs);
  }

  reset(): void {
    this.delayMs = this.policy.initialDelayMs;
  }
}

/** Resolves true after `ms`, or false as soon as `signal` aborts. */
export function pause(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) {
    return Promise.resolve(false);
  }
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
