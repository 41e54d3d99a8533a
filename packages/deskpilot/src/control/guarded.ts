import type { CallOptions } from "../types/ports.js";

export type Guarded<T> =
  | { status: "ok"; value: T; durationMs: number }
  | { status: "timeout"; durationMs: number }
  | { status: "cancelled"; durationMs: number }
  | { status: "error"; error: unknown; durationMs: number };

export type GuardOptions = {
  timeoutMs: number;
  /** Run-wide stop signal; aborting it unwinds the call immediately. */
  stop: AbortSignal;
};

export type BackoffPolicy = {
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
};

/**
 * Runs one collaborator call under a deadline and the run's stop signal.
 * Never rejects. When the deadline or the stop signal fires first, the call's
 * own signal is aborted and its eventual result is ignored.
 */
export function runGuarded<T>(
  task: (options: CallOptions) => Promise<T>,
  options: GuardOptions,
): Promise<Guarded<T>> {
  const startedAt = Date.now();
  const elapsed = () => Date.now() - startedAt;

  if (options.stop.aborted) {
    return Promise.resolve({ status: "cancelled", durationMs: 0 });
  }

  const controller = new AbortController();

  return new Promise<Guarded<T>>((resolve) => {
    let settled = false;

    const finish = (outcome: Guarded<T>) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      options.stop.removeEventListener("abort", onStop);
      resolve(outcome);
    };

    const onStop = () => {
      finish({ status: "cancelled", durationMs: elapsed() });
      controller.abort();
    };

    const timer = setTimeout(() => {
      finish({ status: "timeout", durationMs: elapsed() });
      controller.abort();
    }, options.timeoutMs);

    options.stop.addEventListener("abort", onStop, { once: true });

    let pending: Promise<T>;
    try {
      pending = task({ timeoutMs: options.timeoutMs, signal: controller.signal });
    } catch (error) {
      finish({ status: "error", error, durationMs: elapsed() });
      return;
    }

    pending.then(
      (value) => finish({ status: "ok", value, durationMs: elapsed() }),
      (error: unknown) => finish({ status: "error", error, durationMs: elapsed() }),
    );
  });
}

/** Resolves true after `ms`, or false as soon as the signal aborts. */
export function sleepWithSignal(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) {
    return Promise.resolve(false);
  }
  if (ms <= 0) {
    return Promise.resolve(true);
  }

  return new Promise((resolve) => {
    const timeout = setTimeout(() => {
      cleanup();
      resolve(true);
    }, ms);

    const cleanup = () => {
      clearTimeout(timeout);
      signal.removeEventListener("abort", onAbort);
    };

    const onAbort = () => {
      cleanup();
      resolve(false);
    };

    signal.addEventListener("abort", onAbort, { once: true });
  });
}

export function backoffDelayMs(policy: BackoffPolicy, attempt: number): number {
  const delay = policy.initialDelayMs * policy.multiplier ** Math.max(0, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}
