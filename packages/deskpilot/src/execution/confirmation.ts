import type {
  ConfirmationChannel,
  ConfirmationOutcome,
  ConfirmationRequest,
} from "../types/ports.js";

export type ConfirmationListener = (request: ConfirmationRequest) => void;

type Waiter = {
  request: ConfirmationRequest;
  settle: (outcome: ConfirmationOutcome) => void;
};

/**
 * In-process confirmation channel. A request stays open until `respond` is
 * called for its cycle, its window elapses, or the run's stop signal fires.
 */
export class ConfirmationBroker implements ConfirmationChannel {
  private readonly waiters = new Map<string, Waiter>();
  private readonly listeners = new Set<ConfirmationListener>();

  request(
    request: ConfirmationRequest,
    options: { windowMs: number; signal: AbortSignal },
  ): Promise<ConfirmationOutcome> {
    if (options.signal.aborted) {
      return Promise.resolve("cancelled");
    }

    const key = keyOf(request.runId, request.cycle);

    return new Promise<ConfirmationOutcome>((resolve) => {
      const settle = (outcome: ConfirmationOutcome) => {
        if (this.waiters.get(key)?.settle !== settle) return;
        this.waiters.delete(key);
        clearTimeout(timer);
        options.signal.removeEventListener("abort", onAbort);
        resolve(outcome);
      };

      const onAbort = () => settle("cancelled");
      const timer = setTimeout(() => settle("timeout"), options.windowMs);

      this.waiters.get(key)?.settle("cancelled");
      this.waiters.set(key, { request, settle });
      options.signal.addEventListener("abort", onAbort, { once: true });

      for (const listener of this.listeners) {
        listener(request);
      }
    });
  }

  /**
   * Delivers the operator's answer for the pending request of `cycle`.
   * Returns false when nothing is waiting for that cycle.
   */
  respond(cycle: number, approved: boolean, runId?: string): boolean {
    for (const waiter of this.waiters.values()) {
      if (waiter.request.cycle === cycle && (runId === undefined || waiter.request.runId === runId)) {
        waiter.settle(approved ? "approved" : "denied");
        return true;
      }
    }
    return false;
  }

  pending(): ConfirmationRequest[] {
    return [...this.waiters.values()].map((waiter) => waiter.request);
  }

  onRequest(listener: ConfirmationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

function keyOf(runId: string, cycle: number): string {
  return `${runId}:${cycle}`;
}
