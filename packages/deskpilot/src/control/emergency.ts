import type { EventEmitter } from "node:events";
import type { RuntimeLogger } from "../logging/logger.js";

/**
 * Run-scoped cancellation cell. Set at most once and never cleared; every
 * suspension point listens on `signal`.
 */
export class EmergencyStop {
  private readonly controller = new AbortController();
  private triggerReason: string | null = null;
  private triggeredAtMs: number | null = null;

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get triggered(): boolean {
    return this.controller.signal.aborted;
  }

  get reason(): string | null {
    return this.triggerReason;
  }

  get triggeredAt(): number | null {
    return this.triggeredAtMs;
  }

  /** Returns true only for the call that actually set the flag. */
  trigger(reason = "operator"): boolean {
    if (this.controller.signal.aborted) {
      return false;
    }
    this.triggerReason = reason;
    this.triggeredAtMs = Date.now();
    this.controller.abort();
    return true;
  }
}

export interface TriggerSource {
  readonly name: string;
  /** Starts listening; returns the detach function. */
  attach(fire: (reason: string) => void): () => void;
}

export function processSignalSource(
  signals: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"],
): TriggerSource {
  return {
    name: `process:${signals.join(",")}`,
    attach(fire) {
      const handlers = signals.map((signal) => {
        const handler = () => fire(`signal:${signal}`);
        process.once(signal, handler);
        return [signal, handler] as const;
      });
      return () => {
        for (const [signal, handler] of handlers) {
          process.removeListener(signal, handler);
        }
      };
    },
  };
}

/** Listens for `event` on any emitter, e.g. a global hotkey listener. */
export function emitterSource(emitter: EventEmitter, event: string, name = `emitter:${event}`): TriggerSource {
  return {
    name,
    attach(fire) {
      const handler = () => fire(name);
      emitter.on(event, handler);
      return () => {
        emitter.off(event, handler);
      };
    },
  };
}

export class EmergencyMonitor {
  private detachers: Array<() => void> = [];

  constructor(
    private readonly stop: EmergencyStop,
    private readonly sources: readonly TriggerSource[],
    private readonly logger: RuntimeLogger,
  ) {}

  get active(): boolean {
    return this.detachers.length > 0;
  }

  start(): void {
    if (this.active) return;
    this.detachers = this.sources.map((source) =>
      source.attach((reason) => {
        this.trigger(reason);
      }),
    );
  }

  trigger(reason: string): boolean {
    const first = this.stop.trigger(reason);
    if (first) {
      this.logger.warn("Emergency stop triggered", { reason });
    }
    return first;
  }

  dispose(): void {
    for (const detach of this.detachers) {
      detach();
    }
    this.detachers = [];
  }
}
