import { describe, it, expect } from "vitest";
import { EventEmitter } from "node:events";
import { EmergencyMonitor, EmergencyStop, emitterSource, type TriggerSource } from "../src/control/emergency.js";
import { silentLogger } from "./fakes.js";

describe("emergency stop", () => {
  it("is set once and never cleared", () => {
    const stop = new EmergencyStop();
    expect(stop.triggered).toBe(false);

    expect(stop.trigger("hotkey")).toBe(true);
    expect(stop.trigger("operator")).toBe(false);

    expect(stop.triggered).toBe(true);
    expect(stop.reason).toBe("hotkey");
    expect(stop.signal.aborted).toBe(true);
    expect(stop.triggeredAt).not.toBeNull();
  });

  it("fires from an attached emitter source", () => {
    const hotkeys = new EventEmitter();
    const stop = new EmergencyStop();
    const monitor = new EmergencyMonitor(stop, [emitterSource(hotkeys, "panic")], silentLogger);

    monitor.start();
    expect(monitor.active).toBe(true);
    hotkeys.emit("panic");

    expect(stop.triggered).toBe(true);
    expect(stop.reason).toBe("emitter:panic");
  });

  it("detaches every source on dispose", () => {
    const hotkeys = new EventEmitter();
    const stop = new EmergencyStop();
    const monitor = new EmergencyMonitor(stop, [emitterSource(hotkeys, "panic", "hotkey")], silentLogger);

    monitor.start();
    expect(hotkeys.listenerCount("panic")).toBe(1);
    monitor.dispose();

    expect(monitor.active).toBe(false);
    expect(hotkeys.listenerCount("panic")).toBe(0);
    hotkeys.emit("panic");
    expect(stop.triggered).toBe(false);
  });

  it("attaches sources only once", () => {
    let attached = 0;
    const source: TriggerSource = {
      name: "counter",
      attach() {
        attached += 1;
        return () => {};
      },
    };
    const monitor = new EmergencyMonitor(new EmergencyStop(), [source], silentLogger);

    monitor.start();
    monitor.start();
    expect(attached).toBe(1);
  });

  it("reports whether a manual trigger was the first", () => {
    const monitor = new EmergencyMonitor(new EmergencyStop(), [], silentLogger);
    expect(monitor.trigger("operator")).toBe(true);
    expect(monitor.trigger("operator")).toBe(false);
  });
});
