import { describe, it, expect } from "vitest";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_RISK_LEVELS, MAX_TIMER_MS, loadRunConfig, resolveRunConfig } from "../src/config/schema.js";
import { ConfigError } from "../src/errors.js";

describe("run config", () => {
  it("fills every default", () => {
    const config = resolveRunConfig();
    expect(config.maxCycles).toBe(50);
    expect(config.maxWallClockMs).toBe(600_000);
    expect(config.timeouts).toEqual({ perceptionMs: 10_000, actionMs: 15_000, confirmationWindowMs: 30_000 });
    expect(config.retryBackoff).toEqual({ initialDelayMs: 500, multiplier: 2, maxDelayMs: 8000 });
    expect(config.maxConsecutiveFailures).toBe(3);
    expect(config.maxSameActionFailures).toBe(2);
    expect(config.historyLimit).toBe(20);
    expect(config.reasoningHistoryWindow).toBe(5);
    expect(config.riskLevels).toEqual(DEFAULT_RISK_LEVELS);
    expect(config.denylist).toContain("sudo");
    expect(config.safeZones).toEqual(["desktop", "documents", "downloads", "pictures"]);
    expect(config.limits).toEqual({});
  });

  it("merges partial nested options with their defaults", () => {
    const config = resolveRunConfig({ timeouts: { actionMs: 5 } });
    expect(config.timeouts).toEqual({ perceptionMs: 10_000, actionMs: 5, confirmationWindowMs: 30_000 });
  });

  it("returns a frozen configuration", () => {
    const config = resolveRunConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.timeouts)).toBe(true);
    expect(Object.isFrozen(config.denylist)).toBe(true);
  });

  it("rejects a risk table missing an action kind", () => {
    const { wait: _wait, ...partial } = DEFAULT_RISK_LEVELS;
    expect(() => resolveRunConfig({ riskLevels: { ...partial, wait: 0 } })).not.toThrow();
    expect(() => resolveRunConfig(JSON.parse(JSON.stringify({ riskLevels: partial })))).toThrow(ConfigError);
  });

  it("rejects unknown action kinds and out-of-range levels", () => {
    const withUnknown = JSON.parse(JSON.stringify({ riskLevels: { ...DEFAULT_RISK_LEVELS, teleport: 0 } }));
    expect(() => resolveRunConfig(withUnknown)).toThrow(ConfigError);

    const outOfRange = JSON.parse(JSON.stringify({ riskLevels: { ...DEFAULT_RISK_LEVELS, click: 5 } }));
    expect(() => resolveRunConfig(outOfRange)).toThrow(/riskLevels\.click/);
  });

  it("joins every issue into the error", () => {
    try {
      resolveRunConfig({ maxCycles: 0, historyLimit: -1 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (!(err instanceof ConfigError)) return;
      expect(err.code).toBe("config_invalid");
      expect(err.issues).toHaveLength(2);
      expect(err.issues[0]).toMatch(/^maxCycles: /);
      expect(err.issues[1]).toMatch(/^historyLimit: /);
    }
  });

  it("accepts timer fields up to the largest delay a timer honours", () => {
    const config = resolveRunConfig({ timeouts: { confirmationWindowMs: MAX_TIMER_MS } });
    expect(config.timeouts.confirmationWindowMs).toBe(2_147_483_647);
  });

  it("rejects timer fields a timer would cut short", () => {
    try {
      resolveRunConfig({
        timeouts: { confirmationWindowMs: 3_000_000_000, actionMs: MAX_TIMER_MS + 1 },
        retryBackoff: { maxDelayMs: 3_000_000_000 },
      });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (!(err instanceof ConfigError)) return;
      expect(err.issues.map((issue) => issue.split(":")[0])).toEqual([
        "timeouts.actionMs",
        "timeouts.confirmationWindowMs",
        "retryBackoff.maxDelayMs",
      ]);
    }
  });

  it("loads a JSON file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "deskpilot-config-"));
    const file = join(dir, "run.json");
    await writeFile(file, JSON.stringify({ maxCycles: 7, denylist: ["secret"] }), "utf8");

    const config = await loadRunConfig(file);
    expect(config.maxCycles).toBe(7);
    expect(config.denylist).toEqual(["secret"]);
  });

  it("reports a file that is not JSON", async () => {
    const dir = await mkdtemp(join(tmpdir(), "deskpilot-config-"));
    const file = join(dir, "broken.json");
    await writeFile(file, "{ maxCycles: ", "utf8");

    await expect(loadRunConfig(file)).rejects.toBeInstanceOf(ConfigError);
  });
});
