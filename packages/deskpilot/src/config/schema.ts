import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import { deepFreeze } from "../utils/freeze.js";
import type { ActionKind } from "../types/action.js";
import type { RiskLevel } from "../types/policy.js";

export const RiskLevelSchema = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]);

/** Every action kind must carry a level; unknown kinds are rejected. */
export const RiskTableSchema = z
  .object({
    pointer_move: RiskLevelSchema,
    click: RiskLevelSchema,
    double_click: RiskLevelSchema,
    right_click: RiskLevelSchema,
    scroll: RiskLevelSchema,
    drag: RiskLevelSchema,
    key_press: RiskLevelSchema,
    text_entry: RiskLevelSchema,
    password_entry: RiskLevelSchema,
    app_launch: RiskLevelSchema,
    file_operation: RiskLevelSchema,
    system_command: RiskLevelSchema,
    wait: RiskLevelSchema,
  })
  .strict();

export const DEFAULT_RISK_LEVELS = {
  pointer_move: 0,
  click: 0,
  double_click: 0,
  right_click: 0,
  scroll: 0,
  wait: 0,
  drag: 1,
  key_press: 1,
  text_entry: 1,
  app_launch: 2,
  file_operation: 3,
  system_command: 3,
  password_entry: 3,
} as const satisfies Record<ActionKind, RiskLevel>;

export const DEFAULT_DENYLIST = [
  "password",
  "credit card",
  "sudo",
  "admin",
  "system32",
  "registry",
  "rm -rf",
  "del /f",
  "format c:",
] as const;

export const DEFAULT_SAFE_ZONES = ["desktop", "documents", "downloads", "pictures"] as const;

/** Largest delay a Node timer honours; longer ones fire almost at once. */
export const MAX_TIMER_MS = 2_147_483_647;

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

export const TimerMsSchema = positiveInt.max(MAX_TIMER_MS);
const delayMs = nonNegativeInt.max(MAX_TIMER_MS);

export const RunConfigSchema = z.object({
  maxCycles: positiveInt.default(50),
  maxWallClockMs: positiveInt.default(10 * 60 * 1000),
  timeouts: z
    .object({
      perceptionMs: TimerMsSchema.default(10_000),
      actionMs: TimerMsSchema.default(15_000),
      confirmationWindowMs: TimerMsSchema.default(30_000),
    })
    .default({}),
  maxPerceptionRetries: nonNegativeInt.default(3),
  maxReasoningRetries: nonNegativeInt.default(3),
  maxConsecutiveFailures: nonNegativeInt.default(3),
  maxSameActionFailures: positiveInt.default(2),
  retryBackoff: z
    .object({
      initialDelayMs: delayMs.default(500),
      multiplier: z.number().min(1).default(2),
      maxDelayMs: delayMs.default(8000),
    })
    .default({}),
  historyLimit: positiveInt.default(20),
  reasoningHistoryWindow: nonNegativeInt.default(5),
  riskLevels: RiskTableSchema.default(DEFAULT_RISK_LEVELS),
  denylist: z.array(z.string().trim().min(1)).default([...DEFAULT_DENYLIST]),
  safeZones: z.array(z.string().trim().min(1)).default([...DEFAULT_SAFE_ZONES]),
  limits: z
    .object({
      maxActionsPerMinute: positiveInt.optional(),
      maxHighRiskPerRun: nonNegativeInt.optional(),
    })
    .default({}),
});

export type RunConfig = z.output<typeof RunConfigSchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;

export function resolveRunConfig(input: RunConfigInput = {}): RunConfig {
  return parseRunConfig(input);
}

export async function loadRunConfig(filePath: string): Promise<RunConfig> {
  const raw = await readFile(filePath, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError([`${filePath}: ${err instanceof Error ? err.message : String(err)}`]);
  }
  return parseRunConfig(json);
}

function parseRunConfig(input: unknown): RunConfig {
  const parsed = RunConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return deepFreeze(parsed.data);
}
