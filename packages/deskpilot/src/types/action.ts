export const ACTION_KINDS = [
  "pointer_move",
  "click",
  "double_click",
  "right_click",
  "scroll",
  "drag",
  "key_press",
  "text_entry",
  "password_entry",
  "app_launch",
  "file_operation",
  "system_command",
  "wait",
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export type Point = {
  x: number;
  y: number;
};

export type FileOperation = "open" | "create" | "copy" | "move" | "rename" | "delete" | "format";

export type ActionTarget = {
  /** Screen coordinates for pointer actions. */
  point?: Point;
  /** End point for drags. */
  to?: Point;
  /** Id of a detected UI element from the snapshot. */
  elementId?: string;
  /** Free-form description of what is being acted on. */
  description?: string;
  text?: string;
  keys?: string[];
  scroll?: { direction: "up" | "down" | "left" | "right"; amount: number };
  app?: string;
  path?: string;
  operation?: FileOperation;
  command?: string;
  durationMs?: number;
};

export type ActionProposal = {
  kind: ActionKind;
  target: ActionTarget;
  rationale: string;
  /** Model confidence in [0, 1]. */
  confidence: number;
  /** Risk level suggested by the model; can raise the configured level, never lower it. */
  riskHint?: 0 | 1 | 2 | 3;
};

export type GoalSatisfied = {
  rationale: string;
  confidence: number;
};

/** What a reasoning endpoint's reply parses into. */
export type ModelReply =
  | { type: "action"; proposal: ActionProposal }
  | { type: "goal_satisfied"; completion: GoalSatisfied };
