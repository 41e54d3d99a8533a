import { z } from "zod";
import { RiskLevelSchema } from "../config/schema.js";
import { ModelMalformedResponseError } from "../errors.js";
import { ACTION_KINDS, type ActionKind, type ActionProposal, type ModelReply } from "../types/action.js";

const PointSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

export const ActionTargetSchema = z.object({
  point: PointSchema.optional(),
  to: PointSchema.optional(),
  elementId: z.string().min(1).optional(),
  description: z.string().optional(),
  text: z.string().optional(),
  keys: z.array(z.string().min(1)).min(1).optional(),
  scroll: z
    .object({
      direction: z.enum(["up", "down", "left", "right"]),
      amount: z.number().int().positive(),
    })
    .optional(),
  app: z.string().min(1).optional(),
  path: z.string().min(1).optional(),
  operation: z.enum(["open", "create", "copy", "move", "rename", "delete", "format"]).optional(),
  command: z.string().min(1).optional(),
  durationMs: z.number().int().nonnegative().optional(),
});

type TargetField = keyof z.infer<typeof ActionTargetSchema>;

const POINTER_KINDS = new Set<ActionKind>(["pointer_move", "click", "double_click", "right_click"]);

const REQUIRED_FIELDS: Partial<Record<ActionKind, TargetField[]>> = {
  drag: ["point", "to"],
  scroll: ["scroll"],
  key_press: ["keys"],
  text_entry: ["text"],
  password_entry: ["text"],
  app_launch: ["app"],
  file_operation: ["path", "operation"],
  system_command: ["command"],
};

export const ActionProposalSchema = z
  .object({
    kind: z.enum(ACTION_KINDS),
    target: ActionTargetSchema.default({}),
    rationale: z.string().trim().min(1),
    confidence: z.number().min(0).max(1),
    riskHint: RiskLevelSchema.optional(),
  })
  .superRefine((proposal, ctx) => {
    if (POINTER_KINDS.has(proposal.kind) && !proposal.target.point && !proposal.target.elementId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["target"],
        message: `${proposal.kind} needs a point or an elementId`,
      });
    }
    for (const field of REQUIRED_FIELDS[proposal.kind] ?? []) {
      if (proposal.target[field] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["target", field],
          message: `${proposal.kind} needs target.${field}`,
        });
      }
    }
  });

export const GoalSatisfiedSchema = z.object({
  goalSatisfied: z.literal(true),
  rationale: z.string().default(""),
  confidence: z.number().min(0).max(1).default(1),
});

/**
 * Parses a raw endpoint reply (text or an already-decoded object) into an
 * action proposal or the goal-satisfied sentinel.
 */
export function parseModelReply(raw: unknown): ModelReply {
  const candidate = typeof raw === "string" ? extractJsonObject(raw) : raw;

  if (!candidate || typeof candidate !== "object" || Array.isArray(candidate)) {
    throw new ModelMalformedResponseError("Reply is not a JSON object");
  }

  if ("goalSatisfied" in candidate) {
    const done = GoalSatisfiedSchema.safeParse(candidate);
    if (!done.success) {
      throw new ModelMalformedResponseError(formatIssues(done.error));
    }
    return {
      type: "goal_satisfied",
      completion: { rationale: done.data.rationale, confidence: done.data.confidence },
    };
  }

  const parsed = ActionProposalSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ModelMalformedResponseError(formatIssues(parsed.error));
  }
  const proposal: ActionProposal = parsed.data;
  return { type: "action", proposal };
}

/** Finds the first JSON object in model text: bare, fenced, or embedded in prose. */
export function extractJsonObject(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new ModelMalformedResponseError("Empty reply");
  }

  const direct = tryParse(trimmed);
  if (direct !== undefined) return direct;

  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(trimmed);
  if (fenced) {
    const inner = tryParse(fenced[1].trim());
    if (inner !== undefined) return inner;
  }

  const start = trimmed.indexOf("{");
  if (start >= 0) {
    const end = findObjectEnd(trimmed, start);
    if (end > start) {
      const embedded = tryParse(trimmed.slice(start, end + 1));
      if (embedded !== undefined) return embedded;
    }
  }

  throw new ModelMalformedResponseError("No JSON object found in reply");
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i += 1) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth += 1;
    else if (ch === "}") {
      depth -= 1;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}
