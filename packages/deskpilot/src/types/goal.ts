export interface GoalConstraints {
  /** Applications the agent may interact with; empty means any. */
  allowedApps?: string[];
  /** Free-form notes forwarded to the model. */
  notes?: string[];
  [key: string]: unknown;
}

export interface Goal {
  readonly id: string;
  readonly text: string;
  readonly constraints: Readonly<GoalConstraints>;
  readonly createdAtMs: number;
}
