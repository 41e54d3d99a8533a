import fs from "node:fs/promises";
import path from "node:path";

export type ArtifactType = "events" | "audit_actions" | "summary";

export function resolveDeskpilotRoot(workspaceDir: string) {
  return path.join(workspaceDir, ".deskpilot");
}

export function resolveArtifactPath(workspaceDir: string, runId: string, type: ArtifactType) {
  const runDir = path.join(resolveDeskpilotRoot(workspaceDir), "runs", runId);
  switch (type) {
    case "events":
      return path.join(runDir, "events.jsonl");
    case "audit_actions":
      return path.join(runDir, "audit", "actions.jsonl");
    case "summary":
      return path.join(runDir, "summary.json");
  }
}

async function ensureDirForFile(filePath: string) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
}

export async function appendJsonLines(filePath: string, payloads: readonly unknown[]): Promise<void> {
  if (payloads.length === 0) return;
  await ensureDirForFile(filePath);
  await fs.appendFile(filePath, payloads.map((p) => JSON.stringify(p) + "\n").join(""), "utf-8");
}

export async function writeRunState(workspaceDir: string, runId: string, payload: unknown): Promise<void> {
  const filePath = resolveArtifactPath(workspaceDir, runId, "summary");
  await ensureDirForFile(filePath);
  const tmpPath = `${filePath}.tmp`;
  await fs.writeFile(tmpPath, JSON.stringify(payload, null, 2) + "\n", "utf-8");
  await fs.rename(tmpPath, filePath);
}
