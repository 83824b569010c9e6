export type RunKind = "ingest" | "sync" | "search" | "run" | "status";

export function createRunId(kind: RunKind, now = new Date()): string {
  const suffix = Math.random().toString(36).slice(2, 8);
  return `${kind}_${now.toISOString().replace(/[:.]/g, "-")}_${suffix}`;
}
