import { ENTITY_TYPES, type EntityType } from "../catalog/types.js";
import { type ErrorDescriptor, describeError } from "../errors.js";
import type { TrackerId } from "../tracker/types.js";

export type OutcomeStatus = "created" | "existing" | "failed" | "deleted";

/** What happened to one entity during a run. */
export interface EntityOutcome {
  readonly type: EntityType;
  /** Identity key for setup outcomes, tracker id for teardown outcomes. */
  readonly label: string;
  readonly status: OutcomeStatus;
  readonly trackerId: TrackerId | null;
  readonly error?: ErrorDescriptor;
}

export interface RunReport {
  readonly phase: "setup" | "teardown";
  readonly dryRun: boolean;
  /** Outcomes in plan order, independent of completion order. */
  readonly outcomes: readonly EntityOutcome[];
}

export interface TypeCounts {
  created: number;
  skipped: number;
  failed: number;
  deleted: number;
}

export function failedOutcome(type: EntityType, label: string, error: unknown, trackerId: TrackerId | null = null): EntityOutcome {
  return { type, label, status: "failed", trackerId, error: describeError(error) };
}

export function hasFailures(reports: readonly RunReport[]): boolean {
  return reports.some((report) => report.outcomes.some((outcome) => outcome.status === "failed"));
}

/** Counts outcomes per entity type; types without outcomes are omitted. */
export function summariseOutcomes(outcomes: readonly EntityOutcome[]): Map<EntityType, TypeCounts> {
  const counts = new Map<EntityType, TypeCounts>();
  for (const outcome of outcomes) {
    let entry = counts.get(outcome.type);
    if (!entry) {
      entry = { created: 0, skipped: 0, failed: 0, deleted: 0 };
      counts.set(outcome.type, entry);
    }
    switch (outcome.status) {
      case "created":
        entry.created += 1;
        break;
      case "existing":
        entry.skipped += 1;
        break;
      case "failed":
        entry.failed += 1;
        break;
      case "deleted":
        entry.deleted += 1;
        break;
    }
  }
  // Stable row order regardless of which entity finished first.
  return new Map(ENTITY_TYPES.flatMap((type) => {
    const entry = counts.get(type);
    return entry ? [[type, entry] as const] : [];
  }));
}

/**
 * Renders the per-type table followed by one line per failure, for example:
 *
 * ```
 * type                 created  skipped  failed  deleted
 * project                    1        0       0        0
 * ```
 */
export function formatSummaryTable(outcomes: readonly EntityOutcome[]): string[] {
  const header = ["type".padEnd(20), "created".padStart(8), "skipped".padStart(8), "failed".padStart(7), "deleted".padStart(8)];
  const lines = [header.join(" ")];
  const totals: TypeCounts = { created: 0, skipped: 0, failed: 0, deleted: 0 };
  for (const [type, counts] of summariseOutcomes(outcomes)) {
    totals.created += counts.created;
    totals.skipped += counts.skipped;
    totals.failed += counts.failed;
    totals.deleted += counts.deleted;
    lines.push(formatRow(type, counts));
  }
  lines.push(formatRow("total", totals));

  const failures = outcomes.filter((outcome) => outcome.status === "failed");
  if (failures.length > 0) {
    lines.push("");
    lines.push("failures:");
    for (const failure of failures) {
      const reason = failure.error ? `${failure.error.name}: ${failure.error.message}` : "unknown error";
      lines.push(`  ${failure.label} - ${reason}`);
    }
  }
  return lines;
}

function formatRow(label: string, counts: TypeCounts): string {
  return [
    label.padEnd(20),
    String(counts.created).padStart(8),
    String(counts.skipped).padStart(8),
    String(counts.failed).padStart(7),
    String(counts.deleted).padStart(8),
  ].join(" ");
}
