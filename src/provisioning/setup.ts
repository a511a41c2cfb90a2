import pLimit from "p-limit";

import { type EntityDefinition, identityKey, identityOf } from "../catalog/types.js";
import { UnresolvedParentError, ValidationError, describeError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { TrackerClient, TrackerId } from "../tracker/types.js";
import { type ResolvedEntity, ResolutionCache } from "./cache.js";
import type { DependencyGraph } from "./graph.js";
import type { RunPlan } from "./planner.js";
import { type EntityOutcome, type RunReport, failedOutcome } from "./report.js";

export interface SetupDependencies {
  readonly tracker: TrackerClient;
  readonly logger: StructuredLogger;
  /** Upper bound on concurrent tracker calls within a level. */
  readonly concurrency: number;
  /** Field ids attached to the screens of every resolved project. */
  readonly screenFieldIds?: readonly string[];
  /** Marks the report as simulated; the tracker is expected to be a dry-run decorator. */
  readonly dryRun?: boolean;
}

export interface SetupReport extends RunReport {
  readonly phase: "setup";
  readonly resolved: readonly ResolvedEntity[];
}

/**
 * Executes {@link plan} level by level. Entities of one level run through a
 * bounded pool; the next level starts once every entity of the current one has
 * settled. Failures are confined to the entity and its descendants.
 */
export async function runSetup(plan: RunPlan, graph: DependencyGraph, deps: SetupDependencies): Promise<SetupReport> {
  const { tracker, logger } = deps;
  const cache = new ResolutionCache();
  const failed = new Set<string>();
  const limit = pLimit(Math.max(1, deps.concurrency));
  const outcomes: EntityOutcome[] = [];

  async function resolveParent(definition: EntityDefinition): Promise<TrackerId | null> {
    const parent = definition.parent;
    if (!parent) {
      return null;
    }
    const childKey = identityKey(definition);
    const parentKey = identityKey(parent);
    if (failed.has(parentKey)) {
      throw new UnresolvedParentError(childKey, parentKey, "parent_failed");
    }

    // Cache first, then the tracker so a partially completed run can resume.
    const parentId = await cache.resolve(parent, async () => {
      const found = await tracker.findEntity(parent.type, parent.qualifyingName, parent.projectKey, null);
      return found?.id ?? null;
    });
    if (parentId !== null) {
      return parentId;
    }

    const fallback = graph.preExisting.get(parentKey);
    if (fallback) {
      return fallback;
    }
    throw new UnresolvedParentError(childKey, parentKey, "missing");
  }

  async function attachScreenFields(projectKey: string): Promise<void> {
    for (const fieldId of deps.screenFieldIds ?? []) {
      try {
        await tracker.attachFieldToScreens(fieldId, projectKey);
        logger.debug("screen_field_attached", { project: projectKey, field: fieldId });
      } catch (error) {
        logger.warn("screen_field_attach_failed", { project: projectKey, field: fieldId, error: describeError(error) });
      }
    }
  }

  async function provision(definition: EntityDefinition): Promise<EntityOutcome> {
    const key = identityKey(definition);
    const identity = identityOf(definition);
    try {
      const parentId = await resolveParent(definition);
      const existing = await tracker.findEntity(definition.type, definition.qualifyingName, definition.projectKey, parentId);

      let outcome: EntityOutcome;
      if (existing) {
        if (parentId !== null && existing.parentId !== parentId) {
          const placement = existing.parentId === null ? "without a parent link" : `under ${existing.parentId}`;
          throw new ValidationError(`${key} exists as ${existing.id} ${placement}, expected parent ${parentId}`, {
            identity: key,
            trackerId: existing.id,
            actualParent: existing.parentId,
            expectedParent: parentId,
          });
        }
        cache.record({ identity, trackerId: existing.id, createdThisRun: false });
        logger.info("entity_existing", { entity: key, id: existing.id });
        outcome = { type: definition.type, label: key, status: "existing", trackerId: existing.id };
      } else {
        const trackerId = await tracker.createEntity(
          definition.type,
          definition.qualifyingName,
          definition.projectKey,
          parentId,
          definition.attributes,
        );
        cache.record({ identity, trackerId, createdThisRun: true });
        logger.info("entity_created", { entity: key, id: trackerId, parent: parentId, dry_run: deps.dryRun ?? false });
        outcome = { type: definition.type, label: key, status: "created", trackerId };
      }

      if (definition.type === "project") {
        await attachScreenFields(definition.projectKey);
      }
      return outcome;
    } catch (error) {
      failed.add(key);
      logger.error("entity_failed", { entity: key, error: describeError(error) });
      return failedOutcome(definition.type, key, error);
    }
  }

  for (const [index, level] of plan.levels.entries()) {
    logger.info("setup_level_started", { level: index, entities: level.length });
    const results = await Promise.all(level.map((definition) => limit(() => provision(definition))));
    outcomes.push(...results);
  }

  return { phase: "setup", dryRun: deps.dryRun ?? false, outcomes, resolved: cache.snapshot() };
}
