import type { EntityAttributes, EntityType } from "../catalog/types.js";
import type { StructuredLogger } from "../logger.js";
import type { FoundEntity, TrackerClient, TrackerId, TrackerRef } from "./types.js";

/** Mutation that a live run would have sent to the tracker. */
export type SimulatedMutation =
  | {
      readonly kind: "create";
      readonly type: EntityType;
      readonly qualifyingName: string;
      readonly projectKey: string;
      readonly parentId: TrackerId | null;
      readonly syntheticId: TrackerId;
    }
  | { readonly kind: "delete"; readonly type: EntityType; readonly id: TrackerId }
  | { readonly kind: "attach-field"; readonly fieldId: string; readonly projectKey: string };

/**
 * Decorator turning every mutating call into a recorded no-op. Reads reach the
 * wrapped client unless they concern an identifier this decorator invented or
 * deleted, in which case they are answered locally. Created entities receive
 * `<projectKey>-DRYRUN-<n>` identifiers so dependent resolutions still succeed.
 */
export class DryRunTracker implements TrackerClient {
  private readonly recorded: SimulatedMutation[] = [];
  private readonly syntheticIds = new Set<TrackerId>();
  private readonly deletedIds = new Set<TrackerId>();
  private sequence = 0;

  constructor(
    private readonly inner: TrackerClient,
    private readonly logger: StructuredLogger,
  ) {}

  /** Simulated mutations in the order they were issued. */
  get mutations(): readonly SimulatedMutation[] {
    return this.recorded;
  }

  isSynthetic(id: TrackerId): boolean {
    return this.syntheticIds.has(id);
  }

  async findEntity(
    type: EntityType,
    qualifyingName: string,
    projectKey: string,
    parentId: TrackerId | null,
  ): Promise<FoundEntity | null> {
    // Nothing real can live under an entity that was only simulated.
    if (parentId !== null && this.syntheticIds.has(parentId)) {
      return null;
    }
    const found = await this.inner.findEntity(type, qualifyingName, projectKey, parentId);
    if (found && this.deletedIds.has(found.id)) {
      return null;
    }
    return found;
  }

  async createEntity(
    type: EntityType,
    qualifyingName: string,
    projectKey: string,
    parentId: TrackerId | null,
    _attributes: EntityAttributes,
  ): Promise<TrackerId> {
    this.sequence += 1;
    const syntheticId = `${projectKey}-DRYRUN-${this.sequence}`;
    this.syntheticIds.add(syntheticId);
    this.record({ kind: "create", type, qualifyingName, projectKey, parentId, syntheticId });
    return syntheticId;
  }

  async deleteEntity(type: EntityType, id: TrackerId): Promise<void> {
    this.deletedIds.add(id);
    this.record({ kind: "delete", type, id });
  }

  async listChildren(type: EntityType, id: TrackerId): Promise<TrackerRef[]> {
    if (this.syntheticIds.has(id)) {
      return [];
    }
    const children = await this.inner.listChildren(type, id);
    return children.filter((child) => !this.deletedIds.has(child.id));
  }

  async attachFieldToScreens(fieldId: string, projectKey: string): Promise<void> {
    this.record({ kind: "attach-field", fieldId, projectKey });
  }

  private record(mutation: SimulatedMutation): void {
    this.recorded.push(mutation);
    this.logger.info("dry_run_mutation_skipped", mutation);
  }
}
