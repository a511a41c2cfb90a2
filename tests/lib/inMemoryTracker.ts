import type { EntityAttributes, EntityType } from "../../src/catalog/types.js";
import { isIssueEntityType } from "../../src/catalog/types.js";
import { ValidationError } from "../../src/errors.js";
import type { FoundEntity, TrackerClient, TrackerId, TrackerRef } from "../../src/tracker/types.js";

export interface StoredEntity {
  readonly id: TrackerId;
  readonly type: EntityType;
  readonly qualifyingName: string;
  readonly projectKey: string;
  readonly parentId: TrackerId | null;
}

export type TrackerCall =
  | {
      readonly method: "findEntity" | "createEntity";
      readonly type: EntityType;
      readonly qualifyingName: string;
      readonly projectKey: string;
      readonly parentId: TrackerId | null;
    }
  | { readonly method: "deleteEntity" | "listChildren"; readonly type: EntityType; readonly id: TrackerId }
  | { readonly method: "attachFieldToScreens"; readonly fieldId: string; readonly projectKey: string };

interface FailureRule {
  readonly matches: (call: TrackerCall) => boolean;
  readonly error: unknown;
  remaining: number;
}

const MUTATIONS = new Set<TrackerCall["method"]>(["createEntity", "deleteEntity", "attachFieldToScreens"]);

/**
 * Tracker kept in memory. Behaves like the Jira client where the orchestrator
 * can observe it: projects are keyed by their key, issues get `<KEY>-<n>`
 * keys, only issues are listed as children, and an issue cannot be deleted
 * while issues still hang below it.
 */
export class InMemoryTracker implements TrackerClient {
  readonly calls: TrackerCall[] = [];
  private readonly entities = new Map<TrackerId, StoredEntity>();
  private readonly failures: FailureRule[] = [];
  private sequence = 0;

  /** Stores an entity directly, bypassing the call log. */
  seed(entity: Omit<StoredEntity, "id"> & { id?: TrackerId }): TrackerId {
    const id = entity.id ?? this.nextId(entity.type, entity.qualifyingName, entity.projectKey);
    this.entities.set(id, { ...entity, id });
    return id;
  }

  /** Makes the next {@link times} calls matching {@link matches} reject with {@link error}. */
  failOn(matches: (call: TrackerCall) => boolean, error: unknown, times = Number.POSITIVE_INFINITY): void {
    this.failures.push({ matches, error, remaining: times });
  }

  get all(): StoredEntity[] {
    return Array.from(this.entities.values());
  }

  get size(): number {
    return this.entities.size;
  }

  has(id: TrackerId): boolean {
    return this.entities.has(id);
  }

  lookup(type: EntityType, qualifyingName: string, projectKey: string): StoredEntity | undefined {
    return this.all.find(
      (entity) => entity.type === type && entity.qualifyingName === qualifyingName && entity.projectKey === projectKey,
    );
  }

  callsTo(method: TrackerCall["method"]): TrackerCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  get mutationCount(): number {
    return this.calls.filter((call) => MUTATIONS.has(call.method)).length;
  }

  async findEntity(
    type: EntityType,
    qualifyingName: string,
    projectKey: string,
    parentId: TrackerId | null,
  ): Promise<FoundEntity | null> {
    await this.record({ method: "findEntity", type, qualifyingName, projectKey, parentId });
    const entity = this.lookup(type, qualifyingName, projectKey);
    return entity ? { id: entity.id, parentId: entity.parentId } : null;
  }

  async createEntity(
    type: EntityType,
    qualifyingName: string,
    projectKey: string,
    parentId: TrackerId | null,
    _attributes: EntityAttributes,
  ): Promise<TrackerId> {
    await this.record({ method: "createEntity", type, qualifyingName, projectKey, parentId });
    if (parentId !== null && !this.entities.has(parentId)) {
      throw new ValidationError(`parent ${parentId} does not exist`, { parentId }, 400);
    }
    return this.seed({ type, qualifyingName, projectKey, parentId });
  }

  async deleteEntity(type: EntityType, id: TrackerId): Promise<void> {
    await this.record({ method: "deleteEntity", type, id });
    const entity = this.entities.get(id);
    if (!entity) {
      return;
    }
    if (type === "project") {
      for (const candidate of this.all) {
        if (candidate.projectKey === entity.projectKey) {
          this.entities.delete(candidate.id);
        }
      }
      return;
    }
    const blocking = this.issueChildrenOf(id);
    if (blocking.length > 0) {
      throw new ValidationError(`${id} still has ${blocking.length} child issue(s)`, { id }, 400);
    }
    // Assignments hanging off an issue disappear with it.
    for (const candidate of this.all) {
      if (candidate.parentId === id) {
        this.entities.delete(candidate.id);
      }
    }
    this.entities.delete(id);
  }

  async listChildren(type: EntityType, id: TrackerId): Promise<TrackerRef[]> {
    await this.record({ method: "listChildren", type, id });
    return this.issueChildrenOf(id).map((entity) => ({ type: entity.type, id: entity.id }));
  }

  async attachFieldToScreens(fieldId: string, projectKey: string): Promise<void> {
    await this.record({ method: "attachFieldToScreens", fieldId, projectKey });
  }

  private issueChildrenOf(id: TrackerId): StoredEntity[] {
    return this.all.filter((entity) => entity.parentId === id && isIssueEntityType(entity.type));
  }

  private nextId(type: EntityType, qualifyingName: string, projectKey: string): TrackerId {
    if (type === "project") {
      return qualifyingName;
    }
    this.sequence += 1;
    return `${projectKey}-${this.sequence}`;
  }

  private async record(call: TrackerCall): Promise<void> {
    this.calls.push(call);
    // Yield so concurrent workers interleave the way they would over HTTP.
    await Promise.resolve();
    const rule = this.failures.find((candidate) => candidate.remaining > 0 && candidate.matches(call));
    if (rule) {
      rule.remaining -= 1;
      throw rule.error;
    }
  }
}
