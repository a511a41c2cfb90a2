import type { EntityAttributes, EntityType } from "../catalog/types.js";

/** Identifier assigned by the tracker (project key, issue key, version id...). */
export type TrackerId = string;

/** Typed reference to a tracker entity, as returned by child listings. */
export interface TrackerRef {
  readonly type: EntityType;
  readonly id: TrackerId;
}

/** Result of a successful lookup. `parentId` is `null` when the tracker does not expose it. */
export interface FoundEntity {
  readonly id: TrackerId;
  readonly parentId: TrackerId | null;
}

/**
 * Operations the orchestrator needs from the issue tracker. Every method may
 * reject with `TransportError`, `RateLimitError` or `ValidationError`.
 */
export interface TrackerClient {
  /**
   * Looks an entity up by logical identity. `parentId` narrows the scope when
   * the entity type is parent-scoped; `null` means "anywhere in the project".
   */
  findEntity(
    type: EntityType,
    qualifyingName: string,
    projectKey: string,
    parentId: TrackerId | null,
  ): Promise<FoundEntity | null>;

  createEntity(
    type: EntityType,
    qualifyingName: string,
    projectKey: string,
    parentId: TrackerId | null,
    attributes: EntityAttributes,
  ): Promise<TrackerId>;

  deleteEntity(type: EntityType, id: TrackerId): Promise<void>;

  /** Direct children of the entity, including constraints blocking it. */
  listChildren(type: EntityType, id: TrackerId): Promise<TrackerRef[]>;

  attachFieldToScreens(fieldId: string, projectKey: string): Promise<void>;
}
