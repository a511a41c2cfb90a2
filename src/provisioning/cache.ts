import { type LogicalIdentity, identityKey } from "../catalog/types.js";
import { ProvisioningError } from "../errors.js";
import type { TrackerId } from "../tracker/types.js";

/** Identity resolved to a tracker identifier during the current run. */
export interface ResolvedEntity {
  readonly identity: LogicalIdentity;
  readonly trackerId: TrackerId;
  readonly createdThisRun: boolean;
}

/**
 * Append-only map from logical identity to tracker identifier, shared by the
 * workers of a run. Each identity is written at most once. Concurrent lookups
 * of the same identity share a single in-flight promise so the tracker is
 * queried once.
 */
export class ResolutionCache {
  private readonly entries = new Map<string, ResolvedEntity>();
  private readonly pending = new Map<string, Promise<TrackerId | null>>();

  /** Number of resolved identities. */
  size(): number {
    return this.entries.size;
  }

  get(identity: LogicalIdentity): ResolvedEntity | undefined {
    return this.entries.get(identityKey(identity));
  }

  /**
   * Stores a resolution.
   *
   * @throws ProvisioningError (`E-PROVISION-CACHE-CONFLICT`) when the identity
   * is already resolved.
   */
  record(entry: ResolvedEntity): ResolvedEntity {
    const key = identityKey(entry.identity);
    const existing = this.entries.get(key);
    if (existing) {
      throw new ProvisioningError(`identity ${key} is already resolved`, "E-PROVISION-CACHE-CONFLICT", {
        identity: key,
        existing: existing.trackerId,
        attempted: entry.trackerId,
      });
    }
    const frozen = Object.freeze({ ...entry });
    this.entries.set(key, frozen);
    return frozen;
  }

  /**
   * Returns the cached identifier or runs {@link lookup} once per identity. A
   * successful lookup is recorded with `createdThisRun=false`; a `null` result
   * is not cached so a later creation can still record the identity.
   */
  async resolve(identity: LogicalIdentity, lookup: () => Promise<TrackerId | null>): Promise<TrackerId | null> {
    const cached = this.get(identity);
    if (cached) {
      return cached.trackerId;
    }

    const key = identityKey(identity);
    let inflight = this.pending.get(key);
    if (!inflight) {
      inflight = lookup().then((trackerId) => {
        if (trackerId !== null && !this.entries.has(key)) {
          this.record({ identity, trackerId, createdThisRun: false });
        }
        return trackerId;
      });
      this.pending.set(key, inflight);
    }

    try {
      return await inflight;
    } finally {
      this.pending.delete(key);
    }
  }

  /** Snapshot of every resolution in insertion order. */
  snapshot(): ResolvedEntity[] {
    return Array.from(this.entries.values());
  }
}
