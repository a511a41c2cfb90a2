import { setTimeout as delay } from "node:timers/promises";

import type { EntityAttributes, EntityType } from "../catalog/types.js";
import { RateLimitError, describeError, isRetriableError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { FoundEntity, TrackerClient, TrackerId, TrackerRef } from "./types.js";

export interface RetryPolicy {
  /** Total attempts per call, first one included. */
  readonly attempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export interface RetryingTrackerOptions {
  readonly policy: RetryPolicy;
  readonly logger: StructuredLogger;
  /** Injectable for tests; defaults to `timers/promises#setTimeout`. */
  readonly sleep?: (ms: number) => Promise<unknown>;
  /** Injectable jitter source in `[0, 1)`; defaults to `Math.random`. */
  readonly random?: () => number;
}

/**
 * Delay before attempt `attempt + 1`: exponential in the attempt number,
 * capped, plus up to one base delay of jitter. A rate-limit hint raises the
 * delay to at least the advertised value.
 */
export function computeBackoff(
  policy: RetryPolicy,
  attempt: number,
  random: () => number,
  retryAfterMs: number | null = null,
): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const jittered = exponential + Math.floor(random() * policy.baseDelayMs);
  return retryAfterMs !== null ? Math.max(jittered, retryAfterMs) : jittered;
}

/**
 * Decorator retrying transport failures and throttling answers with
 * exponential backoff. Validation errors and unresolved lookups are returned
 * to the caller untouched. Once the attempt budget is spent the last error is
 * rethrown and fails the entity that triggered the call.
 */
export class RetryingTracker implements TrackerClient {
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly random: () => number;

  constructor(
    private readonly inner: TrackerClient,
    private readonly options: RetryingTrackerOptions,
  ) {
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.random = options.random ?? Math.random;
  }

  findEntity(type: EntityType, qualifyingName: string, projectKey: string, parentId: TrackerId | null): Promise<FoundEntity | null> {
    return this.withRetry("findEntity", () => this.inner.findEntity(type, qualifyingName, projectKey, parentId));
  }

  createEntity(
    type: EntityType,
    qualifyingName: string,
    projectKey: string,
    parentId: TrackerId | null,
    attributes: EntityAttributes,
  ): Promise<TrackerId> {
    return this.withRetry("createEntity", () =>
      this.inner.createEntity(type, qualifyingName, projectKey, parentId, attributes),
    );
  }

  deleteEntity(type: EntityType, id: TrackerId): Promise<void> {
    return this.withRetry("deleteEntity", () => this.inner.deleteEntity(type, id));
  }

  listChildren(type: EntityType, id: TrackerId): Promise<TrackerRef[]> {
    return this.withRetry("listChildren", () => this.inner.listChildren(type, id));
  }

  attachFieldToScreens(fieldId: string, projectKey: string): Promise<void> {
    return this.withRetry("attachFieldToScreens", () => this.inner.attachFieldToScreens(fieldId, projectKey));
  }

  private async withRetry<T>(operation: string, call: () => Promise<T>): Promise<T> {
    const { policy, logger } = this.options;
    const maxAttempts = Math.max(1, policy.attempts);
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await call();
      } catch (error) {
        if (!isRetriableError(error) || attempt >= maxAttempts) {
          throw error;
        }
        const retryAfter = error instanceof RateLimitError ? error.retryAfterMs : null;
        const backoffMs = computeBackoff(policy, attempt, this.random, retryAfter);
        logger.warn("tracker_retry_scheduled", {
          operation,
          attempt,
          max_attempts: maxAttempts,
          backoff_ms: backoffMs,
          error: describeError(error),
        });
        await this.sleep(backoffMs);
      }
    }
  }
}
