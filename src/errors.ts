/**
 * Error taxonomy shared by the provisioning orchestrator, the tracker clients
 * and the CLI. Every error carries a stable {@link ProvisioningError.code} so
 * reports and logs can be filtered without parsing messages.
 *
 * Two families exist:
 * - pre-flight errors ({@link isPreflightError}) abort the invocation before any
 *   mutation reaches the tracker;
 * - entity-scoped errors are recorded against a single entity and aggregated
 *   into the final report.
 */
export class ProvisioningError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, code: string, details?: unknown, options: { cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ProvisioningError";
    this.code = code;
    this.details = details;
  }
}

/** Raised when a static catalog file is missing or does not match its schema. */
export class CatalogError extends ProvisioningError {
  constructor(message: string, details?: unknown, options: { cause?: unknown } = {}) {
    super(message, "E-PROVISION-CATALOG", details, options);
    this.name = "CatalogError";
  }
}

/** Raised when the environment does not describe a usable configuration. */
export class ConfigurationError extends ProvisioningError {
  constructor(message: string, details?: unknown) {
    super(message, "E-PROVISION-CONFIG", details);
    this.name = "ConfigurationError";
  }
}

/** Two catalog entries share the same logical identity. */
export class DuplicateIdentityError extends ProvisioningError {
  constructor(identityKey: string) {
    super(`duplicate logical identity ${identityKey}`, "E-PROVISION-DUPLICATE", { identity: identityKey });
    this.name = "DuplicateIdentityError";
  }
}

/** A child references a parent that is neither in the catalog nor pre-existing. */
export class DanglingParentError extends ProvisioningError {
  constructor(childKey: string, parentKey: string) {
    super(`${childKey} references unknown parent ${parentKey}`, "E-PROVISION-DANGLING-PARENT", {
      child: childKey,
      parent: parentKey,
    });
    this.name = "DanglingParentError";
  }
}

/** The parent chain of an entity revisits a node. */
export class CycleError extends ProvisioningError {
  public readonly path: readonly string[];

  constructor(path: readonly string[]) {
    super(`dependency cycle detected: ${path.join(" -> ")}`, "E-PROVISION-CYCLE", { path });
    this.name = "CycleError";
    this.path = path;
  }
}

/** The parent of an entity could not be resolved to a tracker identifier. */
export class UnresolvedParentError extends ProvisioningError {
  constructor(childKey: string, parentKey: string, reason: "missing" | "parent_failed") {
    const suffix = reason === "parent_failed" ? "failed earlier in this run" : "was not found in the tracker";
    super(`parent ${parentKey} of ${childKey} ${suffix}`, "E-PROVISION-UNRESOLVED-PARENT", {
      child: childKey,
      parent: parentKey,
      reason,
    });
    this.name = "UnresolvedParentError";
  }
}

/** Network failure, timeout or 5xx answer from the tracker. */
export class TransportError extends ProvisioningError {
  public readonly status: number | null;

  constructor(message: string, options: { status?: number | null; cause?: unknown } = {}) {
    super(message, "E-TRACKER-TRANSPORT", { status: options.status ?? null }, { cause: options.cause });
    this.name = "TransportError";
    this.status = options.status ?? null;
  }
}

/** The tracker throttled the request (HTTP 429). */
export class RateLimitError extends ProvisioningError {
  /** Delay advertised through `Retry-After`, when the tracker sent one. */
  public readonly retryAfterMs: number | null;

  constructor(message: string, retryAfterMs: number | null = null) {
    super(message, "E-TRACKER-RATE-LIMIT", { retryAfterMs });
    this.name = "RateLimitError";
    this.retryAfterMs = retryAfterMs;
  }
}

/** The tracker rejected the entity (4xx other than 404/429) or the state conflicts with the catalog. */
export class ValidationError extends ProvisioningError {
  public readonly status: number | null;

  constructor(message: string, details?: unknown, status: number | null = null) {
    super(message, "E-TRACKER-VALIDATION", details);
    this.name = "ValidationError";
    this.status = status;
  }
}

/** A teardown node was left in place because some of its children survived. */
export class PartialTeardownError extends ProvisioningError {
  constructor(entityId: string, remainingChildren: readonly string[]) {
    super(
      `${entityId} kept: ${remainingChildren.length} child(ren) could not be deleted`,
      "E-PROVISION-PARTIAL-TEARDOWN",
      { entity: entityId, remainingChildren },
    );
    this.name = "PartialTeardownError";
  }
}

/** Structural or configuration errors that must abort before any mutation. */
export function isPreflightError(error: unknown): boolean {
  return (
    error instanceof CatalogError ||
    error instanceof ConfigurationError ||
    error instanceof DuplicateIdentityError ||
    error instanceof DanglingParentError ||
    error instanceof CycleError
  );
}

/** Errors worth another attempt after a backoff. */
export function isRetriableError(error: unknown): error is TransportError | RateLimitError {
  return error instanceof TransportError || error instanceof RateLimitError;
}

/** Serialisable summary of a failure, as stored in run reports. */
export interface ErrorDescriptor {
  readonly name: string;
  readonly code: string;
  readonly message: string;
}

/** Normalises any thrown value into an {@link ErrorDescriptor}. */
export function describeError(error: unknown): ErrorDescriptor {
  if (error instanceof ProvisioningError) {
    return { name: error.name, code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { name: error.name, code: "E-PROVISION-UNEXPECTED", message: error.message };
  }
  return { name: "Error", code: "E-PROVISION-UNEXPECTED", message: String(error) };
}
