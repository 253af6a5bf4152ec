/**
 * Reconciliation error taxonomy.
 *
 * Every failure the workflow can surface carries a `kind` so the pipeline
 * can report it verbatim and exit non-zero. Nothing here is retried.
 */

export type ReconcileErrorKind =
  | "parse"
  | "authentication"
  | "authorization"
  | "dependency"
  | "lock-contention"
  | "stale-plan"
  | "conflict"
  | "provider";

/** Base class for every error the reconciliation workflow reports. */
export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly kind: ReconcileErrorKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ReconcileError";
  }
}

/** A single problem found while checking a document or configuration. */
export type Diagnostic = {
  severity: "error" | "warning";
  summary: string;
  detail?: string;
  /** File or logical source the diagnostic refers to. */
  source?: string;
  /** JSON path inside the source, e.g. `/if/allOf/0/field`. */
  path?: string;
};

/** Malformed JSON or an unrecognized rule shape in a policy rule document. */
export class RuleDocumentError extends ReconcileError {
  constructor(
    message: string,
    public readonly source: string,
    public readonly diagnostics: Diagnostic[] = [],
  ) {
    super(message, "parse");
    this.name = "RuleDocumentError";
  }
}

/** Configuration file that does not match its schema. */
export class ConfigValidationError extends ReconcileError {
  constructor(
    public readonly source: string,
    public readonly errors: string[],
  ) {
    super(`Invalid configuration in ${source}:\n  ${errors.join("\n  ")}`, "parse");
    this.name = "ConfigValidationError";
  }
}

/** One or more of the cloud credentials is absent. */
export class AuthenticationError extends ReconcileError {
  constructor(message: string, public readonly missing: string[] = [], options?: { cause?: unknown }) {
    super(message, "authentication", options);
    this.name = "AuthenticationError";
  }
}

/** The caller's identity lacks the role required at a scope. */
export class AuthorizationError extends ReconcileError {
  constructor(
    public readonly scope: string,
    public readonly operation: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Authorization failed for ${operation} at ${scope}: ${detail}`, "authorization", options);
    this.name = "AuthorizationError";
  }
}

/** A resource references something that does not exist (yet). */
export class DependencyOrderError extends ReconcileError {
  constructor(
    message: string,
    public readonly address: string,
    public readonly missingReference: string,
    options?: { cause?: unknown },
  ) {
    super(message, "dependency", options);
    this.name = "DependencyOrderError";
  }
}

/** The shared state is locked by another run. */
export class LockContentionError extends ReconcileError {
  constructor(
    public readonly stateId: string,
    public readonly holder: { id: string; operation: string; lockedBy: string; lockedAt: string } | null,
    detail?: string,
  ) {
    super(
      holder
        ? `Error acquiring the state lock for "${stateId}": held by ${holder.lockedBy} (${holder.operation}, lock ID ${holder.id}, since ${holder.lockedAt})`
        : `Error acquiring the state lock for "${stateId}"${detail ? `: ${detail}` : ""}`,
      "lock-contention",
    );
    this.name = "LockContentionError";
  }
}

/** The state changed after the plan was computed. */
export class StalePlanError extends ReconcileError {
  constructor(
    public readonly expectedSerial: number | null,
    public readonly actualSerial: number,
  ) {
    super(
      `Saved plan is stale: it was created against state serial ${expectedSerial ?? "unknown"}, but the state is now at serial ${actualSerial}. Run plan again.`,
      "stale-plan",
    );
    this.name = "StalePlanError";
  }
}

/** A resource exists on the platform but is not tracked in state. */
export class ResourceConflictError extends ReconcileError {
  constructor(public readonly address: string, public readonly resourceId: string) {
    super(
      `A resource with the ID "${resourceId}" already exists - to be managed, ${address} needs to be imported into the state.`,
      "conflict",
    );
    this.name = "ResourceConflictError";
  }
}

/** Any other failure reported by the cloud platform. */
export class ProviderError extends ReconcileError {
  constructor(message: string, public readonly code?: string, options?: { cause?: unknown }) {
    super(message, "provider", options);
    this.name = "ProviderError";
  }
}

/** Narrow an unknown thrown value to a ReconcileError. */
export function isReconcileError(err: unknown): err is ReconcileError {
  return err instanceof ReconcileError;
}

/** Render any thrown value as a single line for step output. */
export function formatError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}
