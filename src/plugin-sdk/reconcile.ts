/**
 * Reconciliation contract shared by resource providers, drivers and the
 * pipeline. Providers describe desired state and know how to talk to the
 * platform; drivers diff that desired state against live state and apply it.
 */

import type { Diagnostic } from "./errors.js";

export type ResourceAttributes = Record<string, unknown>;

// ── Desired state ───────────────────────────────────────────────

/** A declared resource, keyed by its Terraform-style address. */
export type DesiredResource = {
  /** `<type>.<name>`, unique across the desired state. */
  address: string;
  type: string;
  name: string;
  attributes: ResourceAttributes;
  /** Addresses that must exist before this resource is created. */
  dependsOn: string[];
  /**
   * Attributes whose value is another resource's attribute, as
   * `<address>.<attribute>`. Used when rendering configuration.
   */
  references?: Record<string, string>;
};

/** CRUD surface for one resource type. */
export interface ResourceHandler {
  readonly type: string;
  /** Attributes whose change forces delete-then-create. */
  readonly forceNew: readonly string[];
  /** Deterministic platform ID from the declared attributes. */
  idOf(attributes: ResourceAttributes): string;
  /** Current live attributes, or null when the resource does not exist. */
  read(id: string): Promise<ResourceAttributes | null>;
  create(attributes: ResourceAttributes): Promise<string>;
  update(id: string, attributes: ResourceAttributes): Promise<void>;
  delete(id: string, attributes: ResourceAttributes): Promise<void>;
}

/** Source of desired state plus the handlers that reconcile it. */
export interface ResourceProvider {
  readonly id: string;
  /** Resolve credentials and build platform clients. */
  configure(env: NodeJS.ProcessEnv): Promise<void>;
  /** Check every declared document without touching the platform. */
  validate(): Promise<Diagnostic[]>;
  desiredResources(): Promise<DesiredResource[]>;
  handler(type: string): ResourceHandler | undefined;
}

// ── Plans ───────────────────────────────────────────────────────

export type ChangeAction = "create" | "update" | "delete" | "no-op";

export type PlannedChange = {
  address: string;
  type: string;
  name: string;
  id: string;
  /** `["delete", "create"]` is a replacement. */
  actions: ChangeAction[];
  before: ResourceAttributes | null;
  after: ResourceAttributes | null;
  dependsOn: string[];
  /** Attribute paths that differ between before and after. */
  changedAttributes: string[];
};

export type PlanSummary = {
  totalChanges: number;
  creates: number;
  updates: number;
  deletes: number;
  replaces: number;
  noOps: number;
  affectedAddresses: string[];
  hasDestructiveChanges: boolean;
};

export type ReconcilePlan = {
  id: string;
  driver: string;
  stateId: string;
  /** State serial the plan was computed against; null when the backend checks staleness itself. */
  priorSerial: number | null;
  lineage: string | null;
  destroy: boolean;
  createdAt: string;
  changes: PlannedChange[];
  summary: PlanSummary;
  /** Driver-specific handle, such as a saved plan file. */
  artifact?: string;
};

export type ValidationResult = {
  valid: boolean;
  diagnostics: Diagnostic[];
};

export type ApplyResult = {
  planId: string;
  stateId: string;
  /** Serial of the state after the apply, when the driver tracks it. */
  serial: number | null;
  applied: Array<{ address: string; actions: ChangeAction[] }>;
  summary: PlanSummary;
  completedAt: string;
};

/** `init -> validate -> plan -> apply`, each step fail-stop. */
export interface ReconciliationDriver {
  readonly id: string;
  init(): Promise<void>;
  validate(): Promise<ValidationResult>;
  plan(options?: { destroy?: boolean }): Promise<ReconcilePlan>;
  apply(plan: ReconcilePlan): Promise<ApplyResult>;
  close(): Promise<void>;
}

/** Whether a plan leaves nothing to do. */
export function isEmptyPlan(plan: ReconcilePlan): boolean {
  return plan.summary.totalChanges === 0;
}
