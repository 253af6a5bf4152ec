/**
 * Azure Policy — Type Definitions
 *
 * Rule documents, definitions, assignments and the resource requests the
 * rules are evaluated against.
 */

// ── Rule language ───────────────────────────────────────────────

export const POLICY_EFFECTS = [
  "deny",
  "audit",
  "append",
  "modify",
  "disabled",
  "auditIfNotExists",
  "deployIfNotExists",
  "denyAction",
  "manual",
] as const;

export type PolicyEffect = (typeof POLICY_EFFECTS)[number];

export const CONDITION_OPERATORS = [
  "equals",
  "notEquals",
  "like",
  "notLike",
  "match",
  "notMatch",
  "matchInsensitively",
  "notMatchInsensitively",
  "contains",
  "notContains",
  "in",
  "notIn",
  "containsKey",
  "notContainsKey",
  "less",
  "lessOrEquals",
  "greater",
  "greaterOrEquals",
  "exists",
] as const;

export type ConditionOperator = (typeof CONDITION_OPERATORS)[number];

export type PolicyCondition =
  | { kind: "allOf"; conditions: PolicyCondition[] }
  | { kind: "anyOf"; conditions: PolicyCondition[] }
  | { kind: "not"; condition: PolicyCondition }
  | { kind: "field"; field: string; operator: ConditionOperator; operand: unknown }
  | { kind: "value"; value: unknown; operator: ConditionOperator; operand: unknown };

export type PolicyRule = {
  condition: PolicyCondition;
  /** Literal effect or a `[parameters('...')]` expression. */
  effect: string;
  details?: unknown;
  /** The document exactly as parsed, sent to the platform unchanged. */
  document: Record<string, unknown>;
};

// ── Definitions & assignments ───────────────────────────────────

export type PolicyType = "BuiltIn" | "Custom" | "Static" | "NotSpecified";

export type PolicyMode = "All" | "Indexed";

export type EnforcementMode = "Default" | "DoNotEnforce";

export type PolicyParameterDefinition = {
  type: string;
  defaultValue?: unknown;
  allowedValues?: unknown[];
  metadata?: Record<string, unknown>;
};

export type PolicyDefinitionSpec = {
  name: string;
  policyType: PolicyType;
  mode: PolicyMode;
  displayName: string;
  description: string;
  policyRule: Record<string, unknown>;
  parameters: Record<string, PolicyParameterDefinition>;
  metadata: Record<string, unknown>;
};

export type PolicyDefinitionRecord = PolicyDefinitionSpec & { id: string };

export type PolicyAssignmentSpec = {
  name: string;
  /** Scope resource ID the assignment is created at. */
  scope: string;
  policyDefinitionId: string;
  displayName: string;
  description: string;
  enforcementMode: EnforcementMode;
  /** Parameter values, keyed by parameter name. */
  parameters: Record<string, unknown>;
  notScopes: string[];
};

export type PolicyAssignmentRecord = PolicyAssignmentSpec & { id: string };

// ── Evaluation ──────────────────────────────────────────────────

/** The resource a create/update request would produce. */
export type PolicyResourceRequest = {
  id: string;
  name: string;
  type: string;
  location?: string;
  kind?: string;
  tags?: Record<string, string>;
  properties?: Record<string, unknown>;
};

export type RuleEvaluation = {
  matched: boolean;
  effect: PolicyEffect;
};

export type PolicyAssignmentOutcome = {
  assignmentId: string;
  assignmentName: string;
  definitionId: string;
  effect: PolicyEffect;
  enforced: boolean;
};

export type PolicyDecision = {
  allowed: boolean;
  denials: PolicyAssignmentOutcome[];
  audits: PolicyAssignmentOutcome[];
  /** Assignments that applied to the request but whose rule did not match. */
  compliant: string[];
};

/** What the platform returns when a deny assignment blocks a request. */
export class RequestDisallowedByPolicyError extends Error {
  readonly code = "RequestDisallowedByPolicy";

  constructor(
    public readonly resourceId: string,
    public readonly denials: PolicyAssignmentOutcome[],
  ) {
    super(
      `Resource '${resourceId}' was disallowed by policy. Policy identifiers: ${denials
        .map((d) => `'${d.assignmentName}' (${d.definitionId})`)
        .join(", ")}`,
    );
    this.name = "RequestDisallowedByPolicyError";
  }
}
