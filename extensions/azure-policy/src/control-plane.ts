/**
 * In-process policy control plane.
 *
 * Keeps definitions, assignments and resource groups in memory and enforces
 * assigned policies when a resource group is written, approximating
 * Resource Manager with the local evaluator. A stand-in for tests and for
 * `controlPlane: "memory"`, never for predicting real denials.
 */

import {
  AuthorizationError,
  DependencyOrderError,
  ProviderError,
  type ReconcileError,
} from "../../../src/plugin-sdk/index.js";
import { evaluateAssignments, RESOURCE_GROUP_TYPE, type AssignmentBinding } from "./evaluator.js";
import { assignmentId, definitionId, isWithinScope, parseScope, resourceGroupId, subscriptionScope } from "./identifiers.js";
import type { PolicyService, ResourceGroupService } from "./policy-service.js";
import { parsePolicyRule } from "./rule-document.js";
import {
  RequestDisallowedByPolicyError,
  type PolicyAssignmentRecord,
  type PolicyAssignmentSpec,
  type PolicyDecision,
  type PolicyDefinitionRecord,
  type PolicyDefinitionSpec,
  type PolicyResourceRequest,
} from "./types.js";

export type ControlPlaneOperation = {
  action: "write" | "delete";
  resource: "policyDefinition" | "policyAssignment" | "resourceGroup";
  id: string;
};

export type InMemoryControlPlaneOptions = {
  subscriptionId: string;
  /** Tenant-level definitions available to assignments. */
  builtIns?: PolicyDefinitionRecord[];
};

type ResourceGroup = { id: string; name: string; location: string; tags: Record<string, string> };

const key = (id: string) => id.toLowerCase();

export class InMemoryPolicyControlPlane implements PolicyService, ResourceGroupService {
  readonly subscriptionId: string;
  private definitions = new Map<string, PolicyDefinitionRecord>();
  private assignments = new Map<string, PolicyAssignmentRecord>();
  private resourceGroups = new Map<string, ResourceGroup>();
  private deniedActions: Array<{ action: string; scope: string }> = [];
  private failures = new Map<string, ReconcileError>();
  private log: ControlPlaneOperation[] = [];

  constructor(options: InMemoryControlPlaneOptions) {
    this.subscriptionId = options.subscriptionId;
    for (const builtIn of options.builtIns ?? []) {
      this.definitions.set(key(builtIn.id), structuredClone(builtIn));
    }
  }

  // ── Test controls ─────────────────────────────────────────────

  /** Withhold an action (e.g. `Microsoft.Authorization/policyAssignments/write`) at a scope and below. */
  denyPermission(action: string, scope: string): void {
    this.deniedActions.push({ action: action.toLowerCase(), scope });
  }

  /** Fail the next write or delete of a resource ID with the given error. */
  failNextOperation(id: string, error: ReconcileError): void {
    this.failures.set(key(id), error);
  }

  /** Every successful mutation, in order. */
  get operations(): readonly ControlPlaneOperation[] {
    return this.log;
  }

  listDefinitions(): PolicyDefinitionRecord[] {
    return [...this.definitions.values()].map((d) => structuredClone(d));
  }

  listAssignments(): PolicyAssignmentRecord[] {
    return [...this.assignments.values()].map((a) => structuredClone(a));
  }

  // ── Authorization ─────────────────────────────────────────────

  private authorize(action: string, scope: string, id: string): void {
    const denied = this.deniedActions.find((d) => d.action === action.toLowerCase() && isWithinScope(scope, d.scope));
    if (denied) {
      throw new AuthorizationError(
        scope,
        action,
        `The client does not have authorization to perform action '${action}' over scope '${id}' or the scope is invalid.`,
      );
    }
    const failure = this.failures.get(key(id));
    if (failure) {
      this.failures.delete(key(id));
      throw failure;
    }
  }

  // ── Definitions ───────────────────────────────────────────────

  async getDefinition(id: string): Promise<PolicyDefinitionRecord | null> {
    const found = this.definitions.get(key(id));
    return found ? structuredClone(found) : null;
  }

  async putDefinition(spec: PolicyDefinitionSpec): Promise<PolicyDefinitionRecord> {
    const scope = subscriptionScope(this.subscriptionId);
    const id = definitionId(scope, spec.name);
    this.authorize("Microsoft.Authorization/policyDefinitions/write", scope, id);
    parsePolicyRule(spec.policyRule, id, { parameterNames: Object.keys(spec.parameters) });

    const record: PolicyDefinitionRecord = { ...structuredClone(spec), id };
    this.definitions.set(key(id), record);
    this.log.push({ action: "write", resource: "policyDefinition", id });
    return structuredClone(record);
  }

  async deleteDefinition(id: string): Promise<void> {
    this.authorize("Microsoft.Authorization/policyDefinitions/delete", subscriptionScope(this.subscriptionId), id);
    const inUse = [...this.assignments.values()].find((a) => key(a.policyDefinitionId) === key(id));
    if (inUse) {
      throw new ProviderError(
        `The policy definition '${id}' is in use by assignment '${inUse.id}' and cannot be deleted.`,
        "PolicyDefinitionInUse",
      );
    }
    if (this.definitions.delete(key(id))) {
      this.log.push({ action: "delete", resource: "policyDefinition", id });
    }
  }

  // ── Assignments ───────────────────────────────────────────────

  async getAssignment(id: string): Promise<PolicyAssignmentRecord | null> {
    const found = this.assignments.get(key(id));
    return found ? structuredClone(found) : null;
  }

  async putAssignment(spec: PolicyAssignmentSpec): Promise<PolicyAssignmentRecord> {
    const id = assignmentId(spec.scope, spec.name);
    if (!parseScope(spec.scope)) {
      throw new ProviderError(`The scope '${spec.scope}' is not a valid policy assignment scope.`, "InvalidScope");
    }
    this.authorize("Microsoft.Authorization/policyAssignments/write", spec.scope, id);
    if (!this.definitions.has(key(spec.policyDefinitionId))) {
      throw new DependencyOrderError(
        `The policy definition '${spec.policyDefinitionId}' could not be found.`,
        id,
        spec.policyDefinitionId,
      );
    }

    const record: PolicyAssignmentRecord = { ...structuredClone(spec), id };
    this.assignments.set(key(id), record);
    this.log.push({ action: "write", resource: "policyAssignment", id });
    return structuredClone(record);
  }

  async deleteAssignment(id: string): Promise<void> {
    const scope = id.split("/providers/Microsoft.Authorization/")[0] ?? id;
    this.authorize("Microsoft.Authorization/policyAssignments/delete", scope, id);
    if (this.assignments.delete(key(id))) {
      this.log.push({ action: "delete", resource: "policyAssignment", id });
    }
  }

  // ── Enforcement ───────────────────────────────────────────────

  /** Evaluate every assignment against a would-be resource. */
  evaluate(request: PolicyResourceRequest): PolicyDecision {
    const bindings: AssignmentBinding[] = [];
    for (const assignment of this.assignments.values()) {
      const definition = this.definitions.get(key(assignment.policyDefinitionId));
      if (!definition) continue;
      const rule = parsePolicyRule(definition.policyRule, definition.id, {
        parameterNames: Object.keys(definition.parameters),
      });
      bindings.push({ assignment, definition, rule });
    }
    return evaluateAssignments(bindings, request);
  }

  async createOrUpdate(name: string, location: string, tags: Record<string, string> = {}): Promise<{ id: string; location: string }> {
    const id = resourceGroupId(this.subscriptionId, name);
    this.authorize("Microsoft.Resources/subscriptions/resourceGroups/write", subscriptionScope(this.subscriptionId), id);

    const decision = this.evaluate({ id, name, type: RESOURCE_GROUP_TYPE, location, tags });
    if (!decision.allowed) throw new RequestDisallowedByPolicyError(id, decision.denials);

    this.resourceGroups.set(key(id), { id, name, location, tags });
    this.log.push({ action: "write", resource: "resourceGroup", id });
    return { id, location };
  }

  async delete(name: string): Promise<void> {
    const id = resourceGroupId(this.subscriptionId, name);
    if (this.resourceGroups.delete(key(id))) {
      this.log.push({ action: "delete", resource: "resourceGroup", id });
    }
  }

  hasResourceGroup(name: string): boolean {
    return this.resourceGroups.has(key(resourceGroupId(this.subscriptionId, name)));
  }
}
