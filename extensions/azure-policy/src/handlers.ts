/**
 * azurerm resource handlers for policy definitions and assignments.
 *
 * Attributes use the azurerm Terraform provider's names so the same state
 * can be rendered to HCL. Optional values are normalized on both sides so a
 * converged resource diffs clean.
 */

import type { ResourceAttributes, ResourceHandler } from "../../../src/plugin-sdk/index.js";
import { assignmentId, definitionId, parseScope, scopeAttribute, subscriptionScope } from "./identifiers.js";
import type { PolicyService } from "./policy-service.js";
import type {
  PolicyAssignmentRecord,
  PolicyAssignmentSpec,
  PolicyDefinitionRecord,
  PolicyDefinitionSpec,
  PolicyMode,
  PolicyParameterDefinition,
  PolicyType,
} from "./types.js";

export const DEFINITION_TYPE = "azurerm_policy_definition";

export const ASSIGNMENT_TYPES = [
  "azurerm_subscription_policy_assignment",
  "azurerm_resource_group_policy_assignment",
  "azurerm_management_group_policy_assignment",
] as const;

// ── Attribute access ────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(attrs: ResourceAttributes, name: string): string {
  const value = attrs[name];
  if (typeof value !== "string" || value === "") throw new Error(`Attribute "${name}" must be a non-empty string`);
  return value;
}

function optionalString(attrs: ResourceAttributes, name: string): string {
  const value = attrs[name];
  return typeof value === "string" ? value : "";
}

function record(attrs: ResourceAttributes, name: string): Record<string, unknown> {
  const value = attrs[name];
  return isRecord(value) ? value : {};
}

function stringList(attrs: ResourceAttributes, name: string): string[] {
  const value = attrs[name];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

function parameterDefinitions(attrs: ResourceAttributes): Record<string, PolicyParameterDefinition> {
  const result: Record<string, PolicyParameterDefinition> = {};
  for (const [name, value] of Object.entries(record(attrs, "parameters"))) {
    if (!isRecord(value)) continue;
    const { type, defaultValue, allowedValues, metadata } = value;
    result[name] = {
      type: typeof type === "string" ? type : "String",
      ...(defaultValue !== undefined ? { defaultValue } : {}),
      ...(Array.isArray(allowedValues) ? { allowedValues } : {}),
      ...(isRecord(metadata) ? { metadata } : {}),
    };
  }
  return result;
}

// ── Conversions ─────────────────────────────────────────────────

const POLICY_TYPES: readonly PolicyType[] = ["BuiltIn", "Custom", "Static", "NotSpecified"];

export function definitionSpecFromAttributes(attrs: ResourceAttributes): PolicyDefinitionSpec {
  const policyType = POLICY_TYPES.find((t) => t === attrs.policy_type) ?? "Custom";
  const mode: PolicyMode = attrs.mode === "Indexed" ? "Indexed" : "All";
  return {
    name: requireString(attrs, "name"),
    policyType,
    mode,
    displayName: requireString(attrs, "display_name"),
    description: optionalString(attrs, "description"),
    policyRule: record(attrs, "policy_rule"),
    parameters: parameterDefinitions(attrs),
    metadata: record(attrs, "metadata"),
  };
}

export function definitionAttributes(def: PolicyDefinitionSpec | PolicyDefinitionRecord): ResourceAttributes {
  return {
    name: def.name,
    policy_type: def.policyType,
    mode: def.mode,
    display_name: def.displayName,
    description: def.description,
    policy_rule: def.policyRule,
    parameters: def.parameters,
    metadata: def.metadata,
  };
}

/** Scope resource ID of an assignment, from whichever scope attribute its type uses. */
export function assignmentScope(type: string, attrs: ResourceAttributes): string {
  const attribute = scopeAttribute(type);
  if (!attribute) throw new Error(`Unsupported policy assignment type: ${type}`);
  return requireString(attrs, attribute);
}

export function assignmentSpecFromAttributes(type: string, attrs: ResourceAttributes): PolicyAssignmentSpec {
  return {
    name: requireString(attrs, "name"),
    scope: assignmentScope(type, attrs),
    policyDefinitionId: requireString(attrs, "policy_definition_id"),
    displayName: requireString(attrs, "display_name"),
    description: optionalString(attrs, "description"),
    enforcementMode: attrs.enforce === false ? "DoNotEnforce" : "Default",
    parameters: record(attrs, "parameters"),
    notScopes: stringList(attrs, "not_scopes"),
  };
}

export function assignmentAttributes(type: string, assignment: PolicyAssignmentSpec | PolicyAssignmentRecord): ResourceAttributes {
  const attribute = scopeAttribute(type);
  if (!attribute) throw new Error(`Unsupported policy assignment type: ${type}`);
  return {
    name: assignment.name,
    display_name: assignment.displayName,
    description: assignment.description,
    policy_definition_id: assignment.policyDefinitionId,
    [attribute]: assignment.scope,
    enforce: assignment.enforcementMode === "Default",
    parameters: assignment.parameters,
    not_scopes: assignment.notScopes,
  };
}

// ── Handlers ────────────────────────────────────────────────────

export class PolicyDefinitionHandler implements ResourceHandler {
  readonly type = DEFINITION_TYPE;
  readonly forceNew = ["name", "policy_type"] as const;

  constructor(private readonly service: PolicyService) {}

  idOf(attributes: ResourceAttributes): string {
    return definitionId(subscriptionScope(this.service.subscriptionId), requireString(attributes, "name"));
  }

  async read(id: string): Promise<ResourceAttributes | null> {
    const found = await this.service.getDefinition(id);
    return found ? definitionAttributes(found) : null;
  }

  async create(attributes: ResourceAttributes): Promise<string> {
    const created = await this.service.putDefinition(definitionSpecFromAttributes(attributes));
    return created.id;
  }

  async update(_id: string, attributes: ResourceAttributes): Promise<void> {
    await this.service.putDefinition(definitionSpecFromAttributes(attributes));
  }

  async delete(id: string): Promise<void> {
    await this.service.deleteDefinition(id);
  }
}

export class PolicyAssignmentHandler implements ResourceHandler {
  readonly forceNew: readonly string[];

  constructor(
    readonly type: (typeof ASSIGNMENT_TYPES)[number],
    private readonly service: PolicyService,
  ) {
    this.forceNew = ["name", "policy_definition_id", scopeAttribute(type) ?? "scope"];
  }

  idOf(attributes: ResourceAttributes): string {
    return assignmentId(assignmentScope(this.type, attributes), requireString(attributes, "name"));
  }

  async read(id: string): Promise<ResourceAttributes | null> {
    const found = await this.service.getAssignment(id);
    return found ? assignmentAttributes(this.type, found) : null;
  }

  async create(attributes: ResourceAttributes): Promise<string> {
    const spec = assignmentSpecFromAttributes(this.type, attributes);
    if (!parseScope(spec.scope)) throw new Error(`Invalid assignment scope: ${spec.scope}`);
    const created = await this.service.putAssignment(spec);
    return created.id;
  }

  async update(_id: string, attributes: ResourceAttributes): Promise<void> {
    await this.service.putAssignment(assignmentSpecFromAttributes(this.type, attributes));
  }

  async delete(id: string): Promise<void> {
    await this.service.deleteAssignment(id);
  }
}

export function createHandlers(service: PolicyService): ResourceHandler[] {
  return [new PolicyDefinitionHandler(service), ...ASSIGNMENT_TYPES.map((type) => new PolicyAssignmentHandler(type, service))];
}
