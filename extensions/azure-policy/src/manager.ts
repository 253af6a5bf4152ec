/**
 * Azure Policy Manager
 *
 * Reads and writes policy definitions and assignments via @azure/arm-policy.
 * Failures are translated to reconcile errors; nothing is retried.
 */

import type { TokenCredential } from "@azure/identity";
import type { PolicyAssignment, PolicyClient, PolicyDefinition } from "@azure/arm-policy";
import { isNotFound, toReconcileError } from "./arm-errors.js";
import { definitionId, parseAssignmentId, parseDefinitionId, subscriptionScope } from "./identifiers.js";
import type { PolicyService } from "./policy-service.js";
import type {
  EnforcementMode,
  PolicyAssignmentRecord,
  PolicyAssignmentSpec,
  PolicyDefinitionRecord,
  PolicyDefinitionSpec,
  PolicyMode,
  PolicyParameterDefinition,
  PolicyType,
} from "./types.js";

const POLICY_TYPES: readonly PolicyType[] = ["BuiltIn", "Custom", "Static", "NotSpecified"];

/** Server-maintained metadata keys that never appear in declared state. */
const SYSTEM_METADATA_KEYS = ["createdBy", "createdOn", "updatedBy", "updatedOn"];

function toPolicyType(value: string | undefined): PolicyType {
  return POLICY_TYPES.find((t) => t.toLowerCase() === value?.toLowerCase()) ?? "NotSpecified";
}

function toPolicyMode(value: string | undefined): PolicyMode {
  return value?.toLowerCase() === "indexed" ? "Indexed" : "All";
}

function toEnforcementMode(value: string | undefined): EnforcementMode {
  return value?.toLowerCase() === "donotenforce" ? "DoNotEnforce" : "Default";
}

export function stripSystemMetadata(metadata: Record<string, unknown> | undefined): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata ?? {})) {
    if (!SYSTEM_METADATA_KEYS.includes(key)) result[key] = value;
  }
  return result;
}

export function fromSdkDefinition(pd: PolicyDefinition): PolicyDefinitionRecord {
  const parameters: Record<string, PolicyParameterDefinition> = {};
  for (const [name, p] of Object.entries(pd.parameters ?? {})) {
    parameters[name] = {
      type: p.type ?? "String",
      ...(p.defaultValue !== undefined ? { defaultValue: p.defaultValue } : {}),
      ...(p.allowedValues ? { allowedValues: p.allowedValues } : {}),
      ...(p.metadata ? { metadata: { ...p.metadata } } : {}),
    };
  }
  return {
    id: pd.id ?? "",
    name: pd.name ?? "",
    policyType: toPolicyType(pd.policyType),
    mode: toPolicyMode(pd.mode),
    displayName: pd.displayName ?? "",
    description: pd.description ?? "",
    policyRule: pd.policyRule ?? {},
    parameters,
    metadata: stripSystemMetadata(pd.metadata),
  };
}

export function fromSdkAssignment(pa: PolicyAssignment): PolicyAssignmentRecord {
  const parameters: Record<string, unknown> = {};
  for (const [name, p] of Object.entries(pa.parameters ?? {})) {
    parameters[name] = p.value;
  }
  return {
    id: pa.id ?? "",
    name: pa.name ?? "",
    scope: pa.scope ?? "",
    policyDefinitionId: pa.policyDefinitionId ?? "",
    displayName: pa.displayName ?? "",
    description: pa.description ?? "",
    enforcementMode: toEnforcementMode(pa.enforcementMode),
    parameters,
    notScopes: pa.notScopes ?? [],
  };
}

export class AzurePolicyManager implements PolicyService {
  private client: PolicyClient | null = null;

  constructor(
    private readonly credential: TokenCredential,
    public readonly subscriptionId: string,
  ) {}

  private async getClient(): Promise<PolicyClient> {
    if (!this.client) {
      const { PolicyClient } = await import("@azure/arm-policy");
      this.client = new PolicyClient(this.credential, this.subscriptionId);
    }
    return this.client;
  }

  private definitionName(id: string): string {
    const parsed = parseDefinitionId(id);
    if (!parsed) throw new Error(`Not a policy definition ID: ${id}`);
    return parsed.name;
  }

  async getDefinition(id: string): Promise<PolicyDefinitionRecord | null> {
    const client = await this.getClient();
    const parsed = parseDefinitionId(id);
    if (!parsed) throw new Error(`Not a policy definition ID: ${id}`);
    try {
      const pd = parsed.scope === "" ? await client.policyDefinitions.getBuiltIn(parsed.name) : await client.policyDefinitions.get(parsed.name);
      return fromSdkDefinition(pd);
    } catch (err) {
      if (isNotFound(err)) return null;
      throw toReconcileError(err, { action: "Microsoft.Authorization/policyDefinitions/read", scope: parsed.scope, target: id });
    }
  }

  async putDefinition(spec: PolicyDefinitionSpec): Promise<PolicyDefinitionRecord> {
    const client = await this.getClient();
    const scope = subscriptionScope(this.subscriptionId);
    try {
      const pd = await client.policyDefinitions.createOrUpdate(spec.name, {
        policyType: spec.policyType,
        mode: spec.mode,
        displayName: spec.displayName,
        description: spec.description,
        policyRule: spec.policyRule,
        parameters: spec.parameters,
        metadata: spec.metadata,
      });
      return fromSdkDefinition(pd);
    } catch (err) {
      throw toReconcileError(err, {
        action: "Microsoft.Authorization/policyDefinitions/write",
        scope,
        target: definitionId(scope, spec.name),
      });
    }
  }

  async deleteDefinition(id: string): Promise<void> {
    const client = await this.getClient();
    try {
      await client.policyDefinitions.delete(this.definitionName(id));
    } catch (err) {
      if (isNotFound(err)) return;
      throw toReconcileError(err, {
        action: "Microsoft.Authorization/policyDefinitions/delete",
        scope: subscriptionScope(this.subscriptionId),
        target: id,
      });
    }
  }

  async getAssignment(id: string): Promise<PolicyAssignmentRecord | null> {
    const client = await this.getClient();
    const parsed = parseAssignmentId(id);
    if (!parsed) throw new Error(`Not a policy assignment ID: ${id}`);
    try {
      return fromSdkAssignment(await client.policyAssignments.get(parsed.scope, parsed.name));
    } catch (err) {
      if (isNotFound(err)) return null;
      throw toReconcileError(err, { action: "Microsoft.Authorization/policyAssignments/read", scope: parsed.scope, target: id });
    }
  }

  async putAssignment(spec: PolicyAssignmentSpec): Promise<PolicyAssignmentRecord> {
    const client = await this.getClient();
    const parameters: Record<string, { value: unknown }> = {};
    for (const [name, value] of Object.entries(spec.parameters)) {
      parameters[name] = { value };
    }
    try {
      const pa = await client.policyAssignments.create(spec.scope, spec.name, {
        policyDefinitionId: spec.policyDefinitionId,
        displayName: spec.displayName,
        description: spec.description,
        enforcementMode: spec.enforcementMode,
        parameters,
        notScopes: spec.notScopes,
      });
      return fromSdkAssignment(pa);
    } catch (err) {
      throw toReconcileError(err, {
        action: "Microsoft.Authorization/policyAssignments/write",
        scope: spec.scope,
        target: spec.policyDefinitionId,
      });
    }
  }

  async deleteAssignment(id: string): Promise<void> {
    const client = await this.getClient();
    const parsed = parseAssignmentId(id);
    if (!parsed) throw new Error(`Not a policy assignment ID: ${id}`);
    try {
      await client.policyAssignments.delete(parsed.scope, parsed.name);
    } catch (err) {
      if (isNotFound(err)) return;
      throw toReconcileError(err, { action: "Microsoft.Authorization/policyAssignments/delete", scope: parsed.scope, target: id });
    }
  }
}
