/**
 * Azure resource identifiers for policy scopes, definitions and assignments.
 */

export type PolicyScope =
  | { kind: "subscription"; subscriptionId: string }
  | { kind: "resourceGroup"; subscriptionId: string; resourceGroup: string }
  | { kind: "managementGroup"; managementGroupId: string };

const SUBSCRIPTION_SCOPE = /^\/subscriptions\/([^/]+)$/i;
const RESOURCE_GROUP_SCOPE = /^\/subscriptions\/([^/]+)\/resourceGroups\/([^/]+)$/i;
const MANAGEMENT_GROUP_SCOPE = /^\/providers\/Microsoft\.Management\/managementGroups\/([^/]+)$/i;
const DEFINITION_ID =
  /^(\/subscriptions\/[^/]+|\/providers\/Microsoft\.Management\/managementGroups\/[^/]+)?\/providers\/Microsoft\.Authorization\/policyDefinitions\/([^/]+)$/i;
const ASSIGNMENT_ID = /^(.*)\/providers\/Microsoft\.Authorization\/policyAssignments\/([^/]+)$/i;

function trimTrailingSlash(id: string): string {
  return id.length > 1 && id.endsWith("/") ? id.slice(0, -1) : id;
}

/** Parse a scope resource ID, or return null when it is not one. */
export function parseScope(id: string): PolicyScope | null {
  const value = trimTrailingSlash(id);
  let match = SUBSCRIPTION_SCOPE.exec(value);
  if (match) return { kind: "subscription", subscriptionId: match[1] };
  match = RESOURCE_GROUP_SCOPE.exec(value);
  if (match) return { kind: "resourceGroup", subscriptionId: match[1], resourceGroup: match[2] };
  match = MANAGEMENT_GROUP_SCOPE.exec(value);
  if (match) return { kind: "managementGroup", managementGroupId: match[1] };
  return null;
}

export function formatScope(scope: PolicyScope): string {
  switch (scope.kind) {
    case "subscription":
      return `/subscriptions/${scope.subscriptionId}`;
    case "resourceGroup":
      return `/subscriptions/${scope.subscriptionId}/resourceGroups/${scope.resourceGroup}`;
    case "managementGroup":
      return `/providers/Microsoft.Management/managementGroups/${scope.managementGroupId}`;
  }
}

export function subscriptionScope(subscriptionId: string): string {
  return formatScope({ kind: "subscription", subscriptionId });
}

export function resourceGroupId(subscriptionId: string, resourceGroup: string): string {
  return formatScope({ kind: "resourceGroup", subscriptionId, resourceGroup });
}

/** Definition ID at a subscription or management group scope. */
export function definitionId(scope: string, name: string): string {
  return `${trimTrailingSlash(scope)}/providers/Microsoft.Authorization/policyDefinitions/${name}`;
}

export function assignmentId(scope: string, name: string): string {
  return `${trimTrailingSlash(scope)}/providers/Microsoft.Authorization/policyAssignments/${name}`;
}

/** Split a definition ID into its scope (empty for tenant built-ins) and name. */
export function parseDefinitionId(id: string): { scope: string; name: string } | null {
  const match = DEFINITION_ID.exec(trimTrailingSlash(id));
  return match ? { scope: match[1] ?? "", name: match[2] } : null;
}

export function parseAssignmentId(id: string): { scope: string; name: string } | null {
  const match = ASSIGNMENT_ID.exec(trimTrailingSlash(id));
  if (!match || parseScope(match[1]) === null) return null;
  return { scope: match[1], name: match[2] };
}

export function isDefinitionId(value: string): boolean {
  return parseDefinitionId(value) !== null;
}

/**
 * Whether a resource ID falls inside a scope. Management group scopes are
 * treated as covering every subscription, since the hierarchy is not known
 * locally.
 */
export function isWithinScope(resourceId: string, scope: string): boolean {
  const parsed = parseScope(scope);
  if (parsed?.kind === "managementGroup") return resourceId.toLowerCase().startsWith("/subscriptions/");
  const prefix = trimTrailingSlash(scope).toLowerCase();
  const id = trimTrailingSlash(resourceId).toLowerCase();
  return id === prefix || id.startsWith(`${prefix}/`);
}

/** Terraform assignment resource type for a scope. */
export function assignmentResourceType(scope: PolicyScope): string {
  switch (scope.kind) {
    case "subscription":
      return "azurerm_subscription_policy_assignment";
    case "resourceGroup":
      return "azurerm_resource_group_policy_assignment";
    case "managementGroup":
      return "azurerm_management_group_policy_assignment";
  }
}

/** Name of the Terraform attribute that carries an assignment's scope. */
export function scopeAttribute(resourceType: string): string | null {
  switch (resourceType) {
    case "azurerm_subscription_policy_assignment":
      return "subscription_id";
    case "azurerm_resource_group_policy_assignment":
      return "resource_group_id";
    case "azurerm_management_group_policy_assignment":
      return "management_group_id";
    default:
      return null;
  }
}
