/**
 * In-memory control plane — Unit Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AuthorizationError, DependencyOrderError, ProviderError, RuleDocumentError } from "../../../src/plugin-sdk/index.js";
import { InMemoryPolicyControlPlane } from "./control-plane.js";
import { RequestDisallowedByPolicyError, type PolicyAssignmentSpec, type PolicyDefinitionSpec } from "./types.js";

const SUB = "/subscriptions/sub-1";
const DEF_ID = `${SUB}/providers/Microsoft.Authorization/policyDefinitions/allowed-location`;

const definitionSpec: PolicyDefinitionSpec = {
  name: "allowed-location",
  policyType: "Custom",
  mode: "All",
  displayName: "Allowed location",
  description: "",
  policyRule: { if: { field: "location", notEquals: "eastus" }, then: { effect: "deny" } },
  parameters: {},
  metadata: {},
};

const assignmentSpec: PolicyAssignmentSpec = {
  name: "allowed-location",
  scope: SUB,
  policyDefinitionId: DEF_ID,
  displayName: "Allowed location",
  description: "",
  enforcementMode: "Default",
  parameters: {},
  notScopes: [],
};

describe("InMemoryPolicyControlPlane", () => {
  let plane: InMemoryPolicyControlPlane;

  beforeEach(() => {
    plane = new InMemoryPolicyControlPlane({ subscriptionId: "sub-1" });
  });

  it("stores definitions under their deterministic ID", async () => {
    const created = await plane.putDefinition(definitionSpec);
    expect(created.id).toBe(DEF_ID);
    expect(await plane.getDefinition(DEF_ID.toUpperCase())).toEqual(created);
  });

  it("rejects a definition whose rule does not parse", async () => {
    await expect(
      plane.putDefinition({ ...definitionSpec, policyRule: { if: { field: "location" }, then: { effect: "deny" } } }),
    ).rejects.toBeInstanceOf(RuleDocumentError);
  });

  it("refuses an assignment of a missing definition", async () => {
    await expect(plane.putAssignment(assignmentSpec)).rejects.toBeInstanceOf(DependencyOrderError);
    expect(plane.operations).toEqual([]);
  });

  it("enforces a deny assignment on resource group writes", async () => {
    await plane.putDefinition(definitionSpec);
    await plane.putAssignment(assignmentSpec);

    await expect(plane.createOrUpdate("rg-west", "westus")).rejects.toBeInstanceOf(RequestDisallowedByPolicyError);
    expect(plane.hasResourceGroup("rg-west")).toBe(false);

    await expect(plane.createOrUpdate("rg-east", "eastus")).resolves.toEqual({
      id: `${SUB}/resourceGroups/rg-east`,
      location: "eastus",
    });
    expect(plane.hasResourceGroup("rg-east")).toBe(true);
  });

  it("does not block when the assignment is not enforced", async () => {
    await plane.putDefinition(definitionSpec);
    await plane.putAssignment({ ...assignmentSpec, enforcementMode: "DoNotEnforce" });
    await expect(plane.createOrUpdate("rg-west", "westus")).resolves.toEqual({
      id: `${SUB}/resourceGroups/rg-west`,
      location: "westus",
    });
  });

  it("withholds permissions at a scope", async () => {
    plane.denyPermission("Microsoft.Authorization/policyAssignments/write", SUB);
    await plane.putDefinition(definitionSpec);
    const put = plane.putAssignment(assignmentSpec);
    await expect(put).rejects.toBeInstanceOf(AuthorizationError);
    await expect(put).rejects.toMatchObject({ kind: "authorization", scope: SUB });
  });

  it("keeps a definition that is still assigned", async () => {
    await plane.putDefinition(definitionSpec);
    await plane.putAssignment(assignmentSpec);
    await expect(plane.deleteDefinition(DEF_ID)).rejects.toBeInstanceOf(ProviderError);
  });

  it("logs every mutation in order", async () => {
    await plane.putDefinition(definitionSpec);
    const assignment = await plane.putAssignment(assignmentSpec);
    await plane.deleteAssignment(assignment.id);
    await plane.deleteDefinition(DEF_ID);
    expect(plane.operations.map((o) => `${o.action} ${o.resource}`)).toEqual([
      "write policyDefinition",
      "write policyAssignment",
      "delete policyAssignment",
      "delete policyDefinition",
    ]);
  });

  it("fails an injected operation once", async () => {
    plane.failNextOperation(DEF_ID, new ProviderError("InternalServerError", "InternalServerError"));
    await expect(plane.putDefinition(definitionSpec)).rejects.toThrow("InternalServerError");
    await expect(plane.putDefinition(definitionSpec)).resolves.toMatchObject({ id: DEF_ID });
  });
});
