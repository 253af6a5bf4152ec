import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryPolicyControlPlane } from "./control-plane.js";
import {
  assignmentSpecFromAttributes,
  createHandlers,
  PolicyAssignmentHandler,
  PolicyDefinitionHandler,
} from "./handlers.js";

const SUB = "/subscriptions/sub-1";
const RULE = { if: { field: "location", notEquals: "eastus" }, then: { effect: "deny" } };

const definitionAttrs = {
  name: "allowed-location",
  policy_type: "Custom",
  mode: "All",
  display_name: "Allowed location",
  description: "",
  policy_rule: RULE,
  parameters: {},
  metadata: {},
};

describe("policy handlers", () => {
  let plane: InMemoryPolicyControlPlane;
  let definitions: PolicyDefinitionHandler;
  let assignments: PolicyAssignmentHandler;

  beforeEach(() => {
    plane = new InMemoryPolicyControlPlane({ subscriptionId: "sub-1" });
    definitions = new PolicyDefinitionHandler(plane);
    assignments = new PolicyAssignmentHandler("azurerm_subscription_policy_assignment", plane);
  });

  it("registers one handler per resource type", () => {
    expect(createHandlers(plane).map((h) => h.type)).toEqual([
      "azurerm_policy_definition",
      "azurerm_subscription_policy_assignment",
      "azurerm_resource_group_policy_assignment",
      "azurerm_management_group_policy_assignment",
    ]);
  });

  it("declares the attributes that force replacement", () => {
    expect(definitions.forceNew).toEqual(["name", "policy_type"]);
    expect(assignments.forceNew).toEqual(["name", "policy_definition_id", "subscription_id"]);
  });

  it("round-trips a definition through the control plane", async () => {
    const id = await definitions.create(definitionAttrs);
    expect(id).toBe(definitions.idOf(definitionAttrs));
    expect(await definitions.read(id)).toEqual(definitionAttrs);
  });

  it("round-trips an assignment and maps enforce to enforcementMode", async () => {
    const definitionId = await definitions.create(definitionAttrs);
    const attrs = {
      name: "allowed-location",
      display_name: "Allowed location",
      description: "",
      policy_definition_id: definitionId,
      subscription_id: SUB,
      enforce: false,
      parameters: {},
      not_scopes: [],
    };
    const id = await assignments.create(attrs);
    expect(id).toBe(`${SUB}/providers/Microsoft.Authorization/policyAssignments/allowed-location`);
    expect(await assignments.read(id)).toEqual(attrs);
    expect((await plane.getAssignment(id))?.enforcementMode).toBe("DoNotEnforce");
  });

  it("reads null for a resource that does not exist", async () => {
    expect(await definitions.read(definitions.idOf(definitionAttrs))).toBeNull();
  });

  it("requires the scope attribute of the assignment type", () => {
    expect(() =>
      assignmentSpecFromAttributes("azurerm_resource_group_policy_assignment", {
        name: "a",
        display_name: "a",
        policy_definition_id: "x",
        subscription_id: SUB,
      }),
    ).toThrow('Attribute "resource_group_id" must be a non-empty string');
  });
});
