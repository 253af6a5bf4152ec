import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { ConfigValidationError, DependencyOrderError, RuleDocumentError } from "../../../src/plugin-sdk/index.js";
import { parseAzurePolicyConfig } from "./config.js";
import { bindingsFromDeclarations, compileDeclarations } from "./desired-state.js";
import { evaluateAssignments, RESOURCE_GROUP_TYPE } from "./evaluator.js";

const RULE = '{ "if": { "field": "location", "notEquals": "eastus" }, "then": { "effect": "deny" } }';

describe("compileDeclarations", () => {
  let dir: string;
  const ctx = () => ({ subscriptionId: "sub-1", resolvePath: (p: string) => join(dir, p) });

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "policy-gate-desired-"));
    writeFileSync(join(dir, "location.json"), RULE);
    writeFileSync(join(dir, "broken.json"), '{ "if": ');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const config = (overrides: Record<string, unknown> = {}) =>
    parseAzurePolicyConfig({
      definitions: [{ name: "allowed-location", displayName: "Allowed location", ruleFile: "location.json" }],
      assignments: [{ name: "allowed-location", displayName: "Allowed location", definition: "allowed-location" }],
      ...overrides,
    });

  it("builds a definition and an assignment that depends on it", async () => {
    const { resources, problems } = await compileDeclarations(config(), ctx());
    expect(problems).toEqual([]);
    expect(resources.map((r) => r.address)).toEqual([
      "azurerm_policy_definition.allowed-location",
      "azurerm_subscription_policy_assignment.allowed-location",
    ]);

    const [definition, assignment] = resources;
    expect(definition.attributes).toEqual({
      name: "allowed-location",
      policy_type: "Custom",
      mode: "All",
      display_name: "Allowed location",
      description: "",
      policy_rule: JSON.parse(RULE),
      parameters: {},
      metadata: {},
    });
    expect(assignment.dependsOn).toEqual(["azurerm_policy_definition.allowed-location"]);
    expect(assignment.references).toEqual({
      policy_definition_id: "azurerm_policy_definition.allowed-location.id",
      subscription_id: "data.azurerm_subscription.current.id",
    });
    expect(assignment.attributes).toMatchObject({
      subscription_id: "/subscriptions/sub-1",
      policy_definition_id: "/subscriptions/sub-1/providers/Microsoft.Authorization/policyDefinitions/allowed-location",
      enforce: true,
      not_scopes: [],
    });
  });

  it("uses the resource type of an explicit scope", async () => {
    const { resources } = await compileDeclarations(
      config({
        assignments: [
          {
            name: "rg-location",
            displayName: "RG location",
            definition: "allowed-location",
            scope: "/subscriptions/sub-1/resourceGroups/rg-app",
          },
        ],
      }),
      ctx(),
    );
    expect(resources[1].address).toBe("azurerm_resource_group_policy_assignment.rg-location");
    expect(resources[1].attributes.resource_group_id).toBe("/subscriptions/sub-1/resourceGroups/rg-app");
    expect(resources[1].references).toEqual({ policy_definition_id: "azurerm_policy_definition.allowed-location.id" });
  });

  it("passes full definition IDs through without a dependency", async () => {
    const builtIn = "/providers/Microsoft.Authorization/policyDefinitions/builtin-locations";
    const { resources, problems } = await compileDeclarations(
      config({ assignments: [{ name: "builtin", displayName: "Built-in", definition: builtIn }] }),
      ctx(),
    );
    expect(problems).toEqual([]);
    expect(resources[1].dependsOn).toEqual([]);
    expect(resources[1].attributes.policy_definition_id).toBe(builtIn);
  });

  it("reports an undeclared definition as a dependency problem", async () => {
    const { problems } = await compileDeclarations(
      config({ assignments: [{ name: "orphan", displayName: "Orphan", definition: "missing" }] }),
      ctx(),
    );
    expect(problems).toHaveLength(1);
    expect(problems[0].error).toBeInstanceOf(DependencyOrderError);
    expect(problems[0].diagnostic.summary).toBe('Assignment "orphan" references undeclared policy definition "missing"');
  });

  it("reports a malformed rule document once and drops the assignments that use it", async () => {
    const { resources, problems } = await compileDeclarations(
      config({ definitions: [{ name: "allowed-location", displayName: "Allowed location", ruleFile: "broken.json" }] }),
      ctx(),
    );
    expect(problems).toHaveLength(1);
    expect(problems[0].error).toBeInstanceOf(RuleDocumentError);
    expect(problems[0].error.message).toMatch(/^Invalid JSON in broken\.json: /);
    expect(resources).toEqual([]);
  });

  it("reports a missing rule file", async () => {
    const { problems } = await compileDeclarations(
      config({ definitions: [{ name: "allowed-location", displayName: "Allowed location", ruleFile: "nope.json" }] }),
      ctx(),
    );
    expect(problems[0].diagnostic.summary).toMatch(/^Cannot read rule document nope\.json: /);
  });

  it("rejects duplicates and long management group assignment names", async () => {
    const { problems } = await compileDeclarations(
      config({
        definitions: [
          { name: "allowed-location", displayName: "A", ruleFile: "location.json" },
          { name: "allowed-location", displayName: "B", ruleFile: "location.json" },
        ],
        assignments: [
          {
            name: "a-very-long-assignment-name",
            displayName: "Long",
            definition: "allowed-location",
            scope: "/providers/Microsoft.Management/managementGroups/platform",
          },
        ],
      }),
      ctx(),
    );
    expect(problems.map((p) => p.error)).toEqual([expect.any(ConfigValidationError), expect.any(ConfigValidationError)]);
    expect(problems.map((p) => p.diagnostic.path)).toEqual(["/definitions/1/name", "/assignments/0/name"]);
  });

  it("pairs assignments with rules for local evaluation", async () => {
    const compiled = await compileDeclarations(config(), ctx());
    const { bindings, external } = bindingsFromDeclarations(compiled);
    expect(external).toEqual([]);
    const request = { name: "rg", type: RESOURCE_GROUP_TYPE, id: "/subscriptions/sub-1/resourceGroups/rg" };
    expect(evaluateAssignments(bindings, { ...request, location: "westus" }).allowed).toBe(false);
    expect(evaluateAssignments(bindings, { ...request, location: "eastus" }).allowed).toBe(true);
  });
});
