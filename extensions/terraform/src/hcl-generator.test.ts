/**
 * HCL generator — Unit Tests
 */

import { describe, it, expect } from "vitest";
import type { DesiredResource } from "../../../src/plugin-sdk/index.js";
import {
  formatValue,
  generateDataBlocks,
  generateProviderBlock,
  generateResourceBlock,
  generateTerraformBlock,
  quote,
  renderConfiguration,
  renderProviders,
} from "./hcl-generator.js";

const DEF_ID = "/subscriptions/sub-1/providers/Microsoft.Authorization/policyDefinitions/allowed-location";

const definition: DesiredResource = {
  address: "azurerm_policy_definition.allowed_location",
  type: "azurerm_policy_definition",
  name: "allowed_location",
  attributes: {
    name: "allowed-location",
    policy_type: "Custom",
    mode: "All",
    display_name: "Allowed location",
    description: "",
    policy_rule: { if: { field: "location", notEquals: "eastus" }, then: { effect: "deny" } },
    parameters: {},
    metadata: {},
  },
  dependsOn: [],
};

const assignment: DesiredResource = {
  address: "azurerm_subscription_policy_assignment.allowed_location",
  type: "azurerm_subscription_policy_assignment",
  name: "allowed_location",
  attributes: {
    name: "allowed-location",
    display_name: "Allowed location",
    description: "",
    policy_definition_id: DEF_ID,
    subscription_id: "/subscriptions/sub-1",
    enforce: true,
    parameters: {},
    not_scopes: [],
  },
  dependsOn: ["azurerm_policy_definition.allowed_location"],
  references: { policy_definition_id: "azurerm_policy_definition.allowed_location.id" },
};

describe("quote", () => {
  it("escapes quotes, backslashes and template sequences", () => {
    expect(quote('say "hi" ${x} %{y} C:\\tmp')).toBe('"say \\"hi\\" $${x} %%{y} C:\\\\tmp"');
  });
});

describe("formatValue", () => {
  it("formats scalars", () => {
    expect(formatValue("eastus")).toBe('"eastus"');
    expect(formatValue(3)).toBe("3");
    expect(formatValue(false)).toBe("false");
    expect(formatValue(null)).toBe("null");
  });

  it("formats lists one item per line", () => {
    expect(formatValue(["a", "b"])).toBe('[\n    "a",\n    "b",\n  ]');
    expect(formatValue([])).toBe("[]");
  });

  it("quotes object keys only when asked or when they are not identifiers", () => {
    expect(formatValue({ env: "prod", "cost-center": "42", "a b": 1 })).toBe(
      '{\n    env = "prod"\n    cost-center = "42"\n    "a b" = 1\n  }',
    );
    expect(formatValue({ env: "prod" }, "  ", true)).toBe('{\n    "env" = "prod"\n  }');
  });
});

describe("generateResourceBlock", () => {
  it("renders a definition with the rule through jsonencode and skips empty values", () => {
    expect(generateResourceBlock(definition)).toBe(
      [
        'resource "azurerm_policy_definition" "allowed_location" {',
        '  name = "allowed-location"',
        '  policy_type = "Custom"',
        '  mode = "All"',
        '  display_name = "Allowed location"',
        "  policy_rule = jsonencode({",
        '    "if" = {',
        '      "field" = "location"',
        '      "notEquals" = "eastus"',
        "    }",
        '    "then" = {',
        '      "effect" = "deny"',
        "    }",
        "  })",
        "}",
      ].join("\n"),
    );
  });

  it("renders references as expressions and leaves the implied dependency out", () => {
    expect(generateResourceBlock(assignment)).toBe(
      [
        'resource "azurerm_subscription_policy_assignment" "allowed_location" {',
        '  name = "allowed-location"',
        '  display_name = "Allowed location"',
        "  policy_definition_id = azurerm_policy_definition.allowed_location.id",
        '  subscription_id = "/subscriptions/sub-1"',
        "  enforce = true",
        "}",
      ].join("\n"),
    );
  });

  it("adds depends_on for dependencies no reference implies", () => {
    const block = generateResourceBlock({ ...assignment, references: {}, attributes: { name: "x" } });
    expect(block.split("\n").slice(-3)).toEqual(["", "  depends_on = [azurerm_policy_definition.allowed_location]", "}"]);
  });
});

describe("generateTerraformBlock", () => {
  it("renders the cloud backend and provider requirements", () => {
    expect(generateTerraformBlock({ organization: "acme", workspace: "policy" })).toBe(
      [
        "terraform {",
        "  cloud {",
        '    organization = "acme"',
        "",
        "    workspaces {",
        '      name = "policy"',
        "    }",
        "  }",
        "",
        "  required_providers {",
        "    azurerm = {",
        '      source  = "hashicorp/azurerm"',
        '      version = "~> 3.0"',
        "    }",
        "  }",
        "}",
      ].join("\n"),
    );
  });

  it("omits the cloud block when no backend is configured", () => {
    expect(generateTerraformBlock()).not.toContain("cloud {");
  });
});

describe("generateDataBlocks", () => {
  const current = {
    ...assignment,
    references: { ...assignment.references, subscription_id: "data.azurerm_subscription.current.id" },
  };

  it("declares each data source a reference reads once", () => {
    expect(generateDataBlocks([definition, current, { ...current, name: "other" }])).toEqual([
      'data "azurerm_subscription" "current" {}',
    ]);
    expect(generateDataBlocks([definition, assignment])).toEqual([]);
  });

  it("renders the data reference as an expression without depends_on", () => {
    expect(generateResourceBlock(current).split("\n").slice(3, 6)).toEqual([
      "  policy_definition_id = azurerm_policy_definition.allowed_location.id",
      "  subscription_id = data.azurerm_subscription.current.id",
      "  enforce = true",
    ]);
    expect(generateResourceBlock(current)).not.toContain("depends_on");
  });
});

describe("renderConfiguration", () => {
  it("renders main.tf and providers.tf", () => {
    const files = renderConfiguration([definition, assignment], { cloud: { organization: "acme", workspace: "policy" } });

    expect(files["main.tf"].split("\n")[0]).toBe(
      "# Generated by policy-gate reconcile render. Edit policy-gate.config.json instead.",
    );
    expect(files["main.tf"]).toContain(`${generateResourceBlock(definition)}\n\n${generateResourceBlock(assignment)}\n`);
    expect(files["providers.tf"]).toContain(generateProviderBlock());
    expect(generateProviderBlock()).toBe('provider "azurerm" {\n  features {}\n}');
  });

  it("puts data blocks ahead of the resources in main.tf", () => {
    const current = { ...assignment, references: { subscription_id: "data.azurerm_subscription.current.id" } };
    const main = renderConfiguration([current])["main.tf"];
    expect(main.split("\n").slice(1, 5)).toEqual([
      "",
      'data "azurerm_subscription" "current" {}',
      "",
      'resource "azurerm_subscription_policy_assignment" "allowed_location" {',
    ]);
  });

  it("renders providers.tf on its own", () => {
    const cloud = { organization: "acme", workspace: "policy" };
    expect(renderProviders({ cloud })).toBe(renderConfiguration([definition], { cloud })["providers.tf"]);
  });
});
