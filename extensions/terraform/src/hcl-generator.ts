/**
 * HCL generator — renders declared resources into Terraform configuration.
 */

import type { DesiredResource } from "../../../src/plugin-sdk/index.js";

/** HCP Terraform workspace the `cloud` block points at. */
export interface CloudBackend {
  organization: string;
  workspace: string;
  hostname?: string;
}

export interface ProviderRequirement {
  name: string;
  source: string;
  version: string;
}

export const AZURERM_PROVIDER: ProviderRequirement = {
  name: "azurerm",
  source: "hashicorp/azurerm",
  version: "~> 3.0",
};

/** Attributes Terraform takes as JSON strings; rendered through `jsonencode`. */
const JSON_ENCODED_ATTRIBUTES = new Set(["policy_rule", "parameters", "metadata"]);

const HEADER = "# Generated by policy-gate reconcile render. Edit policy-gate.config.json instead.";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_-]*$/;

/** Quote a string for HCL, escaping template sequences. */
export function quote(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t")
    .replace(/\$\{/g, () => "$${")
    .replace(/%\{/g, "%%{");
  return `"${escaped}"`;
}

function formatKey(key: string, quoteKeys: boolean): string {
  return !quoteKeys && IDENTIFIER.test(key) ? key : quote(key);
}

/**
 * Format a value for HCL output. Object keys inside `jsonencode` are
 * always quoted so JSON keys such as `if` survive unchanged.
 */
export function formatValue(value: unknown, indent = "  ", quoteKeys = false): string {
  if (typeof value === "string") return quote(value);
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    const inner = indent + "  ";
    return `[\n${value.map((v) => `${inner}${formatValue(v, inner, quoteKeys)},`).join("\n")}\n${indent}]`;
  }
  if (value != null && typeof value === "object") {
    const entries = Object.entries(value);
    if (entries.length === 0) return "{}";
    const inner = indent + "  ";
    const lines = entries.map(([k, v]) => `${inner}${formatKey(k, quoteKeys)} = ${formatValue(v, inner, quoteKeys)}`);
    return `{\n${lines.join("\n")}\n${indent}}`;
  }
  return "null";
}

function isEmpty(value: unknown): boolean {
  if (value == null || value === "") return true;
  if (Array.isArray(value)) return value.length === 0;
  return typeof value === "object" && Object.keys(value).length === 0;
}

/** Address part of `<type>.<name>.<attribute>` or `data.<type>.<name>.<attribute>`. */
function referenceAddress(reference: string): string {
  const parts = reference.split(".");
  return parts.slice(0, parts[0] === "data" ? 3 : 2).join(".");
}

/**
 * Argument-less `data` blocks for every data source the references read,
 * e.g. `data.azurerm_subscription.current.id`.
 */
export function generateDataBlocks(resources: DesiredResource[]): string[] {
  const sources = new Set<string>();
  for (const resource of resources) {
    for (const reference of Object.values(resource.references ?? {})) {
      if (reference.startsWith("data.")) sources.add(referenceAddress(reference));
    }
  }
  return [...sources].map((address) => {
    const [, type, name] = address.split(".");
    return `data "${type}" "${name}" {}`;
  });
}

/**
 * Generate a resource block. References render as bare expressions;
 * dependencies that no reference already implies become `depends_on`.
 */
export function generateResourceBlock(resource: DesiredResource): string {
  const references = resource.references ?? {};
  const lines = [`resource "${resource.type}" "${resource.name}" {`];

  for (const [key, value] of Object.entries(resource.attributes)) {
    const reference = references[key];
    if (reference) {
      lines.push(`  ${key} = ${reference}`);
    } else if (isEmpty(value)) {
      continue;
    } else if (JSON_ENCODED_ATTRIBUTES.has(key)) {
      lines.push(`  ${key} = jsonencode(${formatValue(value, "  ", true)})`);
    } else {
      lines.push(`  ${key} = ${formatValue(value)}`);
    }
  }

  const implied = new Set(Object.values(references).map(referenceAddress));
  const explicit = resource.dependsOn.filter((address) => !implied.has(address));
  if (explicit.length > 0) {
    lines.push("", `  depends_on = [${explicit.join(", ")}]`);
  }

  lines.push("}");
  return lines.join("\n");
}

/** Generate provider block HCL. */
export function generateProviderBlock(provider: ProviderRequirement = AZURERM_PROVIDER): string {
  return `provider "${provider.name}" {\n  features {}\n}`;
}

/** `terraform` settings block: the HCP Terraform `cloud` backend, when given, and provider requirements. */
export function generateTerraformBlock(
  cloud?: CloudBackend,
  provider: ProviderRequirement = AZURERM_PROVIDER,
): string {
  const lines = ["terraform {"];
  if (cloud) {
    lines.push("  cloud {");
    if (cloud.hostname) lines.push(`    hostname     = ${quote(cloud.hostname)}`);
    lines.push(`    organization = ${quote(cloud.organization)}`, "", "    workspaces {");
    lines.push(`      name = ${quote(cloud.workspace)}`, "    }", "  }", "");
  }
  lines.push(
    "  required_providers {",
    `    ${provider.name} = {`,
    `      source  = ${quote(provider.source)}`,
    `      version = ${quote(provider.version)}`,
    "    }",
    "  }",
    "}",
  );
  return lines.join("\n");
}

/** Files for the working directory, keyed by file name. */
export type RenderedConfiguration = {
  "main.tf": string;
  "providers.tf": string;
};

export type RenderOptions = { cloud?: CloudBackend; provider?: ProviderRequirement };

/** providers.tf: backend, provider requirements and provider configuration. Independent of the declarations. */
export function renderProviders(options: RenderOptions = {}): string {
  return [
    HEADER,
    "",
    generateTerraformBlock(options.cloud, options.provider),
    "",
    generateProviderBlock(options.provider),
    "",
  ].join("\n");
}

export function renderConfiguration(resources: DesiredResource[], options: RenderOptions = {}): RenderedConfiguration {
  const blocks = [...generateDataBlocks(resources), ...resources.map(generateResourceBlock)];
  const main = [HEADER, "", ...blocks.flatMap((block) => [block, ""])].join("\n");
  return { "main.tf": main, "providers.tf": renderProviders(options) };
}
