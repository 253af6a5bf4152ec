/**
 * Azure Policy — CLI Commands
 */

import { randomUUID } from "node:crypto";
import type { Command } from "commander";
import type { PluginLogger } from "../../../src/plugin-sdk/index.js";
import { bindingsFromDeclarations } from "./desired-state.js";
import { evaluateAssignments, RESOURCE_GROUP_TYPE } from "./evaluator.js";
import { resourceGroupId } from "./identifiers.js";
import type { AzurePolicyResourceProvider } from "./provider.js";
import { probeResourceGroup } from "./resource-groups.js";

function parseTags(values: string[]): Record<string, string> {
  const tags: Record<string, string> = {};
  for (const value of values) {
    const eq = value.indexOf("=");
    if (eq <= 0) throw new Error(`Invalid tag "${value}"; expected key=value`);
    tags[value.slice(0, eq)] = value.slice(eq + 1);
  }
  return tags;
}

const collect = (value: string, previous: string[]) => [...previous, value];

export function createPolicyCli(provider: AzurePolicyResourceProvider, logger: PluginLogger) {
  return (program: Command) => {
    const policy = program.command("policy").description("Check, evaluate and probe the declared Azure policies");

    // ── policy validate ─────────────────────────────────────────
    policy
      .command("validate")
      .description("Check every rule document and declared reference without contacting Azure")
      .option("--json", "Output as JSON")
      .action(async (opts: { json?: boolean }) => {
        const diagnostics = await provider.validate();
        const errors = diagnostics.filter((d) => d.severity === "error");
        if (errors.length > 0) process.exitCode = 1;

        if (opts.json) {
          console.log(JSON.stringify({ valid: errors.length === 0, diagnostics }, null, 2));
          return;
        }
        if (diagnostics.length === 0) {
          console.log("Success! The policy configuration is valid.");
          return;
        }
        for (const d of diagnostics) {
          const where = [d.source, d.path].filter(Boolean).join(" ");
          console.log(`${d.severity === "error" ? "Error" : "Warning"}: ${d.summary}${where ? `\n  on ${where}` : ""}`);
        }
      });

    // ── policy evaluate ─────────────────────────────────────────
    policy
      .command("evaluate")
      .description("Preview the declared assignments against a resource group request with the local evaluator")
      .requiredOption("--location <location>", "Location of the requested resource group")
      .option("--name <name>", "Resource group name", "policy-gate-evaluate")
      .option("--tag <key=value>", "Tag on the request (repeatable)", collect, [])
      .option("--json", "Output as JSON")
      .action(async (opts: { location: string; name: string; tag: string[]; json?: boolean }) => {
        const compiled = await provider.declarations();
        const [first] = compiled.problems;
        if (first) throw first.error;

        const { bindings, external } = bindingsFromDeclarations(compiled);
        for (const address of external) {
          logger.warn(`${address} assigns a definition that is not declared here; it is not evaluated locally`);
        }
        const decision = evaluateAssignments(bindings, {
          id: resourceGroupId(compiled.subscriptionId, opts.name),
          name: opts.name,
          type: RESOURCE_GROUP_TYPE,
          location: opts.location,
          tags: parseTags(opts.tag),
        });
        if (!decision.allowed) process.exitCode = 1;

        if (opts.json) {
          console.log(JSON.stringify(decision, null, 2));
          return;
        }
        console.log(`${decision.allowed ? "Allowed" : "Denied"}: resource group "${opts.name}" in ${opts.location}`);
        for (const d of decision.denials) console.log(`  deny   ${d.assignmentName}`);
        for (const a of decision.audits) console.log(`  ${a.effect.padEnd(6)} ${a.assignmentName}${a.enforced ? "" : " (not enforced)"}`);
        for (const name of decision.compliant) console.log(`  ok     ${name}`);
      });

    // ── policy probe ────────────────────────────────────────────
    policy
      .command("probe")
      .description("Create a resource group to confirm the live assignments allow or deny it")
      .requiredOption("--location <location>", "Location to create the resource group in")
      .option("--name <name>", "Resource group name")
      .option("--keep", "Keep the resource group if it was created")
      .option("--json", "Output as JSON")
      .action(async (opts: { location: string; name?: string; keep?: boolean; json?: boolean }) => {
        await provider.configure(process.env);
        const service = provider.resourceGroupService;
        if (!service) throw new Error("The configured control plane cannot create resource groups");

        const name = opts.name ?? `policy-gate-probe-${randomUUID().slice(0, 8)}`;
        const result = await probeResourceGroup(service, provider.subscriptionId, name, opts.location, { keep: opts.keep });
        if (!result.allowed) process.exitCode = 1;

        if (opts.json) {
          console.log(JSON.stringify(result, null, 2));
          return;
        }
        console.log(
          result.allowed
            ? `Allowed: ${result.resourceGroupId} was created in ${opts.location}${opts.keep ? "" : " and removed again"}`
            : `Denied: ${result.reason}`,
        );
      });
  };
}
