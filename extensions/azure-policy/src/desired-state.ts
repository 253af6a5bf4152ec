/**
 * Desired state — turns the declared definitions and assignments into
 * azurerm resources, checking every rule document and reference on the way.
 */

import { readFile } from "node:fs/promises";
import {
  ConfigValidationError,
  DependencyOrderError,
  RuleDocumentError,
  type DesiredResource,
  type Diagnostic,
  type ReconcileError,
} from "../../../src/plugin-sdk/index.js";
import type { AssignmentConfig, AzurePolicyConfig, DefinitionConfig } from "./config.js";
import type { AssignmentBinding } from "./evaluator.js";
import {
  assignmentAttributes,
  assignmentSpecFromAttributes,
  definitionAttributes,
  definitionSpecFromAttributes,
  DEFINITION_TYPE,
} from "./handlers.js";
import {
  assignmentResourceType,
  definitionId,
  isDefinitionId,
  parseScope,
  subscriptionScope,
  type PolicyScope,
} from "./identifiers.js";
import { parsePolicyRuleDocument } from "./rule-document.js";
import type { PolicyDefinitionRecord, PolicyRule } from "./types.js";

/** Assignment names are limited to 24 characters at management group scope. */
const MANAGEMENT_GROUP_ASSIGNMENT_NAME_MAX = 24;

const CURRENT_SUBSCRIPTION_ID = "data.azurerm_subscription.current.id";

export type DeclarationContext = {
  subscriptionId: string;
  resolvePath: (relative: string) => string;
};

type Problem = { diagnostic: Diagnostic; error: ReconcileError };

export type CompiledDeclarations = {
  subscriptionId: string;
  resources: DesiredResource[];
  rules: Map<string, PolicyRule>;
  problems: Problem[];
};

function problem(summary: string, source: string, error: ReconcileError, path?: string): Problem {
  return { diagnostic: { severity: "error", summary, source, ...(path ? { path } : {}) }, error };
}

async function loadRule(def: DefinitionConfig, ctx: DeclarationContext): Promise<{ rule: PolicyRule | null; problems: Problem[] }> {
  let text: string;
  try {
    text = await readFile(ctx.resolvePath(def.ruleFile), "utf8");
  } catch (err) {
    const summary = `Cannot read rule document ${def.ruleFile}: ${err instanceof Error ? err.message : String(err)}`;
    return { rule: null, problems: [problem(summary, def.ruleFile, new RuleDocumentError(summary, def.ruleFile))] };
  }

  try {
    return { rule: parsePolicyRuleDocument(text, def.ruleFile, { parameterNames: Object.keys(def.parameters) }), problems: [] };
  } catch (err) {
    if (!(err instanceof RuleDocumentError)) throw err;
    return { rule: null, problems: err.diagnostics.map((diagnostic) => ({ diagnostic, error: err })) };
  }
}

function resolveAssignmentScope(assignment: AssignmentConfig, subscriptionId: string): PolicyScope | null {
  if (assignment.scope === "subscription") return { kind: "subscription", subscriptionId };
  return parseScope(assignment.scope);
}

/**
 * Build desired resources and collect every problem. Resources for
 * declarations with problems are left out.
 */
export async function compileDeclarations(config: AzurePolicyConfig, ctx: DeclarationContext): Promise<CompiledDeclarations> {
  const problems: Problem[] = [];
  const resources: DesiredResource[] = [];
  const rules = new Map<string, PolicyRule>();
  const source = "plugins.azure-policy";
  const subScope = subscriptionScope(ctx.subscriptionId);

  const declared = new Set<string>();
  for (const [index, def] of config.definitions.entries()) {
    const path = `/definitions/${index}/name`;
    if (declared.has(def.name)) {
      const summary = `Duplicate policy definition name "${def.name}"`;
      problems.push(problem(summary, source, new ConfigValidationError(source, [`${path}: ${summary}`]), path));
      continue;
    }
    declared.add(def.name);

    const loaded = await loadRule(def, ctx);
    problems.push(...loaded.problems);
    if (!loaded.rule) continue;
    rules.set(def.name, loaded.rule);

    resources.push({
      address: `${DEFINITION_TYPE}.${def.name}`,
      type: DEFINITION_TYPE,
      name: def.name,
      attributes: definitionAttributes({
        name: def.name,
        policyType: def.policyType,
        mode: def.mode,
        displayName: def.displayName,
        description: def.description,
        policyRule: loaded.rule.document,
        parameters: def.parameters,
        metadata: def.metadata,
      }),
      dependsOn: [],
    });
  }

  const addresses = new Set<string>();
  for (const [index, assignment] of config.assignments.entries()) {
    const scope = resolveAssignmentScope(assignment, ctx.subscriptionId);
    if (!scope) {
      const path = `/assignments/${index}/scope`;
      const summary = `Invalid scope "${assignment.scope}" for assignment "${assignment.name}"`;
      problems.push(problem(summary, source, new ConfigValidationError(source, [`${path}: ${summary}`]), path));
      continue;
    }

    if (scope.kind === "managementGroup" && assignment.name.length > MANAGEMENT_GROUP_ASSIGNMENT_NAME_MAX) {
      const path = `/assignments/${index}/name`;
      const summary = `Assignment name "${assignment.name}" exceeds ${MANAGEMENT_GROUP_ASSIGNMENT_NAME_MAX} characters, the limit at management group scope`;
      problems.push(problem(summary, source, new ConfigValidationError(source, [`${path}: ${summary}`]), path));
      continue;
    }

    const type = assignmentResourceType(scope);
    const address = `${type}.${assignment.name}`;
    if (addresses.has(address)) {
      const path = `/assignments/${index}/name`;
      const summary = `Duplicate policy assignment "${address}"`;
      problems.push(problem(summary, source, new ConfigValidationError(source, [`${path}: ${summary}`]), path));
      continue;
    }
    addresses.add(address);

    let policyDefinitionId: string;
    const dependsOn: string[] = [];
    const references: Record<string, string> = {};
    if (declared.has(assignment.definition)) {
      // Already reported against the definition's rule document.
      if (!rules.has(assignment.definition)) continue;
      const definitionAddress = `${DEFINITION_TYPE}.${assignment.definition}`;
      policyDefinitionId = definitionId(subScope, assignment.definition);
      dependsOn.push(definitionAddress);
      references.policy_definition_id = `${definitionAddress}.id`;
    } else if (isDefinitionId(assignment.definition)) {
      policyDefinitionId = assignment.definition;
    } else {
      const summary = `Assignment "${assignment.name}" references undeclared policy definition "${assignment.definition}"`;
      problems.push(
        problem(summary, source, new DependencyOrderError(summary, address, assignment.definition), `/assignments/${index}/definition`),
      );
      continue;
    }

    // Terraform resolves the subscription it is authenticated against.
    if (assignment.scope === "subscription") references.subscription_id = CURRENT_SUBSCRIPTION_ID;

    resources.push({
      address,
      type,
      name: assignment.name,
      attributes: assignmentAttributes(type, {
        name: assignment.name,
        scope: scope.kind === "subscription" ? subScope : assignment.scope,
        policyDefinitionId,
        displayName: assignment.displayName,
        description: assignment.description,
        enforcementMode: assignment.enforcementMode,
        parameters: assignment.parameters,
        notScopes: assignment.notScopes,
      }),
      dependsOn,
      references,
    });
  }

  return { subscriptionId: ctx.subscriptionId, resources, rules, problems };
}

/**
 * Pair every declared assignment with its declared definition and parsed
 * rule, for evaluating requests locally. Assignments of definitions that are
 * not declared here (built-ins) are returned separately.
 */
export function bindingsFromDeclarations(
  compiled: CompiledDeclarations,
): { bindings: AssignmentBinding[]; external: string[] } {
  const definitions = new Map<string, PolicyDefinitionRecord>();
  for (const resource of compiled.resources) {
    if (resource.type !== DEFINITION_TYPE) continue;
    const spec = definitionSpecFromAttributes(resource.attributes);
    definitions.set(spec.name, { ...spec, id: `${DEFINITION_TYPE}.${spec.name}` });
  }

  const bindings: AssignmentBinding[] = [];
  const external: string[] = [];
  for (const resource of compiled.resources) {
    if (resource.type === DEFINITION_TYPE) continue;
    const spec = assignmentSpecFromAttributes(resource.type, resource.attributes);
    const definitionAddress = resource.dependsOn.find((a) => a.startsWith(`${DEFINITION_TYPE}.`));
    const definitionName = definitionAddress?.slice(DEFINITION_TYPE.length + 1);
    const definition = definitionName ? definitions.get(definitionName) : undefined;
    const rule = definitionName ? compiled.rules.get(definitionName) : undefined;
    if (!definition || !rule) {
      external.push(resource.address);
      continue;
    }
    bindings.push({ assignment: { ...spec, id: resource.address }, definition: { ...definition, id: spec.policyDefinitionId }, rule });
  }
  return { bindings, external };
}
