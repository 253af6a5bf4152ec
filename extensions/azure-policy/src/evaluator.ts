/**
 * Azure Policy — Rule Evaluator
 *
 * Evaluates parsed policy rules against a resource request, resolving
 * `[parameters('...')]` expressions from assignment values and definition
 * defaults. String comparisons follow the platform: case-insensitive except
 * for `match`/`notMatch`.
 *
 * A local approximation for the in-process control plane and for
 * `policy evaluate` previews. Azure's own evaluation decides what is
 * actually denied.
 */

import { normalizeEffect, parameterReference } from "./rule-document.js";
import type {
  ConditionOperator,
  PolicyAssignmentOutcome,
  PolicyAssignmentRecord,
  PolicyCondition,
  PolicyDecision,
  PolicyDefinitionRecord,
  PolicyParameterDefinition,
  PolicyResourceRequest,
  PolicyRule,
  RuleEvaluation,
} from "./types.js";
import { isWithinScope } from "./identifiers.js";

export const RESOURCE_GROUP_TYPE = "Microsoft.Resources/subscriptions/resourceGroups";

export type ParameterValues = Record<string, unknown>;

/** Merge assignment values over definition defaults. */
export function resolveParameterValues(
  definitions: Record<string, PolicyParameterDefinition>,
  values: ParameterValues,
): ParameterValues {
  const resolved: ParameterValues = {};
  for (const [name, def] of Object.entries(definitions)) {
    if (def.defaultValue !== undefined) resolved[name] = def.defaultValue;
  }
  return { ...resolved, ...values };
}

/** Substitute parameter expressions anywhere inside a value. */
export function resolveExpressions(value: unknown, params: ParameterValues): unknown {
  const param = parameterReference(value);
  if (param !== null) {
    if (!(param in params)) {
      throw new Error(`The policy parameter '${param}' has no value and no default`);
    }
    return params[param];
  }
  if (typeof value === "string" && value.startsWith("[[")) return value.slice(1);
  if (Array.isArray(value)) return value.map((v) => resolveExpressions(v, params));
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, resolveExpressions(v, params)]));
  }
  return value;
}

function lookupCaseInsensitive(obj: Record<string, unknown>, key: string): unknown {
  if (key in obj) return obj[key];
  const lower = key.toLowerCase();
  const match = Object.keys(obj).find((k) => k.toLowerCase() === lower);
  return match === undefined ? undefined : obj[match];
}

function getPath(obj: unknown, parts: string[]): unknown {
  let current = obj;
  for (const part of parts) {
    if (typeof current !== "object" || current === null || Array.isArray(current)) return undefined;
    current = lookupCaseInsensitive(Object.fromEntries(Object.entries(current)), part);
  }
  return current;
}

const TAG_BRACKET = /^tags\[['"]?([^'"\]]+)['"]?\]$/i;

/** Resolve a policy `field` reference against a resource request. */
export function resolveField(resource: PolicyResourceRequest, field: string): unknown {
  const lower = field.toLowerCase();
  switch (lower) {
    case "name":
    case "fullname":
      return resource.name;
    case "type":
      return resource.type;
    case "location":
      return resource.location;
    case "id":
      return resource.id;
    case "kind":
      return resource.kind;
    case "tags":
      return resource.tags ?? {};
  }

  const bracket = TAG_BRACKET.exec(field);
  if (bracket) return lookupCaseInsensitive(resource.tags ?? {}, bracket[1]);
  if (lower.startsWith("tags.")) return lookupCaseInsensitive(resource.tags ?? {}, field.slice(5));

  // Property aliases: Microsoft.Namespace/type/property/path
  if (field.includes("/")) {
    const segments = field.split("/");
    return getPath(resource.properties ?? {}, segments.slice(2));
  }
  return getPath(resource.properties ?? {}, field.split("."));
}

function equalsInsensitive(a: unknown, b: unknown): boolean {
  if (typeof a === "string" && typeof b === "string") return a.toLowerCase() === b.toLowerCase();
  return JSON.stringify(a) === JSON.stringify(b);
}

function wildcardToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, "\\$&").replace(/\*/g, ".*");
  return new RegExp(`^${escaped}$`, "is");
}

/** `#` = digit, `?` = letter, `.` = any character; everything else literal. */
function matchPatternToRegExp(pattern: string, insensitive: boolean): RegExp {
  let source = "";
  for (const ch of pattern) {
    if (ch === "#") source += "[0-9]";
    else if (ch === "?") source += "[A-Za-z]";
    else if (ch === ".") source += ".";
    else source += ch.replace(/[*+^${}()|[\]\\]/g, "\\$&");
  }
  return new RegExp(`^${source}$`, insensitive ? "is" : "s");
}

function compareOrdered(a: unknown, b: unknown): number | null {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "string" && typeof b === "string") {
    const da = Date.parse(a);
    const db = Date.parse(b);
    if (!Number.isNaN(da) && !Number.isNaN(db)) return da - db;
    return a.toLowerCase().localeCompare(b.toLowerCase());
  }
  return null;
}

/** Apply one operator to a resolved left-hand value. */
export function applyOperator(operator: ConditionOperator, actual: unknown, operand: unknown): boolean {
  switch (operator) {
    case "equals":
      return actual !== undefined && equalsInsensitive(actual, operand);
    case "notEquals":
      return !(actual !== undefined && equalsInsensitive(actual, operand));
    case "like":
      return typeof actual === "string" && typeof operand === "string" && wildcardToRegExp(operand).test(actual);
    case "notLike":
      return !applyOperator("like", actual, operand);
    case "match":
      return typeof actual === "string" && typeof operand === "string" && matchPatternToRegExp(operand, false).test(actual);
    case "notMatch":
      return !applyOperator("match", actual, operand);
    case "matchInsensitively":
      return typeof actual === "string" && typeof operand === "string" && matchPatternToRegExp(operand, true).test(actual);
    case "notMatchInsensitively":
      return !applyOperator("matchInsensitively", actual, operand);
    case "contains":
      if (typeof actual === "string" && typeof operand === "string") {
        return actual.toLowerCase().includes(operand.toLowerCase());
      }
      if (Array.isArray(actual)) return actual.some((item) => equalsInsensitive(item, operand));
      return false;
    case "notContains":
      return !applyOperator("contains", actual, operand);
    case "in":
      return Array.isArray(operand) && actual !== undefined && operand.some((item) => equalsInsensitive(actual, item));
    case "notIn":
      return !applyOperator("in", actual, operand);
    case "containsKey":
      return (
        typeof actual === "object" &&
        actual !== null &&
        !Array.isArray(actual) &&
        typeof operand === "string" &&
        Object.keys(actual).some((k) => k.toLowerCase() === operand.toLowerCase())
      );
    case "notContainsKey":
      return !applyOperator("containsKey", actual, operand);
    case "less":
    case "lessOrEquals":
    case "greater":
    case "greaterOrEquals": {
      const cmp = compareOrdered(actual, operand);
      if (cmp === null) return false;
      if (operator === "less") return cmp < 0;
      if (operator === "lessOrEquals") return cmp <= 0;
      if (operator === "greater") return cmp > 0;
      return cmp >= 0;
    }
    case "exists": {
      const expected = operand === true || operand === "true";
      return (actual !== undefined && actual !== null) === expected;
    }
  }
}

export function evaluateCondition(
  condition: PolicyCondition,
  resource: PolicyResourceRequest,
  params: ParameterValues = {},
): boolean {
  switch (condition.kind) {
    case "allOf":
      return condition.conditions.every((c) => evaluateCondition(c, resource, params));
    case "anyOf":
      return condition.conditions.some((c) => evaluateCondition(c, resource, params));
    case "not":
      return !evaluateCondition(condition.condition, resource, params);
    case "field":
      return applyOperator(
        condition.operator,
        resolveField(resource, condition.field),
        resolveExpressions(condition.operand, params),
      );
    case "value":
      return applyOperator(
        condition.operator,
        resolveExpressions(condition.value, params),
        resolveExpressions(condition.operand, params),
      );
  }
}

/** Evaluate a rule's condition and resolve its effect. */
export function evaluatePolicyRule(
  rule: PolicyRule,
  resource: PolicyResourceRequest,
  params: ParameterValues = {},
): RuleEvaluation {
  const resolvedEffect = resolveExpressions(rule.effect, params);
  const effect = typeof resolvedEffect === "string" ? normalizeEffect(resolvedEffect) : null;
  if (effect === null) {
    throw new Error(`The policy effect '${String(resolvedEffect)}' is not recognized`);
  }
  return { matched: evaluateCondition(rule.condition, resource, params), effect };
}

export type AssignmentBinding = {
  assignment: PolicyAssignmentRecord;
  definition: PolicyDefinitionRecord;
  rule: PolicyRule;
};

/** Whether an assignment's scope covers a resource, honouring notScopes. */
export function assignmentApplies(assignment: PolicyAssignmentRecord, resourceId: string): boolean {
  if (!isWithinScope(resourceId, assignment.scope)) return false;
  return !assignment.notScopes.some((excluded) => isWithinScope(resourceId, excluded));
}

/**
 * Decide a create/update request against every assignment that covers it.
 * `deny` blocks only when the assignment enforces; otherwise it is recorded
 * as an audit.
 */
export function evaluateAssignments(bindings: AssignmentBinding[], resource: PolicyResourceRequest): PolicyDecision {
  const denials: PolicyAssignmentOutcome[] = [];
  const audits: PolicyAssignmentOutcome[] = [];
  const compliant: string[] = [];

  for (const { assignment, definition, rule } of bindings) {
    if (!assignmentApplies(assignment, resource.id)) continue;
    if (definition.mode === "Indexed" && resource.type.toLowerCase() === RESOURCE_GROUP_TYPE.toLowerCase()) continue;

    const params = resolveParameterValues(definition.parameters, assignment.parameters);
    const { matched, effect } = evaluatePolicyRule(rule, resource, params);
    if (effect === "disabled") continue;
    if (!matched) {
      compliant.push(assignment.name);
      continue;
    }

    const enforced = assignment.enforcementMode === "Default";
    const outcome: PolicyAssignmentOutcome = {
      assignmentId: assignment.id,
      assignmentName: assignment.name,
      definitionId: definition.id,
      effect,
      enforced,
    };
    if (effect === "deny" && enforced) denials.push(outcome);
    else audits.push(outcome);
  }

  return { allowed: denials.length === 0, denials, audits, compliant };
}
