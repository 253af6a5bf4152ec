/**
 * Policy rule documents — parse and check `{ "if": ..., "then": ... }`.
 *
 * The envelope is checked with a TypeBox schema; conditions are walked by
 * hand so every problem carries the JSON path it was found at.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { RuleDocumentError, type Diagnostic } from "../../../src/plugin-sdk/index.js";
import {
  CONDITION_OPERATORS,
  POLICY_EFFECTS,
  type ConditionOperator,
  type PolicyCondition,
  type PolicyEffect,
  type PolicyRule,
} from "./types.js";

const RuleEnvelopeSchema = Type.Object(
  {
    if: Type.Record(Type.String(), Type.Unknown()),
    then: Type.Object({
      effect: Type.String({ minLength: 1 }),
      details: Type.Optional(Type.Unknown()),
    }),
  },
  { additionalProperties: false },
);

const PARAMETER_EXPRESSION = /^\[parameters\('([^']+)'\)\]$/i;

export type RuleParseOptions = {
  /** Parameters the enclosing definition declares; references to others are errors. */
  parameterNames?: string[];
};

export type RuleCheckResult = {
  rule: PolicyRule | null;
  diagnostics: Diagnostic[];
};

/** Name of the parameter a `[parameters('x')]` string refers to, if it is one. */
export function parameterReference(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const match = PARAMETER_EXPRESSION.exec(value.trim());
  return match ? match[1] : null;
}

/** Canonical spelling of an effect name, matched case-insensitively. */
export function normalizeEffect(value: string): PolicyEffect | null {
  const lower = value.toLowerCase();
  return POLICY_EFFECTS.find((e) => e.toLowerCase() === lower) ?? null;
}

function isOperator(key: string): key is ConditionOperator {
  return CONDITION_OPERATORS.some((op) => op === key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse JSON text into a rule, collecting every problem instead of
 * stopping at the first.
 */
export function checkPolicyRuleDocument(text: string, source: string, options: RuleParseOptions = {}): RuleCheckResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return {
      rule: null,
      diagnostics: [
        {
          severity: "error",
          summary: `Invalid JSON in ${source}: ${err instanceof Error ? err.message : String(err)}`,
          source,
        },
      ],
    };
  }
  return checkPolicyRule(parsed, source, options);
}

/** Check an already-decoded value as a rule document. */
export function checkPolicyRule(value: unknown, source: string, options: RuleParseOptions = {}): RuleCheckResult {
  const diagnostics: Diagnostic[] = [];
  const error = (path: string, summary: string) => diagnostics.push({ severity: "error", summary, source, path });

  if (!Value.Check(RuleEnvelopeSchema, value)) {
    for (const e of Value.Errors(RuleEnvelopeSchema, value)) {
      error(e.path || "/", e.message);
    }
    return { rule: null, diagnostics };
  }

  const parameterNames = options.parameterNames ? new Set(options.parameterNames) : null;
  const checkExpressions = (operand: unknown, path: string) => {
    for (const [str, at] of collectStrings(operand, path)) {
      if (str.startsWith("[[") || !str.startsWith("[")) continue;
      const param = parameterReference(str);
      if (param === null) {
        error(at, `Unsupported template expression '${str}'; only [parameters('name')] is supported`);
      } else if (parameterNames && !parameterNames.has(param)) {
        error(at, `Parameter '${param}' is not defined`);
      }
    }
  };

  const condition = parseCondition(value.if, "/if", error, checkExpressions);

  const effect = value.then.effect;
  const effectParam = parameterReference(effect);
  if (effectParam !== null) {
    checkExpressions(effect, "/then/effect");
  } else if (normalizeEffect(effect) === null) {
    error("/then/effect", `Unknown effect '${effect}'. Expected one of: ${POLICY_EFFECTS.join(", ")}`);
  }

  if (!condition || diagnostics.length > 0) return { rule: null, diagnostics };

  return {
    rule: {
      condition,
      effect: effectParam !== null ? effect : (normalizeEffect(effect) ?? effect),
      details: value.then.details,
      document: value,
    },
    diagnostics,
  };
}

/** Parse JSON text into a rule, or throw a RuleDocumentError naming each problem. */
export function parsePolicyRuleDocument(text: string, source: string, options: RuleParseOptions = {}): PolicyRule {
  return unwrap(checkPolicyRuleDocument(text, source, options), source);
}

export function parsePolicyRule(value: unknown, source: string, options: RuleParseOptions = {}): PolicyRule {
  return unwrap(checkPolicyRule(value, source, options), source);
}

function unwrap(result: RuleCheckResult, source: string): PolicyRule {
  if (result.rule) return result.rule;
  const [first] = result.diagnostics;
  if (result.diagnostics.length === 1 && first && !first.path) {
    throw new RuleDocumentError(first.summary, source, result.diagnostics);
  }
  const lines = result.diagnostics.map((d) => `${d.path ?? "/"}: ${d.summary}`);
  throw new RuleDocumentError(`Invalid policy rule in ${source}:\n  ${lines.join("\n  ")}`, source, result.diagnostics);
}

// ── Conditions ──────────────────────────────────────────────────

function parseCondition(
  raw: unknown,
  path: string,
  error: (path: string, summary: string) => void,
  checkExpressions: (operand: unknown, path: string) => void,
): PolicyCondition | null {
  if (!isRecord(raw)) {
    error(path, "Condition must be an object");
    return null;
  }

  const keys = Object.keys(raw);
  if (keys.length === 0) {
    error(path, "Condition is empty");
    return null;
  }

  for (const logical of ["allOf", "anyOf"] as const) {
    if (!(logical in raw)) continue;
    if (keys.length !== 1) {
      error(path, `'${logical}' cannot be combined with other keys (${keys.filter((k) => k !== logical).join(", ")})`);
      return null;
    }
    const list = raw[logical];
    if (!Array.isArray(list) || list.length === 0) {
      error(`${path}/${logical}`, `'${logical}' must be a non-empty array of conditions`);
      return null;
    }
    const conditions: PolicyCondition[] = [];
    list.forEach((item, i) => {
      const parsed = parseCondition(item, `${path}/${logical}/${i}`, error, checkExpressions);
      if (parsed) conditions.push(parsed);
    });
    return conditions.length === list.length ? { kind: logical, conditions } : null;
  }

  if ("not" in raw) {
    if (keys.length !== 1) {
      error(path, "'not' cannot be combined with other keys");
      return null;
    }
    const inner = parseCondition(raw.not, `${path}/not`, error, checkExpressions);
    return inner ? { kind: "not", condition: inner } : null;
  }

  if ("count" in raw) {
    error(path, "'count' expressions are not supported");
    return null;
  }

  const hasField = "field" in raw;
  const hasValue = "value" in raw;
  if (hasField && hasValue) {
    error(path, "A condition takes either 'field' or 'value', not both");
    return null;
  }
  if (!hasField && !hasValue) {
    error(path, `Unrecognized condition: expected allOf, anyOf, not, field or value (found ${keys.join(", ")})`);
    return null;
  }

  const subject = hasField ? "field" : "value";
  const operatorKeys = keys.filter((k) => k !== subject);
  const unknown = operatorKeys.filter((k) => !isOperator(k));
  if (unknown.length > 0) {
    error(`${path}/${unknown[0]}`, `Unknown operator '${unknown[0]}'`);
    return null;
  }
  if (operatorKeys.length !== 1) {
    error(
      path,
      operatorKeys.length === 0
        ? "Condition has no operator"
        : `Condition must have exactly one operator, found ${operatorKeys.length}: ${operatorKeys.join(", ")}`,
    );
    return null;
  }

  const operator = operatorKeys[0];
  if (!isOperator(operator)) return null;
  const operand = raw[operator];
  const operandPath = `${path}/${operator}`;

  if (!checkOperand(operator, operand, operandPath, error)) return null;
  checkExpressions(operand, operandPath);

  if (hasField) {
    const field = raw.field;
    if (typeof field !== "string" || field.trim() === "") {
      error(`${path}/field`, "'field' must be a non-empty string");
      return null;
    }
    return { kind: "field", field, operator, operand };
  }

  checkExpressions(raw.value, `${path}/value`);
  return { kind: "value", value: raw.value, operator, operand };
}

function checkOperand(
  operator: ConditionOperator,
  operand: unknown,
  path: string,
  error: (path: string, summary: string) => void,
): boolean {
  if (parameterReference(operand) !== null) return true;

  switch (operator) {
    case "in":
    case "notIn":
      if (!Array.isArray(operand)) {
        error(path, `'${operator}' expects an array`);
        return false;
      }
      return true;
    case "exists":
      if (typeof operand !== "boolean" && operand !== "true" && operand !== "false") {
        error(path, "'exists' expects true or false");
        return false;
      }
      return true;
    case "like":
    case "notLike":
    case "match":
    case "notMatch":
    case "matchInsensitively":
    case "notMatchInsensitively":
    case "containsKey":
    case "notContainsKey":
      if (typeof operand !== "string") {
        error(path, `'${operator}' expects a string`);
        return false;
      }
      return true;
    default:
      return true;
  }
}

function collectStrings(value: unknown, path: string): Array<[string, string]> {
  if (typeof value === "string") return [[value, path]];
  if (Array.isArray(value)) return value.flatMap((v, i) => collectStrings(v, `${path}/${i}`));
  if (isRecord(value)) return Object.entries(value).flatMap(([k, v]) => collectStrings(v, `${path}/${k}`));
  return [];
}
