/**
 * Azure Policy extension configuration schema (TypeBox).
 *
 * Declares the policy definitions and assignments that make up the desired
 * state. Rule documents live in their own JSON files, resolved relative to
 * the config file.
 */

import { Type, type Static } from "@sinclair/typebox";
import { parseConfigSection } from "../../../src/plugin-sdk/index.js";

const NamePattern = "^[A-Za-z][A-Za-z0-9_-]{0,63}$";

const ParameterDefinitionSchema = Type.Object({
  type: Type.String(),
  defaultValue: Type.Optional(Type.Unknown()),
  allowedValues: Type.Optional(Type.Array(Type.Unknown())),
  metadata: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

export const definitionConfigSchema = Type.Object(
  {
    name: Type.String({ pattern: NamePattern, description: "Definition name, unique within the subscription" }),
    displayName: Type.String({ minLength: 1, maxLength: 128 }),
    description: Type.String({ default: "", maxLength: 512 }),
    mode: Type.Union([Type.Literal("All"), Type.Literal("Indexed")], { default: "All" }),
    policyType: Type.Union([Type.Literal("Custom"), Type.Literal("BuiltIn"), Type.Literal("Static"), Type.Literal("NotSpecified")], {
      default: "Custom",
    }),
    ruleFile: Type.String({ minLength: 1, description: "Path to the rule document, relative to the config file" }),
    parameters: Type.Record(Type.String(), ParameterDefinitionSchema, { default: {} }),
    metadata: Type.Record(Type.String(), Type.Unknown(), { default: {} }),
  },
  { additionalProperties: false },
);

export const assignmentConfigSchema = Type.Object(
  {
    name: Type.String({ pattern: NamePattern }),
    displayName: Type.String({ minLength: 1, maxLength: 128 }),
    description: Type.String({ default: "", maxLength: 512 }),
    definition: Type.String({ minLength: 1, description: "Logical name of a declared definition, or a full definition ID" }),
    scope: Type.String({
      default: "subscription",
      description: '"subscription" for the configured subscription, or a full scope resource ID',
    }),
    enforcementMode: Type.Union([Type.Literal("Default"), Type.Literal("DoNotEnforce")], { default: "Default" }),
    parameters: Type.Record(Type.String(), Type.Unknown(), { default: {} }),
    notScopes: Type.Array(Type.String(), { default: [] }),
  },
  { additionalProperties: false },
);

export const configSchema = Type.Object({
  subscriptionId: Type.Optional(Type.String({ description: "Target subscription; defaults to ARM_SUBSCRIPTION_ID" })),
  controlPlane: Type.Union([Type.Literal("arm"), Type.Literal("memory")], {
    default: "arm",
    description: "arm talks to Azure Resource Manager; memory keeps everything in process",
  }),
  definitions: Type.Array(definitionConfigSchema, { default: [] }),
  assignments: Type.Array(assignmentConfigSchema, { default: [] }),
});

export type AzurePolicyConfig = Static<typeof configSchema>;
export type DefinitionConfig = Static<typeof definitionConfigSchema>;
export type AssignmentConfig = Static<typeof assignmentConfigSchema>;

export function parseAzurePolicyConfig(value: unknown): AzurePolicyConfig {
  return parseConfigSection(configSchema, value, "plugins.azure-policy");
}
