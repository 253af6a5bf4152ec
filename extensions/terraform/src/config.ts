/**
 * Reconciliation extension configuration schema (TypeBox).
 */

import { Type, type Static } from "@sinclair/typebox";
import { parseConfigSection } from "../../../src/plugin-sdk/index.js";

export const DEFAULT_CREDENTIAL_VARIABLES = ["ARM_CLIENT_ID", "ARM_CLIENT_SECRET", "ARM_SUBSCRIPTION_ID", "ARM_TENANT_ID"];

const CloudSchema = Type.Object(
  {
    organization: Type.String({ minLength: 1 }),
    workspace: Type.String({ minLength: 1 }),
    hostname: Type.Optional(Type.String({ minLength: 1 })),
  },
  { additionalProperties: false },
);

export const configSchema = Type.Object(
  {
    provider: Type.String({ default: "azurerm", description: "Resource provider the drivers reconcile" }),
    backend: Type.Union([Type.Literal("sqlite"), Type.Literal("memory")], {
      default: "sqlite",
      description: "State backend of the native driver",
    }),
    statePath: Type.String({ default: ".policy-gate/state.db", description: "SQLite state file, relative to the config file" }),
    stateId: Type.String({ minLength: 1, default: "default" }),
    terraform: Type.Object(
      {
        workingDir: Type.String({ default: "terraform" }),
        bin: Type.String({ default: "terraform" }),
        planFile: Type.String({ default: "policy-gate.tfplan" }),
        render: Type.Boolean({ default: true, description: "Regenerate main.tf and providers.tf from the declarations" }),
        cloud: Type.Optional(CloudSchema),
        credentialVariables: Type.Array(Type.String(), { default: DEFAULT_CREDENTIAL_VARIABLES }),
      },
      { additionalProperties: false, default: {} },
    ),
  },
  { additionalProperties: false },
);

export type ReconcileConfig = Static<typeof configSchema>;

/**
 * Parse the extension's section. `POLICY_GATE_STATE_PATH` overrides the
 * configured state file.
 */
export function parseReconcileConfig(value: unknown, env: NodeJS.ProcessEnv = process.env): ReconcileConfig {
  const config = parseConfigSection(configSchema, value, "plugins.terraform");
  const statePath = env.POLICY_GATE_STATE_PATH?.trim();
  return statePath ? { ...config, statePath } : config;
}
