/**
 * Azure Policy — Credentials
 *
 * Resolves the service principal the workflow authenticates as from the
 * `ARM_*` environment variables shared with the azurerm Terraform provider.
 */

import type { TokenCredential } from "@azure/identity";
import { AuthenticationError } from "../../../src/plugin-sdk/index.js";

export const CREDENTIAL_VARIABLES = [
  "ARM_CLIENT_ID",
  "ARM_CLIENT_SECRET",
  "ARM_SUBSCRIPTION_ID",
  "ARM_TENANT_ID",
] as const;

export type ArmCredentials = {
  clientId: string;
  clientSecret: string;
  subscriptionId: string;
  tenantId: string;
};

/** Names of the credential variables that are unset or blank. */
export function missingCredentials(env: NodeJS.ProcessEnv): string[] {
  return CREDENTIAL_VARIABLES.filter((name) => !env[name]?.trim());
}

/** Read all four credentials, failing with every missing name at once. */
export function resolveArmCredentials(env: NodeJS.ProcessEnv): ArmCredentials {
  const missing = missingCredentials(env);
  const clientId = env.ARM_CLIENT_ID?.trim();
  const clientSecret = env.ARM_CLIENT_SECRET?.trim();
  const subscriptionId = env.ARM_SUBSCRIPTION_ID?.trim();
  const tenantId = env.ARM_TENANT_ID?.trim();
  if (!clientId || !clientSecret || !subscriptionId || !tenantId) {
    throw new AuthenticationError(`Missing Azure credentials: ${missing.join(", ")} must be set`, missing);
  }
  return { clientId, clientSecret, subscriptionId, tenantId };
}

/**
 * Build the token credential. Dynamic import of @azure/identity keeps it
 * off the load path for the in-memory control plane.
 */
export async function createTokenCredential(credentials: ArmCredentials): Promise<TokenCredential> {
  const identity = await import("@azure/identity");
  return new identity.ClientSecretCredential(credentials.tenantId, credentials.clientId, credentials.clientSecret);
}
