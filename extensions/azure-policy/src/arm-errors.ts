/**
 * Translate Azure Resource Manager failures into reconcile errors.
 */

import { isRestError } from "@azure/core-rest-pipeline";
import {
  AuthenticationError,
  AuthorizationError,
  DependencyOrderError,
  ProviderError,
  ReconcileError,
} from "../../../src/plugin-sdk/index.js";
import { RequestDisallowedByPolicyError } from "./types.js";

export type ArmOperation = {
  /** e.g. `Microsoft.Authorization/policyAssignments/write`. */
  action: string;
  scope: string;
  /** Address or ID to blame for a dependency failure. */
  target: string;
};

/** Whether a thrown value is an ARM 404, for reads and deletes of the resource itself. */
export function isNotFound(err: unknown): boolean {
  return isRestError(err) && err.statusCode === 404;
}

export function toReconcileError(err: unknown, op: ArmOperation): ReconcileError {
  if (err instanceof ReconcileError) return err;
  if (err instanceof RequestDisallowedByPolicyError) return new ProviderError(err.message, err.code, { cause: err });

  if (isRestError(err)) {
    const code = err.code ?? "";
    if (err.statusCode === 401 || code === "InvalidAuthenticationToken" || code === "ExpiredAuthenticationToken") {
      return new AuthenticationError(`Azure rejected the credentials: ${err.message}`, [], { cause: err });
    }
    if (err.statusCode === 403 || code === "AuthorizationFailed") {
      return new AuthorizationError(op.scope, op.action, err.message, { cause: err });
    }
    if (code === "PolicyDefinitionNotFound") {
      return new DependencyOrderError(err.message, op.target, op.target, { cause: err });
    }
    return new ProviderError(err.message, code || undefined, { cause: err });
  }

  // @azure/identity raises CredentialUnavailableError / AuthenticationError by name
  if (err instanceof Error && (err.name === "CredentialUnavailableError" || err.name === "AuthenticationError")) {
    return new AuthenticationError(err.message, [], { cause: err });
  }
  return new ProviderError(err instanceof Error ? err.message : String(err), undefined, { cause: err });
}
