/**
 * Config-section validation shared by the host and every extension.
 */

import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigValidationError } from "./errors.js";

/** Apply schema defaults, then check; throws with every failing path. */
export function parseConfigSection<T extends TSchema>(schema: T, value: unknown, source: string): Static<T> {
  const candidate = Value.Default(schema, structuredClone(value ?? {}));
  if (Value.Check(schema, candidate)) return candidate;

  const errors: string[] = [];
  for (const error of Value.Errors(schema, candidate)) {
    errors.push(`${error.path || "/"}: ${error.message}`);
  }
  throw new ConfigValidationError(source, errors);
}
