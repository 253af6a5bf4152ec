/**
 * Schemas for the machine-readable output of the `terraform` CLI.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

const AttributeMap = Type.Union([Type.Record(Type.String(), Type.Unknown()), Type.Null()]);

/** `terraform validate -json` output. */
export const validateOutputSchema = Type.Object({
  valid: Type.Boolean(),
  error_count: Type.Number(),
  warning_count: Type.Number(),
  diagnostics: Type.Array(
    Type.Object({
      severity: Type.Union([Type.Literal("error"), Type.Literal("warning")]),
      summary: Type.String(),
      detail: Type.Optional(Type.String()),
      range: Type.Optional(
        Type.Object({
          filename: Type.String(),
          start: Type.Object({ line: Type.Number(), column: Type.Number() }),
        }),
      ),
    }),
  ),
});

export type TerraformValidateOutput = Static<typeof validateOutputSchema>;

export const resourceChangeSchema = Type.Object({
  address: Type.String(),
  type: Type.String(),
  name: Type.String(),
  mode: Type.String(),
  change: Type.Object({
    actions: Type.Array(Type.String()),
    before: AttributeMap,
    after: AttributeMap,
  }),
});

export type TerraformResourceChange = Static<typeof resourceChangeSchema>;

/** The parts of `terraform show -json <planfile>` the driver reads. */
export const planJsonSchema = Type.Object({
  format_version: Type.String(),
  terraform_version: Type.Optional(Type.String()),
  resource_changes: Type.Optional(Type.Array(resourceChangeSchema)),
});

export type TerraformPlanJson = Static<typeof planJsonSchema>;

export function parseValidateOutput(json: unknown): TerraformValidateOutput | null {
  return Value.Check(validateOutputSchema, json) ? json : null;
}

export function parsePlanJson(json: unknown): TerraformPlanJson | null {
  return Value.Check(planJsonSchema, json) ? json : null;
}
