/**
 * Pipeline runner — executes a trigger's steps against a driver, fail-stop.
 *
 * The first failing step ends the run: its error is recorded verbatim, the
 * remaining steps are marked skipped, and nothing is retried or rolled back.
 */

import {
  formatError,
  isEmptyPlan,
  isReconcileError,
  ReconcileError,
  type PluginLogger,
  type ReconcilePlan,
  type ReconciliationDriver,
} from "../../../src/plugin-sdk/index.js";
import { createPipelineRun, transitionPipeline } from "./state-machine.js";
import type { PipelineRun, PipelineState, PipelineTrigger, StepName, StepRecord } from "./types.js";

export type RunPipelineOptions = {
  logger?: PluginLogger;
};

const ENTRY_STATE: Record<PipelineTrigger, PipelineState> = { validate: "validating", apply: "applying" };
const SUCCESS_STATE: Record<PipelineTrigger, PipelineState> = { validate: "validated", apply: "applied" };
const FAILURE_STATE: Record<PipelineTrigger, PipelineState> = { validate: "rejected", apply: "failed" };

/** A failed step that already produced output worth keeping. */
class StepFailure extends Error {
  constructor(
    public readonly output: string[],
    public readonly reason: unknown,
  ) {
    super(formatError(reason));
    this.name = "StepFailure";
  }
}

function move(run: PipelineRun, to: PipelineState, reason: string): PipelineRun {
  const result = transitionPipeline(run, to, reason);
  if (!result.success) throw new Error(result.error);
  return result.run;
}

function updateStep(run: PipelineRun, name: StepName, patch: Partial<StepRecord>): PipelineRun {
  return { ...run, steps: run.steps.map((s) => (s.name === name ? { ...s, ...patch } : s)), updatedAt: new Date().toISOString() };
}

function planLines(plan: ReconcilePlan): string[] {
  if (isEmptyPlan(plan)) return ["No changes. Infrastructure matches the configuration."];
  const lines = plan.changes
    .filter((c) => c.actions[0] !== "no-op")
    .map((c) => `${c.address}: ${c.actions.join(", ")}`);
  const s = plan.summary;
  lines.push(`Plan: ${s.creates} to add, ${s.updates} to change, ${s.deletes} to destroy, ${s.replaces} to replace.`);
  return lines;
}

/** Run the trigger's steps in order and return the finished run. */
export async function runPipeline(
  trigger: PipelineTrigger,
  driver: ReconciliationDriver,
  options: RunPipelineOptions = {},
): Promise<PipelineRun> {
  const { logger } = options;
  let run = move(createPipelineRun(trigger, driver.id), ENTRY_STATE[trigger], `${trigger} triggered`);
  let plan: ReconcilePlan | null = null;

  const steps: Record<StepName, () => Promise<string[]>> = {
    init: async () => {
      await driver.init();
      return [`Initialized the ${driver.id} driver.`];
    },
    validate: async () => {
      const result = await driver.validate();
      const lines = result.diagnostics.map(
        (d) => `${d.severity === "error" ? "Error" : "Warning"}: ${d.summary}${d.source ? ` (${d.source}${d.path ? ` ${d.path}` : ""})` : ""}`,
      );
      if (!result.valid) {
        const errors = result.diagnostics.filter((d) => d.severity === "error");
        const first = errors[0]?.summary ?? "configuration is invalid";
        throw new StepFailure(lines, new ReconcileError(`Validation failed with ${errors.length} error(s): ${first}`, "parse"));
      }
      return lines.length > 0 ? lines : ["The configuration is valid."];
    },
    plan: async () => {
      plan = await driver.plan();
      run = { ...run, plan: plan.summary };
      return planLines(plan);
    },
    apply: async () => {
      if (!plan) throw new Error("No plan to apply");
      if (isEmptyPlan(plan)) return ["Nothing to apply."];
      const result = await driver.apply(plan);
      const s = result.summary;
      return [`Apply complete! Resources: ${s.creates} added, ${s.updates} changed, ${s.deletes} destroyed, ${s.replaces} replaced.`];
    },
  };

  try {
    for (const step of run.steps.map((s) => s.name)) {
      if (run.error) {
        run = updateStep(run, step, { status: "skipped" });
        continue;
      }

      const startedAt = new Date();
      logger?.info(`▶ ${step}`);
      run = updateStep(run, step, { startedAt: startedAt.toISOString() });
      const finish = (status: StepRecord["status"], output: string[]) => {
        const finishedAt = new Date();
        run = updateStep(run, step, {
          status,
          output,
          finishedAt: finishedAt.toISOString(),
          durationMs: finishedAt.getTime() - startedAt.getTime(),
        });
      };

      try {
        finish("succeeded", await steps[step]());
      } catch (err) {
        const cause = err instanceof StepFailure ? err.reason : err;
        const message = formatError(cause);
        finish("failed", [...(err instanceof StepFailure ? err.output : []), message]);
        run = { ...run, error: { step, kind: isReconcileError(cause) ? cause.kind : "internal", message } };
        logger?.error(`${step} failed: ${message}`);
      }
    }
  } finally {
    await driver.close();
  }

  return run.error
    ? move(run, FAILURE_STATE[trigger], `${run.error.step} failed`)
    : move(run, SUCCESS_STATE[trigger], `all ${run.steps.length} steps succeeded`);
}
