// ─── Pipeline State Machine ────────────────────────────────────────────
//
// Stateless functions: every transition returns a new run object.
// ───────────────────────────────────────────────────────────────────────

import { randomUUID } from "node:crypto";
import type { PipelineRun, PipelineState, PipelineTransition, PipelineTrigger } from "./types.js";
import { PIPELINE_TRANSITIONS, TRIGGER_STATES, TRIGGER_STEPS } from "./types.js";

function now(): string {
  return new Date().toISOString();
}

/* ------------------------------------------------------------------ */
/*  Create a run                                                       */
/* ------------------------------------------------------------------ */

export function createPipelineRun(trigger: PipelineTrigger, driver: string): PipelineRun {
  const ts = now();
  return {
    id: randomUUID(),
    trigger,
    driver,
    state: "idle",
    history: [],
    steps: TRIGGER_STEPS[trigger].map((name) => ({ name, status: "pending", output: [] })),
    plan: null,
    error: null,
    createdAt: ts,
    updatedAt: ts,
  };
}

/* ------------------------------------------------------------------ */
/*  Transition                                                         */
/* ------------------------------------------------------------------ */

export type TransitionError = {
  success: false;
  error: string;
};

export type TransitionSuccess = {
  success: true;
  run: PipelineRun;
};

export type TransitionResult = TransitionError | TransitionSuccess;

/**
 * Attempt to move a run to a new state. The state must be reachable from
 * the current one, and allowed for the run's trigger.
 */
export function transitionPipeline(run: PipelineRun, to: PipelineState, reason: string): TransitionResult {
  const allowed = PIPELINE_TRANSITIONS[run.state];
  if (!allowed.includes(to)) {
    return {
      success: false,
      error: `Invalid transition: "${run.state}" → "${to}". Allowed: [${allowed.join(", ")}]`,
    };
  }
  if (!TRIGGER_STATES[run.trigger].includes(to)) {
    return {
      success: false,
      error: `A ${run.trigger} run may not enter "${to}"`,
    };
  }

  const ts = now();
  const transition: PipelineTransition = { from: run.state, to, timestamp: ts, reason };
  return {
    success: true,
    run: { ...run, state: to, history: [...run.history, transition], updatedAt: ts },
  };
}

/* ------------------------------------------------------------------ */
/*  Queries                                                            */
/* ------------------------------------------------------------------ */

export function isTerminal(state: PipelineState): boolean {
  return PIPELINE_TRANSITIONS[state].length === 0;
}

export function isSuccessful(state: PipelineState): boolean {
  return state === "validated" || state === "applied";
}

/** Process exit code for a finished run. */
export function exitCodeFor(run: PipelineRun): number {
  return isSuccessful(run.state) ? 0 : 1;
}
