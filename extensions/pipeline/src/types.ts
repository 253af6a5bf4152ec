// ─── CI Pipeline Types ─────────────────────────────────────────────────
//
// Two-phase gate, as an explicit state machine:
//   pull request against main: idle → validating → validated | rejected
//   push to main:              idle → applying   → applied   | failed
// There is no edge from validated to applying; merging is the trigger.
// ───────────────────────────────────────────────────────────────────────

import type { PlanSummary, ReconcileErrorKind } from "../../../src/plugin-sdk/index.js";

export type PipelineState = "idle" | "validating" | "validated" | "rejected" | "applying" | "applied" | "failed";

/** Valid transitions: state → allowed next states. */
export const PIPELINE_TRANSITIONS: Record<PipelineState, PipelineState[]> = {
  idle: ["validating", "applying"],
  validating: ["validated", "rejected"],
  validated: [], // terminal; apply needs its own push event
  rejected: [],
  applying: ["applied", "failed"],
  applied: [],
  failed: [],
};

export type PipelineTrigger = "validate" | "apply";

/** States each trigger may enter. A pull request never reaches `applying`. */
export const TRIGGER_STATES: Record<PipelineTrigger, PipelineState[]> = {
  validate: ["validating", "validated", "rejected"],
  apply: ["applying", "applied", "failed"],
};

export type StepName = "init" | "validate" | "plan" | "apply";

/** Steps each trigger runs, in order. */
export const TRIGGER_STEPS: Record<PipelineTrigger, StepName[]> = {
  validate: ["init", "validate", "plan"],
  apply: ["init", "validate", "plan", "apply"],
};

/** Event that may start a run, as GitHub Actions reports it. */
export type TriggerEvent = {
  /** `GITHUB_EVENT_NAME`, e.g. `pull_request` or `push`. */
  eventName: string;
  /** `GITHUB_REF`, e.g. `refs/heads/main` or `refs/pull/7/merge`. */
  ref?: string;
  /** `GITHUB_BASE_REF`: target branch of a pull request. */
  baseRef?: string;
};

export type StepStatus = "pending" | "succeeded" | "failed" | "skipped";

/** Failure reported verbatim; `internal` covers errors outside the reconciliation taxonomy. */
export type RunError = {
  step: StepName;
  kind: ReconcileErrorKind | "internal";
  message: string;
};

export type StepRecord = {
  name: StepName;
  status: StepStatus;
  startedAt?: string;
  finishedAt?: string;
  durationMs?: number;
  /** Lines the step printed. */
  output: string[];
};

export type PipelineTransition = {
  from: PipelineState;
  to: PipelineState;
  timestamp: string; // ISO-8601
  reason: string;
};

export type PipelineRun = {
  id: string;
  trigger: PipelineTrigger;
  /** Reconciliation driver id. */
  driver: string;
  state: PipelineState;
  history: PipelineTransition[];
  steps: StepRecord[];
  /** Summary of the plan step, once it ran. */
  plan: PlanSummary | null;
  error: RunError | null;
  createdAt: string;
  updatedAt: string;
};
