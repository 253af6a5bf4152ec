/**
 * Trigger resolution: which path, if any, a CI event takes.
 */

import type { PipelineTrigger, TriggerEvent } from "./types.js";

const PULL_REQUEST_EVENTS = new Set(["pull_request"]);

function branchName(ref: string | undefined): string | undefined {
  if (!ref) return undefined;
  return ref.startsWith("refs/heads/") ? ref.slice("refs/heads/".length) : ref;
}

/**
 * Pull requests against the main branch validate; pushes to it apply.
 * Every other event is ignored (null).
 */
export function resolveTrigger(event: TriggerEvent, mainBranch = "main"): PipelineTrigger | null {
  if (PULL_REQUEST_EVENTS.has(event.eventName)) {
    return branchName(event.baseRef) === mainBranch ? "validate" : null;
  }
  if (event.eventName === "push") {
    return event.ref === `refs/heads/${mainBranch}` ? "apply" : null;
  }
  return null;
}
