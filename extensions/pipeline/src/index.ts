export * from "./types.js";
export { resolveTrigger } from "./trigger.js";
export {
  createPipelineRun,
  transitionPipeline,
  isTerminal,
  isSuccessful,
  exitCodeFor,
  type TransitionResult,
} from "./state-machine.js";
export { runPipeline, type RunPipelineOptions } from "./runner.js";
export { formatRunReport } from "./report.js";
export { createPipelineCli } from "./cli.js";
