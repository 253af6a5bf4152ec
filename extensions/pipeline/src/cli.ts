/**
 * Pipeline — CLI Commands
 */

import { appendFile } from "node:fs/promises";
import type { Command } from "commander";
import type { PluginLogger, ReconciliationDriver } from "../../../src/plugin-sdk/index.js";
import { formatRunReport } from "./report.js";
import { runPipeline } from "./runner.js";
import { exitCodeFor } from "./state-machine.js";
import { resolveTrigger } from "./trigger.js";

export type PipelineCliDeps = {
  resolveDriver: (id?: string) => ReconciliationDriver;
  env: NodeJS.ProcessEnv;
};

type RunOptions = {
  event?: string;
  ref?: string;
  baseRef?: string;
  mainBranch: string;
  driver?: string;
  summary?: string;
  json?: boolean;
};

export function createPipelineCli(deps: PipelineCliDeps, logger: PluginLogger) {
  return (program: Command) => {
    const pipeline = program.command("pipeline").description("Two-phase policy gate: validate pull requests, apply merges");

    // ── pipeline run ────────────────────────────────────────────
    pipeline
      .command("run")
      .description("Run the path the CI event selects (defaults come from GITHUB_* variables)")
      .option("--event <name>", "Event name, e.g. pull_request or push", deps.env.GITHUB_EVENT_NAME)
      .option("--ref <ref>", "Git ref the event ran on", deps.env.GITHUB_REF)
      .option("--base-ref <branch>", "Target branch of a pull request", deps.env.GITHUB_BASE_REF)
      .option("--main-branch <branch>", "Branch whose pull requests validate and pushes apply", "main")
      .option("--driver <id>", "Reconciliation driver (native | terraform)")
      .option("--summary <file>", "Markdown report file to append to", deps.env.GITHUB_STEP_SUMMARY)
      .option("--json", "Output the run as JSON")
      .action(async (opts: RunOptions) => {
        if (!opts.event) throw new Error("No event given; pass --event or set GITHUB_EVENT_NAME");

        const trigger = resolveTrigger({ eventName: opts.event, ref: opts.ref, baseRef: opts.baseRef }, opts.mainBranch);
        if (!trigger) {
          const message = `Event "${opts.event}" on ${opts.ref ?? opts.baseRef ?? "(no ref)"} does not trigger the policy gate; nothing to do.`;
          if (opts.json) console.log(JSON.stringify({ trigger: null, message }, null, 2));
          else console.log(message);
          return;
        }

        logger.info(`Event "${opts.event}" selects the ${trigger} path`);
        const run = await runPipeline(trigger, deps.resolveDriver(opts.driver), { logger });
        const report = formatRunReport(run);
        if (opts.summary) await appendFile(opts.summary, report, "utf-8");

        if (opts.json) console.log(JSON.stringify(run, null, 2));
        else console.log(report);
        process.exitCode = exitCodeFor(run);
      });
  };
}
