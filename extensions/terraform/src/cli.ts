/**
 * Reconciliation — CLI Commands
 */

import type { Command } from "commander";
import type { PluginLogger, ReconcilePlan, ReconciliationDriver, ValidationResult } from "../../../src/plugin-sdk/index.js";
import { isEmptyPlan } from "../../../src/plugin-sdk/index.js";
import { formatChanges } from "./planner.js";
import type { StateManager } from "./state-manager.js";

export type ReconcileCliDeps = {
  resolveDriver: (id?: string) => ReconciliationDriver;
  state: StateManager;
  stateId: string;
  /** Render the declarations to Terraform files; returns the paths written. */
  render: (outDir?: string) => Promise<string[]>;
};

export type LockAwareDriver = ReconciliationDriver & { forceUnlock(lockId: string): Promise<void> };

function isLockAware(driver: ReconciliationDriver): driver is LockAwareDriver {
  return "forceUnlock" in driver && typeof driver.forceUnlock === "function";
}

/** Run `fn` against a fresh driver and always close it. */
async function withDriver<T>(deps: ReconcileCliDeps, id: string | undefined, fn: (driver: ReconciliationDriver) => Promise<T>): Promise<T> {
  const driver = deps.resolveDriver(id);
  try {
    return await fn(driver);
  } finally {
    await driver.close();
  }
}

function printValidation(result: ValidationResult): void {
  if (result.diagnostics.length === 0) {
    console.log("Success! The configuration is valid.");
    return;
  }
  for (const d of result.diagnostics) {
    console.log(`${d.severity === "error" ? "Error" : "Warning"}: ${d.summary}`);
    if (d.detail) console.log(`  ${d.detail}`);
    if (d.source) console.log(`  on ${d.source}${d.path ? ` ${d.path}` : ""}`);
  }
}

function printPlan(plan: ReconcilePlan): void {
  if (isEmptyPlan(plan)) {
    console.log("No changes. Your infrastructure matches the configuration.");
    return;
  }
  for (const line of formatChanges(plan.changes)) console.log(line);
  const s = plan.summary;
  console.log(`\nPlan: ${s.creates} to add, ${s.updates} to change, ${s.deletes} to destroy, ${s.replaces} to replace.`);
}

/** init, validate and plan; an invalid configuration stops before planning. */
async function planWith(driver: ReconciliationDriver, destroy: boolean): Promise<ReconcilePlan | null> {
  await driver.init();
  const validation = await driver.validate();
  if (!validation.valid) {
    printValidation(validation);
    process.exitCode = 1;
    return null;
  }
  return driver.plan({ destroy });
}

export function createReconcileCli(deps: ReconcileCliDeps, logger: PluginLogger) {
  return (program: Command) => {
    const reconcile = program.command("reconcile").description("Reconcile declared policy resources with Azure");

    // ── reconcile init ──────────────────────────────────────────
    reconcile
      .command("init")
      .description("Check credentials and prepare the driver's state backend")
      .option("--driver <id>", "Reconciliation driver (native | terraform)")
      .action(async (opts: { driver?: string }) => {
        await withDriver(deps, opts.driver, async (driver) => {
          await driver.init();
          console.log(`${driver.id} driver has been successfully initialized!`);
        });
      });

    // ── reconcile validate ──────────────────────────────────────
    reconcile
      .command("validate")
      .description("Initialize, then check rule documents, references and dependency order")
      .option("--driver <id>", "Reconciliation driver (native | terraform)")
      .option("--json", "Output as JSON")
      .action(async (opts: { driver?: string; json?: boolean }) => {
        await withDriver(deps, opts.driver, async (driver) => {
          await driver.init();
          const result = await driver.validate();
          if (!result.valid) process.exitCode = 1;
          if (opts.json) console.log(JSON.stringify(result, null, 2));
          else printValidation(result);
        });
      });

    // ── reconcile plan ──────────────────────────────────────────
    reconcile
      .command("plan")
      .description("Show the changes an apply would make")
      .option("--driver <id>", "Reconciliation driver (native | terraform)")
      .option("--destroy", "Plan the removal of every managed resource")
      .option("--detailed-exitcode", "Exit 2 when the plan has changes")
      .option("--json", "Output as JSON")
      .action(async (opts: { driver?: string; destroy?: boolean; detailedExitcode?: boolean; json?: boolean }) => {
        await withDriver(deps, opts.driver, async (driver) => {
          const plan = await planWith(driver, opts.destroy ?? false);
          if (!plan) return;
          if (opts.json) console.log(JSON.stringify(plan, null, 2));
          else printPlan(plan);
          if (opts.detailedExitcode && !isEmptyPlan(plan)) process.exitCode = 2;
        });
      });

    // ── reconcile apply / destroy ───────────────────────────────
    const applyAction = (destroy: boolean) => async (opts: { driver?: string; json?: boolean }) => {
      await withDriver(deps, opts.driver, async (driver) => {
        const plan = await planWith(driver, destroy);
        if (!plan) return;
        if (!opts.json) printPlan(plan);
        if (isEmptyPlan(plan)) {
          if (opts.json) console.log(JSON.stringify({ plan, result: null }, null, 2));
          return;
        }
        const result = await driver.apply(plan);
        if (opts.json) {
          console.log(JSON.stringify({ plan, result }, null, 2));
          return;
        }
        const s = result.summary;
        console.log(
          `\nApply complete! Resources: ${s.creates} added, ${s.updates} changed, ${s.deletes} destroyed, ${s.replaces} replaced.`,
        );
      });
    };

    reconcile
      .command("apply")
      .description("Plan and apply the changes")
      .option("--driver <id>", "Reconciliation driver (native | terraform)")
      .option("--json", "Output as JSON")
      .action(applyAction(false));

    reconcile
      .command("destroy")
      .description("Remove every managed resource")
      .option("--driver <id>", "Reconciliation driver (native | terraform)")
      .option("--json", "Output as JSON")
      .action(applyAction(true));

    // ── reconcile force-unlock ──────────────────────────────────
    reconcile
      .command("force-unlock")
      .description("Release a state lock left behind by an interrupted run")
      .argument("<lockId>", "ID of the lock to release")
      .option("--driver <id>", "Reconciliation driver (native | terraform)")
      .action(async (lockId: string, opts: { driver?: string }) => {
        await withDriver(deps, opts.driver, async (driver) => {
          if (!isLockAware(driver)) throw new Error(`The ${driver.id} driver does not support force-unlock`);
          if (driver.id !== "native") await driver.init();
          await driver.forceUnlock(lockId);
          console.log(`State has been successfully unlocked (lock ${lockId}).`);
        });
      });

    // ── reconcile render ────────────────────────────────────────
    reconcile
      .command("render")
      .description("Write the declarations as Terraform configuration")
      .option("--out <dir>", "Output directory (default: the configured working directory)")
      .action(async (opts: { out?: string }) => {
        const written = await deps.render(opts.out);
        for (const file of written) console.log(`Wrote ${file}`);
      });

    // ── reconcile state ─────────────────────────────────────────
    const state = reconcile.command("state").description("Inspect the native driver's state");

    state
      .command("show")
      .description("Show the current state")
      .option("--json", "Output as JSON")
      .action(async (opts: { json?: boolean }) => {
        await deps.state.initialize();
        const snapshot = await deps.state.readState(deps.stateId);
        const lock = await deps.state.getStateLock(deps.stateId);

        if (opts.json) {
          console.log(JSON.stringify({ stateId: deps.stateId, lock, ...snapshot }, null, 2));
          return;
        }
        console.log(`State "${deps.stateId}" serial ${snapshot.serial}, lineage ${snapshot.lineage ?? "(none)"}`);
        if (lock) console.log(`Locked by ${lock.lockedBy} for ${lock.operation} since ${lock.lockedAt} (ID ${lock.id})`);
        if (snapshot.resources.length === 0) {
          console.log("No resources are tracked.");
          return;
        }
        for (const r of snapshot.resources) console.log(`  ${r.address}  ${r.id}`);
      });

    state
      .command("history")
      .description("List state versions, newest first")
      .option("--limit <n>", "Number of versions", "20")
      .option("--json", "Output as JSON")
      .action(async (opts: { limit: string; json?: boolean }) => {
        const limit = Number.parseInt(opts.limit, 10);
        if (!Number.isInteger(limit) || limit <= 0) throw new Error(`--limit must be a positive integer, got "${opts.limit}"`);
        await deps.state.initialize();
        const versions = await deps.state.history(deps.stateId, limit);

        if (opts.json) {
          console.log(JSON.stringify(versions.map(({ snapshot: _snapshot, ...v }) => v), null, 2));
          return;
        }
        if (versions.length === 0) {
          console.log(`State "${deps.stateId}" has no versions.`);
          return;
        }
        for (const v of versions) {
          console.log(`  #${v.serial}  ${v.writtenAt}  ${v.operation}  (${v.resourceCount} resources)`);
        }
      });

    state
      .command("diff")
      .description("Compare two state versions")
      .argument("<from>", "Older serial")
      .argument("<to>", "Newer serial")
      .option("--json", "Output as JSON")
      .action(async (from: string, to: string, opts: { json?: boolean }) => {
        await deps.state.initialize();
        const versions = await deps.state.history(deps.stateId);
        const find = (serial: string) => {
          const version = versions.find((v) => String(v.serial) === serial);
          if (!version) throw new Error(`State "${deps.stateId}" has no version with serial ${serial}`);
          return version.snapshot;
        };
        const diff = deps.state.diffStates(find(from), find(to));

        if (opts.json) {
          console.log(JSON.stringify(diff, null, 2));
          return;
        }
        console.log(`Serial ${diff.beforeSerial} -> ${diff.afterSerial}: ${diff.additions} added, ${diff.removals} removed, ${diff.changes} changed`);
        for (const e of diff.entries) {
          const marker = e.action === "added" ? "+" : e.action === "removed" ? "-" : "~";
          console.log(`  ${marker} ${e.address}`);
          for (const c of e.changedAttributes ?? []) console.log(`      ${c.path}`);
        }
      });

    logger.debug("Registered reconcile commands");
  };
}
