/**
 * Terraform reconciliation driver.
 *
 * Drives the real `terraform` binary: renders the provider's declared
 * resources into the working directory, then runs
 * `init -> validate -> plan -out -> show -json -> apply <planfile>`.
 * State, locking and plan staleness belong to the configured Terraform
 * backend; this driver only translates its output into the shared contract.
 */

import { randomUUID } from "node:crypto";
import { mkdir, writeFile } from "node:fs/promises";
import * as path from "node:path";
import {
  AuthenticationError,
  AuthorizationError,
  DependencyOrderError,
  LockContentionError,
  ProviderError,
  ReconcileError,
  ResourceConflictError,
  type ApplyResult,
  type ChangeAction,
  type Diagnostic,
  type PlannedChange,
  type PluginLogger,
  type ReconcilePlan,
  type ReconciliationDriver,
  type ResourceProvider,
  type ValidationResult,
} from "../../../src/plugin-sdk/index.js";
import {
  isTerraformInstalled,
  tfApply,
  tfForceUnlock,
  tfInit,
  tfPlan,
  tfShow,
  tfValidate,
  type TfCliOptions,
  type TfCliResult,
} from "./cli-wrapper.js";
import { changedRoots, diffAttributes } from "./diff.js";
import { renderConfiguration, renderProviders, type CloudBackend } from "./hcl-generator.js";
import { summarizeChanges } from "./planner.js";
import { parsePlanJson, parseValidateOutput, type TerraformResourceChange } from "./terraform-json.js";

export type TerraformDriverOptions = {
  provider: ResourceProvider;
  /** Directory holding the Terraform configuration. */
  workingDir: string;
  env: NodeJS.ProcessEnv;
  logger: PluginLogger;
  /** Workspace name, reported as the plan's state id. */
  stateId: string;
  terraformBin?: string;
  /** Saved plan file, relative to the working directory. */
  planFile?: string;
  /** Regenerate main.tf and providers.tf from the declarations before each step. */
  render?: boolean;
  cloud?: CloudBackend;
  /** Environment variables that must be set before `init`. */
  credentialVariables: string[];
};

const DEFAULT_PLAN_FILE = "policy-gate.tfplan";

// ── Failure classification ──────────────────────────────────────

function capture(text: string, pattern: RegExp): string | undefined {
  return pattern.exec(text)?.[1];
}

/** `Lock Info:` block of a state lock error, with or without diagnostic box drawing. */
export function parseLockInfo(
  stderr: string,
): { id: string; operation: string; lockedBy: string; lockedAt: string } | null {
  const id = capture(stderr, /^[\s│]*ID:\s*(\S+)/m);
  if (!id) return null;
  return {
    id,
    operation: capture(stderr, /^[\s│]*Operation:\s*(\S+)/m) ?? "unknown",
    lockedBy: capture(stderr, /^[\s│]*Who:\s*(\S+)/m) ?? "unknown",
    lockedAt: capture(stderr, /^[\s│]*Created:\s*(.+)$/m)?.trim() ?? "unknown",
  };
}

/** Resource address from the `with <address>,` line Terraform prints under an error. */
function erroredAddress(stderr: string): string {
  return capture(stderr, /with ([A-Za-z0-9_]+\.[A-Za-z0-9_-]+)/) ?? "(unknown)";
}

function failureText(result: TfCliResult): string {
  const text = [result.stderr, result.stdout].map((s) => s.trim()).filter((s) => s !== "");
  return text.length > 0 ? text.join("\n") : `terraform exited with code ${result.exitCode ?? "unknown"}`;
}

const AUTHENTICATION_PATTERNS = [
  /building AzureRM Client/i,
  /unable to build authorizer/i,
  /Authenticating using/i,
  /AADSTS\d+/,
  /InvalidAuthenticationToken/,
  /ExpiredAuthenticationToken/,
];

/** Map a failed `terraform` invocation onto the reconciliation error taxonomy. */
export function classifyTerraformFailure(result: TfCliResult, stateId: string): ReconcileError {
  const text = failureText(result);

  if (/Error acquiring the state lock/.test(text)) {
    return new LockContentionError(stateId, parseLockInfo(text), text);
  }
  if (/AuthorizationFailed/.test(text)) {
    const action = capture(text, /perform action '([^']+)'/) ?? "unknown action";
    const scope = capture(text, /over scope '([^']+)'/) ?? "unknown scope";
    return new AuthorizationError(scope, action, text);
  }
  if (/PolicyDefinitionNotFound/.test(text)) {
    const missing = capture(text, /policy definition '([^']+)'/) ?? "unknown definition";
    return new DependencyOrderError(text, erroredAddress(text), missing);
  }
  if (/Saved plan is stale/.test(text)) {
    return new ReconcileError(text, "stale-plan");
  }
  if (/already exists - to be managed/.test(text)) {
    const id = capture(text, /A resource with the ID "([^"]+)" already exists/) ?? "(unknown)";
    return new ResourceConflictError(erroredAddress(text), id);
  }
  if (AUTHENTICATION_PATTERNS.some((p) => p.test(text))) {
    return new AuthenticationError(text);
  }
  const code = capture(text, /Code[=:]\s*"?([A-Za-z]+)"?/);
  return new ProviderError(text, code);
}

// ── Plan translation ────────────────────────────────────────────

/** Normalize Terraform's action list; replacements read `["delete", "create"]` either way round. */
export function toChangeActions(actions: string[]): ChangeAction[] | null {
  if (actions.includes("delete") && actions.includes("create")) return ["delete", "create"];
  const mapped: ChangeAction[] = [];
  for (const action of actions) {
    if (action === "create" || action === "update" || action === "delete" || action === "no-op") {
      mapped.push(action);
    }
  }
  return mapped.length > 0 ? mapped : null;
}

function resourceId(change: TerraformResourceChange): string {
  const id = change.change.before?.id ?? change.change.after?.id;
  return typeof id === "string" ? id : "";
}

export function toPlannedChanges(
  resourceChanges: TerraformResourceChange[],
  dependencies: Map<string, string[]> = new Map(),
): PlannedChange[] {
  const changes: PlannedChange[] = [];
  for (const rc of resourceChanges) {
    if (rc.mode !== "managed") continue;
    const actions = toChangeActions(rc.change.actions);
    if (!actions) continue;
    const { before, after } = rc.change;
    changes.push({
      address: rc.address,
      type: rc.type,
      name: rc.name,
      id: resourceId(rc),
      actions,
      before,
      after,
      dependsOn: dependencies.get(rc.address) ?? [],
      changedAttributes: actions[0] === "no-op" ? [] : changedRoots(diffAttributes(before ?? {}, after ?? {})),
    });
  }
  return changes;
}

// ── Driver ──────────────────────────────────────────────────────

export class TerraformReconciliationDriver implements ReconciliationDriver {
  readonly id = "terraform";
  private initialized = false;

  constructor(private readonly options: TerraformDriverOptions) {}

  private get cli(): TfCliOptions {
    return { cwd: this.options.workingDir, terraformBin: this.options.terraformBin, env: this.options.env };
  }

  private get planFile(): string {
    return this.options.planFile ?? DEFAULT_PLAN_FILE;
  }

  private fail(result: TfCliResult): never {
    throw classifyTerraformFailure(result, this.options.stateId);
  }

  async init(): Promise<void> {
    const { env, credentialVariables, provider, logger, terraformBin } = this.options;
    const missing = credentialVariables.filter((name) => !env[name]?.trim());
    if (missing.length > 0) {
      throw new AuthenticationError(`Missing Azure credentials: ${missing.join(", ")} must be set`, missing);
    }

    const installed = await isTerraformInstalled(terraformBin);
    if (!installed.installed) {
      throw new ProviderError(`terraform binary "${terraformBin ?? "terraform"}" was not found`, "TerraformNotInstalled");
    }
    logger.info(`Using terraform ${installed.version ?? "(unknown version)"}`);

    await provider.configure(env);
    // main.tf waits for validate: a broken declaration must fail there, not here.
    await this.renderProviders();

    const result = await tfInit(this.cli);
    if (!result.success) this.fail(result);
    this.initialized = true;
  }

  private requireInit(): void {
    if (!this.initialized) throw new Error("The terraform driver is not initialized; run init first");
  }

  /** Write main.tf and providers.tf from the declarations. Returns the files written. */
  async render(): Promise<string[]> {
    const { render, provider, cloud } = this.options;
    if (!render) return [];
    return this.writeFiles(renderConfiguration(await provider.desiredResources(), { cloud }));
  }

  private async renderProviders(): Promise<string[]> {
    const { render, cloud } = this.options;
    if (!render) return [];
    return this.writeFiles({ "providers.tf": renderProviders({ cloud }) });
  }

  private async writeFiles(files: Record<string, string>): Promise<string[]> {
    const { workingDir, logger } = this.options;
    await mkdir(workingDir, { recursive: true });
    const written: string[] = [];
    for (const [name, content] of Object.entries(files)) {
      const file = path.join(workingDir, name);
      await writeFile(file, content, "utf-8");
      written.push(file);
    }
    logger.debug(`Rendered ${written.join(", ")}`);
    return written;
  }

  async validate(): Promise<ValidationResult> {
    const diagnostics: Diagnostic[] = [...(await this.options.provider.validate())];
    if (diagnostics.some((d) => d.severity === "error") || !this.initialized) {
      return { valid: !diagnostics.some((d) => d.severity === "error"), diagnostics };
    }

    await this.render();
    const result = await tfValidate(this.cli);
    const output = parseValidateOutput(result.json);
    if (!output) {
      if (!result.success) this.fail(result);
      throw new ProviderError("terraform validate -json produced no readable output");
    }
    for (const d of output.diagnostics) {
      diagnostics.push({
        severity: d.severity,
        summary: d.summary,
        detail: d.detail,
        source: d.range ? `${d.range.filename}:${d.range.start.line}` : undefined,
      });
    }
    return { valid: output.valid && !diagnostics.some((d) => d.severity === "error"), diagnostics };
  }

  async plan(options: { destroy?: boolean } = {}): Promise<ReconcilePlan> {
    this.requireInit();
    const { provider, stateId, logger } = this.options;

    await this.render();
    const planned = await tfPlan(this.cli, { destroy: options.destroy, out: this.planFile });
    if (!planned.success) this.fail(planned);

    const shown = await tfShow(this.cli, { planFile: this.planFile });
    if (!shown.success) this.fail(shown);
    const json = parsePlanJson(shown.json);
    if (!json) throw new ProviderError("terraform show -json produced no readable plan");

    const declared = options.destroy ? [] : await provider.desiredResources();
    const dependencies = new Map(declared.map((r) => [r.address, r.dependsOn]));
    const changes = toPlannedChanges(json.resource_changes ?? [], dependencies);
    const summary = summarizeChanges(changes);
    logger.info(
      `Plan: ${summary.creates} to add, ${summary.updates} to change, ${summary.deletes} to destroy, ${summary.replaces} to replace`,
    );

    return {
      id: randomUUID(),
      driver: this.id,
      stateId,
      priorSerial: null,
      lineage: null,
      destroy: options.destroy ?? false,
      createdAt: new Date().toISOString(),
      changes,
      summary,
      artifact: this.planFile,
    };
  }

  async apply(plan: ReconcilePlan): Promise<ApplyResult> {
    this.requireInit();
    if (plan.driver !== this.id) throw new Error(`Plan ${plan.id} was made by the ${plan.driver} driver`);
    if (!plan.artifact) throw new Error(`Plan ${plan.id} has no saved plan file`);

    const result = await tfApply(this.cli, { planFile: plan.artifact });
    if (!result.success) this.fail(result);
    this.options.logger.info(result.stdout.match(/Apply complete!.*$/m)?.[0] ?? "Apply complete!");

    return {
      planId: plan.id,
      stateId: plan.stateId,
      serial: null,
      applied: plan.changes
        .filter((c) => c.actions[0] !== "no-op")
        .map((c) => ({ address: c.address, actions: c.actions })),
      summary: plan.summary,
      completedAt: new Date().toISOString(),
    };
  }

  /** `terraform force-unlock`; needs `init` so the backend is known. */
  async forceUnlock(lockId: string): Promise<void> {
    this.requireInit();
    const result = await tfForceUnlock(this.cli, lockId);
    if (!result.success) this.fail(result);
    this.options.logger.warn(`Released Terraform state lock ${lockId}`);
  }

  async close(): Promise<void> {
    this.initialized = false;
  }
}
