/**
 * Terraform CLI wrapper — executes real `terraform` commands via child_process.
 *
 * All commands run in a specified working directory with TF_IN_AUTOMATION
 * set. Returns structured results with stdout/stderr and parsed JSON where
 * available.
 */

import { execFile as execFileCb } from "node:child_process";
import { promisify } from "node:util";

const execFile = promisify(execFileCb);

/** Options for Terraform CLI invocations. */
export interface TfCliOptions {
  /** Working directory containing .tf files. */
  cwd: string;
  /** Path to terraform binary (default: "terraform"). */
  terraformBin?: string;
  /** Environment for the process (default: process.env). */
  env?: NodeJS.ProcessEnv;
  /** Timeout in ms (default: 300_000 = 5 min). */
  timeout?: number;
}

/** Result from a Terraform CLI command. */
export interface TfCliResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  /** Parsed JSON output when available (validate -json, show -json, etc.). */
  json?: unknown;
}

function tfBin(opts: TfCliOptions): string {
  return opts.terraformBin ?? "terraform";
}

function field(err: object, name: string): unknown {
  return name in err ? Reflect.get(err, name) : undefined;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Core exec helper. */
async function run(args: string[], opts: TfCliOptions): Promise<TfCliResult> {
  const bin = tfBin(opts);
  const timeout = opts.timeout ?? 300_000;
  const env = { ...(opts.env ?? process.env), TF_IN_AUTOMATION: "1" };

  try {
    const { stdout, stderr } = await execFile(bin, args, {
      cwd: opts.cwd,
      env,
      timeout,
      maxBuffer: 50 * 1024 * 1024, // 50 MB
    });
    return { success: true, stdout, stderr, exitCode: 0 };
  } catch (err: unknown) {
    if (typeof err !== "object" || err === null) {
      return { success: false, stdout: "", stderr: String(err), exitCode: 1 };
    }
    const stdout = field(err, "stdout");
    const stderr = field(err, "stderr");
    const code = field(err, "code");
    const message = err instanceof Error ? err.message : String(err);
    return {
      success: false,
      stdout: typeof stdout === "string" ? stdout : "",
      stderr: typeof stderr === "string" && stderr !== "" ? stderr : message,
      exitCode: typeof code === "number" ? code : 1,
    };
  }
}

function withJson(result: TfCliResult): TfCliResult {
  return result.stdout ? { ...result, json: parseJson(result.stdout) } : result;
}

// ─── Individual Commands ────────────────────────────────────────

/** `terraform init` — initialize providers, modules and the backend. */
export async function tfInit(
  opts: TfCliOptions,
  flags?: { upgrade?: boolean; reconfigure?: boolean; backendConfig?: string[] },
): Promise<TfCliResult> {
  const args = ["init", "-input=false", "-no-color"];
  if (flags?.upgrade) args.push("-upgrade");
  if (flags?.reconfigure) args.push("-reconfigure");
  for (const bc of flags?.backendConfig ?? []) args.push(`-backend-config=${bc}`);
  return run(args, opts);
}

/** `terraform validate -json` — check configuration syntax. */
export async function tfValidate(opts: TfCliOptions): Promise<TfCliResult> {
  return withJson(await run(["validate", "-json", "-no-color"], opts));
}

/** `terraform plan` — generate an execution plan. Lock waits are off, so contention fails fast. */
export async function tfPlan(
  opts: TfCliOptions,
  flags?: { destroy?: boolean; out?: string; lockTimeout?: string },
): Promise<TfCliResult> {
  const args = ["plan", "-input=false", "-no-color", `-lock-timeout=${flags?.lockTimeout ?? "0s"}`];
  if (flags?.destroy) args.push("-destroy");
  if (flags?.out) args.push(`-out=${flags.out}`);
  return run(args, opts);
}

/** `terraform show -json <planfile>`. */
export async function tfShow(opts: TfCliOptions, flags?: { planFile?: string }): Promise<TfCliResult> {
  const args = ["show", "-no-color", "-json"];
  if (flags?.planFile) args.push(flags.planFile);
  return withJson(await run(args, opts));
}

/** `terraform apply` — apply a saved plan, or plan-and-apply when none is given. */
export async function tfApply(
  opts: TfCliOptions,
  flags?: { planFile?: string; lockTimeout?: string },
): Promise<TfCliResult> {
  const args = ["apply", "-input=false", "-no-color", `-lock-timeout=${flags?.lockTimeout ?? "0s"}`];
  if (flags?.planFile) args.push(flags.planFile);
  else args.push("-auto-approve");
  return run(args, opts);
}

/** `terraform force-unlock -force <lockId>`. */
export async function tfForceUnlock(opts: TfCliOptions, lockId: string): Promise<TfCliResult> {
  return run(["force-unlock", "-force", lockId], opts);
}

/** `terraform version -json` — get version info. */
export async function tfVersion(opts: TfCliOptions): Promise<TfCliResult> {
  return withJson(await run(["version", "-json"], opts));
}

/** Check if terraform is installed and accessible. */
export async function isTerraformInstalled(terraformBin?: string): Promise<{ installed: boolean; version?: string }> {
  const result = await tfVersion({ cwd: ".", terraformBin });
  if (!result.success) return { installed: false };
  const json = result.json;
  const version =
    typeof json === "object" && json !== null && "terraform_version" in json && typeof json.terraform_version === "string"
      ? json.terraform_version
      : result.stdout.trim();
  return { installed: true, version };
}
