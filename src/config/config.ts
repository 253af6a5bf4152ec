/**
 * Host configuration schema (TypeBox) and loader.
 *
 * The file holds host settings plus one raw section per extension under
 * `plugins`; each extension validates its own section.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { ConfigValidationError, parseConfigSection } from "../plugin-sdk/index.js";

export const DEFAULT_CONFIG_FILE = "policy-gate.config.json";

const LogLevelSchema = Type.Union(
  [Type.Literal("error"), Type.Literal("warn"), Type.Literal("info"), Type.Literal("debug")],
  { default: "info" },
);

export const configSchema = Type.Object({
  driver: Type.String({ default: "native", description: "Reconciliation driver id: native | terraform" }),
  logging: Type.Object(
    {
      level: LogLevelSchema,
      format: Type.Union([Type.Literal("pretty"), Type.Literal("json")], { default: "pretty" }),
    },
    { default: {} },
  ),
  plugins: Type.Record(Type.String(), Type.Unknown(), { default: {} }),
});

export type PolicyGateConfig = Static<typeof configSchema>;

export type LoadedConfig = PolicyGateConfig & {
  /** Absolute path of the file read, or null when running on defaults. */
  path: string | null;
  /** Directory relative paths in the config resolve against. */
  baseDir: string;
};

export type LoadConfigOptions = {
  path?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.path ?? env.POLICY_GATE_CONFIG;
  const configPath = path.resolve(cwd, explicit ?? DEFAULT_CONFIG_FILE);

  let raw: unknown = {};
  let loadedFrom: string | null = null;
  if (fs.existsSync(configPath)) {
    const text = fs.readFileSync(configPath, "utf-8");
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ConfigValidationError(configPath, [`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`]);
    }
    loadedFrom = configPath;
  } else if (explicit) {
    throw new ConfigValidationError(configPath, ["File not found"]);
  }

  const parsed = parseConfigSection(configSchema, raw, configPath);
  const config: PolicyGateConfig = {
    ...parsed,
    driver: env.POLICY_GATE_DRIVER ?? parsed.driver,
    logging: { ...parsed.logging, level: parseLogLevel(env.POLICY_GATE_LOG_LEVEL) ?? parsed.logging.level },
  };

  return {
    ...config,
    path: loadedFrom,
    baseDir: loadedFrom ? path.dirname(loadedFrom) : cwd,
  };
}

function parseLogLevel(value: string | undefined): PolicyGateConfig["logging"]["level"] | undefined {
  switch (value) {
    case "error":
    case "warn":
    case "info":
    case "debug":
      return value;
    default:
      return undefined;
  }
}
