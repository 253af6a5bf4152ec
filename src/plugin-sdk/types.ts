/**
 * Plugin API surface handed to every extension's `register()`.
 */

import type { Command } from "commander";
import type { ReconciliationDriver, ResourceProvider } from "./reconcile.js";

export type PluginLogger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export type CliContext = {
  program: Command;
  logger: PluginLogger;
};

export type PluginService = {
  id: string;
  start: () => Promise<void>;
  stop: () => Promise<void>;
};

export type DriverFactory = () => ReconciliationDriver;

export interface PolicyGatePluginApi {
  /** Extension id, as declared by the plugin. */
  readonly id: string;
  readonly logger: PluginLogger;
  /** This extension's raw section of the config file (validated by the extension). */
  readonly pluginConfig: unknown;
  /** Resolve a path relative to the config file's directory. */
  resolvePath(relative: string): string;
  registerCli(register: (ctx: CliContext) => void, opts: { commands: string[] }): void;
  registerService(service: PluginService): void;
  registerResourceProvider(provider: ResourceProvider): void;
  getResourceProvider(id: string): ResourceProvider | undefined;
  registerDriver(id: string, factory: DriverFactory): void;
  /** Build a driver; falls back to the configured default driver id. */
  resolveDriver(id?: string): ReconciliationDriver;
}

export type PolicyGatePlugin = {
  id: string;
  name: string;
  description?: string;
  register(api: PolicyGatePluginApi): void | Promise<void>;
};
