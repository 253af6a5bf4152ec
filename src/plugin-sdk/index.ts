/**
 * policy-gate — Plugin SDK
 *
 * Everything an extension may import from the host.
 */

export * from "./errors.js";
export * from "./reconcile.js";
export type {
  PluginLogger,
  CliContext,
  PluginService,
  DriverFactory,
  PolicyGatePluginApi,
  PolicyGatePlugin,
} from "./types.js";
export { parseConfigSection } from "./config.js";
