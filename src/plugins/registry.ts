/**
 * Plugin registry — collects what each extension registers and wires it
 * into the CLI program and the service lifecycle.
 */

import * as path from "node:path";
import type { Command } from "commander";
import type {
  CliContext,
  DriverFactory,
  PluginLogger,
  PluginService,
  PolicyGatePlugin,
  PolicyGatePluginApi,
  ReconciliationDriver,
  ResourceProvider,
} from "../plugin-sdk/index.js";
import type { LoadedConfig } from "../config/config.js";
import { createSubsystemLogger } from "../logging/logger.js";

type CliRegistration = {
  pluginId: string;
  commands: string[];
  register: (ctx: CliContext) => void;
};

export class PluginRegistry {
  private readonly config: LoadedConfig;
  private readonly loaded: PolicyGatePlugin[] = [];
  private readonly cliRegistrations: CliRegistration[] = [];
  private readonly services: PluginService[] = [];
  private readonly started: PluginService[] = [];
  private readonly providers = new Map<string, ResourceProvider>();
  private readonly drivers = new Map<string, DriverFactory>();
  private readonly logger: PluginLogger;

  constructor(config: LoadedConfig) {
    this.config = config;
    this.logger = createSubsystemLogger("plugins");
  }

  /** Register every plugin, in order. */
  async load(plugins: PolicyGatePlugin[]): Promise<void> {
    for (const plugin of plugins) {
      if (this.loaded.some((p) => p.id === plugin.id)) {
        throw new Error(`Plugin "${plugin.id}" is already loaded`);
      }
      await plugin.register(this.createApi(plugin));
      this.loaded.push(plugin);
      this.logger.debug(`Loaded plugin ${plugin.id}`);
    }
  }

  listPlugins(): Array<{ id: string; name: string }> {
    return this.loaded.map((p) => ({ id: p.id, name: p.name }));
  }

  listDrivers(): string[] {
    return [...this.drivers.keys()];
  }

  /** Attach every registered command group to the program. */
  registerCommands(program: Command): void {
    for (const reg of this.cliRegistrations) {
      reg.register({ program, logger: createSubsystemLogger(reg.pluginId) });
    }
  }

  async startServices(): Promise<void> {
    for (const service of this.services) {
      await service.start();
      this.started.push(service);
    }
  }

  /** Stop started services in reverse order; every service gets its stop call. */
  async stopServices(): Promise<void> {
    const errors: unknown[] = [];
    while (this.started.length > 0) {
      const service = this.started.pop();
      if (!service) break;
      try {
        await service.stop();
      } catch (err) {
        errors.push(err);
        this.logger.error(`Service ${service.id} failed to stop: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    if (errors.length > 0) {
      throw new AggregateError(errors, "One or more services failed to stop");
    }
  }

  getResourceProvider(id: string): ResourceProvider | undefined {
    return this.providers.get(id);
  }

  resolveDriver(id?: string): ReconciliationDriver {
    const driverId = id ?? this.config.driver;
    const factory = this.drivers.get(driverId);
    if (!factory) {
      const known = this.listDrivers();
      throw new Error(
        `Unknown reconciliation driver "${driverId}". Registered drivers: ${known.length > 0 ? known.join(", ") : "(none)"}`,
      );
    }
    return factory();
  }

  private createApi(plugin: PolicyGatePlugin): PolicyGatePluginApi {
    const registry = this;
    const logger = createSubsystemLogger(plugin.id);

    return {
      id: plugin.id,
      logger,
      pluginConfig: this.config.plugins[plugin.id],
      resolvePath: (relative) => path.resolve(this.config.baseDir, relative),
      registerCli(register, opts) {
        for (const command of opts.commands) {
          const owner = registry.cliRegistrations.find((r) => r.commands.includes(command));
          if (owner) {
            throw new Error(`Command "${command}" from ${plugin.id} is already registered by ${owner.pluginId}`);
          }
        }
        registry.cliRegistrations.push({ pluginId: plugin.id, commands: opts.commands, register });
      },
      registerService(service) {
        registry.services.push(service);
      },
      registerResourceProvider(provider) {
        if (registry.providers.has(provider.id)) {
          throw new Error(`Resource provider "${provider.id}" is already registered`);
        }
        registry.providers.set(provider.id, provider);
      },
      getResourceProvider: (id) => registry.getResourceProvider(id),
      registerDriver(id, factory) {
        if (registry.drivers.has(id)) {
          throw new Error(`Reconciliation driver "${id}" is already registered`);
        }
        registry.drivers.set(id, factory);
      },
      resolveDriver: (id) => registry.resolveDriver(id),
    };
  }
}
