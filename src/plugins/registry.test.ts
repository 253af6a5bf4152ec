import { Command } from "commander";
import { describe, expect, it } from "vitest";

import type { LoadedConfig } from "../config/config.js";
import type { PolicyGatePlugin, ReconciliationDriver, ResourceProvider } from "../plugin-sdk/index.js";
import { PluginRegistry } from "./registry.js";

const config: LoadedConfig = {
  driver: "native",
  logging: { level: "info", format: "pretty" },
  plugins: { demo: { greeting: "hello" } },
  path: "/srv/project/policy-gate.config.json",
  baseDir: "/srv/project",
};

function driver(id: string): ReconciliationDriver {
  const notUsed = async (): Promise<never> => {
    throw new Error("not used");
  };
  return { id, init: async () => {}, validate: notUsed, plan: notUsed, apply: notUsed, close: async () => {} };
}

const provider: ResourceProvider = {
  id: "demo",
  configure: async () => {},
  validate: async () => [],
  desiredResources: async () => [],
  handler: () => undefined,
};

function plugin(id: string, register: PolicyGatePlugin["register"]): PolicyGatePlugin {
  return { id, name: id.toUpperCase(), register };
}

describe("PluginRegistry", () => {
  it("hands each plugin its own config section and resolves paths against the config file", async () => {
    const seen: unknown[] = [];
    const registry = new PluginRegistry(config);
    await registry.load([
      plugin("demo", (api) => {
        seen.push(api.pluginConfig, api.resolvePath("policies/a.json"));
      }),
      plugin("other", (api) => {
        seen.push(api.pluginConfig);
      }),
    ]);

    expect(seen).toEqual([{ greeting: "hello" }, "/srv/project/policies/a.json", undefined]);
    expect(registry.listPlugins()).toEqual([
      { id: "demo", name: "DEMO" },
      { id: "other", name: "OTHER" },
    ]);
  });

  it("refuses to load the same plugin twice", async () => {
    const registry = new PluginRegistry(config);
    const noop = plugin("demo", () => {});
    await expect(registry.load([noop, noop])).rejects.toThrow('Plugin "demo" is already loaded');
  });

  it("shares providers and drivers between plugins", async () => {
    const registry = new PluginRegistry(config);
    let found: ResourceProvider | undefined;
    await registry.load([
      plugin("provider", (api) => api.registerResourceProvider(provider)),
      plugin("drivers", (api) => {
        found = api.getResourceProvider("demo");
        api.registerDriver("native", () => driver("native"));
        api.registerDriver("terraform", () => driver("terraform"));
      }),
    ]);

    expect(found).toBe(provider);
    expect(registry.listDrivers()).toEqual(["native", "terraform"]);
    expect(registry.resolveDriver().id).toBe("native");
    expect(registry.resolveDriver("terraform").id).toBe("terraform");
    expect(() => registry.resolveDriver("pulumi")).toThrow(
      'Unknown reconciliation driver "pulumi". Registered drivers: native, terraform',
    );
  });

  it("rejects duplicate providers, drivers and command groups", async () => {
    const registry = new PluginRegistry(config);
    await expect(
      registry.load([
        plugin("a", (api) => api.registerDriver("native", () => driver("native"))),
        plugin("b", (api) => api.registerDriver("native", () => driver("native"))),
      ]),
    ).rejects.toThrow('Reconciliation driver "native" is already registered');

    const cli = new PluginRegistry(config);
    await expect(
      cli.load([
        plugin("a", (api) => api.registerCli(() => {}, { commands: ["reconcile"] })),
        plugin("b", (api) => api.registerCli(() => {}, { commands: ["reconcile"] })),
      ]),
    ).rejects.toThrow('Command "reconcile" from b is already registered by a');
  });

  it("attaches registered command groups to the program", async () => {
    const registry = new PluginRegistry(config);
    await registry.load([
      plugin("demo", (api) =>
        api.registerCli(({ program }) => program.command("policy").description("Policy commands"), { commands: ["policy"] }),
      ),
    ]);
    const program = new Command();
    registry.registerCommands(program);
    expect(program.commands.map((c) => c.name())).toEqual(["policy"]);
  });

  it("stops services in reverse order and reports every stop failure", async () => {
    const events: string[] = [];
    const registry = new PluginRegistry(config);
    await registry.load([
      plugin("demo", (api) => {
        for (const id of ["first", "second", "third"]) {
          api.registerService({
            id,
            start: async () => {
              events.push(`start ${id}`);
            },
            stop: async () => {
              events.push(`stop ${id}`);
              if (id === "second") throw new Error("disk full");
            },
          });
        }
      }),
    ]);

    await registry.startServices();
    await expect(registry.stopServices()).rejects.toThrow("One or more services failed to stop");
    expect(events).toEqual(["start first", "start second", "start third", "stop third", "stop second", "stop first"]);
  });
});
