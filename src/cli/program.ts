import { Command } from "commander";
import type { LoadedConfig } from "../config/config.js";
import type { PluginRegistry } from "../plugins/registry.js";
import { VERSION } from "../version.js";

export type ProgramDeps = {
  config: LoadedConfig;
  registry: PluginRegistry;
};

export function buildProgram({ config, registry }: ProgramDeps): Command {
  const program = new Command();
  program
    .name("policy-gate")
    .description("Declarative Azure Policy reconciliation with a validate-on-PR, apply-on-merge gate")
    .version(VERSION)
    // Read before the program is built; declared here for --help and so commander accepts it.
    .option("--config <path>", "Config file (default: policy-gate.config.json, or POLICY_GATE_CONFIG)");

  program
    .command("plugins")
    .description("List loaded extensions and registered drivers")
    .option("--json", "Output as JSON")
    .action((opts: { json?: boolean }) => {
      const plugins = registry.listPlugins();
      const drivers = registry.listDrivers();
      if (opts.json) {
        console.log(JSON.stringify({ config: config.path, defaultDriver: config.driver, plugins, drivers }, null, 2));
        return;
      }
      console.log(`Config: ${config.path ?? "(defaults)"}`);
      for (const p of plugins) console.log(`  ${p.id.padEnd(14)} ${p.name}`);
      console.log(`Drivers: ${drivers.map((d) => (d === config.driver ? `${d} (default)` : d)).join(", ")}`);
    });

  registry.registerCommands(program);
  return program;
}
