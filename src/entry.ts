#!/usr/bin/env node
import { getFlagValue } from "./cli/argv.js";
import { buildProgram } from "./cli/program.js";
import { loadConfig } from "./config/config.js";
import { configureLogging, getRootLogger } from "./logging/logger.js";
import { formatError } from "./plugin-sdk/index.js";
import { BUILTIN_PLUGINS } from "./plugins/builtin.js";
import { PluginRegistry } from "./plugins/registry.js";

async function main(argv: string[]): Promise<void> {
  const configFlag = getFlagValue(argv, "--config");
  if (configFlag === null) throw new Error("--config needs a path");

  const config = loadConfig({ path: configFlag });
  configureLogging({ level: config.logging.level, format: config.logging.format });

  const registry = new PluginRegistry(config);
  await registry.load(BUILTIN_PLUGINS);
  const program = buildProgram({ config, registry });

  await registry.startServices();
  try {
    await program.parseAsync(argv);
  } finally {
    await registry.stopServices();
  }
}

main(process.argv).catch((err: unknown) => {
  getRootLogger().debug(err instanceof Error && err.stack ? err.stack : String(err));
  console.error(`Error: ${formatError(err)}`);
  process.exitCode = 1;
});
