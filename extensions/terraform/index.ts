/**
 * Reconciliation — Plugin Entry Point
 *
 * Registers the `native` and `terraform` drivers, the native state backend
 * and the `reconcile` commands. Drivers look the resource provider up when
 * they are built, so provider extensions may load in any order.
 */

import * as path from "node:path";
import type { PolicyGatePluginApi, ResourceProvider } from "../../src/plugin-sdk/index.js";
import {
  createReconcileCli,
  InMemoryStateStorage,
  NativeReconciliationDriver,
  parseReconcileConfig,
  SQLiteStateStorage,
  StateManager,
  TerraformReconciliationDriver,
  type StateStorage,
} from "./src/index.js";

export default {
  id: "terraform",
  name: "Reconciliation",
  description: "Native and Terraform reconciliation drivers with locked, versioned state",
  register(api: PolicyGatePluginApi) {
    const config = parseReconcileConfig(api.pluginConfig);
    const useMemory =
      config.backend === "memory" || process.env.NODE_ENV === "test" || process.env.POLICY_GATE_TEST === "1";
    const storage: StateStorage = useMemory
      ? new InMemoryStateStorage()
      : new SQLiteStateStorage(api.resolvePath(config.statePath));
    const state = new StateManager(storage);

    const provider = (): ResourceProvider => {
      const found = api.getResourceProvider(config.provider);
      if (!found) throw new Error(`No resource provider "${config.provider}" is registered`);
      return found;
    };

    const terraformDriver = (workingDir: string, render = config.terraform.render) =>
      new TerraformReconciliationDriver({
        provider: provider(),
        workingDir,
        env: process.env,
        logger: api.logger,
        stateId: config.terraform.cloud?.workspace ?? config.stateId,
        terraformBin: config.terraform.bin,
        planFile: config.terraform.planFile,
        render,
        cloud: config.terraform.cloud,
        credentialVariables: config.terraform.credentialVariables,
      });

    api.registerDriver(
      "native",
      () =>
        new NativeReconciliationDriver({
          provider: provider(),
          state,
          stateId: config.stateId,
          env: process.env,
          logger: api.logger,
        }),
    );
    api.registerDriver("terraform", () => terraformDriver(api.resolvePath(config.terraform.workingDir)));

    api.registerService({
      id: "reconcile-state",
      start: async () => {
        await state.initialize();
        api.logger.debug(useMemory ? "Using in-memory state" : `Using state at ${api.resolvePath(config.statePath)}`);
      },
      stop: async () => {
        await state.close();
      },
    });

    api.registerCli(
      (ctx) =>
        createReconcileCli(
          {
            resolveDriver: (id) => api.resolveDriver(id),
            state,
            stateId: config.stateId,
            render: async (outDir) => {
              await provider().configure(process.env);
              const dir = outDir ? path.resolve(outDir) : api.resolvePath(config.terraform.workingDir);
              return terraformDriver(dir, true).render();
            },
          },
          ctx.logger,
        )(ctx.program),
      { commands: ["reconcile"] },
    );
  },
};
