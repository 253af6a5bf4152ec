/**
 * Azure Policy — Plugin Entry Point
 */

import type { PolicyGatePluginApi } from "../../src/plugin-sdk/index.js";
import { AzurePolicyResourceProvider, createPolicyCli, parseAzurePolicyConfig } from "./src/index.js";

export default {
  id: "azure-policy",
  name: "Azure Policy",
  description: "Policy rule documents, definitions and assignments for Azure Resource Manager",
  register(api: PolicyGatePluginApi) {
    const config = parseAzurePolicyConfig(api.pluginConfig);
    const provider = new AzurePolicyResourceProvider({
      config,
      resolvePath: (p) => api.resolvePath(p),
      logger: api.logger,
    });

    api.registerResourceProvider(provider);
    api.registerCli((ctx) => createPolicyCli(provider, ctx.logger)(ctx.program), { commands: ["policy"] });
    api.logger.debug(`${config.definitions.length} definition(s), ${config.assignments.length} assignment(s) declared`);
  },
};
