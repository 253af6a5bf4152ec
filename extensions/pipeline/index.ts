/**
 * CI Pipeline — Plugin Entry Point
 */

import type { PolicyGatePluginApi } from "../../src/plugin-sdk/index.js";
import { createPipelineCli } from "./src/index.js";

export default {
  id: "pipeline",
  name: "CI Pipeline",
  description: "Validate-on-pull-request, apply-on-merge gate over a reconciliation driver",
  register(api: PolicyGatePluginApi) {
    api.registerCli(
      (ctx) => createPipelineCli({ resolveDriver: (id) => api.resolveDriver(id), env: process.env }, ctx.logger)(ctx.program),
      { commands: ["pipeline"] },
    );
  },
};
