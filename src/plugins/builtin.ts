/**
 * Extensions bundled with the CLI, in load order.
 */

import azurePolicy from "../../extensions/azure-policy/index.js";
import pipeline from "../../extensions/pipeline/index.js";
import reconcile from "../../extensions/terraform/index.js";
import type { PolicyGatePlugin } from "../plugin-sdk/index.js";

export const BUILTIN_PLUGINS: PolicyGatePlugin[] = [azurePolicy, reconcile, pipeline];
