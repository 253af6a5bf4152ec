export { InMemoryStateStorage, SQLiteStateStorage } from "./storage.js";
export { StateManager, emptySnapshot, defaultLockOwner } from "./state-manager.js";
export type { StateDiffEntry, StateDiffResult } from "./state-manager.js";
export { computeChanges, orderByDependencies, summarizeChanges, formatChanges, isReplace } from "./planner.js";
export { NativeReconciliationDriver } from "./native-driver.js";
export type { NativeDriverOptions } from "./native-driver.js";
export { TerraformReconciliationDriver, classifyTerraformFailure, parseLockInfo, toPlannedChanges } from "./terraform-driver.js";
export type { TerraformDriverOptions } from "./terraform-driver.js";
export {
  renderConfiguration,
  renderProviders,
  generateDataBlocks,
  generateResourceBlock,
  generateTerraformBlock,
  generateProviderBlock,
  formatValue,
} from "./hcl-generator.js";
export type { CloudBackend, RenderedConfiguration, RenderOptions } from "./hcl-generator.js";
export { createReconcileCli } from "./cli.js";
export { parseReconcileConfig } from "./config.js";
export type { ReconcileConfig } from "./config.js";
export * from "./types.js";
