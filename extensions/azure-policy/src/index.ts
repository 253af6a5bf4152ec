export * from "./types.js";
export * from "./rule-document.js";
export * from "./evaluator.js";
export * from "./identifiers.js";
export * from "./config.js";
export * from "./credentials.js";
export type { PolicyService, ResourceGroupService } from "./policy-service.js";
export { AzurePolicyManager } from "./manager.js";
export { InMemoryPolicyControlPlane, type ControlPlaneOperation } from "./control-plane.js";
export { probeResourceGroup, type ProbeResult } from "./resource-groups.js";
export * from "./handlers.js";
export { compileDeclarations, bindingsFromDeclarations, type CompiledDeclarations } from "./desired-state.js";
export { AzurePolicyResourceProvider, PROVIDER_ID } from "./provider.js";
export { createPolicyCli } from "./cli.js";
