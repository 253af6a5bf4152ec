/**
 * azurerm resource provider — desired state from the extension config,
 * handlers backed by Resource Manager or the in-process control plane.
 */

import type {
  DesiredResource,
  Diagnostic,
  PluginLogger,
  ResourceHandler,
  ResourceProvider,
} from "../../../src/plugin-sdk/index.js";
import type { AzurePolicyConfig } from "./config.js";
import { InMemoryPolicyControlPlane } from "./control-plane.js";
import { createTokenCredential, resolveArmCredentials } from "./credentials.js";
import { compileDeclarations, type CompiledDeclarations } from "./desired-state.js";
import { createHandlers } from "./handlers.js";
import { AzurePolicyManager } from "./manager.js";
import type { PolicyService, ResourceGroupService } from "./policy-service.js";
import { AzureResourceGroupService } from "./resource-groups.js";

export const PROVIDER_ID = "azurerm";

/** Placeholder used to build IDs when checking documents offline. */
const OFFLINE_SUBSCRIPTION = "00000000-0000-0000-0000-000000000000";

export type AzurePolicyProviderOptions = {
  config: AzurePolicyConfig;
  resolvePath: (relative: string) => string;
  logger: PluginLogger;
  /** Platform services to use instead of building them from credentials. */
  services?: { policy: PolicyService; resourceGroups?: ResourceGroupService };
};

type Connection = {
  subscriptionId: string;
  policy: PolicyService;
  resourceGroups: ResourceGroupService | null;
  handlers: Map<string, ResourceHandler>;
};

export class AzurePolicyResourceProvider implements ResourceProvider {
  readonly id = PROVIDER_ID;
  private connection: Connection | null = null;

  constructor(private readonly options: AzurePolicyProviderOptions) {}

  async configure(env: NodeJS.ProcessEnv): Promise<void> {
    const credentials = resolveArmCredentials(env);
    const { config, services, logger } = this.options;

    let policy: PolicyService;
    let resourceGroups: ResourceGroupService | null;
    if (services) {
      policy = services.policy;
      resourceGroups = services.resourceGroups ?? null;
    } else {
      const subscriptionId = config.subscriptionId ?? credentials.subscriptionId;
      if (config.controlPlane === "memory") {
        const plane = new InMemoryPolicyControlPlane({ subscriptionId });
        policy = plane;
        resourceGroups = plane;
      } else {
        const credential = await createTokenCredential(credentials);
        policy = new AzurePolicyManager(credential, subscriptionId);
        resourceGroups = new AzureResourceGroupService(credential, subscriptionId);
      }
    }

    const handlers = new Map(createHandlers(policy).map((h) => [h.type, h]));
    this.connection = { subscriptionId: policy.subscriptionId, policy, resourceGroups, handlers };
    logger.debug(`Configured ${this.id} provider for subscription ${policy.subscriptionId} (${config.controlPlane})`);
  }

  get configured(): boolean {
    return this.connection !== null;
  }

  private requireConnection(): Connection {
    if (!this.connection) throw new Error(`The ${this.id} provider is not configured; run init first`);
    return this.connection;
  }

  private compile(): Promise<CompiledDeclarations> {
    const subscriptionId = this.connection?.subscriptionId ?? this.options.config.subscriptionId ?? OFFLINE_SUBSCRIPTION;
    return compileDeclarations(this.options.config, { subscriptionId, resolvePath: this.options.resolvePath });
  }

  async validate(): Promise<Diagnostic[]> {
    const { problems } = await this.compile();
    return problems.map((p) => p.diagnostic);
  }

  /** Declared resources; throws the first problem found. */
  async desiredResources(): Promise<DesiredResource[]> {
    this.requireConnection();
    const { resources, problems } = await this.compile();
    const [first] = problems;
    if (first) throw first.error;
    return resources;
  }

  /** Declared resources and problems without a platform connection. */
  async declarations(): Promise<CompiledDeclarations> {
    return this.compile();
  }

  handler(type: string): ResourceHandler | undefined {
    return this.requireConnection().handlers.get(type);
  }

  get subscriptionId(): string {
    return this.requireConnection().subscriptionId;
  }

  get policyService(): PolicyService {
    return this.requireConnection().policy;
  }

  get resourceGroupService(): ResourceGroupService | null {
    return this.requireConnection().resourceGroups;
  }
}
