/**
 * Resource group writes via @azure/arm-resources, and the probe that asks
 * the platform whether the assigned policies let a resource group through.
 */

import type { TokenCredential } from "@azure/identity";
import type { ResourceManagementClient } from "@azure/arm-resources";
import { isRestError } from "@azure/core-rest-pipeline";
import { toReconcileError } from "./arm-errors.js";
import { resourceGroupId, subscriptionScope } from "./identifiers.js";
import type { ResourceGroupService } from "./policy-service.js";
import { RequestDisallowedByPolicyError } from "./types.js";

export class AzureResourceGroupService implements ResourceGroupService {
  private client: ResourceManagementClient | null = null;

  constructor(
    private readonly credential: TokenCredential,
    private readonly subscriptionId: string,
  ) {}

  private async getClient(): Promise<ResourceManagementClient> {
    if (!this.client) {
      const { ResourceManagementClient } = await import("@azure/arm-resources");
      this.client = new ResourceManagementClient(this.credential, this.subscriptionId);
    }
    return this.client;
  }

  async createOrUpdate(name: string, location: string, tags?: Record<string, string>): Promise<{ id: string; location: string }> {
    const client = await this.getClient();
    const rg = await client.resourceGroups.createOrUpdate(name, { location, tags });
    return { id: rg.id ?? resourceGroupId(this.subscriptionId, name), location: rg.location };
  }

  async delete(name: string): Promise<void> {
    const client = await this.getClient();
    await client.resourceGroups.beginDeleteAndWait(name);
  }
}

export type ProbeResult =
  | { allowed: true; resourceGroupId: string }
  | { allowed: false; resourceGroupId: string; reason: string };

/**
 * Try to create a resource group and report whether policy allowed it.
 * A group that was created is deleted again unless `keep` is set.
 */
export async function probeResourceGroup(
  service: ResourceGroupService,
  subscriptionId: string,
  name: string,
  location: string,
  options: { keep?: boolean } = {},
): Promise<ProbeResult> {
  const id = resourceGroupId(subscriptionId, name);
  try {
    await service.createOrUpdate(name, location);
  } catch (err) {
    if (err instanceof RequestDisallowedByPolicyError) {
      return { allowed: false, resourceGroupId: id, reason: err.message };
    }
    if (isRestError(err) && err.code === "RequestDisallowedByPolicy") {
      return { allowed: false, resourceGroupId: id, reason: err.message };
    }
    throw toReconcileError(err, {
      action: "Microsoft.Resources/subscriptions/resourceGroups/write",
      scope: subscriptionScope(subscriptionId),
      target: id,
    });
  }
  if (!options.keep) await service.delete(name);
  return { allowed: true, resourceGroupId: id };
}
