/**
 * Native reconciliation driver.
 *
 * Plans and applies against the platform directly, through a provider's
 * resource handlers, with its own locked and versioned state. The state
 * store is the only record of what the driver manages.
 */

import { randomUUID } from "node:crypto";
import {
  DependencyOrderError,
  ProviderError,
  ResourceConflictError,
  StalePlanError,
  type ApplyResult,
  type Diagnostic,
  type PlannedChange,
  type PluginLogger,
  type ReconcilePlan,
  type ReconciliationDriver,
  type ResourceAttributes,
  type ResourceHandler,
  type ResourceProvider,
  type ValidationResult,
} from "../../../src/plugin-sdk/index.js";
import { computeChanges, isReplace, orderByDependencies, summarizeChanges } from "./planner.js";
import type { StateManager } from "./state-manager.js";
import type { StateResource, StateSnapshot } from "./types.js";

export type NativeDriverOptions = {
  provider: ResourceProvider;
  state: StateManager;
  stateId: string;
  env: NodeJS.ProcessEnv;
  logger: PluginLogger;
  /** Recorded on the lock; defaults to `user@host`. */
  lockedBy?: string;
};

export class NativeReconciliationDriver implements ReconciliationDriver {
  readonly id = "native";
  private initialized = false;

  constructor(private readonly options: NativeDriverOptions) {}

  async init(): Promise<void> {
    const { provider, state, env, logger, stateId } = this.options;
    await provider.configure(env);
    await state.initialize();
    this.initialized = true;
    logger.info(`Initialized native driver (provider ${provider.id}, state "${stateId}")`);
  }

  private requireInit(): void {
    if (!this.initialized) throw new Error("The native driver is not initialized; run init first");
  }

  async validate(): Promise<ValidationResult> {
    const { provider } = this.options;
    const diagnostics: Diagnostic[] = [...(await provider.validate())];

    if (!diagnostics.some((d) => d.severity === "error") && this.initialized) {
      try {
        orderByDependencies(await provider.desiredResources());
      } catch (err) {
        if (!(err instanceof DependencyOrderError)) throw err;
        diagnostics.push({ severity: "error", summary: err.message, source: err.address });
      }
    }

    return { valid: !diagnostics.some((d) => d.severity === "error"), diagnostics };
  }

  private handler(type: string): ResourceHandler {
    const handler = this.options.provider.handler(type);
    if (!handler) throw new ProviderError(`Provider ${this.options.provider.id} has no handler for resource type "${type}"`);
    return handler;
  }

  async plan(options: { destroy?: boolean } = {}): Promise<ReconcilePlan> {
    this.requireInit();
    const { provider, state, stateId, logger, lockedBy } = this.options;

    return state.withLock(
      stateId,
      options.destroy ? "plan -destroy" : "plan",
      async () => {
        const snapshot = await state.readState(stateId);
        const desired = options.destroy ? [] : await provider.desiredResources();
        if (!options.destroy) orderByDependencies(desired);

        const live = new Map<string, ResourceAttributes | null>();
        for (const resource of snapshot.resources) {
          logger.debug(`Refreshing ${resource.address} (${resource.id})`);
          live.set(resource.address, await this.handler(resource.type).read(resource.id));
        }

        const changes = computeChanges({
          desired,
          prior: snapshot.resources,
          live,
          handler: (type) => this.handler(type),
          destroy: options.destroy,
        });
        const summary = summarizeChanges(changes);
        logger.info(
          `Plan: ${summary.creates} to add, ${summary.updates} to change, ${summary.deletes} to destroy, ${summary.replaces} to replace`,
        );

        return {
          id: randomUUID(),
          driver: this.id,
          stateId,
          priorSerial: snapshot.serial,
          lineage: snapshot.lineage,
          destroy: options.destroy ?? false,
          createdAt: new Date().toISOString(),
          changes,
          summary,
        };
      },
      lockedBy,
    );
  }

  async apply(plan: ReconcilePlan): Promise<ApplyResult> {
    this.requireInit();
    const { state, stateId, logger, lockedBy } = this.options;
    if (plan.driver !== this.id) throw new Error(`Plan ${plan.id} was made by the ${plan.driver} driver`);

    return state.withLock(
      stateId,
      plan.destroy ? "apply -destroy" : "apply",
      async () => {
        let snapshot = await state.readState(stateId);
        if (snapshot.serial !== plan.priorSerial || (plan.lineage !== null && snapshot.lineage !== plan.lineage)) {
          throw new StalePlanError(plan.priorSerial, snapshot.serial);
        }

        const resources = new Map(snapshot.resources.map((r) => [r.address, r]));
        const applied: ApplyResult["applied"] = [];
        const persist = async (operation: string) => {
          snapshot = await state.writeState(stateId, snapshot, [...resources.values()], operation);
        };

        // Deletes, dependents first.
        for (const c of [...plan.changes].reverse()) {
          if (c.actions[0] !== "delete") continue;
          if (c.before) {
            logger.info(`${c.address}: Destroying... [id=${c.id}]`);
            await this.handler(c.type).delete(c.id, c.before);
          }
          resources.delete(c.address);
          await persist(`delete ${c.address}`);
          if (!isReplace(c)) applied.push({ address: c.address, actions: c.actions });
        }

        // Creates and updates, dependencies first.
        for (const c of plan.changes) {
          if (c.actions.includes("create")) {
            resources.set(c.address, await this.create(c));
            await persist(`create ${c.address}`);
            applied.push({ address: c.address, actions: c.actions });
          } else if (c.actions[0] === "update" && c.after) {
            logger.info(`${c.address}: Modifying... [id=${c.id}]`);
            await this.handler(c.type).update(c.id, c.after);
            resources.set(c.address, this.stateResource(c, c.id, c.after));
            await persist(`update ${c.address}`);
            applied.push({ address: c.address, actions: c.actions });
          }
        }

        logger.info(`Apply complete! Resources: ${plan.summary.creates} added, ${plan.summary.updates} changed, ${plan.summary.deletes} destroyed, ${plan.summary.replaces} replaced.`);
        return {
          planId: plan.id,
          stateId,
          serial: snapshot.serial,
          applied,
          summary: plan.summary,
          completedAt: new Date().toISOString(),
        };
      },
      lockedBy,
    );
  }

  private async create(c: PlannedChange): Promise<StateResource> {
    if (!c.after) throw new Error(`Planned create of ${c.address} has no attributes`);
    const handler = this.handler(c.type);
    const id = handler.idOf(c.after);
    if ((await handler.read(id)) !== null) {
      throw new ResourceConflictError(c.address, id);
    }
    this.options.logger.info(`${c.address}: Creating...`);
    const created = await handler.create(c.after);
    this.options.logger.info(`${c.address}: Creation complete [id=${created}]`);
    return this.stateResource(c, created, c.after);
  }

  private stateResource(c: PlannedChange, id: string, attributes: ResourceAttributes): StateResource {
    return { address: c.address, type: c.type, name: c.name, id, attributes, dependencies: c.dependsOn };
  }

  /** Release a lock left behind by an interrupted run. */
  async forceUnlock(lockId: string): Promise<void> {
    const { state, stateId, logger } = this.options;
    await state.initialize();
    const released = await state.forceUnlock(stateId, lockId);
    logger.warn(`Released lock ${released.id} held by ${released.lockedBy} (${released.operation}) on state "${stateId}"`);
  }

  /** Current state snapshot, for reporting. */
  async currentState(): Promise<StateSnapshot> {
    return this.options.state.readState(this.options.stateId);
  }

  async close(): Promise<void> {
    this.initialized = false;
  }
}
