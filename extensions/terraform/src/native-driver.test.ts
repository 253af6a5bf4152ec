/**
 * Native reconciliation driver — Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  AuthenticationError,
  LockContentionError,
  ProviderError,
  ResourceConflictError,
  StalePlanError,
  type Diagnostic,
  type DesiredResource,
  type ResourceAttributes,
  type ResourceHandler,
  type ResourceProvider,
} from "../../../src/plugin-sdk/index.js";
import { NativeReconciliationDriver } from "./native-driver.js";
import { StateManager } from "./state-manager.js";
import { InMemoryStateStorage } from "./storage.js";

// ── Fake provider ───────────────────────────────────────────────

class FakeProvider implements ResourceProvider {
  readonly id = "fake";
  desired: DesiredResource[] = [];
  diagnostics: Diagnostic[] = [];
  failCreateOf: string | null = null;
  readonly live = new Map<string, ResourceAttributes>();
  readonly calls: string[] = [];

  async configure(env: NodeJS.ProcessEnv): Promise<void> {
    if (!env.TEST_TOKEN) throw new AuthenticationError("Missing credentials: TEST_TOKEN must be set", ["TEST_TOKEN"]);
  }

  async validate(): Promise<Diagnostic[]> {
    return this.diagnostics;
  }

  async desiredResources(): Promise<DesiredResource[]> {
    return this.desired;
  }

  handler(type: string): ResourceHandler | undefined {
    if (!type.startsWith("test_")) return undefined;
    const idOf = (attributes: ResourceAttributes) => `/${type}/${String(attributes.name)}`;
    return {
      type,
      forceNew: ["name", "region"],
      idOf,
      read: async (id) => {
        const found = this.live.get(id);
        return found ? { ...found } : null;
      },
      create: async (attributes) => {
        const id = idOf(attributes);
        if (this.failCreateOf === attributes.name) throw new ProviderError(`Creating ${id} failed`, "InternalServerError");
        this.live.set(id, { ...attributes });
        this.calls.push(`create ${id}`);
        return id;
      },
      update: async (id, attributes) => {
        this.live.set(id, { ...attributes });
        this.calls.push(`update ${id}`);
      },
      delete: async (id) => {
        this.live.delete(id);
        this.calls.push(`delete ${id}`);
      },
    };
  }
}

const group: DesiredResource = {
  address: "test_group.g",
  type: "test_group",
  name: "g",
  attributes: { name: "g", region: "east", sku: "basic" },
  dependsOn: [],
};

const member: DesiredResource = {
  address: "test_member.m",
  type: "test_member",
  name: "m",
  attributes: { name: "m", group_id: "/test_group/g" },
  dependsOn: ["test_group.g"],
};

const ENV = { TEST_TOKEN: "test-secret" };
const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

describe("NativeReconciliationDriver", () => {
  let provider: FakeProvider;
  let state: StateManager;

  const driver = (lockedBy = "alice@ci") =>
    new NativeReconciliationDriver({ provider, state, stateId: "default", env: ENV, logger, lockedBy });

  async function converge() {
    const d = driver();
    await d.init();
    return d.apply(await d.plan());
  }

  beforeEach(() => {
    provider = new FakeProvider();
    provider.desired = [member, group];
    state = new StateManager(new InMemoryStateStorage());
  });

  describe("init", () => {
    it("fails with an authentication error when credentials are missing", async () => {
      const d = new NativeReconciliationDriver({ provider, state, stateId: "default", env: {}, logger });
      await expect(d.init()).rejects.toBeInstanceOf(AuthenticationError);
      await expect(d.plan()).rejects.toThrow("The native driver is not initialized; run init first");
    });
  });

  describe("validate", () => {
    it("passes provider diagnostics through", async () => {
      provider.diagnostics = [{ severity: "error", summary: "Invalid rule", source: "rule.json" }];
      const result = await driver().validate();
      expect(result).toEqual({ valid: false, diagnostics: provider.diagnostics });
    });

    it("reports references to undeclared resources once initialized", async () => {
      provider.desired = [member];
      const d = driver();
      await d.init();
      const result = await d.validate();
      expect(result.valid).toBe(false);
      expect(result.diagnostics[0]?.summary).toBe(
        "Reference to undeclared resource: test_member.m depends on test_group.g, which is not declared",
      );
    });
  });

  describe("plan and apply", () => {
    it("creates dependencies first and persists state after each change", async () => {
      const result = await converge();

      expect(provider.calls).toEqual(["create /test_group/g", "create /test_member/m"]);
      expect(result.serial).toBe(2);
      expect(result.applied).toEqual([
        { address: "test_group.g", actions: ["create"] },
        { address: "test_member.m", actions: ["create"] },
      ]);
      const history = await state.history("default");
      expect(history.map((v) => v.operation)).toEqual(["create test_member.m", "create test_group.g"]);
    });

    it("plans nothing once converged", async () => {
      await converge();
      const d = driver();
      await d.init();
      const plan = await d.plan();
      expect(plan.summary.totalChanges).toBe(0);
      expect(plan.priorSerial).toBe(2);
    });

    it("updates mutable attributes in place", async () => {
      await converge();
      provider.desired = [member, { ...group, attributes: { ...group.attributes, sku: "premium" } }];
      provider.calls.length = 0;

      await converge();
      expect(provider.calls).toEqual(["update /test_group/g"]);
      expect(provider.live.get("/test_group/g")?.sku).toBe("premium");
    });

    it("replaces dependents before their dependency and recreates in order", async () => {
      await converge();
      provider.desired = [member, { ...group, attributes: { ...group.attributes, region: "west" } }];
      provider.calls.length = 0;

      await converge();
      expect(provider.calls).toEqual([
        "delete /test_member/m",
        "delete /test_group/g",
        "create /test_group/g",
        "create /test_member/m",
      ]);
    });

    it("destroys in reverse dependency order", async () => {
      await converge();
      provider.calls.length = 0;

      const d = driver();
      await d.init();
      const plan = await d.plan({ destroy: true });
      expect(plan.destroy).toBe(true);
      await d.apply(plan);

      expect(provider.calls).toEqual(["delete /test_member/m", "delete /test_group/g"]);
      expect((await d.currentState()).resources).toEqual([]);
    });

    it("recreates a tracked resource deleted outside the driver", async () => {
      await converge();
      provider.live.delete("/test_member/m");
      provider.calls.length = 0;

      await converge();
      expect(provider.calls).toEqual(["create /test_member/m"]);
    });
  });

  describe("failures", () => {
    it("rejects a stale plan without touching the platform", async () => {
      const d = driver();
      await d.init();
      const stale = await d.plan();
      await d.apply(await d.plan());
      provider.calls.length = 0;

      await expect(d.apply(stale)).rejects.toBeInstanceOf(StalePlanError);
      expect(provider.calls).toEqual([]);
    });

    it("fails fast while another run holds the lock", async () => {
      const held = await state.lockState("default", "apply", "bob@ci");
      const d = driver();
      await d.init();

      await expect(d.plan()).rejects.toBeInstanceOf(LockContentionError);
      await expect(d.plan()).rejects.toThrow(`held by bob@ci (apply, lock ID ${held?.id}`);
    });

    it("lets exactly one of two concurrent applies through", async () => {
      const first = driver("alice@ci");
      const second = driver("bob@ci");
      await first.init();
      await second.init();
      const [planA, planB] = [await first.plan(), await second.plan()];

      const results = await Promise.allSettled([first.apply(planA), second.apply(planB)]);

      expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected"]);
      const rejected = results[1];
      expect(rejected?.status === "rejected" && rejected.reason).toBeInstanceOf(LockContentionError);
      expect(provider.calls).toEqual(["create /test_group/g", "create /test_member/m"]);
      expect((await state.readState("default")).serial).toBe(2);
    });

    it("refuses to create over an untracked live resource", async () => {
      provider.live.set("/test_group/g", { name: "g", region: "east" });
      const d = driver();
      await d.init();

      await expect(d.apply(await d.plan())).rejects.toBeInstanceOf(ResourceConflictError);
      expect(provider.calls).toEqual([]);
      expect((await state.readState("default")).serial).toBe(0);
    });

    it("keeps state at the last successful change when a create fails", async () => {
      provider.failCreateOf = "m";
      const d = driver();
      await d.init();

      await expect(d.apply(await d.plan())).rejects.toThrow("Creating /test_member/m failed");
      const snapshot = await state.readState("default");
      expect(snapshot.serial).toBe(1);
      expect(snapshot.resources.map((r) => r.address)).toEqual(["test_group.g"]);
      expect(await state.getStateLock("default")).toBeNull();
    });

    it("refuses a plan made by another driver", async () => {
      const d = driver();
      await d.init();
      const plan = await d.plan();
      await expect(d.apply({ ...plan, driver: "terraform" })).rejects.toThrow("was made by the terraform driver");
    });
  });

  describe("forceUnlock", () => {
    it("releases a lock left behind by another run", async () => {
      const held = await state.lockState("default", "apply", "bob@ci");
      await driver().forceUnlock(held?.id ?? "");
      expect(await state.getStateLock("default")).toBeNull();
    });
  });
});
