/**
 * State Manager — Unit Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { LockContentionError, StalePlanError } from "../../../src/plugin-sdk/index.js";
import { StateManager, emptySnapshot } from "./state-manager.js";
import { InMemoryStateStorage } from "./storage.js";
import type { StateResource, StateSnapshot } from "./types.js";

function resource(address: string, attributes: Record<string, unknown> = {}): StateResource {
  const [type = "", name = ""] = address.split(".");
  return { address, type, name, id: `/things/${name}`, attributes: { name, ...attributes }, dependencies: [] };
}

describe("StateManager", () => {
  let manager: StateManager;

  beforeEach(async () => {
    manager = new StateManager(new InMemoryStateStorage());
    await manager.initialize();
  });

  describe("locking", () => {
    it("acquires a free lock and refuses a second one", async () => {
      const first = await manager.lockState("default", "apply", "alice@ci");
      expect(first).toMatchObject({ stateId: "default", operation: "apply", lockedBy: "alice@ci" });
      expect(await manager.lockState("default", "plan", "bob@ci")).toBeNull();
    });

    it("names the holder when withLock meets contention", async () => {
      const held = await manager.lockState("default", "apply", "alice@ci");
      const attempt = manager.withLock("default", "apply", async () => "ran", "bob@ci");

      await expect(attempt).rejects.toBeInstanceOf(LockContentionError);
      await expect(attempt).rejects.toThrow(`held by alice@ci (apply, lock ID ${held?.id}`);
    });

    it("releases the lock when the work throws", async () => {
      await expect(
        manager.withLock("default", "apply", async () => {
          throw new Error("boom");
        }),
      ).rejects.toThrow("boom");
      expect(await manager.getStateLock("default")).toBeNull();
    });

    it("passes the held lock to the work", async () => {
      const seen = await manager.withLock("default", "plan", async (lock) => {
        expect(await manager.getStateLock("default")).toEqual(lock);
        return lock.operation;
      });
      expect(seen).toBe("plan");
    });

    it("force-unlocks only with the matching ID", async () => {
      const held = await manager.lockState("default", "apply", "alice@ci");
      await expect(manager.forceUnlock("default", "wrong")).rejects.toThrow(
        `Lock ID "wrong" does not match the existing lock ID "${held?.id}" on state "default"`,
      );
      const released = await manager.forceUnlock("default", held?.id ?? "");
      expect(released.lockedBy).toBe("alice@ci");
      expect(await manager.getStateLock("default")).toBeNull();
    });

    it("refuses to force-unlock a state that is not locked", async () => {
      await expect(manager.forceUnlock("default", "any")).rejects.toThrow('State "default" is not locked');
    });
  });

  describe("reads and writes", () => {
    it("reads an empty snapshot for a new state", async () => {
      expect(await manager.readState("default")).toEqual(emptySnapshot());
    });

    it("bumps the serial and starts a lineage on the first write", async () => {
      const written = await manager.writeState("default", emptySnapshot(), [resource("t.a")], "create t.a");
      expect(written.serial).toBe(1);
      expect(written.lineage).toMatch(/^[0-9a-f-]{36}$/);
      expect(await manager.readState("default")).toEqual(written);
    });

    it("keeps the lineage across writes", async () => {
      const first = await manager.writeState("default", emptySnapshot(), [resource("t.a")], "create t.a");
      const second = await manager.writeState("default", first, [], "delete t.a");
      expect(second.serial).toBe(2);
      expect(second.lineage).toBe(first.lineage);
    });

    it("throws StalePlanError when another writer moved the state", async () => {
      const base = emptySnapshot();
      await manager.writeState("default", base, [resource("t.a")], "create t.a");

      const attempt = manager.writeState("default", base, [resource("t.b")], "create t.b");
      await expect(attempt).rejects.toBeInstanceOf(StalePlanError);
      await expect(attempt).rejects.toThrow("created against state serial 0, but the state is now at serial 1");
    });

    it("keeps history newest first", async () => {
      const first = await manager.writeState("default", emptySnapshot(), [resource("t.a")], "create t.a");
      await manager.writeState("default", first, [resource("t.a"), resource("t.b")], "create t.b");

      const history = await manager.history("default");
      expect(history.map((v) => [v.serial, v.operation, v.resourceCount])).toEqual([
        [2, "create t.b", 2],
        [1, "create t.a", 1],
      ]);
    });
  });

  describe("diffStates", () => {
    const state = (serial: number, resources: StateResource[]): StateSnapshot => ({
      version: 1,
      serial,
      lineage: "l",
      resources,
    });

    it("reports added, removed and changed resources", () => {
      const before = state(1, [resource("t.a", { size: 1 }), resource("t.b")]);
      const after = state(2, [resource("t.a", { size: 2 }), resource("t.c")]);

      const diff = manager.diffStates(before, after);
      expect(diff).toMatchObject({ beforeSerial: 1, afterSerial: 2, additions: 1, removals: 1, changes: 1 });
      expect(diff.entries).toEqual([
        { address: "t.c", type: "t", action: "added" },
        { address: "t.b", type: "t", action: "removed" },
        { address: "t.a", type: "t", action: "changed", changedAttributes: [{ path: "size", before: 1, after: 2 }] },
      ]);
    });

    it("reports nothing for identical states", () => {
      const s = state(1, [resource("t.a")]);
      expect(manager.diffStates(s, s).entries).toEqual([]);
    });
  });
});
