/**
 * Terraform State Manager
 *
 * High-level state operations over a storage backend: locking, versioned
 * compare-and-swap writes, history and state diffs.
 */

import { randomUUID } from "node:crypto";
import { hostname, userInfo } from "node:os";
import { LockContentionError, StalePlanError } from "../../../src/plugin-sdk/index.js";
import { diffAttributes, type AttributeChange } from "./diff.js";
import { STATE_FORMAT_VERSION, type StateLock, type StateResource, type StateSnapshot, type StateStorage, type StateVersion } from "./types.js";

// =============================================================================
// State Diff
// =============================================================================

/** A resource-level change between two states. */
export interface StateDiffEntry {
  address: string;
  type: string;
  action: "added" | "removed" | "changed";
  changedAttributes?: AttributeChange[];
}

/** Result of comparing two state snapshots. */
export interface StateDiffResult {
  beforeSerial: number;
  afterSerial: number;
  additions: number;
  removals: number;
  changes: number;
  entries: StateDiffEntry[];
}

export function emptySnapshot(): StateSnapshot {
  return { version: STATE_FORMAT_VERSION, serial: 0, lineage: null, resources: [] };
}

/** `user@host`, recorded on every lock. */
export function defaultLockOwner(): string {
  let user = "unknown";
  try {
    user = userInfo().username;
  } catch {
    // no passwd entry (e.g. containers running as an arbitrary uid)
    user = process.env.USER ?? "unknown";
  }
  return `${user}@${hostname()}`;
}

// =============================================================================
// StateManager
// =============================================================================

export class StateManager {
  private storage: StateStorage;

  constructor(storage: StateStorage) {
    this.storage = storage;
  }

  /** Initialize the storage backend. */
  async initialize(): Promise<void> {
    await this.storage.initialize();
  }

  /** Close storage connections. */
  async close(): Promise<void> {
    await this.storage.close();
  }

  // ---------------------------------------------------------------------------
  // State Locking
  // ---------------------------------------------------------------------------

  /**
   * Acquire the state lock (prevents concurrent modifications).
   * Returns null when another holder has it.
   */
  async lockState(stateId: string, operation: string, lockedBy: string = defaultLockOwner()): Promise<StateLock | null> {
    const existing = await this.storage.getLock(stateId);
    if (existing) return null;

    const lock: StateLock = {
      id: randomUUID(),
      stateId,
      operation,
      lockedBy,
      lockedAt: new Date().toISOString(),
    };

    const acquired = await this.storage.acquireLock(lock);
    return acquired ? lock : null;
  }

  /** Release a state lock. */
  async unlockState(stateId: string, lockId: string): Promise<boolean> {
    return this.storage.releaseLock(stateId, lockId);
  }

  /** Get the current lock for a state (if any). */
  async getStateLock(stateId: string): Promise<StateLock | null> {
    return this.storage.getLock(stateId);
  }

  /**
   * Run `fn` while holding the lock. Contention fails immediately, naming
   * the current holder; the lock is released whatever `fn` does.
   */
  async withLock<T>(stateId: string, operation: string, fn: (lock: StateLock) => Promise<T>, lockedBy?: string): Promise<T> {
    const lock = await this.lockState(stateId, operation, lockedBy);
    if (!lock) {
      throw new LockContentionError(stateId, await this.storage.getLock(stateId));
    }
    try {
      return await fn(lock);
    } finally {
      await this.storage.releaseLock(stateId, lock.id);
    }
  }

  /** Remove a lock left behind by a crashed run. The ID must match. */
  async forceUnlock(stateId: string, lockId: string): Promise<StateLock> {
    const existing = await this.storage.getLock(stateId);
    if (!existing) throw new Error(`State "${stateId}" is not locked`);
    if (existing.id !== lockId) {
      throw new Error(`Lock ID "${lockId}" does not match the existing lock ID "${existing.id}" on state "${stateId}"`);
    }
    await this.storage.releaseLock(stateId, lockId);
    return existing;
  }

  // ---------------------------------------------------------------------------
  // Reads & Writes
  // ---------------------------------------------------------------------------

  async readState(stateId: string): Promise<StateSnapshot> {
    return (await this.storage.readState(stateId)) ?? emptySnapshot();
  }

  /**
   * Persist a new resource list on top of `prior`. The write only lands if
   * the stored serial still equals `prior.serial`.
   */
  async writeState(stateId: string, prior: StateSnapshot, resources: StateResource[], operation: string): Promise<StateSnapshot> {
    const next: StateSnapshot = {
      version: STATE_FORMAT_VERSION,
      serial: prior.serial + 1,
      lineage: prior.lineage ?? randomUUID(),
      resources,
    };
    const written = await this.storage.writeState(stateId, next, prior.serial, operation);
    if (!written) {
      const actual = await this.storage.readState(stateId);
      throw new StalePlanError(prior.serial, actual?.serial ?? 0);
    }
    return next;
  }

  async history(stateId: string, limit?: number): Promise<StateVersion[]> {
    return this.storage.listVersions(stateId, limit);
  }

  // ---------------------------------------------------------------------------
  // State Diffing
  // ---------------------------------------------------------------------------

  /** Compare two snapshots and return resource-level differences. */
  diffStates(before: StateSnapshot, after: StateSnapshot): StateDiffResult {
    const beforeMap = new Map(before.resources.map((r) => [r.address, r]));
    const afterMap = new Map(after.resources.map((r) => [r.address, r]));

    const entries: StateDiffEntry[] = [];

    for (const [addr, resource] of afterMap) {
      if (!beforeMap.has(addr)) entries.push({ address: addr, type: resource.type, action: "added" });
    }

    for (const [addr, resource] of beforeMap) {
      if (!afterMap.has(addr)) entries.push({ address: addr, type: resource.type, action: "removed" });
    }

    for (const [addr, beforeRes] of beforeMap) {
      const afterRes = afterMap.get(addr);
      if (!afterRes) continue;

      const changedAttrs = diffAttributes(beforeRes.attributes, afterRes.attributes);
      if (changedAttrs.length > 0) {
        entries.push({ address: addr, type: beforeRes.type, action: "changed", changedAttributes: changedAttrs });
      }
    }

    return {
      beforeSerial: before.serial,
      afterSerial: after.serial,
      additions: entries.filter((e) => e.action === "added").length,
      removals: entries.filter((e) => e.action === "removed").length,
      changes: entries.filter((e) => e.action === "changed").length,
      entries,
    };
  }
}
