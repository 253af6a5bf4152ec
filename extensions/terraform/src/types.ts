/**
 * Terraform — Type Definitions
 *
 * Versioned state snapshots, state locks and the storage backends that
 * hold them.
 */

import type { ResourceAttributes } from "../../../src/plugin-sdk/index.js";

// ── State ───────────────────────────────────────────────────────

export const STATE_FORMAT_VERSION = 1;

export interface StateResource {
  address: string;
  type: string;
  name: string;
  /** Platform resource ID. */
  id: string;
  attributes: ResourceAttributes;
  dependencies: string[];
}

export interface StateSnapshot {
  version: number;
  /** Increases by one on every persisted write; 0 before the first. */
  serial: number;
  /** Fixed at the first write; null while the state is empty. */
  lineage: string | null;
  resources: StateResource[];
}

/** One persisted write, kept for `state history`. */
export interface StateVersion {
  stateId: string;
  serial: number;
  lineage: string;
  writtenAt: string;
  /** Operation that produced the write, e.g. `apply`. */
  operation: string;
  resourceCount: number;
  snapshot: StateSnapshot;
}

// ── State Lock ──────────────────────────────────────────────────

export interface StateLock {
  id: string;
  stateId: string;
  operation: string;
  lockedBy: string;
  lockedAt: string;
  info?: string;
}

// ── Storage Interface ───────────────────────────────────────────

export interface StateStorage {
  initialize(): Promise<void>;

  /** Latest snapshot, or null when nothing was ever written. */
  readState(stateId: string): Promise<StateSnapshot | null>;
  /**
   * Compare-and-swap write: succeeds only while the stored serial equals
   * `expectedSerial` (0 for a state that does not exist yet).
   */
  writeState(stateId: string, snapshot: StateSnapshot, expectedSerial: number, operation: string): Promise<boolean>;
  listVersions(stateId: string, limit?: number): Promise<StateVersion[]>;

  /** Atomic: false when the state is already locked. */
  acquireLock(lock: StateLock): Promise<boolean>;
  releaseLock(stateId: string, lockId: string): Promise<boolean>;
  getLock(stateId: string): Promise<StateLock | null>;

  close(): Promise<void>;
}
