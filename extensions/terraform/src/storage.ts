/**
 * Terraform — State Storage (InMemory + SQLite)
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { Database } from "better-sqlite3";
import type { StateLock, StateSnapshot, StateStorage, StateVersion } from "./types.js";

// ── InMemory ────────────────────────────────────────────────────

export class InMemoryStateStorage implements StateStorage {
  private states = new Map<string, StateSnapshot>();
  private versions = new Map<string, StateVersion[]>();
  private locks = new Map<string, StateLock>();

  async initialize(): Promise<void> {}

  async readState(stateId: string): Promise<StateSnapshot | null> {
    const state = this.states.get(stateId);
    return state ? structuredClone(state) : null;
  }

  async writeState(stateId: string, snapshot: StateSnapshot, expectedSerial: number, operation: string): Promise<boolean> {
    const current = this.states.get(stateId)?.serial ?? 0;
    if (current !== expectedSerial) return false;
    this.states.set(stateId, structuredClone(snapshot));

    const list = this.versions.get(stateId) ?? [];
    list.unshift({
      stateId,
      serial: snapshot.serial,
      lineage: snapshot.lineage ?? "",
      writtenAt: new Date().toISOString(),
      operation,
      resourceCount: snapshot.resources.length,
      snapshot: structuredClone(snapshot),
    });
    this.versions.set(stateId, list);
    return true;
  }

  async listVersions(stateId: string, limit = 10): Promise<StateVersion[]> {
    const list = this.versions.get(stateId) ?? [];
    return list.slice(0, limit).map((v) => structuredClone(v));
  }

  async acquireLock(lock: StateLock): Promise<boolean> {
    if (this.locks.has(lock.stateId)) return false;
    this.locks.set(lock.stateId, structuredClone(lock));
    return true;
  }

  async releaseLock(stateId: string, lockId: string): Promise<boolean> {
    const existing = this.locks.get(stateId);
    if (!existing || existing.id !== lockId) return false;
    this.locks.delete(stateId);
    return true;
  }

  async getLock(stateId: string): Promise<StateLock | null> {
    const lock = this.locks.get(stateId);
    return lock ? structuredClone(lock) : null;
  }

  async close(): Promise<void> {
    this.states.clear();
    this.versions.clear();
    this.locks.clear();
  }
}

// ── SQLite ──────────────────────────────────────────────────────

type StateRow = { serial: number; snapshot_json: string };
type VersionRow = { state_id: string; serial: number; lineage: string; written_at: string; operation: string; resource_count: number; snapshot_json: string };
type LockRow = { state_id: string; lock_id: string; operation: string; locked_by: string; locked_at: string; info: string | null };

function parseSnapshot(json: string): StateSnapshot {
  const value: StateSnapshot = JSON.parse(json);
  return value;
}

export class SQLiteStateStorage implements StateStorage {
  private db: Database | null = null;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  async initialize(): Promise<void> {
    if (this.db) return;
    const BetterSqlite3 = (await import("better-sqlite3")).default;
    if (this.dbPath !== ":memory:") mkdirSync(dirname(this.dbPath), { recursive: true });
    const db = new BetterSqlite3(this.dbPath);
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");

    db.exec(`
      CREATE TABLE IF NOT EXISTS states (
        state_id TEXT PRIMARY KEY,
        serial INTEGER NOT NULL,
        lineage TEXT NOT NULL,
        snapshot_json TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS state_versions (
        state_id TEXT NOT NULL,
        serial INTEGER NOT NULL,
        lineage TEXT NOT NULL,
        written_at TEXT NOT NULL,
        operation TEXT NOT NULL,
        resource_count INTEGER NOT NULL,
        snapshot_json TEXT NOT NULL,
        PRIMARY KEY (state_id, serial)
      );

      CREATE TABLE IF NOT EXISTS state_locks (
        state_id TEXT PRIMARY KEY,
        lock_id TEXT NOT NULL,
        operation TEXT NOT NULL,
        locked_by TEXT NOT NULL,
        locked_at TEXT NOT NULL,
        info TEXT
      );
    `);
    this.db = db;
  }

  private get conn(): Database {
    if (!this.db) throw new Error("State storage is not initialized");
    return this.db;
  }

  async readState(stateId: string): Promise<StateSnapshot | null> {
    const row = this.conn.prepare<[string], StateRow>("SELECT serial, snapshot_json FROM states WHERE state_id = ?").get(stateId);
    return row ? parseSnapshot(row.snapshot_json) : null;
  }

  async writeState(stateId: string, snapshot: StateSnapshot, expectedSerial: number, operation: string): Promise<boolean> {
    const db = this.conn;
    const now = new Date().toISOString();
    const json = JSON.stringify(snapshot);
    const lineage = snapshot.lineage ?? "";

    const write = db.transaction((): boolean => {
      const row = db.prepare<[string], StateRow>("SELECT serial, snapshot_json FROM states WHERE state_id = ?").get(stateId);
      if ((row?.serial ?? 0) !== expectedSerial) return false;

      db.prepare(
        `INSERT INTO states (state_id, serial, lineage, snapshot_json, updated_at) VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(state_id) DO UPDATE SET serial = excluded.serial, lineage = excluded.lineage,
           snapshot_json = excluded.snapshot_json, updated_at = excluded.updated_at`,
      ).run(stateId, snapshot.serial, lineage, json, now);
      db.prepare(
        `INSERT INTO state_versions (state_id, serial, lineage, written_at, operation, resource_count, snapshot_json) VALUES (?, ?, ?, ?, ?, ?, ?)`,
      ).run(stateId, snapshot.serial, lineage, now, operation, snapshot.resources.length, json);
      return true;
    });
    return write.immediate();
  }

  async listVersions(stateId: string, limit = 10): Promise<StateVersion[]> {
    const rows = this.conn
      .prepare<[string, number], VersionRow>("SELECT * FROM state_versions WHERE state_id = ? ORDER BY serial DESC LIMIT ?")
      .all(stateId, limit);
    return rows.map((r) => ({
      stateId: r.state_id,
      serial: r.serial,
      lineage: r.lineage,
      writtenAt: r.written_at,
      operation: r.operation,
      resourceCount: r.resource_count,
      snapshot: parseSnapshot(r.snapshot_json),
    }));
  }

  async acquireLock(lock: StateLock): Promise<boolean> {
    const result = this.conn
      .prepare(
        `INSERT INTO state_locks (state_id, lock_id, operation, locked_by, locked_at, info) VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(state_id) DO NOTHING`,
      )
      .run(lock.stateId, lock.id, lock.operation, lock.lockedBy, lock.lockedAt, lock.info ?? null);
    return result.changes === 1;
  }

  async releaseLock(stateId: string, lockId: string): Promise<boolean> {
    return this.conn.prepare("DELETE FROM state_locks WHERE state_id = ? AND lock_id = ?").run(stateId, lockId).changes > 0;
  }

  async getLock(stateId: string): Promise<StateLock | null> {
    const row = this.conn.prepare<[string], LockRow>("SELECT * FROM state_locks WHERE state_id = ?").get(stateId);
    if (!row) return null;
    return {
      id: row.lock_id,
      stateId: row.state_id,
      operation: row.operation,
      lockedBy: row.locked_by,
      lockedAt: row.locked_at,
      ...(row.info !== null ? { info: row.info } : {}),
    };
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }
}
