import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import type { TransferDirection, TransferSource, TransferStatus } from '@lan-drop/shared';
import type { HistoryEntry } from './types.js';

/**
 * Append-only log of transfer events. Rows are never deleted; the only
 * mutation allowed is moving an upload row's status forward.
 */
export interface HistoryLog {
  insert(entry: HistoryEntry): void;
  updateStatus(id: string, status: TransferStatus, from: readonly TransferStatus[]): boolean;
  list(deviceId?: string): HistoryEntry[];
  get(id: string): HistoryEntry | undefined;
  // Run `fn` so that every write inside it lands, or none does
  transaction<T>(fn: () => T): T;
  close(): void;
}

interface HistoryRow {
  id: string;
  device_id: string;
  device_name: string;
  file_name: string;
  file_path: string;
  direction: string;
  timestamp: string;
  status: string;
  file_size: number;
  source: string;
}

const COLUMNS = 'id, device_id, device_name, file_name, file_path, direction, timestamp, status, file_size, source';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS transfer_history (
    id TEXT PRIMARY KEY,
    device_id TEXT NOT NULL,
    device_name TEXT NOT NULL,
    file_name TEXT NOT NULL,
    file_path TEXT NOT NULL,
    direction TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    status TEXT NOT NULL,
    file_size INTEGER NOT NULL DEFAULT 0,
    source TEXT NOT NULL DEFAULT 'mobile'
  );
  CREATE INDEX IF NOT EXISTS idx_transfer_history_device_ts ON transfer_history(device_id, timestamp);
  CREATE INDEX IF NOT EXISTS idx_transfer_history_ts ON transfer_history(timestamp);
`;

function toDirection(value: string): TransferDirection {
  return value === 'download' ? 'download' : 'upload';
}

function toStatus(value: string): TransferStatus {
  return value === 'downloaded' || value === 'saved' ? value : 'success';
}

function toSource(value: string): TransferSource {
  return value === 'desktop' ? 'desktop' : 'mobile';
}

function fromRow(row: HistoryRow): HistoryEntry {
  return {
    id: row.id,
    deviceId: row.device_id,
    deviceName: row.device_name,
    fileName: row.file_name,
    filePath: row.file_path,
    direction: toDirection(row.direction),
    status: toStatus(row.status),
    sizeBytes: row.file_size,
    source: toSource(row.source),
    createdAt: row.timestamp,
  };
}

export class SqliteHistoryLog implements HistoryLog {
  private db: Database.Database;
  private insertStmt: Database.Statement;
  private selectAllStmt: Database.Statement;
  private selectByDeviceStmt: Database.Statement;
  private selectByIdStmt: Database.Statement;

  // Pass ':memory:' for a throwaway log
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath, { timeout: 15000 });
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.exec(SCHEMA);

    this.insertStmt = this.db.prepare(
      `INSERT INTO transfer_history (${COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    this.selectAllStmt = this.db.prepare(
      `SELECT ${COLUMNS} FROM transfer_history ORDER BY timestamp ASC, id ASC`
    );
    this.selectByDeviceStmt = this.db.prepare(
      `SELECT ${COLUMNS} FROM transfer_history WHERE device_id = ? ORDER BY timestamp ASC, id ASC`
    );
    this.selectByIdStmt = this.db.prepare(
      `SELECT ${COLUMNS} FROM transfer_history WHERE id = ? LIMIT 1`
    );
  }

  insert(entry: HistoryEntry): void {
    this.insertStmt.run(
      entry.id,
      entry.deviceId,
      entry.deviceName,
      entry.fileName,
      entry.filePath,
      entry.direction,
      entry.createdAt,
      entry.status,
      Math.max(0, Math.floor(entry.sizeBytes)),
      entry.source
    );
  }

  updateStatus(id: string, status: TransferStatus, from: readonly TransferStatus[]): boolean {
    if (from.length === 0) {
      return false;
    }
    const placeholders = from.map(() => '?').join(', ');
    const result = this.db
      .prepare(`UPDATE transfer_history SET status = ? WHERE id = ? AND status IN (${placeholders})`)
      .run(status, id, ...from);
    return result.changes > 0;
  }

  list(deviceId?: string): HistoryEntry[] {
    const rows = deviceId === undefined
      ? this.selectAllStmt.all()
      : this.selectByDeviceStmt.all(deviceId);
    return rows.filter(isHistoryRow).map(fromRow);
  }

  get(id: string): HistoryEntry | undefined {
    const row: unknown = this.selectByIdStmt.get(id);
    return isHistoryRow(row) ? fromRow(row) : undefined;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }
}

function isHistoryRow(value: unknown): value is HistoryRow {
  return typeof value === 'object' && value !== null && 'id' in value && 'file_name' in value;
}
