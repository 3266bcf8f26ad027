import * as fs from 'fs/promises';
import type { PublicRecord, TransferStatus } from '@lan-drop/shared';
import { LOG_TAGS } from './constants.js';
import { StorageError, errorCode } from './errors.js';
import type { HistoryLog } from './history.js';
import { logger } from './utils/logger.js';
import type { HistoryEntry, TransferContext, TransferRecord } from './types.js';

const TAG = LOG_TAGS.RECORDS;

const STATUS_ORDER: readonly TransferStatus[] = ['success', 'downloaded', 'saved'];

const STATUS_RANK: Record<TransferStatus, number> = {
  success: 0,
  downloaded: 1,
  saved: 2,
};

// Statuses a record may move to `status` from; transitions only go forward
export function statusesBefore(status: TransferStatus): TransferStatus[] {
  const rank = STATUS_RANK[status];
  return STATUS_ORDER.filter((s) => STATUS_RANK[s] < rank);
}

export function toHistoryEntry(record: TransferRecord): HistoryEntry {
  const { isTransient: _isTransient, ...entry } = record;
  return entry;
}

/**
 * Live transfer records in memory, backed by the persisted history log
 */
export class TransferRecordStore {
  private context: TransferContext;
  private history: HistoryLog;

  constructor(context: TransferContext, history: HistoryLog) {
    this.context = context;
    this.history = history;
  }

  // Publish the live record and its history row together, or neither
  create(record: TransferRecord): void {
    this.context.records.set(record.id, record);
    try {
      this.history.insert(toHistoryEntry(record));
    } catch (error) {
      this.context.records.delete(record.id);
      throw new StorageError('Failed to write transfer history', error);
    }
    logger.debug(TAG, `Created record ${record.id} (${record.fileName}) for ${record.deviceId}`);
  }

  get(id: string): TransferRecord | undefined {
    return this.context.records.get(id);
  }

  getHistory(id: string): HistoryEntry | undefined {
    return this.history.get(id);
  }

  isLive(id: string): boolean {
    return this.context.records.has(id);
  }

  /**
   * Move a record forward. A `transfer` entry logging the download or save
   * that moved it is written in the same transaction, and the live record
   * only changes once that transaction commits.
   */
  updateStatus(id: string, status: TransferStatus, transfer?: HistoryEntry): boolean {
    let changed: boolean;
    try {
      changed = this.history.transaction(() => {
        const updated = this.history.updateStatus(id, status, statusesBefore(status));
        if (transfer) {
          this.history.insert(transfer);
        }
        return updated;
      });
    } catch (error) {
      throw new StorageError('Failed to update transfer history', error);
    }
    this.advanceLive(id, status);
    return changed;
  }

  private advanceLive(id: string, status: TransferStatus): void {
    const record = this.context.records.get(id);
    if (record && STATUS_RANK[status] > STATUS_RANK[record.status]) {
      record.status = status;
    }
  }

  // Drop the live record; a transient record also loses its backing file
  async removeAndReclaim(id: string): Promise<TransferRecord | undefined> {
    const removed = this.context.records.get(id);
    if (!removed) {
      return undefined;
    }
    this.context.records.delete(id);

    if (removed.isTransient) {
      try {
        await fs.unlink(removed.filePath);
      } catch (error) {
        if (errorCode(error) !== 'ENOENT') {
          logger.warn(TAG, `Failed to reclaim ${removed.filePath}:`, error);
        }
      }
    }
    logger.debug(TAG, `Removed record ${id}`);
    return removed;
  }

  // Desktop callers pass no filter and see every device; phones only see their own
  list(deviceFilter?: string): HistoryEntry[] {
    return this.history.list(deviceFilter);
  }

  toPublic(entry: HistoryEntry, includeFilePath: boolean): PublicRecord {
    return {
      id: entry.id,
      deviceId: entry.deviceId,
      deviceName: entry.deviceName,
      name: entry.fileName,
      filePath: includeFilePath ? entry.filePath : '',
      direction: entry.direction,
      status: entry.status,
      size: entry.sizeBytes,
      source: entry.source,
      createdAt: entry.createdAt,
      downloadUrl: this.isLive(entry.id) ? `/files/${entry.id}` : '',
    };
  }

  listPublic(deviceFilter?: string): PublicRecord[] {
    const includeFilePath = deviceFilter === undefined;
    return this.list(deviceFilter).map((entry) => this.toPublic(entry, includeFilePath));
  }
}
