import { createReadStream } from 'fs';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import type { SaveResult, TransferStatus } from '@lan-drop/shared';
import { DESKTOP_DEVICE_ID, LOG_TAGS } from './constants.js';
import type { BroadcastHub } from './broadcast.js';
import { DESKTOP_IDENTITY, type DeviceRegistry } from './device-registry.js';
import {
  AuthError,
  BadRequestError,
  IOFailureError,
  NotFoundError,
  TransferError,
} from './errors.js';
import {
  allocateUniqueFilePath,
  fileSize,
  isInsideDirectory,
  secureFilename,
  streamToDisk,
} from './files.js';
import { toHistoryEntry, type TransferRecordStore } from './record-store.js';
import { logger } from './utils/logger.js';
import type { HistoryEntry, Requester, TransferRecord } from './types.js';

const TAG = LOG_TAGS.TRANSFER;

/**
 * Values the desktop may change while the service runs; read on every operation
 */
export interface TransferSettings {
  maxUploadBytes: number;
  downloadDir: string;
  transientDir: string;
}

export interface UploadInput {
  fileName: string;
  stream: Readable;
}

export interface DownloadTicket {
  record: TransferRecord;
  entry: HistoryEntry;
  // Bytes `open()` yields: the file's size when the download was authorized
  size: number;
  open(): Readable;
  // Call once the bytes have been handed to the client
  complete(): Promise<void>;
}

function newId(): string {
  return uuidv4().replace(/-/g, '');
}

function expandHome(raw: string): string {
  if (raw === '~') return os.homedir();
  if (raw.startsWith('~/') || raw.startsWith('~\\')) return path.join(os.homedir(), raw.slice(2));
  return raw;
}

export class TransferCoordinator {
  private records: TransferRecordStore;
  private devices: DeviceRegistry;
  private hub: BroadcastHub;
  private settings: TransferSettings;
  private now: () => number;

  constructor(
    records: TransferRecordStore,
    devices: DeviceRegistry,
    hub: BroadcastHub,
    settings: TransferSettings,
    now: () => number = Date.now
  ) {
    this.records = records;
    this.devices = devices;
    this.hub = hub;
    this.settings = settings;
    this.now = now;
  }

  /**
   * Store an incoming file. Desktop uploads are pushes to the latest phone and
   * land in the transient directory under a generated name; phone uploads
   * land in the download directory under their own (de-duplicated) name.
   */
  async upload(requester: Requester, input: UploadInput): Promise<TransferRecord> {
    const originalName = input.fileName.trim();
    if (!originalName) {
      input.stream.resume();
      throw new BadRequestError('Missing file');
    }

    const id = newId();
    const isTransient = requester.isDesktop;
    const owner = isTransient ? this.devices.preferredMobileDevice() : requester;
    const maxBytes = this.settings.maxUploadBytes;

    let destination: string;
    let storedName: string;
    try {
      if (isTransient) {
        await fs.mkdir(this.settings.transientDir, { recursive: true });
        const safeName = secureFilename(originalName) || `file-${Math.floor(this.now() / 1000)}`;
        destination = path.join(this.settings.transientDir, `${Math.floor(this.now() / 1000)}_${id}_${safeName}`);
        storedName = originalName;
      } else {
        await fs.mkdir(this.settings.downloadDir, { recursive: true });
        destination = await allocateUniqueFilePath(this.settings.downloadDir, originalName);
        storedName = path.basename(destination);
      }
    } catch (error) {
      input.stream.resume();
      throw new IOFailureError('Save directory is unavailable', error);
    }

    let size: number;
    try {
      size = await streamToDisk(input.stream, destination, maxBytes);
    } catch (error) {
      if (error instanceof TransferError) {
        logger.warn(TAG, `Rejected upload ${originalName}: ${error.message}`);
        throw error;
      }
      throw new IOFailureError('Failed to save upload', error);
    }

    const record: TransferRecord = {
      id,
      deviceId: owner.deviceId,
      deviceName: owner.deviceName,
      fileName: storedName,
      filePath: destination,
      direction: 'upload',
      status: 'success',
      sizeBytes: size,
      source: requester.isDesktop ? 'desktop' : 'mobile',
      createdAt: new Date(this.now()).toISOString(),
      isTransient,
    };

    try {
      this.records.create(record);
    } catch (error) {
      await fs.rm(destination, { force: true });
      throw error;
    }

    logger.info(TAG, `Received ${storedName} (${size} bytes) for ${owner.deviceId}`);
    this.publishNew(toHistoryEntry(record), owner.deviceId);
    return record;
  }

  /**
   * Offer a file that already exists on the desktop without copying it
   */
  async uploadDesktopPath(requester: Requester, rawPath: string): Promise<TransferRecord> {
    if (!requester.isDesktop) {
      throw new AuthError('DesktopOnly');
    }

    const trimmed = rawPath.trim();
    if (!trimmed) {
      throw new BadRequestError('Missing filePath');
    }
    const expanded = expandHome(trimmed);
    if (!path.isAbsolute(expanded)) {
      throw new BadRequestError('filePath must be an absolute path');
    }
    const sourcePath = path.resolve(expanded);

    let size: number | null;
    try {
      size = await fileSize(sourcePath);
    } catch (error) {
      throw new IOFailureError('Failed to read file information', error);
    }
    if (size === null) {
      throw new NotFoundError('Source file does not exist');
    }

    const owner = this.devices.preferredMobileDevice();
    const record: TransferRecord = {
      id: newId(),
      deviceId: owner.deviceId,
      deviceName: owner.deviceName,
      fileName: path.basename(sourcePath),
      filePath: sourcePath,
      direction: 'upload',
      status: 'success',
      sizeBytes: size,
      source: 'desktop',
      createdAt: new Date(this.now()).toISOString(),
      isTransient: false,
    };

    // The file belongs to the user; a failed insert leaves it alone
    this.records.create(record);

    logger.info(TAG, `Offering ${sourcePath} to ${owner.deviceId}`);
    this.publishNew(toHistoryEntry(record), owner.deviceId);
    return record;
  }

  /**
   * Authorize a download and record it. The caller streams `open()` and then
   * calls `complete()`, which announces the download and reclaims transient
   * files: a desktop push can be downloaded once.
   */
  async download(requester: Requester, id: string): Promise<DownloadTicket> {
    const record = this.requireOwnedRecord(requester, id);
    const size = await this.requireSourceFile(record);

    const entry: HistoryEntry = {
      id: newId(),
      deviceId: requester.deviceId,
      deviceName: requester.deviceName,
      fileName: record.fileName,
      filePath: record.filePath,
      direction: 'download',
      status: 'success',
      sizeBytes: size,
      source: requester.isDesktop ? 'desktop' : 'mobile',
      createdAt: new Date(this.now()).toISOString(),
    };
    this.recordTransfer(record, 'downloaded', entry);

    let completed = false;
    return {
      record,
      entry,
      size,
      open: () => (size > 0 ? createReadStream(record.filePath, { start: 0, end: size - 1 }) : Readable.from([])),
      complete: async () => {
        if (completed) return;
        completed = true;
        this.publishNew(entry, requester.deviceId);
        if (record.isTransient) {
          await this.reclaim(record);
        }
      },
    };
  }

  /**
   * Put a copy of the file into the download directory (or adopt it in place
   * when it already lives there) and mark the upload as saved
   */
  async saveToFolder(requester: Requester, id: string): Promise<SaveResult> {
    const record = this.requireOwnedRecord(requester, id);
    const size = await this.requireSourceFile(record);

    const downloadDir = path.resolve(this.settings.downloadDir);
    let targetPath: string;
    try {
      await fs.mkdir(downloadDir, { recursive: true });
      if (isInsideDirectory(record.filePath, downloadDir)) {
        targetPath = path.resolve(record.filePath);
      } else {
        targetPath = await allocateUniqueFilePath(downloadDir, record.fileName);
        try {
          await fs.copyFile(record.filePath, targetPath);
        } catch (error) {
          await fs.rm(targetPath, { force: true });
          throw error;
        }
      }
    } catch (error) {
      throw new IOFailureError('Failed to save file', error);
    }

    const entry: HistoryEntry = {
      id: newId(),
      deviceId: DESKTOP_IDENTITY.deviceId,
      deviceName: DESKTOP_IDENTITY.deviceName,
      fileName: path.basename(targetPath),
      filePath: targetPath,
      direction: 'download',
      status: 'success',
      sizeBytes: size,
      source: 'desktop',
      createdAt: new Date(this.now()).toISOString(),
    };
    try {
      this.recordTransfer(record, 'saved', entry);
    } catch (error) {
      if (targetPath !== path.resolve(record.filePath)) {
        await fs.rm(targetPath, { force: true });
      }
      throw error;
    }

    if (record.isTransient) {
      await this.reclaim(record);
    }

    logger.info(TAG, `Saved ${record.fileName} to ${targetPath}`);
    this.publishNew(entry, DESKTOP_DEVICE_ID);

    return {
      savedPath: targetPath,
      fileName: path.basename(targetPath),
      downloadDir,
    };
  }

  private requireOwnedRecord(requester: Requester, id: string): TransferRecord {
    const record = this.records.get(id);
    if (!record) {
      throw new NotFoundError('File does not exist');
    }
    if (!requester.isDesktop && record.deviceId !== requester.deviceId) {
      throw new AuthError('NotOwner');
    }
    return record;
  }

  private async requireSourceFile(record: TransferRecord): Promise<number> {
    let size: number | null;
    try {
      size = await fileSize(record.filePath);
    } catch (error) {
      throw new IOFailureError('Source file is unavailable', error);
    }
    if (size === null) {
      throw new NotFoundError('Source file is unavailable');
    }
    return size;
  }

  private recordTransfer(record: TransferRecord, status: TransferStatus, entry: HistoryEntry): void {
    if (this.records.updateStatus(record.id, status, entry)) {
      this.hub.publish({ type: 'record_updated', id: record.id, status }, record.deviceId);
    }
  }

  private async reclaim(record: TransferRecord): Promise<void> {
    const removed = await this.records.removeAndReclaim(record.id);
    if (removed) {
      this.hub.publish({ type: 'record_removed', id: record.id }, record.deviceId);
    }
  }

  private publishNew(entry: HistoryEntry, targetDeviceId: string): void {
    this.hub.publish({ type: 'new_record', record: this.records.toPublic(entry, false) }, targetDeviceId);
  }
}
