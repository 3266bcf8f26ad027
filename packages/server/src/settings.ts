import * as fs from 'fs';
import * as path from 'path';
import { LOG_TAGS } from './constants.js';
import { logger } from './utils/logger.js';

const TAG = LOG_TAGS.SETTINGS;

export interface PersistedSettings {
  maxUploadBytes?: number;
  downloadDir?: string;
}

/**
 * Runtime settings the desktop changes from its page, kept across restarts
 */
export interface SettingsStore {
  load(): PersistedSettings;
  save(update: PersistedSettings): void;
}

export class JsonSettingsStore implements SettingsStore {
  constructor(private readonly filePath: string) {}

  load(): PersistedSettings {
    if (!fs.existsSync(this.filePath)) {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      logger.warn(TAG, `Ignoring unreadable settings file ${this.filePath}:`, error);
      return {};
    }
    return parseSettings(raw);
  }

  // Merges into what is on disk; failures are logged, the running value still applies
  save(update: PersistedSettings): void {
    try {
      const merged = { ...this.load(), ...update };
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(merged, null, 2), 'utf-8');
    } catch (error) {
      logger.warn(TAG, `Failed to persist settings to ${this.filePath}:`, error);
    }
  }
}

export class MemorySettingsStore implements SettingsStore {
  private settings: PersistedSettings;

  constructor(initial: PersistedSettings = {}) {
    this.settings = { ...initial };
  }

  load(): PersistedSettings {
    return { ...this.settings };
  }

  save(update: PersistedSettings): void {
    this.settings = { ...this.settings, ...update };
  }
}

function parseSettings(raw: unknown): PersistedSettings {
  if (typeof raw !== 'object' || raw === null) {
    return {};
  }

  const settings: PersistedSettings = {};
  if ('maxUploadBytes' in raw && Number.isInteger(raw.maxUploadBytes)) {
    const value = Number(raw.maxUploadBytes);
    if (value > 0) {
      settings.maxUploadBytes = value;
    }
  }
  if ('downloadDir' in raw && typeof raw.downloadDir === 'string' && path.isAbsolute(raw.downloadDir)) {
    settings.downloadDir = raw.downloadDir;
  }
  return settings;
}
