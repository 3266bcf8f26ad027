import * as os from 'os';
import * as path from 'path';
import {
  DATA_DIR,
  DEFAULT_DOWNLOAD_DIR,
  DEFAULT_MAX_UPLOAD_BYTES,
  DEFAULT_PORT,
  HISTORY_DB_FILENAME,
  SESSION_TTL_SECONDS,
  SETTINGS_FILENAME,
  TOKEN_TTL_SECONDS,
  TRANSIENT_DIRNAME,
} from './constants.js';
import { JsonSettingsStore, type SettingsStore } from './settings.js';

export interface ServerConfig {
  port: number;
  strictPort: boolean;
  host: string;
  dataDir: string;
  downloadDir: string;
  transientDir: string;
  historyDbPath: string;
  settingsPath: string;
  maxUploadBytes: number;
  tokenTtlSeconds: number;
  sessionTtlSeconds: number;
}

export function getArgValue(args: string[], longFlag: string, shortFlag?: string): string | undefined {
  const longIndex = args.indexOf(longFlag);
  if (longIndex !== -1 && args[longIndex + 1]) {
    return args[longIndex + 1];
  }

  if (shortFlag) {
    const shortIndex = args.indexOf(shortFlag);
    if (shortIndex !== -1 && args[shortIndex + 1]) {
      return args[shortIndex + 1];
    }
  }

  return undefined;
}

// Absolute paths only; '~' expands to the home directory
export function normalizeDirectory(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  if (!value) {
    return undefined;
  }
  const expanded = value === '~' || value.startsWith('~/')
    ? path.join(os.homedir(), value.slice(1))
    : value;
  return path.isAbsolute(expanded) ? path.resolve(expanded) : undefined;
}

function parsePort(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const port = Number.parseInt(raw, 10);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid port: ${raw}`);
  }
  return port;
}

/**
 * Resolve the service configuration. Precedence: command-line flag, then
 * environment variable, then persisted settings, then the default.
 */
export function loadConfig(
  args: string[] = [],
  env: NodeJS.ProcessEnv = process.env,
  settingsStore?: SettingsStore
): ServerConfig {
  const dataDir = normalizeDirectory(getArgValue(args, '--data-dir'))
    ?? normalizeDirectory(env.LAN_DROP_DATA_DIR)
    ?? DATA_DIR;
  const settingsPath = getArgValue(args, '--settings') ?? path.join(dataDir, SETTINGS_FILENAME);
  const persisted = (settingsStore ?? new JsonSettingsStore(settingsPath)).load();

  const port = parsePort(getArgValue(args, '--port', '-p')) ?? parsePort(env.PORT) ?? DEFAULT_PORT;

  const downloadDir = normalizeDirectory(getArgValue(args, '--download-dir', '-d'))
    ?? normalizeDirectory(env.LAN_DROP_DOWNLOAD_DIR)
    ?? persisted.downloadDir
    ?? DEFAULT_DOWNLOAD_DIR;

  return {
    port,
    strictPort: args.includes('--strict-port'),
    host: '0.0.0.0',
    dataDir,
    downloadDir,
    transientDir: path.join(dataDir, TRANSIENT_DIRNAME),
    historyDbPath: path.join(dataDir, HISTORY_DB_FILENAME),
    settingsPath,
    maxUploadBytes: persisted.maxUploadBytes ?? DEFAULT_MAX_UPLOAD_BYTES,
    tokenTtlSeconds: TOKEN_TTL_SECONDS,
    sessionTtlSeconds: SESSION_TTL_SECONDS,
  };
}
