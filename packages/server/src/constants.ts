import * as os from 'os';
import * as path from 'path';

export const DESKTOP_DEVICE_ID = 'desktop';
export const DESKTOP_DEVICE_NAME = 'Desktop';
export const MOBILE_NAME_PREFIX = 'Phone-';

// Pairing
export const TOKEN_LENGTH = 16;
export const TOKEN_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnpqrstuvwxyz23456789'; // Excludes confusing characters
export const TOKEN_TTL_SECONDS = 120;
export const SESSION_TTL_SECONDS = 8 * 60 * 60;

// Device identity
export const DEVICE_ID_MAX_LENGTH = 120;
export const DEVICE_NAME_MAX_LENGTH = 80;

// Uploads
export const MIB = 1024 * 1024;
export const GIB = 1024 * MIB;
export const DEFAULT_MAX_UPLOAD_BYTES = 10 * GIB;
export const MIN_UPLOAD_LIMIT_BYTES = 1 * MIB;
export const MAX_UPLOAD_LIMIT_BYTES = 100 * GIB;
export const MULTIPART_OVERHEAD_BYTES = 1 * MIB;
export const FALLBACK_FILE_NAME = 'downloaded_file';

// HTTP
export const DEFAULT_PORT = 5000;
export const PORT_SEARCH_TRIES = 100;
export const SESSION_COOKIE = 'lft_session';
export const HEADERS = {
  SESSION_ID: 'x-session-id',
  DEVICE_ID: 'x-device-id',
  DEVICE_NAME: 'x-device-name',
} as const;

// Storage locations
export const DATA_DIR = path.join(os.homedir(), '.lan-drop');
export const DEFAULT_DOWNLOAD_DIR = path.join(os.homedir(), 'Downloads');
export const HISTORY_DB_FILENAME = 'history.db';
export const SETTINGS_FILENAME = 'settings.json';
export const TRANSIENT_DIRNAME = 'transient_uploads';

export const LOG_TAGS = {
  PAIRING: '[Pairing]',
  DEVICES: '[Devices]',
  RECORDS: '[Records]',
  HUB: '[Hub]',
  TRANSFER: '[Transfer]',
  HTTP: '[HTTP]',
  REALTIME: '[Realtime]',
  SERVER: '[Server]',
  SETTINGS: '[Settings]',
} as const;
