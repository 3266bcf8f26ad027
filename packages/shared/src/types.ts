// Transfer record wire types
export type TransferDirection = 'upload' | 'download';
export type TransferStatus = 'success' | 'downloaded' | 'saved';
export type TransferSource = 'desktop' | 'mobile';

export interface PublicRecord {
  id: string;
  deviceId: string;
  deviceName: string;
  name: string;
  filePath: string;  // empty unless the caller is the desktop
  direction: TransferDirection;
  status: TransferStatus;
  size: number;
  source: TransferSource;
  createdAt: string;
  downloadUrl: string;  // empty once the live record is gone
}

// WebSocket Message Types
export type ServerMessage =
  | { type: 'init'; records: PublicRecord[] }
  | { type: 'new_record'; record: PublicRecord }
  | { type: 'record_updated'; id: string; status: TransferStatus }
  | { type: 'record_removed'; id: string }
  | { type: 'pong'; ts: number };

export type ClientMessage = { type: 'ping' };

// Pairing Types
export interface MobileTokenPayload {
  mobileUrl: string;
  mobileQrDataUrl: string;
  tokenExpiresAt: number;  // seconds since epoch
}

// Settings Types
export interface SettingsView {
  maxUploadBytes: number;
  sessionTtlSeconds: number;
  downloadDir: string;
  defaultDownloadDir: string;
}

export interface UploadLimitUpdate {
  maxUploadBytes: number;
}

export interface DownloadDirUpdate {
  downloadDir: string;
}

export interface DesktopPathUpload {
  filePath: string;
}

export interface SaveResult {
  savedPath: string;
  fileName: string;
  downloadDir: string;
}

// API Response Types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
}
