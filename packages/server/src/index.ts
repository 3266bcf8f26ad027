export { LanDropServer } from './server.js';
export type { LanDropServerOptions, ListeningAddress } from './server.js';
export { loadConfig } from './config.js';
export type { ServerConfig } from './config.js';
export { createApp } from './app.js';
export type { AppDeps } from './app.js';
export { RealtimeServer, REALTIME_PATH } from './realtime.js';
export { Gatekeeper } from './auth.js';
export { BroadcastHub, isVisibleTo } from './broadcast.js';
export { TransferCoordinator } from './coordinator.js';
export type { DownloadTicket, TransferSettings, UploadInput } from './coordinator.js';
export { DeviceRegistry, normalizeDeviceId } from './device-registry.js';
export { SqliteHistoryLog } from './history.js';
export type { HistoryLog } from './history.js';
export { TokenIssuer, generateToken } from './pairing.js';
export { TransferRecordStore } from './record-store.js';
export { SessionStore } from './session-store.js';
export { JsonSettingsStore, MemorySettingsStore } from './settings.js';
export type { SettingsStore, PersistedSettings } from './settings.js';
export { PlatformShellOpener } from './shell.js';
export type { ShellOpener } from './shell.js';
export { PlainPageRenderer } from './page.js';
export type { PageRenderer, PageView, QrEncoder } from './page.js';
export * from './errors.js';
export { createTransferContext } from './types.js';
export type {
  ClientChannel,
  ClientConnection,
  DeviceIdentity,
  HistoryEntry,
  PairingToken,
  Requester,
  Session,
  TransferContext,
  TransferRecord,
} from './types.js';
export { main } from './cli.js';
