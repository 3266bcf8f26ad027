import type { TransferDirection, TransferSource, TransferStatus } from '@lan-drop/shared';

export interface PairingToken {
  value: string;
  expiresAt: number;  // ms since epoch
  consumed: boolean;
}

export interface Session {
  id: string;
  boundIp: string;
  createdAt: number;
  lastSeenAt: number;
}

export interface DeviceIdentity {
  deviceId: string;
  deviceName: string;
}

export interface TransferRecord {
  id: string;
  deviceId: string;
  deviceName: string;
  fileName: string;
  filePath: string;
  direction: TransferDirection;
  status: TransferStatus;
  sizeBytes: number;
  source: TransferSource;
  createdAt: string;
  isTransient: boolean;
}

export type HistoryEntry = Omit<TransferRecord, 'isTransient'>;

export interface ClientChannel {
  send(payload: string): Promise<void>;
}

export interface ClientConnection {
  connectionId: string;
  isDesktop: boolean;
  deviceId: string;
  channel: ClientChannel;
}

/**
 * A caller that has passed authorization and attribution
 */
export interface Requester extends DeviceIdentity {
  isDesktop: boolean;
}

/**
 * All mutable state shared across requests. Every read or write happens in a
 * synchronous method, so no other request can interleave with it; I/O is
 * always done before or after, never in between.
 */
export interface TransferContext {
  token: PairingToken;
  sessions: Map<string, Session>;
  devices: Map<string, string>;  // deviceId -> display name
  latestMobileDeviceId: string | null;
  records: Map<string, TransferRecord>;
  clients: Map<string, ClientConnection>;
  now: () => number;
}

export function createTransferContext(now: () => number = Date.now): TransferContext {
  return {
    token: { value: '', expiresAt: 0, consumed: true },
    sessions: new Map(),
    devices: new Map(),
    latestMobileDeviceId: null,
    records: new Map(),
    clients: new Map(),
    now,
  };
}
