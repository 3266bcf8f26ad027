import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import type { ServerMessage } from '@lan-drop/shared';
import { BroadcastHub } from './broadcast.js';
import type { ServerConfig } from './config.js';
import { TransferCoordinator, type TransferSettings } from './coordinator.js';
import { DESKTOP_IDENTITY, DeviceRegistry } from './device-registry.js';
import { SqliteHistoryLog, type HistoryLog } from './history.js';
import { TokenIssuer } from './pairing.js';
import { TransferRecordStore } from './record-store.js';
import { LanDropServer } from './server.js';
import { SessionStore } from './session-store.js';
import { MemorySettingsStore } from './settings.js';
import type { ShellOpener } from './shell.js';
import { createTransferContext, type ClientChannel, type Requester, type TransferContext } from './types.js';

export const START_TIME = Date.UTC(2024, 0, 15, 10, 0, 0);

export const DESKTOP: Requester = { ...DESKTOP_IDENTITY, isDesktop: true };

export function mobile(deviceId: string, deviceName: string = `Phone ${deviceId}`): Requester {
  return { deviceId, deviceName, isDesktop: false };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'lan-drop-test-'));
}

export function streamOf(content: string | Buffer): Readable {
  return Readable.from([Buffer.isBuffer(content) ? content : Buffer.from(content)]);
}

export class RecordingChannel implements ClientChannel {
  messages: ServerMessage[] = [];
  failing = false;

  send(payload: string): Promise<void> {
    if (this.failing) {
      return Promise.reject(new Error('socket closed'));
    }
    this.messages.push(JSON.parse(payload));
    return Promise.resolve();
  }

  types(): string[] {
    return this.messages.map((m) => m.type);
  }
}

export interface Clock {
  value: number;
  now: () => number;
  advance(ms: number): void;
}

export function createClock(start: number = START_TIME): Clock {
  const clock: Clock = {
    value: start,
    now: () => clock.value,
    advance: (ms) => {
      clock.value += ms;
    },
  };
  return clock;
}

export interface Harness {
  root: string;
  clock: Clock;
  context: TransferContext;
  tokens: TokenIssuer;
  sessions: SessionStore;
  devices: DeviceRegistry;
  history: HistoryLog;
  records: TransferRecordStore;
  hub: BroadcastHub;
  settings: TransferSettings;
  coordinator: TransferCoordinator;
  cleanup(): Promise<void>;
}

export async function createHarness(
  options: { maxUploadBytes?: number; history?: HistoryLog } = {}
): Promise<Harness> {
  const root = await makeTempDir();
  const clock = createClock();
  const context = createTransferContext(clock.now);
  const history = options.history ?? new SqliteHistoryLog(':memory:');
  const records = new TransferRecordStore(context, history);
  const devices = new DeviceRegistry(context);
  const hub = new BroadcastHub(context, (filter) => records.listPublic(filter));
  const settings: TransferSettings = {
    maxUploadBytes: options.maxUploadBytes ?? 1024 * 1024,
    downloadDir: path.join(root, 'downloads'),
    transientDir: path.join(root, 'transient'),
  };

  return {
    root,
    clock,
    context,
    tokens: new TokenIssuer(context, 120),
    sessions: new SessionStore(context, 3600),
    devices,
    history,
    records,
    hub,
    settings,
    coordinator: new TransferCoordinator(records, devices, hub, settings, clock.now),
    cleanup: async () => {
      history.close();
      await fs.rm(root, { recursive: true, force: true });
    },
  };
}

export class RecordingShell implements ShellOpener {
  opened: string[] = [];
  revealed: string[] = [];

  openPath(target: string): Promise<void> {
    this.opened.push(target);
    return Promise.resolve();
  }

  revealFile(filePath: string): Promise<void> {
    this.revealed.push(filePath);
    return Promise.resolve();
  }
}

export interface TestServer {
  server: LanDropServer;
  baseUrl: string;
  port: number;
  root: string;
  shell: RecordingShell;
  settingsStore: MemorySettingsStore;
  stop(): Promise<void>;
}

export const TEST_LAN_IP = '192.0.2.10';

/**
 * Full service on an ephemeral loopback port. Pass `trustedIps` without
 * loopback to make the test process look like a phone.
 */
export async function startTestServer(options: { trustedIps?: string[]; maxUploadBytes?: number } = {}): Promise<TestServer> {
  const root = await makeTempDir();
  const config: ServerConfig = {
    port: 0,
    strictPort: true,
    host: '127.0.0.1',
    dataDir: root,
    downloadDir: path.join(root, 'downloads'),
    transientDir: path.join(root, 'transient'),
    historyDbPath: ':memory:',
    settingsPath: path.join(root, 'settings.json'),
    maxUploadBytes: options.maxUploadBytes ?? 1024,
    tokenTtlSeconds: 120,
    sessionTtlSeconds: 3600,
  };
  const shell = new RecordingShell();
  const settingsStore = new MemorySettingsStore();
  const server = new LanDropServer(config, {
    lanIp: TEST_LAN_IP,
    trustedIps: options.trustedIps,
    settingsStore,
    shell,
  });
  const address = await server.start();

  return {
    server,
    baseUrl: `http://127.0.0.1:${address.port}`,
    port: address.port,
    root,
    shell,
    settingsStore,
    stop: async () => {
      await server.stop();
      await fs.rm(root, { recursive: true, force: true });
    },
  };
}
