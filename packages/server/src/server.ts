import { createServer, type Server as HttpServer } from 'http';
import type { AddressInfo } from 'net';
import * as fs from 'fs';
import { createApp } from './app.js';
import { Gatekeeper } from './auth.js';
import { BroadcastHub } from './broadcast.js';
import type { ServerConfig } from './config.js';
import { LOG_TAGS, PORT_SEARCH_TRIES } from './constants.js';
import { TransferCoordinator, type TransferSettings } from './coordinator.js';
import { DeviceRegistry } from './device-registry.js';
import { SqliteHistoryLog, type HistoryLog } from './history.js';
import { PlainPageRenderer, type PageRenderer, type QrEncoder } from './page.js';
import { TokenIssuer } from './pairing.js';
import { RealtimeServer } from './realtime.js';
import { TransferRecordStore } from './record-store.js';
import { SessionStore } from './session-store.js';
import { JsonSettingsStore, type SettingsStore } from './settings.js';
import { PlatformShellOpener, type ShellOpener } from './shell.js';
import { logger } from './utils/logger.js';
import { findAvailablePort, getLocalIP } from './utils/network.js';
import { createTransferContext, type TransferContext } from './types.js';

const TAG = LOG_TAGS.SERVER;

export interface LanDropServerOptions {
  lanIp?: string;
  // Addresses treated as the desktop itself; defaults to loopback plus the LAN address
  trustedIps?: string[];
  now?: () => number;
  historyLog?: HistoryLog;
  settingsStore?: SettingsStore;
  shell?: ShellOpener;
  renderer?: PageRenderer;
  qrEncoder?: QrEncoder;
}

export interface ListeningAddress {
  port: number;
  desktopUrl: string;
  lanUrl: string;
}

/**
 * Wires the transfer core to one HTTP server that also carries the realtime
 * channel
 */
export class LanDropServer {
  readonly context: TransferContext;
  readonly tokens: TokenIssuer;
  readonly sessions: SessionStore;
  readonly devices: DeviceRegistry;
  readonly records: TransferRecordStore;
  readonly hub: BroadcastHub;
  readonly coordinator: TransferCoordinator;
  readonly gatekeeper: Gatekeeper;
  readonly settings: TransferSettings;

  private config: ServerConfig;
  private history: HistoryLog;
  private lanIp: string;
  private httpServer: HttpServer;
  private realtime: RealtimeServer;
  private port: number;

  constructor(config: ServerConfig, options: LanDropServerOptions = {}) {
    this.config = config;
    this.port = config.port;
    this.lanIp = options.lanIp ?? getLocalIP();

    this.context = createTransferContext(options.now);
    this.history = options.historyLog ?? new SqliteHistoryLog(config.historyDbPath);
    this.settings = {
      maxUploadBytes: config.maxUploadBytes,
      downloadDir: config.downloadDir,
      transientDir: config.transientDir,
    };

    this.tokens = new TokenIssuer(this.context, config.tokenTtlSeconds);
    this.sessions = new SessionStore(this.context, config.sessionTtlSeconds);
    this.devices = new DeviceRegistry(this.context);
    this.records = new TransferRecordStore(this.context, this.history);
    this.hub = new BroadcastHub(this.context, (deviceFilter) => this.records.listPublic(deviceFilter));
    this.coordinator = new TransferCoordinator(this.records, this.devices, this.hub, this.settings, this.context.now);
    this.gatekeeper = new Gatekeeper(
      options.trustedIps ?? ['127.0.0.1', '::1', this.lanIp],
      this.sessions,
      this.devices
    );

    const app = createApp({
      baseUrl: () => this.lanUrl,
      gatekeeper: this.gatekeeper,
      sessions: this.sessions,
      tokens: this.tokens,
      records: this.records,
      coordinator: this.coordinator,
      settings: this.settings,
      settingsStore: options.settingsStore ?? new JsonSettingsStore(config.settingsPath),
      shell: options.shell ?? new PlatformShellOpener(),
      renderer: options.renderer ?? new PlainPageRenderer(),
      qrEncoder: options.qrEncoder,
    });

    this.httpServer = createServer(app);
    this.realtime = new RealtimeServer(this.httpServer, this.gatekeeper, this.hub);
  }

  get lanUrl(): string {
    return `http://${this.lanIp}:${this.port}`;
  }

  async start(): Promise<ListeningAddress> {
    fs.mkdirSync(this.config.transientDir, { recursive: true });

    const wanted = this.config.port === 0 || this.config.strictPort
      ? this.config.port
      : await findAvailablePort(this.config.port, PORT_SEARCH_TRIES, this.config.host);
    if (wanted !== this.config.port) {
      logger.warn(TAG, `Port ${this.config.port} is busy, using ${wanted}`);
    }

    await new Promise<void>((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(wanted, this.config.host, () => {
        this.httpServer.off('error', reject);
        resolve();
      });
    });

    const address = this.httpServer.address();
    this.port = isAddressInfo(address) ? address.port : wanted;
    logger.info(TAG, `Listening on ${this.config.host}:${this.port}`);

    return {
      port: this.port,
      desktopUrl: `http://127.0.0.1:${this.port}`,
      lanUrl: this.lanUrl,
    };
  }

  async stop(): Promise<void> {
    this.realtime.close();
    if (this.httpServer.listening) {
      await new Promise<void>((resolve, reject) => {
        this.httpServer.close((error) => (error ? reject(error) : resolve()));
        this.httpServer.closeAllConnections();
      });
    }
    this.history.close();
    logger.info(TAG, 'Stopped');
  }
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}
