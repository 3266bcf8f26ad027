import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { STATUS_CODES, type IncomingMessage, type Server as HttpServer } from 'http';
import type { Duplex } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import type { ClientMessage } from '@lan-drop/shared';
import type { Gatekeeper } from './auth.js';
import type { BroadcastHub } from './broadcast.js';
import { LOG_TAGS } from './constants.js';
import { TransferError } from './errors.js';
import { logger } from './utils/logger.js';
import type { ClientChannel, Requester } from './types.js';

const TAG = LOG_TAGS.REALTIME;

export const REALTIME_PATH = '/ws';
const HEARTBEAT_INTERVAL_MS = 30 * 1000;

function parseClientMessage(data: RawData): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data.toString());
  } catch {
    return null;
  }
  if (typeof parsed === 'object' && parsed !== null && 'type' in parsed && parsed.type === 'ping') {
    return { type: 'ping' };
  }
  return null;
}

function refuse(socket: Duplex, status: number): void {
  socket.write(`HTTP/1.1 ${status} ${STATUS_CODES[status] ?? ''}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
  socket.destroy();
}

function socketChannel(ws: WebSocket): ClientChannel {
  return {
    send: (payload) =>
      new Promise<void>((resolve, reject) => {
        if (ws.readyState !== WebSocket.OPEN) {
          reject(new Error('Socket is not open'));
          return;
        }
        ws.send(payload, (error) => (error ? reject(error) : resolve()));
      }),
  };
}

/**
 * The `/ws` channel: authorizes the handshake, registers the socket with the
 * hub (which sends the `init` snapshot) and answers pings
 */
export class RealtimeServer {
  private wss: WebSocketServer;
  private gatekeeper: Gatekeeper;
  private hub: BroadcastHub;
  private alive: Map<WebSocket, boolean> = new Map();
  private heartbeatInterval: NodeJS.Timeout | null = null;

  constructor(httpServer: HttpServer, gatekeeper: Gatekeeper, hub: BroadcastHub) {
    this.gatekeeper = gatekeeper;
    this.hub = hub;
    this.wss = new WebSocketServer({ noServer: true });

    httpServer.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head);
    });

    this.startHeartbeat();
  }

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const url = new URL(req.url || '/', 'http://localhost');
    if (url.pathname !== REALTIME_PATH) {
      refuse(socket, 404);
      return;
    }

    let requester: Requester;
    try {
      requester = this.gatekeeper.authenticate(
        { ip: req.socket.remoteAddress, headers: req.headers, query: url.searchParams },
        true
      );
    } catch (error) {
      const status = error instanceof TransferError ? error.status : 500;
      logger.warn(TAG, `Handshake from ${req.socket.remoteAddress} refused (${status})`);
      refuse(socket, status);
      return;
    }

    this.wss.handleUpgrade(req, socket, head, (ws) => {
      this.handleConnection(ws, requester);
    });
  }

  private handleConnection(ws: WebSocket, requester: Requester): void {
    const connectionId = uuidv4();
    this.alive.set(ws, true);

    ws.on('message', (data) => {
      const message = parseClientMessage(data);
      if (message?.type === 'ping') {
        this.hub.send(connectionId, { type: 'pong', ts: Date.now() });
      }
    });

    ws.on('pong', () => {
      this.alive.set(ws, true);
    });

    ws.on('close', () => {
      this.alive.delete(ws);
      this.hub.unregister(connectionId);
    });

    ws.on('error', (error) => {
      logger.warn(TAG, `WebSocket error on ${connectionId}:`, error);
    });

    this.hub.register(connectionId, requester.isDesktop, requester.deviceId, socketChannel(ws));
  }

  // Terminate sockets that stopped answering protocol-level pings
  private startHeartbeat(): void {
    this.heartbeatInterval = setInterval(() => {
      for (const [ws, isAlive] of this.alive.entries()) {
        if (!isAlive) {
          logger.info(TAG, 'Client timed out');
          ws.terminate();
          this.alive.delete(ws);
          continue;
        }
        this.alive.set(ws, false);
        ws.ping();
      }
    }, HEARTBEAT_INTERVAL_MS);
    this.heartbeatInterval.unref();
  }

  public close(): void {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
    }
    for (const ws of this.alive.keys()) {
      ws.terminate();
    }
    this.wss.close();
  }
}
