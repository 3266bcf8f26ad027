import type { PublicRecord, ServerMessage } from '@lan-drop/shared';
import { LOG_TAGS } from './constants.js';
import { logger } from './utils/logger.js';
import type { ClientChannel, ClientConnection, TransferContext } from './types.js';

const TAG = LOG_TAGS.HUB;

/**
 * Supplies the records a connection may see when it first registers
 */
export type SnapshotSource = (deviceFilter?: string) => PublicRecord[];

/**
 * Live realtime connections and the visibility rule for each of them:
 * desktops see every event, a phone only events for its own device or
 * events with no target.
 */
export class BroadcastHub {
  private context: TransferContext;
  private snapshot: SnapshotSource;

  constructor(context: TransferContext, snapshot: SnapshotSource) {
    this.context = context;
    this.snapshot = snapshot;
  }

  register(connectionId: string, isDesktop: boolean, deviceId: string, channel: ClientChannel): void {
    const connection: ClientConnection = { connectionId, isDesktop, deviceId, channel };
    const records = this.snapshot(isDesktop ? undefined : deviceId);
    this.context.clients.set(connectionId, connection);
    logger.info(TAG, `Connection ${connectionId} registered (${isDesktop ? 'desktop' : deviceId})`);

    this.deliver(connection, JSON.stringify({ type: 'init', records } satisfies ServerMessage));
  }

  unregister(connectionId: string): boolean {
    const removed = this.context.clients.delete(connectionId);
    if (removed) {
      logger.info(TAG, `Connection ${connectionId} unregistered`);
    }
    return removed;
  }

  // Returns how many connections the event was handed to
  publish(event: ServerMessage, targetDeviceId?: string): number {
    const payload = JSON.stringify(event);
    const targets = [...this.context.clients.values()].filter((client) =>
      isVisibleTo(client, targetDeviceId)
    );

    for (const client of targets) {
      this.deliver(client, payload);
    }
    return targets.length;
  }

  send(connectionId: string, event: ServerMessage): void {
    const client = this.context.clients.get(connectionId);
    if (client) {
      this.deliver(client, JSON.stringify(event));
    }
  }

  connectionCount(): number {
    return this.context.clients.size;
  }

  private deliver(client: ClientConnection, payload: string): void {
    client.channel.send(payload).catch((error: unknown) => {
      logger.warn(TAG, `Dropping connection ${client.connectionId} after failed send:`, error);
      this.unregister(client.connectionId);
    });
  }
}

export function isVisibleTo(client: Pick<ClientConnection, 'isDesktop' | 'deviceId'>, targetDeviceId?: string): boolean {
  if (client.isDesktop) {
    return true;
  }
  return !targetDeviceId || client.deviceId === targetDeviceId;
}
