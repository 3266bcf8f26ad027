import {
  DESKTOP_DEVICE_ID,
  DESKTOP_DEVICE_NAME,
  DEVICE_ID_MAX_LENGTH,
  DEVICE_NAME_MAX_LENGTH,
  MOBILE_NAME_PREFIX,
} from './constants.js';
import { AuthError } from './errors.js';
import type { DeviceIdentity, TransferContext } from './types.js';

export const DESKTOP_IDENTITY: DeviceIdentity = {
  deviceId: DESKTOP_DEVICE_ID,
  deviceName: DESKTOP_DEVICE_NAME,
};

// Truncate, then keep only alphanumerics, '-' and '_'
export function normalizeDeviceId(raw: string | null | undefined): string {
  const value = (raw ?? '').trim().slice(0, DEVICE_ID_MAX_LENGTH);
  return value.replace(/[^\p{L}\p{N}_-]/gu, '');
}

export function defaultDeviceName(deviceId: string): string {
  return `${MOBILE_NAME_PREFIX}${deviceId.slice(0, 8)}`;
}

/**
 * Maps self-declared device ids to display names and remembers which phone
 * was active last, so desktop pushes have somewhere to go.
 */
export class DeviceRegistry {
  private context: TransferContext;

  constructor(context: TransferContext) {
    this.context = context;
  }

  resolve(
    isTrustedOrigin: boolean,
    declaredId?: string | null,
    declaredName?: string | null
  ): DeviceIdentity {
    if (isTrustedOrigin) {
      return DESKTOP_IDENTITY;
    }

    const deviceId = normalizeDeviceId(declaredId);
    if (!deviceId) {
      throw new AuthError('MissingDeviceId');
    }
    if (deviceId === DESKTOP_DEVICE_ID) {
      throw new AuthError('ReservedDeviceId');
    }

    const name = (declaredName ?? '').trim();
    const deviceName = name ? name.slice(0, DEVICE_NAME_MAX_LENGTH) : defaultDeviceName(deviceId);

    this.context.devices.set(deviceId, deviceName);
    this.context.latestMobileDeviceId = deviceId;

    return { deviceId, deviceName };
  }

  // The phone that paired or spoke last, falling back to the desktop itself
  preferredMobileDevice(): DeviceIdentity {
    const deviceId = this.context.latestMobileDeviceId;
    if (!deviceId) {
      return DESKTOP_IDENTITY;
    }
    return {
      deviceId,
      deviceName: this.context.devices.get(deviceId) ?? defaultDeviceName(deviceId),
    };
  }
}
