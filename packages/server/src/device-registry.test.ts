import { DeviceRegistry, defaultDeviceName, normalizeDeviceId } from './device-registry.js';
import { AuthError } from './errors.js';
import { createTransferContext, type TransferContext } from './types.js';

describe('normalizeDeviceId', () => {
  it('should keep letters, digits, dashes and underscores', () => {
    expect(normalizeDeviceId('  abc-123_XY  ')).toBe('abc-123_XY');
  });

  it('should drop everything else', () => {
    expect(normalizeDeviceId('a b/c.d<e>')).toBe('abcde');
  });

  it('should truncate to 120 characters before filtering', () => {
    expect(normalizeDeviceId('x'.repeat(200))).toHaveLength(120);
    expect(normalizeDeviceId(`${'!'.repeat(119)}ab`)).toBe('a');
  });

  it('should return an empty string for missing input', () => {
    expect(normalizeDeviceId(undefined)).toBe('');
    expect(normalizeDeviceId(null)).toBe('');
  });
});

function failureOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof AuthError ? error.reason : 'unexpected error';
  }
  return undefined;
}

describe('DeviceRegistry', () => {
  let context: TransferContext;
  let registry: DeviceRegistry;

  beforeEach(() => {
    context = createTransferContext();
    registry = new DeviceRegistry(context);
  });

  it('should resolve a trusted origin to the desktop', () => {
    expect(registry.resolve(true, 'ignored', 'Ignored')).toEqual({ deviceId: 'desktop', deviceName: 'Desktop' });
    expect(context.latestMobileDeviceId).toBeNull();
  });

  it('should register a phone and remember it as the latest', () => {
    const identity = registry.resolve(false, 'phone-1', 'Alice Phone');

    expect(identity).toEqual({ deviceId: 'phone-1', deviceName: 'Alice Phone' });
    expect(context.devices.get('phone-1')).toBe('Alice Phone');
    expect(context.latestMobileDeviceId).toBe('phone-1');
  });

  it('should derive a name when none is declared', () => {
    expect(registry.resolve(false, 'abcdef123456').deviceName).toBe('Phone-abcdef12');
    expect(defaultDeviceName('ab')).toBe('Phone-ab');
  });

  it('should cap declared names at 80 characters', () => {
    expect(registry.resolve(false, 'p1', 'n'.repeat(100)).deviceName).toHaveLength(80);
  });

  it('should refuse a phone without a usable id', () => {
    expect(() => registry.resolve(false, '...')).toThrow(AuthError);
    expect(failureOf(() => registry.resolve(false, undefined))).toBe('MissingDeviceId');
  });

  it('should refuse a phone claiming the desktop id', () => {
    expect(failureOf(() => registry.resolve(false, 'desktop', 'Sneaky'))).toBe('ReservedDeviceId');
    expect(context.devices.has('desktop')).toBe(false);
  });

  it('should follow the most recent phone', () => {
    registry.resolve(false, 'phone-1', 'One');
    registry.resolve(false, 'phone-2', 'Two');

    expect(registry.preferredMobileDevice()).toEqual({ deviceId: 'phone-2', deviceName: 'Two' });
  });

  it('should fall back to the desktop when no phone has been seen', () => {
    expect(registry.preferredMobileDevice()).toEqual({ deviceId: 'desktop', deviceName: 'Desktop' });
  });
});
