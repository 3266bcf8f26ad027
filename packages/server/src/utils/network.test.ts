import { createServer, type Server } from 'net';
import { findAvailablePort, isPortFree, normalizeIp } from './network.js';

function listen(port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.once('error', reject);
    server.listen(port, '127.0.0.1', () => resolve(server));
  });
}

function portOf(server: Server): number {
  const address = server.address();
  return typeof address === 'object' && address !== null ? address.port : 0;
}

describe('normalizeIp', () => {
  it('should strip the IPv4-mapped prefix', () => {
    expect(normalizeIp('::ffff:10.0.0.7')).toBe('10.0.0.7');
    expect(normalizeIp('::1')).toBe('::1');
    expect(normalizeIp(undefined)).toBe('');
  });
});

describe('port search', () => {
  it('should skip a busy port', async () => {
    const busy = await listen(0);
    const port = portOf(busy);
    try {
      expect(await isPortFree(port, '127.0.0.1')).toBe(false);
      expect(await findAvailablePort(port, 20, '127.0.0.1')).toBeGreaterThan(port);
    } finally {
      await new Promise((resolve) => busy.close(resolve));
    }
  });

  it('should give up after the allowed tries', async () => {
    const busy = await listen(0);
    const port = portOf(busy);
    try {
      await expect(findAvailablePort(port, 1, '127.0.0.1')).rejects.toThrow(`No free port found starting at ${port} after 1 tries`);
    } finally {
      await new Promise((resolve) => busy.close(resolve));
    }
  });
});
