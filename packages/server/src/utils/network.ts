import { createServer } from 'net';
import { networkInterfaces } from 'os';

// First external IPv4 address, or loopback when offline
export function getLocalIP(): string {
  const nets = networkInterfaces();
  for (const name of Object.keys(nets)) {
    for (const net of nets[name] || []) {
      if (net.family === 'IPv4' && !net.internal) {
        return net.address;
      }
    }
  }
  return '127.0.0.1';
}

// Strip the IPv4-mapped prefix Node reports on dual-stack sockets
export function normalizeIp(ip: string | undefined | null): string {
  if (!ip) return '';
  return ip.startsWith('::ffff:') ? ip.slice('::ffff:'.length) : ip;
}

export function isPortFree(port: number, host: string = '0.0.0.0'): Promise<boolean> {
  return new Promise((resolve) => {
    const probe = createServer();
    probe.once('error', () => resolve(false));
    probe.once('listening', () => {
      probe.close(() => resolve(true));
    });
    probe.listen(port, host);
  });
}

export async function findAvailablePort(startPort: number, maxTries: number, host?: string): Promise<number> {
  for (let port = startPort; port < startPort + maxTries; port++) {
    if (await isPortFree(port, host)) {
      return port;
    }
  }
  throw new Error(`No free port found starting at ${startPort} after ${maxTries} tries`);
}
