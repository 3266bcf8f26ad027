#!/usr/bin/env node
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { loadConfig } from './config.js';
import { LanDropServer } from './server.js';
import { LOG_TAGS } from './constants.js';
import { logger } from './utils/logger.js';

export async function main(args: string[]): Promise<void> {
  if (args.includes('--help') || args.includes('-h')) {
    printHelp();
    return;
  }

  if (args.includes('--verbose') || args.includes('-v')) {
    logger.setLevel('debug');
  }

  const config = loadConfig(args);
  const server = new LanDropServer(config);
  const address = await server.start();
  const pairing = server.tokens.issue();

  console.log('');
  console.log('╔══════════════════════════════════════════════════════════╗');
  console.log('║                    LAN Drop                              ║');
  console.log('╠══════════════════════════════════════════════════════════╣');
  console.log(`║  Desktop: ${address.desktopUrl}`.padEnd(59) + '║');
  console.log(`║  Phone:   ${address.lanUrl}/?token=${pairing.token}`.padEnd(59) + '║');
  console.log(`║  Saving to ${config.downloadDir}`.padEnd(59) + '║');
  console.log('╚══════════════════════════════════════════════════════════╝');
  console.log('');

  const shutdown = () => {
    console.log('\nShutting down...');
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error(LOG_TAGS.SERVER, 'Shutdown failed:', error);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

function printHelp(): void {
  console.log(`
lan-drop - move files between this computer and phones on the same network

Usage:
  lan-drop [options]

Options:
  -p, --port PORT          Port to listen on (default: 5000, next free one is used)
      --strict-port        Fail instead of searching when the port is busy
  -d, --download-dir DIR   Where received files are saved (default: ~/Downloads)
      --data-dir DIR       Where history and settings live (default: ~/.lan-drop)
      --settings FILE      Settings file (default: <data-dir>/settings.json)
  -v, --verbose            Log every request
  -h, --help               Show this help

Environment:
  PORT                     Same as --port
  LAN_DROP_DOWNLOAD_DIR    Same as --download-dir
  LAN_DROP_DATA_DIR        Same as --data-dir
  LOG_LEVEL                debug | info | warn | error
`);
}

// True when `scriptPath` (argv[1]) resolves to the module at `moduleUrl`, also through a bin symlink
export function isInvokedDirectly(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath) {
    return false;
  }
  try {
    return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}

if (isInvokedDirectly(process.argv[1], import.meta.url)) {
  main(process.argv.slice(2)).catch((error: unknown) => {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
}
