import { spawn } from 'child_process';
import * as path from 'path';

/**
 * Opens files and folders in the desktop's own file manager
 */
export interface ShellOpener {
  openPath(target: string): Promise<void>;
  revealFile(filePath: string): Promise<void>;
}

function launch(command: string, args: string[]): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}

export class PlatformShellOpener implements ShellOpener {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  openPath(target: string): Promise<void> {
    if (this.platform === 'win32') {
      return launch('explorer', [target]);
    }
    if (this.platform === 'darwin') {
      return launch('open', [target]);
    }
    return launch('xdg-open', [target]);
  }

  revealFile(filePath: string): Promise<void> {
    if (this.platform === 'win32') {
      return launch('explorer', ['/select,', filePath]);
    }
    if (this.platform === 'darwin') {
      return launch('open', ['-R', filePath]);
    }
    return launch('xdg-open', [path.dirname(filePath)]);
  }
}
