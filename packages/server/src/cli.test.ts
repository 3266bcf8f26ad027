import * as fs from 'fs/promises';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { isInvokedDirectly } from './cli.js';
import { makeTempDir } from './test-helpers.js';

describe('isInvokedDirectly', () => {
  let dir: string;
  let script: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    script = path.join(dir, 'cli.js');
    await fs.writeFile(script, '');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should match the script itself', () => {
    expect(isInvokedDirectly(script, pathToFileURL(script).href)).toBe(true);
  });

  it('should match through an installed bin symlink', async () => {
    const bin = path.join(dir, 'lan-drop');
    await fs.symlink(script, bin);

    expect(isInvokedDirectly(bin, pathToFileURL(script).href)).toBe(true);
  });

  it('should not match another script', async () => {
    const other = path.join(dir, 'other.js');
    await fs.writeFile(other, '');

    expect(isInvokedDirectly(other, pathToFileURL(script).href)).toBe(false);
  });

  it('should not match a missing or absent script path', () => {
    expect(isInvokedDirectly(undefined, pathToFileURL(script).href)).toBe(false);
    expect(isInvokedDirectly(path.join(dir, 'missing.js'), pathToFileURL(script).href)).toBe(false);
  });
});
