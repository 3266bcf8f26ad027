import { createWriteStream } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { Transform, type Readable, type TransformCallback } from 'stream';
import { pipeline } from 'stream/promises';
import { FALLBACK_FILE_NAME } from './constants.js';
import { LimitExceededError, errorCode } from './errors.js';

const WINDOWS_INVALID = /[<>:"/\\|?*]/g;

/**
 * Replace characters Windows refuses in file names and trim the leading and
 * trailing spaces and dots it would otherwise drop silently
 */
export function sanitizeFilenameForWindows(name: string): string {
  const replaced = (name || '').replace(WINDOWS_INVALID, '_');
  const trimmed = replaced.replace(/^[ .]+|[ .]+$/g, '');
  return trimmed || FALLBACK_FILE_NAME;
}

/**
 * ASCII-only file name safe for any file system: path separators become
 * spaces, whitespace becomes '_', anything outside [A-Za-z0-9_.-] is dropped
 */
export function secureFilename(name: string): string {
  const ascii = name.normalize('NFKD').replace(/[^\x00-\x7f]/g, '');
  const flattened = ascii.replace(/[/\\]/g, ' ');
  return flattened
    .trim()
    .split(/\s+/)
    .join('_')
    .replace(/[^A-Za-z0-9_.-]/g, '')
    .replace(/^[._]+|[._]+$/g, '');
}

export function splitExtension(fileName: string): { stem: string; ext: string } {
  const ext = path.extname(fileName);
  const stem = ext ? fileName.slice(0, -ext.length) : fileName;
  return { stem, ext };
}

/**
 * Claim the first free name in `directory`: `name.ext`, then `name (1).ext`,
 * `name (2).ext`, ... The file is created empty so concurrent callers can
 * never be handed the same path.
 */
export async function allocateUniqueFilePath(directory: string, desiredName: string): Promise<string> {
  const cleanName = sanitizeFilenameForWindows(desiredName);
  const { stem, ext } = splitExtension(cleanName);
  const base = stem || FALLBACK_FILE_NAME;

  for (let index = 0; ; index++) {
    const candidate = path.join(directory, index === 0 ? cleanName : `${base} (${index})${ext}`);
    try {
      const handle = await fs.open(candidate, 'wx');
      await handle.close();
      return candidate;
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') {
        throw error;
      }
    }
  }
}

class ByteLimiter extends Transform {
  bytes = 0;

  constructor(private readonly maxBytes: number | undefined) {
    super();
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.bytes += chunk.length;
    if (this.maxBytes !== undefined && this.bytes > this.maxBytes) {
      callback(new LimitExceededError(this.maxBytes));
      return;
    }
    callback(null, chunk);
  }
}

/**
 * Write `source` to `destination`, counting bytes per chunk. Crossing
 * `maxBytes` aborts the write and removes the partial file.
 */
export async function streamToDisk(source: Readable, destination: string, maxBytes?: number): Promise<number> {
  const limiter = new ByteLimiter(maxBytes);
  try {
    await pipeline(source, limiter, createWriteStream(destination));
  } catch (error) {
    await fs.rm(destination, { force: true });
    throw error;
  }
  return limiter.bytes;
}

export async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile() ? stat.size : null;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export function isInsideDirectory(filePath: string, directory: string): boolean {
  return path.dirname(path.resolve(filePath)) === path.resolve(directory);
}
