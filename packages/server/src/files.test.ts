import * as fs from 'fs/promises';
import * as path from 'path';
import { LimitExceededError } from './errors.js';
import {
  allocateUniqueFilePath,
  fileSize,
  isInsideDirectory,
  sanitizeFilenameForWindows,
  secureFilename,
  splitExtension,
  streamToDisk,
} from './files.js';
import { makeTempDir, streamOf } from './test-helpers.js';

describe('sanitizeFilenameForWindows', () => {
  it('should replace reserved characters with underscores', () => {
    expect(sanitizeFilenameForWindows('a<b>:c?.txt')).toBe('a_b__c_.txt');
    expect(sanitizeFilenameForWindows('dir/sub\\file|x*.md')).toBe('dir_sub_file_x_.md');
  });

  it('should trim leading and trailing spaces and dots', () => {
    expect(sanitizeFilenameForWindows(' .hidden. ')).toBe('hidden');
  });

  it('should fall back when nothing is left', () => {
    expect(sanitizeFilenameForWindows('...')).toBe('downloaded_file');
    expect(sanitizeFilenameForWindows('')).toBe('downloaded_file');
  });

  it('should keep non-ASCII names', () => {
    expect(sanitizeFilenameForWindows('résumé.pdf')).toBe('résumé.pdf');
  });
});

describe('secureFilename', () => {
  it('should join words with underscores and drop punctuation', () => {
    expect(secureFilename('My Report (final).pdf')).toBe('My_Report_final.pdf');
  });

  it('should flatten path traversal', () => {
    expect(secureFilename('../../etc/passwd')).toBe('etc_passwd');
  });

  it('should drop non-ASCII characters', () => {
    expect(secureFilename('café.txt')).toBe('cafe.txt');
  });
});

describe('splitExtension', () => {
  it('should split on the last dot', () => {
    expect(splitExtension('archive.tar.gz')).toEqual({ stem: 'archive.tar', ext: '.gz' });
    expect(splitExtension('README')).toEqual({ stem: 'README', ext: '' });
  });
});

describe('file system helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('allocateUniqueFilePath', () => {
    it('should use the name itself when it is free', async () => {
      expect(await allocateUniqueFilePath(dir, 'report.pdf')).toBe(path.join(dir, 'report.pdf'));
    });

    it('should number later copies', async () => {
      await fs.writeFile(path.join(dir, 'report.pdf'), 'x');

      expect(await allocateUniqueFilePath(dir, 'report.pdf')).toBe(path.join(dir, 'report (1).pdf'));
      expect(await allocateUniqueFilePath(dir, 'report.pdf')).toBe(path.join(dir, 'report (2).pdf'));
    });

    it('should sanitize the requested name', async () => {
      expect(await allocateUniqueFilePath(dir, 'a:b.txt')).toBe(path.join(dir, 'a_b.txt'));
    });

    it('should hand concurrent callers distinct paths', async () => {
      const paths = await Promise.all(
        Array.from({ length: 5 }, () => allocateUniqueFilePath(dir, 'a.txt'))
      );

      expect(new Set(paths).size).toBe(5);
      expect(paths.map((p) => path.basename(p)).sort()).toEqual([
        'a (1).txt',
        'a (2).txt',
        'a (3).txt',
        'a (4).txt',
        'a.txt',
      ]);
    });
  });

  describe('streamToDisk', () => {
    it('should write the stream and return its size', async () => {
      const target = path.join(dir, 'out.bin');

      expect(await streamToDisk(streamOf('hello'), target, 100)).toBe(5);
      expect(await fs.readFile(target, 'utf-8')).toBe('hello');
    });

    it('should accept a stream exactly at the limit', async () => {
      expect(await streamToDisk(streamOf(Buffer.alloc(100)), path.join(dir, 'exact.bin'), 100)).toBe(100);
    });

    it('should abort past the limit and remove the partial file', async () => {
      const target = path.join(dir, 'big.bin');

      await expect(streamToDisk(streamOf(Buffer.alloc(101)), target, 100)).rejects.toBeInstanceOf(LimitExceededError);
      expect(await fileSize(target)).toBeNull();
    });
  });

  describe('fileSize', () => {
    it('should return the size of a file', async () => {
      await fs.writeFile(path.join(dir, 'f.txt'), 'abc');
      expect(await fileSize(path.join(dir, 'f.txt'))).toBe(3);
    });

    it('should return null for missing paths and directories', async () => {
      expect(await fileSize(path.join(dir, 'missing'))).toBeNull();
      expect(await fileSize(dir)).toBeNull();
    });
  });

  it('should tell whether a file sits directly in a directory', () => {
    expect(isInsideDirectory(path.join(dir, 'a.txt'), dir)).toBe(true);
    expect(isInsideDirectory(path.join(dir, 'sub', 'a.txt'), dir)).toBe(false);
  });
});
