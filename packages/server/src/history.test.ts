import * as fs from 'fs/promises';
import * as path from 'path';
import { SqliteHistoryLog } from './history.js';
import type { HistoryEntry } from './types.js';
import { makeTempDir } from './test-helpers.js';

function entry(overrides: Partial<HistoryEntry> = {}): HistoryEntry {
  return {
    id: 'r1',
    deviceId: 'phone-1',
    deviceName: 'Phone One',
    fileName: 'notes.txt',
    filePath: '/tmp/notes.txt',
    direction: 'upload',
    status: 'success',
    sizeBytes: 12,
    source: 'mobile',
    createdAt: '2024-01-15T10:00:00.000Z',
    ...overrides,
  };
}

describe('SqliteHistoryLog', () => {
  let log: SqliteHistoryLog;

  beforeEach(() => {
    log = new SqliteHistoryLog(':memory:');
  });

  afterEach(() => {
    log.close();
  });

  it('should store and return an entry', () => {
    log.insert(entry());
    expect(log.get('r1')).toEqual(entry());
    expect(log.get('missing')).toBeUndefined();
  });

  it('should list in timestamp order, then by id', () => {
    log.insert(entry({ id: 'c', createdAt: '2024-01-15T10:00:02.000Z' }));
    log.insert(entry({ id: 'b', createdAt: '2024-01-15T10:00:01.000Z' }));
    log.insert(entry({ id: 'a', createdAt: '2024-01-15T10:00:02.000Z' }));

    expect(log.list().map((e) => e.id)).toEqual(['b', 'a', 'c']);
  });

  it('should filter by device', () => {
    log.insert(entry({ id: 'r1', deviceId: 'phone-1' }));
    log.insert(entry({ id: 'r2', deviceId: 'phone-2' }));

    expect(log.list('phone-2').map((e) => e.id)).toEqual(['r2']);
  });

  it('should reject duplicate ids', () => {
    log.insert(entry());
    expect(() => log.insert(entry())).toThrow();
  });

  it('should only move status from the allowed states', () => {
    log.insert(entry({ status: 'saved' }));

    expect(log.updateStatus('r1', 'downloaded', ['success'])).toBe(false);
    expect(log.get('r1')?.status).toBe('saved');

    log.insert(entry({ id: 'r2' }));
    expect(log.updateStatus('r2', 'downloaded', ['success'])).toBe(true);
    expect(log.get('r2')?.status).toBe('downloaded');
  });

  it('should ignore an update with no allowed states', () => {
    log.insert(entry());
    expect(log.updateStatus('r1', 'success', [])).toBe(false);
  });

  it('should keep rows across reopening a file database', async () => {
    const dir = await makeTempDir();
    const dbPath = path.join(dir, 'nested', 'history.db');
    try {
      const first = new SqliteHistoryLog(dbPath);
      first.insert(entry());
      first.close();

      const second = new SqliteHistoryLog(dbPath);
      expect(second.list()).toEqual([entry()]);
      second.close();
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
