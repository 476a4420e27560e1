import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RunHistory, getDefaultHistoryPath } from '../../../src/main/services/runHistory';
import type { RunSummary } from '../../../src/main/services/runHistory';

const FIXED_DATE = new Date('2026-03-01T10:00:00.000Z');

function summary(input: string, overrides: Partial<RunSummary> = {}): RunSummary {
  return { input, strategy: 'batch', successCount: 3, failureCount: 1, cohesion: null, ...overrides };
}

describe('RunHistory', () => {
  let history: RunHistory;

  beforeEach(() => {
    history = new RunHistory({ inMemory: true, getCurrentDate: () => FIXED_DATE });
    history.initialize();
  });

  afterEach(() => {
    history.close();
  });

  it('should record a run and return it with id and timestamp', () => {
    const record = history.record(summary('/music/beats'));

    expect(record).toEqual({
      id: 1,
      createdAt: '2026-03-01T10:00:00.000Z',
      input: '/music/beats',
      strategy: 'batch',
      successCount: 3,
      failureCount: 1,
      cohesion: null,
    });
    expect(history.count()).toBe(1);
  });

  it('should list newest runs first', () => {
    history.record(summary('first'));
    history.record(summary('second', { strategy: 'album', cohesion: 82.5 }));
    history.record(summary('third'));

    expect(history.list().map((r) => r.input)).toEqual(['third', 'second', 'first']);
    expect(history.list(1).map((r) => r.input)).toEqual(['third']);
    expect(history.list()[1]).toMatchObject({ strategy: 'album', cohesion: 82.5 });
  });

  it('should keep only the newest maxRuns runs', () => {
    const small = new RunHistory({ inMemory: true, maxRuns: 2 });
    small.initialize();
    small.record(summary('a'));
    small.record(summary('b'));
    small.record(summary('c'));

    expect(small.count()).toBe(2);
    expect(small.list().map((r) => r.input)).toEqual(['c', 'b']);
    small.close();
  });

  it('should clear all runs', () => {
    history.record(summary('a'));
    history.clear();
    expect(history.count()).toBe(0);
    expect(history.list()).toEqual([]);
  });

  it('should refuse operations before initialize() and after close()', () => {
    const fresh = new RunHistory({ inMemory: true });
    expect(() => fresh.count()).toThrow('RunHistory is not initialized');
    expect(fresh.isOpen()).toBe(false);

    history.close();
    expect(history.isOpen()).toBe(false);
    expect(() => history.record(summary('late'))).toThrow('RunHistory is not initialized');
  });

  it('should report the in-memory path', () => {
    expect(history.getPath()).toBe(':memory:');
  });

  it('should default to history.db in the app folder', () => {
    expect(path.basename(getDefaultHistoryPath())).toBe('history.db');
    expect(path.basename(path.dirname(getDefaultHistoryPath()))).toBe('master-dispatch');
  });

  describe('on disk', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'history-test-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should create the folder and keep runs across instances', () => {
      const dbPath = path.join(tempDir, 'nested', 'history.db');
      const first = new RunHistory({ dbPath });
      first.initialize();
      first.record(summary('persisted'));
      first.close();

      const second = new RunHistory({ dbPath });
      second.initialize();
      expect(second.list().map((r) => r.input)).toEqual(['persisted']);
      second.close();
    });
  });
});
