import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RunStorageService } from '../run-storage.service.js';

describe('RunStorageService', () => {
  let baseDir: string;
  let storage: RunStorageService;

  beforeEach(() => {
    baseDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'run-storage-')), 'runs');
    storage = new RunStorageService(baseDir);
  });

  afterEach(() => {
    fs.rmSync(path.dirname(baseDir), { recursive: true, force: true });
  });

  it('creates the base directory', () => {
    expect(fs.existsSync(baseDir)).toBe(true);
  });

  it('stores one file per stage attempt', () => {
    const first = storage.storeStageOutput('run-1', 'test', 1, 'first attempt');
    storage.storeStageOutput('run-1', 'test', 2, 'second attempt');

    expect(first).toBe(path.join(baseDir, 'run-1', 'test.1.log'));
    expect(storage.readStageOutput('run-1', 'test', 1)).toBe('first attempt');
    expect(storage.readStageOutput('run-1', 'test', 2)).toBe('second attempt');
    expect(fs.readdirSync(storage.getRunPath('run-1')).sort()).toEqual(['test.1.log', 'test.2.log']);
  });

  it('encodes stage names used as file names', () => {
    const stored = storage.storeStageOutput('run-1', 'deploy/eu west', 1, 'ok');

    expect(path.basename(stored)).toBe('deploy%2Feu%20west.1.log');
  });

  it('keeps stages whose names differ only in special characters apart', () => {
    const slashed = storage.storeStageOutput('run-1', 'a/b', 1, 'slash');
    const underscored = storage.storeStageOutput('run-1', 'a_b', 1, 'underscore');
    const dotted = storage.storeStageOutput('run-1', 'a.1', 1, 'dot');

    expect(new Set([slashed, underscored, dotted]).size).toBe(3);
    expect(storage.readStageOutput('run-1', 'a/b', 1)).toBe('slash');
    expect(storage.readStageOutput('run-1', 'a_b', 1)).toBe('underscore');
    expect(path.basename(dotted)).toBe('a%2E1.1.log');
  });

  it('returns nothing for output that was never stored', () => {
    expect(storage.readStageOutput('run-2', 'build', 1)).toBeUndefined();
  });
});
