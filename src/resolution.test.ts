import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { WardenDatabase } from './database.js';
import { classifyDuplicates } from './classifier.js';
import { groupByContentHash, resolveDuplicates, scoreGroup, selectKeeper } from './resolution.js';
import { FileRecord } from './types.js';

function member(path: string, overrides: Partial<FileRecord> = {}): FileRecord {
  const filename = path.split('/').pop() ?? path;
  return {
    path,
    filename,
    simplifiedName: filename.replace(/\.[^.]*$/, ''),
    extension: 'bin',
    contentHash: 'same',
    sizeBytes: 10,
    createdAt: null,
    modifiedAt: null,
    isDuplicate: true,
    ...overrides
  };
}

function scoresByPath(records: FileRecord[]): Record<string, number> {
  return Object.fromEntries(scoreGroup(records).map(s => [s.record.path, s.score]));
}

describe('keeper scoring', () => {
  it('rewards the shortest and alphabetically first name', () => {
    const group = [member('/r/a.bin'), member('/r/aa.bin'), member('/r/aaa.bin')];

    expect(scoresByPath(group)).toEqual({ '/r/a.bin': 6, '/r/aa.bin': 1, '/r/aaa.bin': 1 });
  });

  it('only rewards the smallest size when it is non-zero', () => {
    const group = [member('/r/a.bin', { sizeBytes: 0 }), member('/r/aa.bin', { sizeBytes: 0 }), member('/r/aaa.bin', { sizeBytes: 0 })];

    expect(scoresByPath(group)).toEqual({ '/r/a.bin': 5, '/r/aa.bin': 0, '/r/aaa.bin': 0 });
  });

  it('splits the name criteria between members', () => {
    const group = [member('/r/zz.bin'), member('/r/abc.bin', { sizeBytes: 5 })];

    expect(scoresByPath(group)).toEqual({ '/r/zz.bin': 3, '/r/abc.bin': 3 });
  });

  it('returns no scores for an empty group', () => {
    expect(scoreGroup([])).toEqual([]);
  });
});

describe('selectKeeper', () => {
  it('keeps the highest score and relocates the rest', () => {
    const group = [member('/r/aaa.bin'), member('/r/a.bin'), member('/r/aa.bin')];

    const { keeper, relocate } = selectKeeper(group);

    expect(keeper.path).toBe('/r/a.bin');
    expect(relocate.map(r => r.path)).toEqual(['/r/aaa.bin', '/r/aa.bin']);
  });

  it('breaks ties by the smallest path', () => {
    const group = [member('/r/y/game.bin'), member('/r/x/game.bin')];

    expect(selectKeeper(group).keeper.path).toBe('/r/x/game.bin');
    expect(selectKeeper([...group].reverse()).keeper.path).toBe('/r/x/game.bin');
  });

  it('throws for an empty group', () => {
    expect(() => selectKeeper([])).toThrow('empty group');
  });
});

describe('groupByContentHash', () => {
  it('keeps only flagged, readable groups of two or more', () => {
    const groups = groupByContentHash([
      member('/r/a.bin', { contentHash: 'h1' }),
      member('/r/b.bin', { contentHash: 'h1' }),
      member('/r/c.bin', { contentHash: 'h2' }),
      member('/r/d.bin', { contentHash: 'h3', isDuplicate: false }),
      member('/r/e.bin', { contentHash: 'h3' }),
      member('/r/f.bin', { contentHash: '' }),
      member('/r/g.bin', { contentHash: '' })
    ]);

    expect([...groups.keys()]).toEqual(['h1']);
    expect(groups.get('h1')?.map(r => r.path)).toEqual(['/r/a.bin', '/r/b.bin']);
  });
});

describe('resolveDuplicates', () => {
  let tempDir: string;
  let db: WardenDatabase;

  beforeEach(() => {
    tempDir = join(process.cwd(), '.test-tmp', 'resolution');
    mkdirSync(tempDir, { recursive: true });
    db = new WardenDatabase(join(tempDir, 'test.sqlite'));
  });

  afterEach(() => {
    db.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('resolves content groups in hash order', () => {
    db.upsertFile(member('/r/b1.bin', { contentHash: 'bbb' }));
    db.upsertFile(member('/r/b22.bin', { contentHash: 'bbb' }));
    db.upsertFile(member('/r/a1.bin', { contentHash: 'aaa' }));
    db.upsertFile(member('/r/a22.bin', { contentHash: 'aaa' }));
    classifyDuplicates(db, '/r');

    const resolutions = resolveDuplicates(db, '/r');

    expect(resolutions.map(r => [r.contentHash, r.keeper.path, r.relocate.map(x => x.path)])).toEqual([
      ['aaa', '/r/a1.bin', ['/r/a22.bin']],
      ['bbb', '/r/b1.bin', ['/r/b22.bin']]
    ]);
  });

  it('leaves filename-only duplicates unresolved', () => {
    db.upsertFile(member('/r/a/save.dat', { contentHash: 'h1' }));
    db.upsertFile(member('/r/b/save.dat', { contentHash: 'h2' }));
    classifyDuplicates(db, '/r');

    expect(db.getDuplicatesUnder('/r')).toHaveLength(2);
    expect(resolveDuplicates(db, '/r')).toEqual([]);
  });
});
