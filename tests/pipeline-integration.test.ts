import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { AppConfig, DEFAULT_CONFIG } from '../src/config.js';
import { WardenDatabase } from '../src/database.js';
import { DuplicateWarden, openWarden } from '../src/pipeline.js';

describe('duplicate warden pipeline', () => {
  let tempDir: string;
  let root: string;
  let config: AppConfig;
  let db: WardenDatabase;
  let warden: DuplicateWarden;

  function write(relativePath: string, content: string): string {
    const filePath = join(root, relativePath);
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, content);
    return filePath;
  }

  function reopen(overrides: Parameters<typeof openWarden>[1] = {}): void {
    db.close();
    ({ db, warden } = openWarden(config, overrides));
  }

  beforeEach(() => {
    tempDir = join(process.cwd(), '.test-tmp', 'pipeline');
    root = join(tempDir, 'library');
    mkdirSync(root, { recursive: true });
    config = {
      ...DEFAULT_CONFIG,
      paths: {
        workingDir: join(tempDir, 'work'),
        databasePath: join(tempDir, 'work', 'file_info.sqlite'),
        quarantineDir: join(tempDir, 'work', 'duplicates')
      }
    };
    ({ db, warden } = openWarden(config));
  });

  afterEach(() => {
    db.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('creates the working directories', () => {
    expect(existsSync(join(tempDir, 'work', 'duplicates'))).toBe(true);
    expect(existsSync(join(tempDir, 'work', 'file_info.sqlite'))).toBe(true);
  });

  it('quarantines one of two identical files and leaves unique ones alone', async () => {
    const foo = write('foo.bin', 'identical');
    const bar = write('bar.bin', 'identical');
    const baz = write('baz.bin', 'unique');

    await warden.runScan(root);
    const planned = warden.planResolution(root);

    expect(db.getFile(foo)?.isDuplicate).toBe(true);
    expect(db.getFile(bar)?.isDuplicate).toBe(true);
    expect(db.getFile(baz)?.isDuplicate).toBe(false);
    expect(planned).toHaveLength(1);

    const result = await warden.classifyAndResolve(root);

    expect(result).toEqual({ totalFiles: 3, duplicateCount: 2, movedCount: 1, moveErrors: 0, errorLog: '' });
    expect([existsSync(foo), existsSync(bar)].filter(Boolean)).toHaveLength(1);
    expect(readFileSync(baz, 'utf-8')).toBe('unique');
    expect(warden.listMoves()).toHaveLength(1);
  });

  it('keeps the shortest, alphabetically first name', async () => {
    write('a.bin', '');
    write('aa.bin', '');
    write('aaa.bin', '');
    await warden.runScan(root);

    const [group] = warden.planResolution(root);
    const scores = Object.fromEntries(group.scores.map(s => [s.record.filename, s.score]));

    expect(scores).toEqual({ 'a.bin': 5, 'aa.bin': 0, 'aaa.bin': 0 });
    expect(group.keeper.filename).toBe('a.bin');

    const result = await warden.classifyAndResolve(root);

    expect(result.movedCount).toBe(2);
    expect(warden.listMoves().map(m => m.originalPath).sort()).toEqual([join(root, 'aa.bin'), join(root, 'aaa.bin')]);
  });

  it('flags same-named files with different content but never moves them', async () => {
    reopen({ directoryMode: 'hierarchical', hierarchy: { subdirectoryMinFiles: 0, rootMinFiles: 1 } });
    const first = write('one/save.dat', 'slot one');
    const second = write('two/save.dat', 'slot two');

    await warden.runScan(root);
    const result = await warden.classifyAndResolve(root);

    expect(result.duplicateCount).toBe(2);
    expect(result.movedCount).toBe(0);
    expect(warden.listDuplicates(root).map(r => r.path).sort()).toEqual([first, second]);
    expect(existsSync(first)).toBe(true);
    expect(existsSync(second)).toBe(true);
  });

  it('gives identical flags and keepers when classification is repeated', async () => {
    write('x.bin', 'dup');
    write('y.bin', 'dup');
    write('zz.bin', 'dup');
    write('solo.bin', 'solo');
    await warden.runScan(root);

    const first = warden.planResolution(root);
    const flagsAfterFirst = warden.listDuplicates(root).map(r => r.path);
    const second = warden.planResolution(root);

    expect(warden.listDuplicates(root).map(r => r.path)).toEqual(flagsAfterFirst);
    expect(second.map(g => g.keeper.path)).toEqual(first.map(g => g.keeper.path));
    expect(second[0].keeper.path).toBe(join(root, 'x.bin'));
  });

  it('selects exactly one keeper in every group', async () => {
    for (let group = 0; group < 3; group++) {
      for (let copy = 0; copy <= group + 1; copy++) {
        write(`g${group}_${copy}.bin`, `group ${group}`);
      }
    }
    await warden.runScan(root);

    const groups = warden.planResolution(root);

    expect(groups.map(g => g.relocate.length + 1)).toEqual(
      groups.map(g => g.scores.length)
    );
    expect(groups.map(g => g.scores.length).sort()).toEqual([2, 3, 4]);
    for (const group of groups) {
      expect(group.relocate.map(r => r.path)).not.toContain(group.keeper.path);
    }
  });

  it('restores relocated files and returns the ledger to its prior size', async () => {
    const keep = write('keep.bin', 'twin');
    const twin = write('twin.bin', 'twin');
    await warden.runScan(root);
    const before = db.countMoves();

    await warden.classifyAndResolve(root);
    expect(db.countMoves()).toBe(before + 1);
    expect(existsSync(twin)).toBe(false);

    const result = await warden.restoreAll();

    expect(result).toEqual({ restoredCount: 1, errors: 0, errorLog: '' });
    expect(readFileSync(twin, 'utf-8')).toBe('twin');
    expect(existsSync(keep)).toBe(true);
    expect(db.countMoves()).toBe(before);
  });

  it('picks up restored files on the next scan', async () => {
    write('keep.bin', 'twin');
    const twin = write('twin.bin', 'twin');
    await warden.run(root);
    await warden.restoreAll();

    const rescan = await warden.runScan(root);

    expect(rescan).toMatchObject({ kind: 'incremental', processed: 1 });
    expect(db.getFile(twin)).toBeDefined();
  });

  it('mirrors subdirectories in the quarantine in hierarchical mode', async () => {
    reopen({ directoryMode: 'hierarchical', hierarchy: { subdirectoryMinFiles: 0, rootMinFiles: 1 } });
    write('a/disk.img', 'image');
    write('b/deeper/disk2.img', 'image');

    await warden.run(root);

    expect(warden.listMoves().map(m => m.destinationPath)).toEqual([
      join(config.paths.quarantineDir, 'b', 'deeper', 'disk2.img')
    ]);
  });

  it('records duplicate statistics for each resolution', async () => {
    const left = write('left.bin', 'pair');
    const right = write('right.bin', 'pair');
    await warden.runScan(root);
    const [group] = warden.planResolution(root);

    await warden.classifyAndResolve(root);

    const [stats] = db.getFileStatistics(root);
    expect(stats.totalFiles).toBe(2);
    expect(stats.potentialDuplicates).toBe(2);
    expect(stats.duplicateFileInfo).toEqual({ [group.contentHash]: [left, right] });
  });

  it('never scans its own working directory', async () => {
    const nested: AppConfig = {
      ...config,
      paths: {
        workingDir: join(root, '.dupewarden'),
        databasePath: join(root, '.dupewarden', 'file_info.sqlite'),
        quarantineDir: join(root, '.dupewarden', 'duplicates')
      }
    };
    db.close();
    ({ db, warden } = openWarden(nested, {
      directoryMode: 'hierarchical',
      hierarchy: { subdirectoryMinFiles: 0, rootMinFiles: 1 }
    }));
    write('game.bin', 'game');

    const result = await warden.runScan(root);

    expect(result.discovered).toBe(1);
    expect(db.getPathsUnder(root)).toEqual([join(root, 'game.bin')]);
  });
});
