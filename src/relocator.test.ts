import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { WardenDatabase } from './database.js';
import { recordFile } from './scanner.js';
import { destinationDirectory, nextAvailableName, relocateFiles, suffixedName } from './relocator.js';

describe('destinationDirectory', () => {
  it('uses the quarantine root in flat mode', () => {
    expect(destinationDirectory('/r/sub/x.bin', '/r', '/q', 'flat')).toBe('/q');
  });

  it('mirrors the relative directory in hierarchical mode', () => {
    expect(destinationDirectory('/r/sub/deep/x.bin', '/r', '/q', 'hierarchical')).toBe('/q/sub/deep');
    expect(destinationDirectory('/r/x.bin', '/r', '/q', 'hierarchical')).toBe('/q');
  });

  it('falls back to the quarantine root for files outside the scan root', () => {
    expect(destinationDirectory('/elsewhere/x.bin', '/r', '/q', 'hierarchical')).toBe('/q');
  });

  it('resolves a relative quarantine directory', () => {
    expect(destinationDirectory('/r/x.bin', '/r', 'quarantine', 'flat')).toBe(resolve('quarantine'));
  });
});

describe('suffixedName', () => {
  it('inserts the counter before the extension', () => {
    expect(suffixedName('rom.bin', 0)).toBe('rom.bin');
    expect(suffixedName('rom.bin', 1)).toBe('rom_1.bin');
    expect(suffixedName('archive.tar.gz', 2)).toBe('archive.tar_2.gz');
    expect(suffixedName('README', 1)).toBe('README_1');
  });
});

describe('relocateFiles', () => {
  let tempDir: string;
  let root: string;
  let quarantine: string;
  let db: WardenDatabase;

  async function place(relativePath: string, content: string): Promise<string> {
    const filePath = join(root, relativePath);
    mkdirSync(join(filePath, '..'), { recursive: true });
    writeFileSync(filePath, content);
    await recordFile(db, filePath);
    return filePath;
  }

  beforeEach(() => {
    tempDir = join(process.cwd(), '.test-tmp', 'relocator');
    root = join(tempDir, 'root');
    quarantine = join(tempDir, 'quarantine');
    mkdirSync(root, { recursive: true });
    db = new WardenDatabase(join(tempDir, 'test.sqlite'));
  });

  afterEach(() => {
    db.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('picks the first free name in a directory', async () => {
    mkdirSync(quarantine, { recursive: true });
    writeFileSync(join(quarantine, 'rom.bin'), 'x');
    writeFileSync(join(quarantine, 'rom_1.bin'), 'x');

    expect(await nextAvailableName(quarantine, 'rom.bin')).toBe('rom_2.bin');
    expect(await nextAvailableName(quarantine, 'other.bin')).toBe('other.bin');
  });

  it('never overwrites when two files share a name', async () => {
    const first = await place('a/rom.bin', 'first');
    const second = await place('b/rom.bin', 'second');

    const result = await relocateFiles(db, [first, second], {
      scanRoot: root,
      quarantineDir: quarantine,
      directoryMode: 'flat'
    });

    expect(result.moved).toBe(2);
    expect(result.errors).toBe(0);
    expect(result.moves.map(m => m.destinationPath)).toEqual([
      join(quarantine, 'rom.bin'),
      join(quarantine, 'rom_1.bin')
    ]);
    expect(readFileSync(join(quarantine, 'rom.bin'), 'utf-8')).toBe('first');
    expect(readFileSync(join(quarantine, 'rom_1.bin'), 'utf-8')).toBe('second');
    expect(existsSync(first)).toBe(false);
    expect(db.getFile(first)).toBeUndefined();
    expect(db.countMoves()).toBe(2);
  });

  it('mirrors subdirectories in hierarchical mode', async () => {
    const file = await place('sub/deep/x.bin', 'x');

    const result = await relocateFiles(db, [file], {
      scanRoot: root,
      quarantineDir: quarantine,
      directoryMode: 'hierarchical'
    });

    expect(result.moves[0].destinationPath).toBe(join(quarantine, 'sub', 'deep', 'x.bin'));
    expect(existsSync(join(quarantine, 'sub', 'deep', 'x.bin'))).toBe(true);
  });

  it('continues past a failed move and keeps its record', async () => {
    const missing = await place('gone.bin', 'gone');
    rmSync(missing);
    const present = await place('here.bin', 'here');

    const result = await relocateFiles(db, [missing, present], {
      scanRoot: root,
      quarantineDir: quarantine,
      directoryMode: 'flat'
    });

    expect(result.moved).toBe(1);
    expect(result.errors).toBe(1);
    expect(result.errorLog).toMatch(new RegExp(`^\\S+ - Could not move ${missing}: `));
    expect(db.getFile(missing)).toBeDefined();
    expect(db.getMoveByOriginalPath(missing)).toBeUndefined();
    expect(db.getMoveByOriginalPath(present)).toBeDefined();
  });

  it('moves the file back when the ledger write fails', async () => {
    const file = await place('x.bin', 'x');
    db.insertMove({ originalPath: file, destinationPath: join(quarantine, 'older.bin') });

    const result = await relocateFiles(db, [file], {
      scanRoot: root,
      quarantineDir: quarantine,
      directoryMode: 'flat'
    });

    expect(result.moved).toBe(0);
    expect(result.errors).toBe(1);
    expect(result.errorLog).toContain(`Could not ledger move of ${file}`);
    expect(readFileSync(file, 'utf-8')).toBe('x');
    expect(existsSync(join(quarantine, 'x.bin'))).toBe(false);
    expect(db.getFile(file)).toBeDefined();
  });
});
