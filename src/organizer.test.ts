import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, statSync, writeFileSync } from 'fs';
import { join, relative } from 'path';
import { organize } from './organizer.js';
import { InvalidTargetError, Logger } from './logger.js';

const SAMPLE_FILES = ['photo.JPG', 'notes.txt', 'archive.tar.gz', 'script.py', 'mystery.xyz'];

function writeFiles(dir: string, names: string[]): void {
  for (const name of names) {
    writeFileSync(join(dir, name), `content of ${name}`);
  }
}

/** Every path under `dir` with file contents, for comparing whole trees */
function snapshotTree(dir: string, root: string = dir): Record<string, string> {
  const tree: Record<string, string> = {};
  for (const name of readdirSync(dir).sort()) {
    const full = join(dir, name);
    if (statSync(full).isDirectory()) {
      tree[`${relative(root, full)}/`] = '';
      Object.assign(tree, snapshotTree(full, root));
    } else {
      tree[relative(root, full)] = readFileSync(full, 'utf-8');
    }
  }
  return tree;
}

describe('organize', () => {
  let tempDir: string;
  let logger: Logger;

  beforeEach(() => {
    tempDir = mkdtempSync(join(TEST_DIR, 'organizer-'));
    logger = new Logger();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('sorts the sample directory into category folders', async () => {
    writeFiles(tempDir, SAMPLE_FILES);

    const summary = await organize(tempDir, { logger });

    expect(snapshotTree(tempDir)).toEqual({
      'Archives/': '',
      'Archives/archive.tar.gz': 'content of archive.tar.gz',
      'Code/': '',
      'Code/script.py': 'content of script.py',
      'Documents/': '',
      'Documents/notes.txt': 'content of notes.txt',
      'Images/': '',
      'Images/photo.JPG': 'content of photo.JPG',
      'Other/': '',
      'Other/mystery.xyz': 'content of mystery.xyz',
    });
    expect(summary).toMatchObject({
      targetDir: tempDir,
      dryRun: false,
      workers: 4,
      total: 5,
      moved: 5,
      wouldMove: 0,
      failed: 0,
      categories: { Images: 1, Documents: 1, Archives: 1, Code: 1, Other: 1 },
    });
  });

  it('leaves the tree untouched in dry-run mode but names every destination', async () => {
    writeFiles(tempDir, SAMPLE_FILES);
    mkdirSync(join(tempDir, 'Images'));
    const before = snapshotTree(tempDir);

    const summary = await organize(tempDir, { dryRun: true, logger });

    expect(snapshotTree(tempDir)).toEqual(before);
    expect(summary.wouldMove).toBe(5);
    expect(summary.moved).toBe(0);

    const messages = logger.getLogs().map(entry => entry.message);
    for (const name of SAMPLE_FILES) {
      const outcome = summary.outcomes.find(item => item.file === name);
      expect(messages).toContain(`Would move ${name} -> ${join(tempDir, outcome?.category ?? '', name)}`);
    }
    expect(messages).not.toContain(`Would create folder: ${join(tempDir, 'Images')}`);
    expect(messages).toContain(`Would create folder: ${join(tempDir, 'Documents')}`);
  });

  it('reports an empty directory as nothing to organize', async () => {
    const summary = await organize(tempDir, { logger });

    expect(summary.total).toBe(0);
    expect(summary.outcomes).toEqual([]);
    expect(readdirSync(tempDir)).toEqual([]);
    expect(logger.getLogs().map(entry => entry.message)).toEqual([
      `No files found in '${tempDir}'. Nothing to organize.`,
    ]);
  });

  it('ignores category folders left by an earlier run', async () => {
    writeFiles(tempDir, ['a.png']);
    await organize(tempDir, { logger });
    writeFiles(tempDir, ['b.png']);

    const summary = await organize(tempDir, { logger });

    expect(summary.total).toBe(1);
    expect(readdirSync(join(tempDir, 'Images')).sort()).toEqual(['a.png', 'b.png']);
  });

  it('throws InvalidTargetError for a file target without touching it', async () => {
    const file = join(tempDir, 'not-a-dir.txt');
    writeFileSync(file, 'x');

    await expect(organize(file, { logger })).rejects.toBeInstanceOf(InvalidTargetError);
    expect(readdirSync(tempDir)).toEqual(['not-a-dir.txt']);
  });

  it('produces the same layout for any worker count', async () => {
    const names = Array.from({ length: 40 }, (_, i) => {
      const extensions = ['.jpg', '.pdf', '.mp3', '.mkv', '.zip', '.ts', '.go', ''];
      return `file-${i}${extensions[i % extensions.length]}`;
    });

    const layouts: Record<string, string>[] = [];
    for (const workers of [1, 4, 16]) {
      const dir = mkdtempSync(join(tempDir, `workers-${workers}-`));
      writeFiles(dir, names);
      const summary = await organize(dir, { workers, logger });
      expect(summary.moved).toBe(names.length);
      expect(summary.workers).toBe(workers);
      layouts.push(snapshotTree(dir));
    }

    expect(layouts[1]).toEqual(layouts[0]);
    expect(layouts[2]).toEqual(layouts[0]);
    expect(layouts[0]['Other/file-5.ts']).toBe('content of file-5.ts');
    expect(layouts[0]['Code/file-6.go']).toBe('content of file-6.go');
    expect(layouts[0]['Other/file-7']).toBe('content of file-7');
  });

  it('keeps going after a failed file and counts it', async () => {
    writeFiles(tempDir, ['one.txt', 'two.txt', 'three.png']);
    mkdirSync(join(tempDir, 'Documents'));
    writeFileSync(join(tempDir, 'Documents', 'two.txt'), 'already here');

    const summary = await organize(tempDir, { workers: 2, logger });

    expect(summary.moved).toBe(2);
    expect(summary.failed).toBe(1);
    const failed = summary.outcomes.filter(outcome => outcome.status === 'failed');
    expect(failed.map(outcome => outcome.file)).toEqual(['two.txt']);
    expect(readFileSync(join(tempDir, 'two.txt'), 'utf-8')).toBe('content of two.txt');
    expect(readFileSync(join(tempDir, 'Documents', 'two.txt'), 'utf-8')).toBe('already here');
    expect(readFileSync(join(tempDir, 'Images', 'three.png'), 'utf-8')).toBe('content of three.png');
  });

  describe('files named like a category folder', () => {
    const LAYOUT = ['Documents', 'n0.txt', 'n1.txt', 'n2.txt', 'n3.txt', 'n4.txt'];

    function outcomeShape(outcomes: { file: string; category: string; status: string }[]): string[] {
      return outcomes.map(outcome => `${outcome.file}:${outcome.category}:${outcome.status}`).sort();
    }

    it('moves the blocking file out of the way first at every worker count', async () => {
      const shapes: string[][] = [];
      for (const workers of [1, 4, 16]) {
        const dir = mkdtempSync(join(tempDir, `blocked-${workers}-`));
        writeFiles(dir, LAYOUT);

        const summary = await organize(dir, { workers, logger });

        expect(summary).toMatchObject({ moved: 6, failed: 0 });
        expect(snapshotTree(dir)).toEqual({
          'Documents/': '',
          'Documents/n0.txt': 'content of n0.txt',
          'Documents/n1.txt': 'content of n1.txt',
          'Documents/n2.txt': 'content of n2.txt',
          'Documents/n3.txt': 'content of n3.txt',
          'Documents/n4.txt': 'content of n4.txt',
          'Other/': '',
          'Other/Documents': 'content of Documents',
        });
        shapes.push(outcomeShape(summary.outcomes));
      }

      expect(shapes[1]).toEqual(shapes[0]);
      expect(shapes[2]).toEqual(shapes[0]);
    });

    it('previews the same plan in dry-run mode at every worker count', async () => {
      for (const workers of [1, 16]) {
        const dir = mkdtempSync(join(tempDir, `blocked-dry-${workers}-`));
        writeFiles(dir, LAYOUT);
        const before = snapshotTree(dir);
        logger.clear();

        const summary = await organize(dir, { dryRun: true, workers, logger });

        expect(summary).toMatchObject({ wouldMove: 6, failed: 0 });
        expect(snapshotTree(dir)).toEqual(before);
        expect(logger.getLogs().map(entry => entry.message)).toContain(
          `Would create folder: ${join(dir, 'Documents')}`
        );
      }
    });

    it('fails consistently when a file sits where its own folder must go', async () => {
      for (const dryRun of [false, true]) {
        for (const workers of [1, 16]) {
          const dir = mkdtempSync(join(tempDir, `self-${workers}-`));
          writeFiles(dir, ['Other', 'x.xyz']);

          const summary = await organize(dir, { dryRun, workers, logger });

          expect(summary.failed).toBe(2);
          expect(summary.outcomes.map(outcome => (outcome.status === 'failed' ? outcome.reason : ''))).toEqual([
            `A file is in the way of folder ${join(dir, 'Other')}`,
            `A file is in the way of folder ${join(dir, 'Other')}`,
          ]);
          expect(readdirSync(dir).sort()).toEqual(['Other', 'x.xyz']);
        }
      }
    });
  });

  it('reports the resolved directory for a relative target', async () => {
    writeFiles(tempDir, ['a.wav']);

    const summary = await organize(relative(process.cwd(), tempDir), { logger });

    expect(summary.targetDir).toBe(tempDir);
    expect(summary.outcomes[0].destination).toBe(join(tempDir, 'Audio', 'a.wav'));
  });

  it('lists outcomes in scan order', async () => {
    writeFiles(tempDir, ['z.txt', 'a.png', 'm.mp4', 'c.rb']);
    const scanOrder = readdirSync(tempDir);

    const summary = await organize(tempDir, { workers: 3, logger });

    expect(summary.outcomes.map(outcome => outcome.file)).toEqual(scanOrder);
  });
});
