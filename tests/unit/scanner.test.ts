/**
 * RPS Export - Directory Scanner Tests
 * ====================================
 */

import * as fs from 'fs';
import * as path from 'path';
import { FileSystemError } from '../../src/core/errors';
import { isSessionFile, readSessionFile, scanDirectory } from '../../src/data/scanner';
import { makeTempDir, removeDir } from '../fixtures/sessions';

describe('isSessionFile', () => {
  it('should accept plain session files', () => {
    expect(isSessionFile('g1.json')).toBe(true);
    expect(isSessionFile('2021_03_game.json')).toBe(true);
  });

  it('should reject files carrying an exclusion marker', () => {
    expect(isSessionFile('pilot_TEST_01.json')).toBe(false);
    expect(isSessionFile('g1_freeResp.json')).toBe(false);
    expect(isSessionFile('g1_sliderData.json')).toBe(false);
  });

  it('should reject non-json files', () => {
    expect(isSessionFile('g1.csv')).toBe(false);
    expect(isSessionFile('g1.json.bak')).toBe(false);
    expect(isSessionFile('g1.JSON')).toBe(false);
  });

  it('should match markers case-sensitively', () => {
    expect(isSessionFile('test_game.json')).toBe(true);
    expect(isSessionFile('g1_freeresp.json')).toBe(true);
  });

  it('should use custom markers when given', () => {
    expect(isSessionFile('pilot_TEST_01.json', ['pilot'])).toBe(false);
    expect(isSessionFile('g1_TEST.json', ['pilot'])).toBe(true);
  });
});

describe('scanDirectory', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('scan');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should list only session files', () => {
    for (const name of ['g1.json', 'g2.json', 'pilot_TEST_01.json', 'g1_freeResp.json', 'g1_sliderData.json', 'notes.txt']) {
      fs.writeFileSync(path.join(dir, name), '{}');
    }
    fs.mkdirSync(path.join(dir, 'archive.json'));

    expect(scanDirectory(dir).sort()).toEqual(['g1.json', 'g2.json']);
  });

  it('should return nothing for an empty directory', () => {
    expect(scanDirectory(dir)).toEqual([]);
  });

  it('should raise a filesystem error for a missing directory', () => {
    const missing = path.join(dir, 'missing');

    expect(() => scanDirectory(missing)).toThrow(FileSystemError);
    try {
      scanDirectory(missing);
    } catch (error) {
      expect(error).toBeInstanceOf(FileSystemError);
      if (error instanceof FileSystemError) {
        expect(error.kind).toBe('filesystem');
        expect(error.path).toBe(missing);
      }
    }
  });
});

describe('readSessionFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('read');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should replace invalid UTF-8 bytes instead of failing', () => {
    fs.writeFileSync(path.join(dir, 'g1.json'), Buffer.from([0x7b, 0xff, 0x7d]));

    expect(readSessionFile(dir, 'g1.json')).toBe('{\uFFFD}');
  });

  it('should raise a filesystem error for a missing file', () => {
    expect(() => readSessionFile(dir, 'gone.json')).toThrow(FileSystemError);
  });
});
