/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  readFile,
  readTextFile,
  writeFile,
  fileExists,
  globFiles,
  toPosixPath,
} from '../../../src/utils/file-system.js';
import { mkdirSync, writeFileSync, rmSync, readFileSync as fsReadFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `layerguard-fs-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('readFile / readTextFile', () => {
    it('should read file contents', async () => {
      const filePath = join(tempDir, 'lib.rs');
      writeFileSync(filePath, 'use crate::core;');

      expect(await readFile(filePath)).toBe('use crate::core;');
      expect(await readTextFile(filePath)).toBe('use crate::core;');
    });

    it('should reject invalid UTF-8 in readTextFile', async () => {
      const filePath = join(tempDir, 'binary.rs');
      writeFileSync(filePath, Buffer.from([0x75, 0x73, 0x65, 0xff, 0xfe, 0x20]));

      await expect(readTextFile(filePath)).rejects.toThrow();
    });

    it('should reject for non-existent file', async () => {
      await expect(readTextFile(join(tempDir, 'missing.rs'))).rejects.toThrow();
    });
  });

  describe('writeFile', () => {
    it('should create parent directories', async () => {
      const filePath = join(tempDir, 'reports', 'nested', 'out.json');

      await writeFile(filePath, '[]');

      expect(fsReadFileSync(filePath, 'utf-8')).toBe('[]');
    });
  });

  describe('fileExists', () => {
    it('should detect existing and missing files', async () => {
      const filePath = join(tempDir, 'Cargo.toml');
      writeFileSync(filePath, '');

      expect(await fileExists(filePath)).toBe(true);
      expect(await fileExists(join(tempDir, 'nope.toml'))).toBe(false);
    });
  });

  describe('globFiles', () => {
    it('should return relative matches and skip target/ by default', async () => {
      mkdirSync(join(tempDir, 'src'), { recursive: true });
      mkdirSync(join(tempDir, 'target', 'debug'), { recursive: true });
      writeFileSync(join(tempDir, 'src', 'lib.rs'), '');
      writeFileSync(join(tempDir, 'target', 'debug', 'build.rs'), '');

      const files = await globFiles('**/*.rs', { cwd: tempDir, absolute: false });

      expect(files).toEqual(['src/lib.rs']);
    });
  });

  describe('toPosixPath', () => {
    it('should convert backslashes', () => {
      expect(toPosixPath('src\\core\\mod.rs')).toBe('src/core/mod.rs');
    });
  });
});
