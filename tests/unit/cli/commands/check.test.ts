/**
 * Tests for the check command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readFileSync, writeFileSync, rmSync, existsSync } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import { InvalidArgumentError } from 'commander';
import {
  parsePositiveInt,
  resolveCheckSettings,
  runCheck,
} from '../../../../src/cli/commands/check.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import { logger } from '../../../../src/utils/logger.js';

describe('check command', () => {
  let tempDir: string;
  const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

  function write(relativePath: string, content: string): void {
    const fullPath = join(tempDir, relativePath);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }

  beforeEach(() => {
    vi.clearAllMocks();
    tempDir = join(tmpdir(), `layerguard-check-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
    write('Cargo.toml', '[package]\nname = "sample"\n\n[dependencies]\nserde = "1"\n');
    write('src/lib.rs', 'pub mod core;\n');
    write('src/core/mod.rs', 'pub fn id(x: u32) -> u32 { x }\n');
  });

  afterEach(() => {
    logger.setLevel('info');
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('runCheck', () => {
    it('should pass a clean crate and write an empty report', async () => {
      const code = await runCheck(tempDir, { quiet: true, color: false });

      expect(code).toBe(0);
      expect(logSpy).toHaveBeenCalledWith('✓ No architectural violations found. All layer boundaries are respected.');
      expect(readFileSync(join(tempDir, 'architecture_report.json'), 'utf-8')).toBe('[]\n');
    });

    it('should fail a crate with violations and record them', async () => {
      write('src/core/mod.rs', 'use crate::network::Client;\n');

      const code = await runCheck(tempDir, { quiet: true, color: false });

      expect(code).toBe(1);
      expect(JSON.parse(readFileSync(join(tempDir, 'architecture_report.json'), 'utf-8'))).toEqual([
        {
          file: 'src/core/mod.rs',
          line: 1,
          type: 'FORBIDDEN_IMPORT',
          detail: "Core module imports forbidden layer 'network': use crate::network::Client;",
        },
      ]);
    });

    it('should print the machine report with --json', async () => {
      write('Cargo.toml', '[dependencies]\naxum = "0.7"\n');

      const code = await runCheck(tempDir, { json: true });

      expect(code).toBe(1);
      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(logSpy).toHaveBeenCalledWith(
        [
          '[',
          '  {',
          '    "file": "Cargo.toml",',
          '    "line": 0,',
          '    "type": "FORBIDDEN_DEPENDENCY",',
          '    "detail": "Core modules cannot use forbidden dependency \'axum\'"',
          '  }',
          ']',
        ].join('\n')
      );
    });

    it('should take settings from the config file', async () => {
      write('.layerguard/config.yaml', 'profile: simplified\nreport: out/boundaries.json\n');
      write('src/bin/cli.rs', 'let data = std::fs::read(path)?;\n');

      const code = await runCheck(tempDir, { quiet: true, color: false });

      expect(code).toBe(1);
      expect(existsSync(join(tempDir, 'architecture_report.json'))).toBe(false);
      expect(JSON.parse(readFileSync(join(tempDir, 'out', 'boundaries.json'), 'utf-8'))).toEqual([
        {
          file: 'src/bin/cli.rs',
          line: 1,
          type: 'FORBIDDEN_IMPORT',
          detail: 'Core module imports forbidden layer: let data = std::fs::read(path)?;',
        },
      ]);
    });

    it('should let flags override the config file', async () => {
      write('.layerguard/config.yaml', 'report: out/boundaries.json\n');

      await runCheck(tempDir, { quiet: true, color: false, report: 'custom.json' });

      expect(readFileSync(join(tempDir, 'custom.json'), 'utf-8')).toBe('[]\n');
    });

    it('should return 1 for an unknown layer', async () => {
      const code = await runCheck(tempDir, { layer: 'ui', color: false });

      expect(code).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Boundary check could not run'));
      expect(existsSync(join(tempDir, 'architecture_report.json'))).toBe(false);
    });

    it('should return 1 for a missing explicit config file', async () => {
      const code = await runCheck(tempDir, { config: 'missing.yaml', quiet: true });

      expect(code).toBe(1);
    });
  });

  describe('resolveCheckSettings', () => {
    it('should use config values when no flags are given', () => {
      expect(resolveCheckSettings(getDefaultConfig(), {})).toEqual({
        layer: 'core',
        profile: 'full',
        manifest: 'Cargo.toml',
        report: 'architecture_report.json',
        unreadableFiles: 'skip',
        concurrency: undefined,
        ignore: ['**/target/**'],
      });
    });

    it('should let flags win', () => {
      const settings = resolveCheckSettings(
        { ...getDefaultConfig(), concurrency: 8 },
        { profile: 'simplified', manifest: 'crates/core/Cargo.toml', strictRead: true, concurrency: 3 }
      );

      expect(settings.profile).toBe('simplified');
      expect(settings.manifest).toBe('crates/core/Cargo.toml');
      expect(settings.unreadableFiles).toBe('fail');
      expect(settings.concurrency).toBe(3);
    });

    it('should force a concurrency of 1 with --sequential', () => {
      const settings = resolveCheckSettings(getDefaultConfig(), { sequential: true, concurrency: 6 });

      expect(settings.concurrency).toBe(1);
    });
  });

  describe('parsePositiveInt', () => {
    it('should parse positive integers', () => {
      expect(parsePositiveInt('4')).toBe(4);
    });

    it('should reject zero, fractions and text', () => {
      expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
      expect(() => parsePositiveInt('1.5')).toThrow(InvalidArgumentError);
      expect(() => parsePositiveInt('many')).toThrow(InvalidArgumentError);
    });
  });
});
