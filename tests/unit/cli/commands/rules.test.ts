/**
 * Tests for the rules command.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createRulesCommand, formatLayerRule, layerRuleToJSON } from '../../../../src/cli/commands/rules.js';
import { createLayerRule } from '../../../../src/core/registry/registry.js';

const rule = createLayerRule({
  name: 'core',
  filePatterns: ['src/lib.rs'],
  forbiddenImports: ['ui'],
  forbiddenDependencies: { tokio: ['net', 'udp'], hyper: '*' },
  apiPatterns: [{ pattern: 'TcpStream', description: 'uses socket type TcpStream' }],
});

describe('formatLayerRule', () => {
  it('should list every restriction of the rule', () => {
    expect(formatLayerRule(rule).split('\n')).toEqual([
      'Layer: core',
      '  Files: src/lib.rs',
      '  Forbidden imports: ui',
      '  Forbidden std imports: (none)',
      '  Std prefix match: substring',
      '  Forbidden dependencies:',
      '    tokio (features: net, udp)',
      '    hyper (any)',
      '  Import patterns:',
      '    (none)',
      '  API patterns:',
      '    /TcpStream/ uses socket type TcpStream',
    ]);
  });

  it('should show segment matching and import patterns', () => {
    const simplified = createLayerRule({
      name: 'core',
      filePatterns: ['src/**/*.rs'],
      forbiddenStdImports: ['std::path::Path'],
      stdPrefixMatch: 'segment',
      importPatterns: [{ pattern: 'use\\s+gtk', description: 'imports forbidden layer' }],
    });

    expect(formatLayerRule(simplified).split('\n').slice(3, 5)).toEqual([
      '  Forbidden std imports: std::path::Path',
      '  Std prefix match: segment',
    ]);
    expect(formatLayerRule(simplified).split('\n').slice(7, 9)).toEqual([
      '  Import patterns:',
      '    /use\\s+gtk/ imports forbidden layer',
    ]);
  });

  it('should mark empty sections', () => {
    const empty = createLayerRule({ name: 'core', filePatterns: [] });

    expect(formatLayerRule(empty).split('\n')).toEqual([
      'Layer: core',
      '  Files: (none)',
      '  Forbidden imports: (none)',
      '  Forbidden std imports: (none)',
      '  Std prefix match: substring',
      '  Forbidden dependencies:',
      '    (none)',
      '  Import patterns:',
      '    (none)',
      '  API patterns:',
      '    (none)',
    ]);
  });
});

describe('layerRuleToJSON', () => {
  it('should use snake_case keys and a plain dependency object', () => {
    expect(layerRuleToJSON(rule)).toEqual({
      name: 'core',
      file_patterns: ['src/lib.rs'],
      forbidden_imports: ['ui'],
      forbidden_std_imports: [],
      std_prefix_match: 'substring',
      forbidden_dependencies: { tokio: ['net', 'udp'], hyper: '*' },
      import_patterns: [],
      api_patterns: [{ pattern: 'TcpStream', description: 'uses socket type TcpStream' }],
    });
  });
});

describe('rules command', () => {
  const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
    throw new Error('process.exit');
  });

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should print the rules of the requested profile', async () => {
    await createRulesCommand().parseAsync(['node', 'layerguard', '--profile', 'simplified']);

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(String(logSpy.mock.calls[0][0]).split('\n').slice(0, 2)).toEqual([
      'Layer: core',
      '  Files: src/**/*.rs',
    ]);
  });

  it('should print JSON with --json', async () => {
    await createRulesCommand().parseAsync(['node', 'layerguard', '--json']);

    const printed: unknown = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(Array.isArray(printed)).toBe(true);
    expect(printed).toHaveLength(1);
  });

  it('should exit with 1 for an unknown profile', async () => {
    await expect(
      createRulesCommand().parseAsync(['node', 'layerguard', '--profile', 'lenient'])
    ).rejects.toThrow('process.exit');

    expect(exitSpy).toHaveBeenCalledWith(1);
  });
});
