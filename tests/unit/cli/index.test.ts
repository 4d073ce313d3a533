/**
 * Tests for the CLI program.
 */
import { describe, it, expect } from 'vitest';
import { createCli } from '../../../src/cli/index.js';

describe('createCli', () => {
  it('should register the check and rules commands', () => {
    const program = createCli();

    expect(program.name()).toBe('layerguard');
    expect(program.commands.map((command) => command.name())).toEqual(['check', 'rules']);
  });

  it('should report the package version', () => {
    expect(createCli().version()).toBe('0.1.0');
  });
});
