import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createCheckCommand } from './commands/check.js';
import { createRulesCommand } from './commands/rules.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Create the CLI program. Running it without a command runs `check`. */
export function createCli(): Command {
  const program = new Command()
    .name('layerguard')
    .description('Architectural boundary checks for Cargo crates')
    .version(readVersion());

  program.addCommand(createCheckCommand(), { isDefault: true });
  program.addCommand(createRulesCommand());
  return program;
}
