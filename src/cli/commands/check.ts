/**
 * `check` - the default command. Scans one layer, prints the report, writes
 * the machine report and exits 0 (clean) or 1 (any violation).
 */
import { Command, InvalidArgumentError } from 'commander';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { registryForProfile } from '../../core/registry/registry.js';
import { BoundaryChecker } from '../../core/engine/checker.js';
import type { UnreadableFilePolicy } from '../../core/detectors/source.js';
import { exitStatus } from '../../core/report/aggregator.js';
import { HumanReporter } from '../../core/report/human.js';
import { renderMachine, writeMachineReport } from '../../core/report/machine.js';
import { logger, type LogLevel } from '../../utils/logger.js';

export interface CheckCommandOptions {
  config?: string;
  profile?: string;
  layer?: string;
  manifest?: string;
  report?: string;
  strictRead?: boolean;
  sequential?: boolean;
  concurrency?: number;
  json?: boolean;
  /** Set to false by --no-color */
  color?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export interface CheckSettings {
  layer: string;
  profile: string;
  manifest: string;
  report: string;
  unreadableFiles: UnreadableFilePolicy;
  /** Undefined means the CPU-based default */
  concurrency?: number;
  ignore: string[];
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Command-line flags win over the config file.
 */
export function resolveCheckSettings(config: Config, options: CheckCommandOptions): CheckSettings {
  return {
    layer: options.layer ?? config.layer,
    profile: options.profile ?? config.profile,
    manifest: options.manifest ?? config.manifest,
    report: options.report ?? config.report,
    unreadableFiles: options.strictRead ? 'fail' : config.unreadable_files,
    concurrency: options.sequential ? 1 : options.concurrency ?? config.concurrency,
    ignore: config.ignore,
  };
}

function logLevelFor(options: CheckCommandOptions): LogLevel {
  if (options.quiet) return 'silent';
  if (options.verbose) return 'debug';
  // Keep stdout parseable
  if (options.json) return 'error';
  return 'info';
}

/**
 * Run a check and return the process exit code. Configuration and rule lookup
 * errors are logged and yield 1.
 */
export async function runCheck(projectRoot: string, options: CheckCommandOptions): Promise<number> {
  logger.setLevel(logLevelFor(options));

  try {
    const config = await loadConfig(projectRoot, options.config);
    const settings = resolveCheckSettings(config, options);
    const rule = registryForProfile(settings.profile).layerRuleFor(settings.layer);

    logger.info(`Checking architectural boundaries of layer '${rule.name}' (${settings.profile} profile)...`);

    const checker = new BoundaryChecker(projectRoot, {
      rule,
      manifestPath: settings.manifest,
      unreadableFiles: settings.unreadableFiles,
      concurrency: settings.concurrency,
      ignore: settings.ignore,
      logger,
    });
    const report = await checker.run();

    const reportPath = path.resolve(projectRoot, settings.report);
    await writeMachineReport(reportPath, report);
    logger.debug(`Machine report written to ${reportPath}`);

    if (options.json) {
      console.log(renderMachine(report).trimEnd());
    } else {
      console.log(new HumanReporter({ colors: options.color !== false }).render(report));
    }

    if (report.isClean) {
      logger.success('Build PASSED: Architecture is clean');
    } else {
      logger.fail(`Build FAILED: ${report.violations.length} architectural violation(s) found`);
    }

    return exitStatus(report);
  } catch (error) {
    logger.error('Boundary check could not run', error instanceof Error ? error : undefined);
    return 1;
  }
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Verify that a layer does not depend on forbidden layers')
    .option('--config <path>', 'Path to config file')
    .option('--profile <name>', 'Built-in rule set: full or simplified')
    .option('--layer <name>', 'Layer to check')
    .option('--manifest <path>', 'Dependency manifest to check')
    .option('--report <path>', 'Where to write the machine-readable report')
    .option('--strict-read', 'Report unreadable layer files instead of skipping them')
    .option('--sequential', 'Scan files one at a time')
    .option('--concurrency <n>', 'Number of files scanned at once', parsePositiveInt)
    .option('--json', 'Print the machine-readable report instead of the summary')
    .option('--no-color', 'Disable colors in the summary')
    .option('--quiet', 'Suppress progress output')
    .option('--verbose', 'Show detailed output')
    .action(async (options: CheckCommandOptions) => {
      process.exit(await runCheck(process.cwd(), options));
    });
}
