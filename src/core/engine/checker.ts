/**
 * Boundary checker - runs the detectors for one layer and merges their output.
 */
import os from 'node:os';
import type { LayerRule } from '../registry/types.js';
import { resolveFiles, DEFAULT_IGNORE } from '../locator/locator.js';
import { detectImports } from '../detectors/imports.js';
import { detectPatterns } from '../detectors/patterns.js';
import { detectManifest, DEFAULT_MANIFEST } from '../detectors/manifest.js';
import type { SourceScanOptions, UnreadableFilePolicy } from '../detectors/source.js';
import { aggregate } from '../report/aggregator.js';
import type { ValidationReport, Violation, ViolationStream } from '../report/types.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';

/** Detector execution order; also the primary sort key of the report. */
export const DetectorIndex = {
  IMPORTS: 0,
  MANIFEST: 1,
  PATTERNS: 2,
} as const;

export interface BoundaryCheckOptions {
  rule: LayerRule;
  /** Manifest path relative to the project root */
  manifestPath?: string;
  unreadableFiles?: UnreadableFilePolicy;
  /** Files scanned at once; 1 runs every scan strictly in sequence */
  concurrency?: number;
  /** Globs excluded from the layer's file set */
  ignore?: string[];
  logger?: Logger;
}

type FileDetector = (file: string, rule: LayerRule, options: SourceScanOptions) => Promise<Violation[]>;

/** Default concurrency: 75% of CPUs, at least 2, at most 16. */
export function defaultConcurrency(): number {
  return Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 2), 16);
}

export class BoundaryChecker {
  private projectRoot: string;
  private options: BoundaryCheckOptions;
  private log: Logger;

  constructor(projectRoot: string, options: BoundaryCheckOptions) {
    this.projectRoot = projectRoot;
    this.options = options;
    this.log = (options.logger ?? rootLogger).child(options.rule.name);
  }

  /**
   * Run a full, stateless scan. The report does not depend on concurrency.
   */
  async run(): Promise<ValidationReport> {
    const { rule } = this.options;
    const files = await resolveFiles(rule.filePatterns, {
      cwd: this.projectRoot,
      ignore: this.options.ignore ?? DEFAULT_IGNORE,
    });
    this.log.debug(`Resolved ${files.length} file(s)`, { patterns: [...rule.filePatterns] });
    if (files.length === 0) {
      this.log.warn(`No files match the layer patterns: ${rule.filePatterns.join(', ')}`);
    }

    const concurrency = this.options.concurrency ?? defaultConcurrency();
    const streams = concurrency <= 1
      ? await this.runSequential(files)
      : await this.runParallel(files, concurrency);

    return aggregate(streams);
  }

  private async runSequential(files: string[]): Promise<ViolationStream[]> {
    const streams: ViolationStream[] = [];

    this.log.info('Analyzing source files...');
    for (const [index, file] of files.entries()) {
      streams.push(await this.scanFile(DetectorIndex.IMPORTS, detectImports, file, index));
    }

    this.log.info('Analyzing dependencies...');
    streams.push(await this.scanManifest());

    this.log.info('Checking API usage patterns...');
    for (const [index, file] of files.entries()) {
      streams.push(await this.scanFile(DetectorIndex.PATTERNS, detectPatterns, file, index));
    }

    return streams;
  }

  /**
   * One task per (detector, file), dispatched in batches, with the manifest
   * scan running alongside. Stream order is restored by the aggregator.
   */
  private async runParallel(files: string[], concurrency: number): Promise<ViolationStream[]> {
    this.log.info(`Analyzing ${files.length} source file(s) and dependencies (concurrency ${concurrency})...`);

    const tasks: Array<() => Promise<ViolationStream>> = [];
    for (const [detector, detect] of [
      [DetectorIndex.IMPORTS, detectImports],
      [DetectorIndex.PATTERNS, detectPatterns],
    ] as const) {
      files.forEach((file, index) => {
        tasks.push(() => this.scanFile(detector, detect, file, index));
      });
    }

    const [manifest, fileStreams] = await Promise.all([
      this.scanManifest(),
      this.runBatches(tasks, concurrency),
    ]);

    return [...fileStreams, manifest];
  }

  private async runBatches(
    tasks: Array<() => Promise<ViolationStream>>,
    concurrency: number
  ): Promise<ViolationStream[]> {
    const streams: ViolationStream[] = [];
    for (let i = 0; i < tasks.length; i += concurrency) {
      const batch = tasks.slice(i, i + concurrency);
      streams.push(...(await Promise.all(batch.map((task) => task()))));
    }
    return streams;
  }

  private async scanFile(
    detector: number,
    detect: FileDetector,
    file: string,
    sequence: number
  ): Promise<ViolationStream> {
    // An unreadable file is reported once, by the import scan
    const violations = await detect(file, this.options.rule, {
      projectRoot: this.projectRoot,
      unreadableFiles: detector === DetectorIndex.IMPORTS ? this.options.unreadableFiles : 'skip',
    });
    if (violations.length > 0) {
      this.log.debug(`${file}: ${violations.length} violation(s)`);
    }
    return { detector, sequence, violations };
  }

  private async scanManifest(): Promise<ViolationStream> {
    const violations = await detectManifest(
      this.options.manifestPath ?? DEFAULT_MANIFEST,
      this.options.rule,
      { projectRoot: this.projectRoot }
    );
    return { detector: DetectorIndex.MANIFEST, sequence: 0, violations };
  }
}
