/**
 * Importer
 *
 * Orchestrates: discover source files → decide → place → record → persist
 *
 * Two passes keep content reads to a minimum:
 * - fast pass: a name never seen before is new, copy it without consulting any digest
 * - slow pass: a known name is only a duplicate if its digest matches too
 *
 * Files are handled strictly one at a time, and the ledger is written after
 * every copy, so an interrupted run loses at most the file in flight.
 */

import type {
  FileOutcome,
  ImportOptions,
  ImportPass,
  ImportResult,
  Logger,
} from '../types/index.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { listSourceFiles } from '../utils/source-files.js';
import type { SourceFile, SourceFileOptions } from './fingerprint.js';
import type { ArchiveLedger } from './ledger.js';
import type { PlacementPolicy } from './placement.js';

export class Importer {
  private ledger: ArchiveLedger;
  private placement: PlacementPolicy;
  private logger: Logger;
  private sourceFileOptions: SourceFileOptions;

  constructor(
    ledger: ArchiveLedger,
    placement: PlacementPolicy,
    logger: Logger,
    sourceFileOptions: SourceFileOptions = {}
  ) {
    this.ledger = ledger;
    this.placement = placement;
    this.logger = logger;
    this.sourceFileOptions = { logger, ...sourceFileOptions };
  }

  /**
   * Import every file directly inside sourceDir
   */
  async run(sourceDir: string, options: ImportOptions = {}): Promise<ImportResult> {
    const files = await listSourceFiles(sourceDir, this.sourceFileOptions);
    this.logger.info(`Found ${files.length} files in ${sourceDir}`);
    return this.importFiles(files, options);
  }

  /**
   * Run both passes over an explicit list of candidate files
   */
  async importFiles(files: SourceFile[], options: ImportOptions = {}): Promise<ImportResult> {
    const startTime = Date.now();
    const result: ImportResult = {
      discovered: files.length,
      copiedFirstPass: 0,
      copiedSecondPass: 0,
      alreadyPresent: 0,
      failed: 0,
      outcomes: new Map(),
      errors: [],
      duration: 0,
    };

    // Pass 1: name only
    const deferred: SourceFile[] = [];
    for (const [i, file] of files.entries()) {
      let outcome: FileOutcome | undefined;
      try {
        if (!this.ledger.containsByName(file.name)) {
          this.logger.info(`The file ${file} hasn't been copied yet`);
          await this.copyAndRecord(file, options);
          outcome = 'copied';
          result.copiedFirstPass++;
        } else {
          this.logger.info(`The file ${file} may have already been copied`);
          deferred.push(file);
        }
      } catch (error) {
        outcome = 'failed';
        this.recordFailure(result, file, 'fast', error);
      }

      if (outcome) {
        result.outcomes.set(file.path, outcome);
      }
      options.onProgress?.({
        pass: 'fast',
        index: i + 1,
        total: files.length,
        path: file.path,
        outcome,
      });
    }

    this.logger.info(
      `Copied ${result.copiedFirstPass} files in the first pass, ` +
        `${deferred.length} files remaining for second pass`
    );

    // Pass 2: name + digest
    for (const [i, file] of deferred.entries()) {
      let outcome: FileOutcome;
      try {
        const digest = await file.contentDigest();
        if (!this.ledger.containsByNameAndDigest(file.name, digest)) {
          this.logger.info(`The file ${file} hasn't been copied yet`);
          await this.copyAndRecord(file, options);
          outcome = 'copied';
          result.copiedSecondPass++;
        } else {
          this.logger.info(`The file ${file} has already been copied`);
          outcome = 'already-present';
          result.alreadyPresent++;
        }
      } catch (error) {
        outcome = 'failed';
        this.recordFailure(result, file, 'slow', error);
      }

      result.outcomes.set(file.path, outcome);
      options.onProgress?.({
        pass: 'slow',
        index: i + 1,
        total: deferred.length,
        path: file.path,
        outcome,
      });
    }

    result.duration = Date.now() - startTime;
    this.logger.info(
      `Import finished: ${result.copiedFirstPass + result.copiedSecondPass} copied, ` +
        `${result.alreadyPresent} already present, ${result.failed} failed ` +
        `(${result.duration}ms)`
    );

    return result;
  }

  private async copyAndRecord(file: SourceFile, options: ImportOptions): Promise<void> {
    if (options.dryRun) {
      const destination = await this.placement.plan(file);
      this.logger.info(`[dry-run] Would copy ${file.path} to ${destination}`);
      return;
    }

    const destination = await this.placement.place(file);
    await this.ledger.add(file);
    await this.ledger.store();
    this.logger.info(`Copied file ${file} to ${destination}`);
  }

  private recordFailure(result: ImportResult, file: SourceFile, pass: ImportPass, error: unknown): void {
    result.failed++;
    result.errors.push({
      path: file.path,
      pass,
      message: getErrorMessage(error),
      error: toError(error),
    });
    this.logger.exception(error, `Failed to import ${file.path}`);
  }
}
