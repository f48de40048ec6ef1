/**
 * Core Types for Photo Vault
 */

// ========== Ledger Types ==========

/**
 * One archived file, as persisted in the state file.
 * A record asserts "a file named basename(path) with digest md5 has been archived".
 */
export interface ArchiveRecord {
  /** Source path the file was archived from */
  path: string;

  /** Source modification time, seconds since the epoch */
  mtime: number;

  /** Hex MD5 of the full file content */
  md5: string;
}

export interface LedgerDocument {
  files: ArchiveRecord[];
}

export interface LedgerStats {
  records: number;
  names: number;
  /** Names archived with more than one distinct digest */
  collidingNames: number;
}

// ========== Placement Types ==========

export interface CaptureDate {
  year: number;
  /** 1-12 */
  month: number;
}

export type CaptureDateSource = 'metadata' | 'mtime';

export interface ResolvedCaptureDate extends CaptureDate {
  source: CaptureDateSource;
}

// ========== Import Types ==========

export type ImportPass = 'fast' | 'slow';

export type FileOutcome = 'copied' | 'already-present' | 'failed';

export interface ImportOptions {
  /** Decide and log, but copy, record and persist nothing */
  dryRun?: boolean;

  /** Called after each candidate file is settled in a pass */
  onProgress?: (event: ImportProgressEvent) => void;
}

export interface ImportProgressEvent {
  pass: ImportPass;
  /** 1-based position within the pass */
  index: number;
  total: number;
  path: string;
  /** Undefined when the fast pass deferred the file to the slow pass */
  outcome?: FileOutcome;
}

export interface ImportError {
  path: string;
  pass: ImportPass;
  message: string;
  error?: Error;
}

export interface ImportResult {
  /** Candidate files found in the source directory */
  discovered: number;

  /** Files copied because their name had never been archived */
  copiedFirstPass: number;

  /** Files copied despite a name match, because their digest was new */
  copiedSecondPass: number;

  /** Files skipped as exact duplicates */
  alreadyPresent: number;

  failed: number;

  /** Final outcome per source path, in processing order */
  outcomes: Map<string, FileOutcome>;

  errors: ImportError[];

  /** Total time taken (ms) */
  duration: number;
}

// ========== Collaborator Types ==========

/**
 * Reads embedded metadata tags from a file.
 */
export interface MetadataReader {
  readTags(filePath: string): Promise<Record<string, unknown>>;
}

/**
 * Converts a file into another format, writing the result to destination.
 */
export interface Converter {
  convert(sourcePath: string, destinationPath: string): Promise<void>;
}

// ========== Logging ==========

export type LogLevel = 'INFO' | 'WARNING' | 'ERROR';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Log an error with its stack trace at ERROR level */
  exception(error: unknown, context?: string): void;
}
