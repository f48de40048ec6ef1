/**
 * Archive Ledger
 *
 * Durable record of every file that has been archived, keyed by
 * (filename, content digest). Backed by a single JSON document:
 *
 *   { "files": [ { "path": "...", "mtime": 1650000000.5, "md5": "..." } ] }
 *
 * Two lookup views are kept over the same records: by name, and by
 * name + digest. Only the constructor and add() touch them.
 */

import fs from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import type { ArchiveRecord, LedgerDocument, LedgerStats, Logger } from '../types/index.js';
import { LedgerDocumentSchema } from '../types/schemas.js';
import type { SourceFile } from './fingerprint.js';

function recordKey(name: string, digest: string): string {
  return `${name}\u0000${digest}`;
}

export class ArchiveLedger {
  readonly statePath: string;
  private byNameAndDigest: Map<string, ArchiveRecord> = new Map();
  private byName: Map<string, ArchiveRecord[]> = new Map();

  constructor(statePath: string, records: ArchiveRecord[] = []) {
    this.statePath = statePath;
    for (const record of records) {
      this.index(record);
    }
  }

  /**
   * Load the ledger from disk.
   * A missing, unreadable or invalid state file yields an empty ledger.
   */
  static async load(statePath: string, logger: Logger): Promise<ArchiveLedger> {
    if (!existsSync(statePath)) {
      logger.info(`No state file at ${statePath}, starting with an empty ledger`);
      return new ArchiveLedger(statePath);
    }

    try {
      const content = await fs.readFile(statePath, 'utf-8');
      const document = LedgerDocumentSchema.parse(JSON.parse(content));
      const ledger = new ArchiveLedger(statePath, document.files);
      logger.info(`Loaded ${ledger.size} archive records from ${statePath}`);
      return ledger;
    } catch (error) {
      logger.exception(error, `Failed to load state file ${statePath}, starting with an empty ledger`);
      return new ArchiveLedger(statePath);
    }
  }

  /**
   * Write all records to disk (temp file + rename, so the target is never truncated)
   */
  async store(): Promise<void> {
    const document: LedgerDocument = { files: this.records() };
    const tempFile = `${this.statePath}.tmp`;

    await fs.mkdir(path.dirname(this.statePath), { recursive: true });
    try {
      await fs.writeFile(tempFile, JSON.stringify(document), 'utf-8');
      await fs.rename(tempFile, this.statePath);
    } catch (error) {
      await fs.rm(tempFile, { force: true });
      throw error;
    }
  }

  /**
   * Record a file as archived. Re-adding the same (name, digest) replaces the record.
   */
  async add(file: SourceFile): Promise<ArchiveRecord> {
    const record: ArchiveRecord = {
      path: file.path,
      mtime: await file.modificationTime(),
      md5: await file.contentDigest(),
    };
    this.index(record);
    return record;
  }

  containsByName(name: string): boolean {
    return this.byName.has(name);
  }

  containsByNameAndDigest(name: string, digest: string): boolean {
    return this.byNameAndDigest.has(recordKey(name, digest));
  }

  /**
   * All records, in insertion order
   */
  records(): ArchiveRecord[] {
    return Array.from(this.byNameAndDigest.values());
  }

  get size(): number {
    return this.byNameAndDigest.size;
  }

  getStats(): LedgerStats {
    let collidingNames = 0;
    for (const bucket of this.byName.values()) {
      if (bucket.length > 1) {
        collidingNames++;
      }
    }

    return {
      records: this.byNameAndDigest.size,
      names: this.byName.size,
      collidingNames,
    };
  }

  private index(record: ArchiveRecord): void {
    const name = path.basename(record.path);
    this.byNameAndDigest.set(recordKey(name, record.md5), record);

    const bucket = this.byName.get(name) ?? [];
    const existing = bucket.findIndex((entry) => entry.md5 === record.md5);
    if (existing === -1) {
      bucket.push(record);
    } else {
      bucket[existing] = record;
    }
    this.byName.set(name, bucket);
  }
}
