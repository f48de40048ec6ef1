/**
 * Zod schemas for runtime validation
 */

import { z } from 'zod';

// ========== State File Schemas ==========

export const ArchiveRecordSchema = z.object({
  path: z.string().min(1),
  mtime: z.number().finite(),
  md5: z.string().regex(/^[0-9a-f]{32}$/, 'md5 must be a 32-character lowercase hex digest'),
});

export const LedgerDocumentSchema = z.object({
  files: z.array(ArchiveRecordSchema),
});

// ========== Config Schemas ==========

export const SettingsSchema = z.object({
  stateFile: z.string().min(1).optional(),
  logFile: z.string().min(1).optional(),
  convertCommand: z.string().min(1).optional(),
  dirSuffix: z.string().optional(),
});

export const ConfigSchema = z.object({
  version: z.string(),
  settings: SettingsSchema.optional(),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
