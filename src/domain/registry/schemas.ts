/**
 * Zod schemas for the on-disk registry document.
 */

import { z } from 'zod';

export const PluginRecordSchema = z.object({
  name: z.string().min(1),
  sourceRepo: z.string().min(1),
  pin: z.string().min(1).optional(),
  resolvedTag: z.string().min(1).optional(),
  commitHash: z.string().min(1),
  lastSyncedAt: z.string().min(1),
  enabled: z.boolean().default(true),
  skipAutoUpdate: z.boolean().default(false),
  sourceScripts: z.array(z.string()).default([]),
});

/** Top level only; records are validated one by one so a single bad entry does not void the rest. */
export const RegistryDocumentSchema = z.object({
  plugins: z.array(z.unknown()),
});
