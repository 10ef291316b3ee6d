// src/config/settings.ts
// What: Tunables for chunking, retrieval and conversation history.
// How: A zod schema with documented defaults and ranges. Components receive a RagSettings object in their
//      constructors; nothing reads these values from a global.

import { z } from 'zod';
import { ConfigError } from '../errors.js';

export const ragSettingsSchema = z
  .object({
    /** Target window size in characters. */
    chunkSize: z.number().int().min(50).max(20_000).default(800),
    /** Characters shared by consecutive windows of one lesson; must be below chunkSize. */
    chunkOverlap: z.number().int().min(0).default(100),
    /** Default number of hits returned by a content search. */
    maxResults: z.number().int().min(1).max(50).default(5),
    /** Number of (user, assistant) pairs kept per session. */
    maxHistory: z.number().int().min(1).max(50).default(2),
  })
  .refine((s) => s.chunkOverlap < s.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

export type RagSettings = z.output<typeof ragSettingsSchema>;

export const DEFAULT_RAG_SETTINGS: RagSettings = Object.freeze(ragSettingsSchema.parse({}));

export function resolveSettings(input: Partial<RagSettings> = {}): RagSettings {
  const parsed = ragSettingsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new ConfigError(`Invalid settings: ${issues}`);
  }
  return parsed.data;
}
