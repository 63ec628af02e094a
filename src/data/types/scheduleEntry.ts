import { z } from 'zod';

/**
 * A pending publication in schedule.json.
 *
 * `filename` is the entry's identity; no two entries share one.
 * `scheduledTime` is ISO-8601 with the configured zone's offset,
 * e.g. "2026-10-19T07:00:00-04:00".
 */
export const scheduleEntrySchema = z.object({
  filename: z.string().min(1),
  scheduledTime: z.string().min(1),
  originalPath: z.string().min(1),
  caption: z.string().optional(),
});

export type ScheduleEntry = z.infer<typeof scheduleEntrySchema>;

/**
 * A completed (or started) publication in processed.json.
 *
 * `publishedUrl` is null when processing started but the post was not
 * confirmed; the scheduler still treats that filename as handled.
 */
export const processedEntrySchema = z.object({
  filename: z.string().min(1),
  scheduledTime: z.string(),
  publishedUrl: z.string().nullable(),
  processedAt: z.string(),
});

export type ProcessedEntry = z.infer<typeof processedEntrySchema>;

export const scheduleDocumentSchema = z.array(scheduleEntrySchema);
export const processedDocumentSchema = z.array(processedEntrySchema);
