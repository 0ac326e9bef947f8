import { z } from "zod";

const timestamp = z.string().nullish();

export const documentMetadataSchema = z
  .object({
    id: z.string(),
    filename: z.string(),
    stage: z.enum(["raw", "cleaned"]),
    status: z.enum(["pending", "approved"]),
    language: z.string(),
    source: z.string(),
    category: z.string().nullish(),
    content_length: z.number(),
    source_filename: z.string().nullish(),
    created_at: z.string(),
    submitted_at: z.string(),
    submitted_by: z.string().nullish(),
    approved_at: timestamp,
    approved_by: z.string().nullish(),
    updated_at: timestamp,
    updated_by: z.string().nullish(),
  })
  .passthrough();

export const chunkDataSchema = z
  .object({
    id: z.string(),
    chunk_id: z.string(),
    chunk_index: z.number().int().nonnegative(),
    source_filename: z.string(),
    language: z.string(),
    category: z.string(),
    text: z.string(),
    char_count: z.number(),
    overlap: z.number().nullish(),
    status: z.enum(["pending", "approved"]),
    created_at: z.string(),
    submitted_at: z.string(),
    submitted_by: z.string().nullish(),
    approved_at: timestamp,
    approved_by: z.string().nullish(),
    updated_at: timestamp,
    updated_by: z.string().nullish(),
  })
  .passthrough();

const recordKeySchema = z.union([
  z.object({ stage: z.enum(["raw", "cleaned"]), filename: z.string() }),
  z.object({ stage: z.literal("chunked"), filename: z.string(), chunkIndex: z.number().int().nonnegative() }),
]);

export const journalEntrySchema = z.object({
  id: z.string(),
  key: recordKeySchema,
  from: z.enum(["pending", "approved"]),
  to: z.enum(["pending", "approved"]),
  patch: z.record(z.unknown()),
  phase: z.enum(["prepared", "copied"]),
  created_at: z.string(),
});

export type JournalEntry = z.infer<typeof journalEntrySchema>;
