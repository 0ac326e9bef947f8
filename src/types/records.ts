export type Stage = "raw" | "cleaned" | "chunked";
export type DocumentStage = "raw" | "cleaned";
export type Status = "pending" | "approved";

export const STAGES: readonly Stage[] = ["raw", "cleaned", "chunked"];
export const STATUSES: readonly Status[] = ["pending", "approved"];

export interface DocumentMetadata {
  id: string;
  filename: string;
  stage: DocumentStage;
  status: Status;
  language: string;
  source: string;
  category?: string | null;
  content_length: number;
  source_filename?: string | null;
  created_at: string;
  submitted_at: string;
  submitted_by?: string | null;
  approved_at?: string | null;
  approved_by?: string | null;
  updated_at?: string | null;
  updated_by?: string | null;
  [field: string]: unknown;
}

export interface ChunkData {
  id: string;
  chunk_id: string;
  chunk_index: number;
  source_filename: string;
  language: string;
  category: string;
  text: string;
  char_count: number;
  overlap?: number | null;
  status: Status;
  created_at: string;
  submitted_at: string;
  submitted_by?: string | null;
  approved_at?: string | null;
  approved_by?: string | null;
  updated_at?: string | null;
  updated_by?: string | null;
  [field: string]: unknown;
}

export interface DocumentRecord {
  stage: DocumentStage;
  status: Status;
  filename: string;
  content: string;
  metadata: DocumentMetadata;
}

export interface ChunkRecord {
  stage: "chunked";
  status: Status;
  /** Source (cleaned) filename the chunk belongs to. */
  filename: string;
  chunkIndex: number;
  chunk: ChunkData;
}

export type ItemRecord = DocumentRecord | ChunkRecord;

export type DocumentKey = { stage: DocumentStage; filename: string };
export type ChunkKey = { stage: "chunked"; filename: string; chunkIndex: number };
export type RecordKey = DocumentKey | ChunkKey;

/** Fields the moderator may patch onto a record when it changes status. */
export type MetadataPatch = Record<string, unknown>;

export type TimestampField = "submitted_at" | "created_at" | "approved_at" | "updated_at";

export function isChunkKey(key: RecordKey): key is ChunkKey {
  return key.stage === "chunked";
}

export function isChunkRecord(record: ItemRecord): record is ChunkRecord {
  return record.stage === "chunked";
}

export function keyOf(record: ItemRecord): RecordKey {
  if (isChunkRecord(record)) {
    return { stage: "chunked", filename: record.filename, chunkIndex: record.chunkIndex };
  }
  return { stage: record.stage, filename: record.filename };
}

export function describeKey(key: RecordKey): string {
  if (isChunkKey(key)) {
    return `chunked/${key.filename}#${key.chunkIndex}`;
  }
  return `${key.stage}/${key.filename}`;
}

/** Metadata view shared by both record shapes, used for sorting and lineage. */
export function metadataOf(record: ItemRecord): DocumentMetadata | ChunkData {
  return isChunkRecord(record) ? record.chunk : record.metadata;
}
