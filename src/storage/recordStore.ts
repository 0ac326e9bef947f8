import { CurationError } from "../errors";
import {
  ItemRecord,
  MetadataPatch,
  RecordKey,
  Stage,
  Status,
  TimestampField,
  ChunkRecord,
  describeKey,
  metadataOf,
} from "../types/records";

export interface PutOptions {
  /** Overwrite an existing record instead of failing with Conflict. */
  replace?: boolean;
}

export interface ListOptions {
  orderBy?: TimestampField;
}

/**
 * Durable storage for item records, partitioned by status and stage.
 * Knows nothing about lineage or moderation rules.
 */
export interface ContentRecordStore {
  put(record: ItemRecord, options?: PutOptions): Promise<void>;
  find(status: Status, key: RecordKey): Promise<ItemRecord | null>;
  get(status: Status, key: RecordKey): Promise<ItemRecord>;
  list(stage: Stage, status: Status, options?: ListOptions): Promise<ItemRecord[]>;
  listChunks(status: Status, source: string): Promise<ChunkRecord[]>;
  listChunkSources(status: Status): Promise<string[]>;
  /**
   * Relocates a record between statuses as one step. The patch is merged into the
   * record's metadata as part of the move. A failed move leaves the record where it was.
   */
  move(key: RecordKey, from: Status, to: Status, patch?: MetadataPatch): Promise<ItemRecord>;
  delete(status: Status, key: RecordKey): Promise<void>;
  deleteChunks(status: Status, source: string): Promise<number>;
  /** Completes or rolls back moves interrupted by a crash. Returns the number of journal entries handled. */
  recover(): Promise<number>;
}

export function notFound(status: Status, key: RecordKey) {
  return new CurationError("NotFound", `No ${status} record for ${describeKey(key)}`, {
    status,
    ...key,
  });
}

export function alreadyExists(status: Status, key: RecordKey) {
  return new CurationError("Conflict", `A ${status} record already exists for ${describeKey(key)}`, {
    status,
    ...key,
  });
}

export function applyPatch(record: ItemRecord, status: Status, patch: MetadataPatch = {}): ItemRecord {
  if (record.stage === "chunked") {
    return { ...record, status, chunk: Object.assign({}, record.chunk, patch, { status }) };
  }
  return { ...record, status, metadata: Object.assign({}, record.metadata, patch, { status }) };
}

/** Descending by the timestamp field; records without it sort last, ties by filename then index. */
export function sortByTimestamp(records: ItemRecord[], field: TimestampField) {
  const stamp = (record: ItemRecord) => {
    const value = metadataOf(record)[field];
    return typeof value === "string" ? Date.parse(value) : Number.NaN;
  };
  return [...records].sort((a, b) => {
    const left = stamp(a);
    const right = stamp(b);
    const leftMissing = Number.isNaN(left);
    const rightMissing = Number.isNaN(right);
    if (leftMissing !== rightMissing) {
      return leftMissing ? 1 : -1;
    }
    if (!leftMissing && left !== right) {
      return right - left;
    }
    const byName = a.filename.localeCompare(b.filename);
    if (byName !== 0) {
      return byName;
    }
    const aIndex = a.stage === "chunked" ? a.chunkIndex : 0;
    const bIndex = b.stage === "chunked" ? b.chunkIndex : 0;
    return aIndex - bIndex;
  });
}
