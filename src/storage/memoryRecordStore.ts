import {
  ChunkRecord,
  ItemRecord,
  MetadataPatch,
  RecordKey,
  Stage,
  Status,
  STATUSES,
  isChunkKey,
  keyOf,
} from "../types/records";
import { assertSafeFilename } from "../utils/naming";
import {
  ContentRecordStore,
  ListOptions,
  PutOptions,
  alreadyExists,
  applyPatch,
  notFound,
  sortByTimestamp,
} from "./recordStore";

function slot(key: RecordKey) {
  return isChunkKey(key) ? `chunked/${key.filename}/${key.chunkIndex}` : `${key.stage}/${key.filename}`;
}

function clone<T extends ItemRecord>(record: T): T {
  return structuredClone(record);
}

/** Map-backed store for tests and embedded use; moves are synchronous and therefore atomic. */
export class InMemoryRecordStore implements ContentRecordStore {
  private readonly partitions: Record<Status, Map<string, ItemRecord>> = {
    pending: new Map(),
    approved: new Map(),
  };

  async put(record: ItemRecord, options: PutOptions = {}) {
    const key = keyOf(record);
    assertSafeFilename(key.filename);
    const partition = this.partitions[record.status];
    if (!options.replace && partition.has(slot(key))) {
      throw alreadyExists(record.status, key);
    }
    partition.set(slot(key), applyPatch(clone(record), record.status));
  }

  async find(status: Status, key: RecordKey) {
    const record = this.partitions[status].get(slot(key));
    return record ? clone(record) : null;
  }

  async get(status: Status, key: RecordKey) {
    const record = await this.find(status, key);
    if (!record) {
      throw notFound(status, key);
    }
    return record;
  }

  async list(stage: Stage, status: Status, options: ListOptions = {}) {
    const records = [...this.partitions[status].values()].filter((record) => record.stage === stage);
    return sortByTimestamp(records.map(clone), options.orderBy ?? "submitted_at");
  }

  async listChunkSources(status: Status) {
    const sources = new Set<string>();
    for (const record of this.partitions[status].values()) {
      if (record.stage === "chunked") {
        sources.add(record.filename);
      }
    }
    return [...sources].sort();
  }

  async listChunks(status: Status, source: string) {
    const chunks: ChunkRecord[] = [];
    for (const record of this.partitions[status].values()) {
      if (record.stage === "chunked" && record.filename === source) {
        chunks.push(clone(record));
      }
    }
    return chunks.sort((a, b) => a.chunkIndex - b.chunkIndex);
  }

  async move(key: RecordKey, from: Status, to: Status, patch: MetadataPatch = {}) {
    const current = this.partitions[from].get(slot(key));
    if (!current) {
      throw notFound(from, key);
    }
    if (this.partitions[to].has(slot(key))) {
      throw alreadyExists(to, key);
    }
    const updated = applyPatch(current, to, patch);
    this.partitions[from].delete(slot(key));
    this.partitions[to].set(slot(key), updated);
    return clone(updated);
  }

  async delete(status: Status, key: RecordKey) {
    if (!this.partitions[status].delete(slot(key))) {
      throw notFound(status, key);
    }
  }

  async deleteChunks(status: Status, source: string) {
    const chunks = await this.listChunks(status, source);
    for (const chunk of chunks) {
      this.partitions[status].delete(slot(keyOf(chunk)));
    }
    return chunks.length;
  }

  async recover() {
    return 0;
  }

  size(status?: Status) {
    const statuses = status ? [status] : STATUSES;
    return statuses.reduce((total, entry) => total + this.partitions[entry].size, 0);
  }
}
