import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { logger } from "../logger";
import { CurationError, toIOFailure } from "../errors";
import {
  ChunkRecord,
  DocumentRecord,
  ItemRecord,
  MetadataPatch,
  RecordKey,
  Stage,
  Status,
  describeKey,
  isChunkKey,
  keyOf,
} from "../types/records";
import { assertSafeFilename, chunkFileName, isSafeFilename, parseChunkFileName } from "../utils/naming";
import {
  isErrnoException,
  pathExists,
  readDirSafe,
  readJson,
  removeDirIfEmpty,
  writeFileAtomic,
  writeJsonAtomic,
} from "./atomicFile";
import {
  ContentRecordStore,
  ListOptions,
  PutOptions,
  alreadyExists,
  applyPatch,
  notFound,
  sortByTimestamp,
} from "./recordStore";
import { JournalEntry, chunkDataSchema, documentMetadataSchema, journalEntrySchema } from "./schemas";

const CONTENT_FILE = "content.txt";
const METADATA_FILE = "metadata.json";

export interface FileRecordStoreOptions {
  pendingDir: string;
  approvedDir: string;
  /** Write-ahead journal for moves; keep it on the same volume as approvedDir. */
  journalDir: string;
}

/**
 * Directory-per-record layout:
 *   <status>/<raw|cleaned>/<filename>/{content.txt,metadata.json}
 *   <status>/chunked/<source>/chunk_NN.json
 * A status change is one rename of the record's directory (or chunk file).
 */
export class FileRecordStore implements ContentRecordStore {
  private readonly log = logger.child({ component: "record-store" });

  constructor(private readonly options: FileRecordStoreOptions) {}

  async put(record: ItemRecord, options: PutOptions = {}) {
    const key = keyOf(record);
    const target = this.locationOf(record.status, key);
    try {
      if (record.stage === "chunked") {
        if (!options.replace && (await pathExists(target))) {
          throw alreadyExists(record.status, key);
        }
        await writeJsonAtomic(target, { ...record.chunk, status: record.status });
        return;
      }
      const metadata = { ...record.metadata, status: record.status };
      if (options.replace && (await pathExists(target))) {
        await writeFileAtomic(path.join(target, CONTENT_FILE), record.content);
        await writeJsonAtomic(path.join(target, METADATA_FILE), metadata);
        return;
      }
      await this.createDocumentDir(record.status, key, target, record.content, metadata);
    } catch (error) {
      throw toIOFailure(error, `Failed to write ${describeKey(key)}`, { status: record.status });
    }
  }

  async find(status: Status, key: RecordKey): Promise<ItemRecord | null> {
    const location = this.locationOf(status, key);
    try {
      if (isChunkKey(key)) {
        const chunk = chunkDataSchema.parse(await readJson(location));
        return {
          stage: "chunked",
          status,
          filename: key.filename,
          chunkIndex: key.chunkIndex,
          chunk: { ...chunk, status },
        };
      }
      const [content, rawMetadata] = await Promise.all([
        fs.readFile(path.join(location, CONTENT_FILE), "utf8"),
        readJson(path.join(location, METADATA_FILE)),
      ]);
      const metadata = documentMetadataSchema.parse(rawMetadata);
      const record: DocumentRecord = {
        stage: key.stage,
        status,
        filename: key.filename,
        content,
        metadata: { ...metadata, status },
      };
      return record;
    } catch (error) {
      if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
        return null;
      }
      throw toIOFailure(error, `Failed to read ${status} ${describeKey(key)}`);
    }
  }

  async get(status: Status, key: RecordKey) {
    const record = await this.find(status, key);
    if (!record) {
      throw notFound(status, key);
    }
    return record;
  }

  async list(stage: Stage, status: Status, options: ListOptions = {}) {
    let records: ItemRecord[] = [];
    if (stage === "chunked") {
      for (const source of await this.listChunkSources(status)) {
        records = records.concat(await this.listChunks(status, source));
      }
    } else {
      const entries = await this.readStageDir(status, stage);
      for (const entry of entries) {
        if (!entry.isDirectory() || !isSafeFilename(entry.name)) {
          continue;
        }
        const record = await this.find(status, { stage, filename: entry.name });
        if (record) {
          records.push(record);
        }
      }
    }
    return sortByTimestamp(records, options.orderBy ?? "submitted_at");
  }

  async listChunkSources(status: Status) {
    const entries = await this.readStageDir(status, "chunked");
    return entries
      .filter((entry) => entry.isDirectory() && isSafeFilename(entry.name))
      .map((entry) => entry.name)
      .sort();
  }

  async listChunks(status: Status, source: string) {
    assertSafeFilename(source, "source_filename");
    const dir = path.join(this.stageDir(status, "chunked"), source);
    let entries;
    try {
      entries = await readDirSafe(dir);
    } catch (error) {
      throw toIOFailure(error, `Failed to list chunks for ${source}`);
    }
    const chunks: ChunkRecord[] = [];
    for (const entry of entries) {
      const index = entry.isFile() ? parseChunkFileName(entry.name) : null;
      if (index === null) {
        continue;
      }
      const record = await this.find(status, { stage: "chunked", filename: source, chunkIndex: index });
      if (record && record.stage === "chunked") {
        chunks.push(record);
      }
    }
    return chunks.sort((a, b) => a.chunkIndex - b.chunkIndex);
  }

  async move(key: RecordKey, from: Status, to: Status, patch: MetadataPatch = {}) {
    if (from === to) {
      throw new CurationError("InvalidState", `Cannot move ${describeKey(key)} onto its own status`);
    }
    const current = await this.get(from, key);
    const source = this.locationOf(from, key);
    const target = this.locationOf(to, key);
    if (await pathExists(target)) {
      throw alreadyExists(to, key);
    }
    const updated = applyPatch(current, to, patch);
    const entry: JournalEntry = {
      id: randomUUID(),
      key,
      from,
      to,
      patch,
      phase: "prepared",
      created_at: new Date().toISOString(),
    };

    let sourceRemoved = true;
    try {
      await this.writeJournal(entry);
      await fs.mkdir(path.dirname(target), { recursive: true });
      sourceRemoved = await this.relocate(entry, source, target);
    } catch (error) {
      await this.dropJournal(entry.id);
      throw toIOFailure(error, `Failed to move ${describeKey(key)} from ${from} to ${to}`);
    }

    try {
      await this.writePatchedMetadata(target, updated);
    } catch (error) {
      await this.rollbackMove(entry, source, target, error);
      throw toIOFailure(error, `Failed to stamp ${describeKey(key)} after moving to ${to}`);
    }

    if (sourceRemoved) {
      await this.dropJournal(entry.id);
    }
    if (isChunkKey(key)) {
      await removeDirIfEmpty(path.dirname(source));
    }
    return updated;
  }

  async delete(status: Status, key: RecordKey) {
    const location = this.locationOf(status, key);
    if (!(await pathExists(location))) {
      throw notFound(status, key);
    }
    try {
      await fs.rm(location, { recursive: true, force: true });
      if (isChunkKey(key)) {
        await removeDirIfEmpty(path.dirname(location));
      }
    } catch (error) {
      throw toIOFailure(error, `Failed to delete ${status} ${describeKey(key)}`);
    }
  }

  async deleteChunks(status: Status, source: string) {
    const chunks = await this.listChunks(status, source);
    const dir = path.join(this.stageDir(status, "chunked"), source);
    try {
      await fs.rm(dir, { recursive: true, force: true });
    } catch (error) {
      throw toIOFailure(error, `Failed to delete ${status} chunks for ${source}`);
    }
    return chunks.length;
  }

  async recover() {
    const entries = await readDirSafe(this.options.journalDir);
    let handled = 0;
    for (const file of entries) {
      if (!file.isFile() || !file.name.endsWith(".json")) {
        continue;
      }
      const journalPath = path.join(this.options.journalDir, file.name);
      const parsed = journalEntrySchema.safeParse(await readJson(journalPath).catch(() => null));
      if (!parsed.success) {
        this.log.warn({ journalPath }, "Discarding unreadable move journal entry");
        await fs.rm(journalPath, { force: true });
        continue;
      }
      await this.replay(parsed.data);
      handled += 1;
    }
    return handled;
  }

  private async replay(entry: JournalEntry) {
    const source = this.locationOf(entry.from, entry.key);
    const target = this.locationOf(entry.to, entry.key);
    const [atSource, atTarget] = await Promise.all([pathExists(source), pathExists(target)]);
    const context = { key: entry.key, from: entry.from, to: entry.to, phase: entry.phase };

    if (atTarget && atSource) {
      if (entry.phase === "copied") {
        // cross-volume copy landed; only the source removal was lost
        await fs.rm(source, { recursive: true, force: true });
      } else {
        this.log.error(context, "Record present in both partitions without a completed copy; leaving both");
        await this.dropJournal(entry.id);
        return;
      }
    }
    if (atTarget) {
      const moved = await this.get(entry.to, entry.key);
      await this.writePatchedMetadata(target, applyPatch(moved, entry.to, entry.patch));
      this.log.info(context, "Completed interrupted move");
    } else if (atSource) {
      this.log.info(context, "Interrupted move never relocated the record; discarding journal entry");
    } else {
      this.log.warn(context, "Journaled record is missing from both partitions");
    }
    if (isChunkKey(entry.key)) {
      await removeDirIfEmpty(path.dirname(source));
    }
    await this.dropJournal(entry.id);
  }

  /** Returns false when a cross-volume copy landed but the source could not be removed. */
  private async relocate(entry: JournalEntry, source: string, target: string) {
    try {
      await fs.rename(source, target);
      return true;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== "EXDEV") {
        throw error;
      }
    }
    // Pending and approved live on different volumes: copy beside the target, rename into
    // place, then drop the source. The journal phase tells recover() which side is authoritative.
    const staging = path.join(path.dirname(target), `.staging-${entry.id}`);
    try {
      await fs.cp(source, staging, { recursive: true });
      await fs.rename(staging, target);
    } catch (error) {
      await fs.rm(staging, { recursive: true, force: true });
      throw error;
    }
    await this.writeJournal({ ...entry, phase: "copied" });
    try {
      await fs.rm(source, { recursive: true, force: true });
      return true;
    } catch (error) {
      this.log.error({ key: entry.key, error }, "Copied record across volumes but could not remove the source");
      return false;
    }
  }

  private async rollbackMove(entry: JournalEntry, source: string, target: string, cause: unknown) {
    try {
      await fs.mkdir(path.dirname(source), { recursive: true });
      await fs.rename(target, source);
      await this.dropJournal(entry.id);
    } catch (error) {
      this.log.error(
        { key: entry.key, cause: String(cause), error },
        "Could not roll back move; journal entry kept for recovery",
      );
    }
  }

  private async writePatchedMetadata(target: string, record: ItemRecord) {
    if (record.stage === "chunked") {
      await writeJsonAtomic(target, record.chunk);
      return;
    }
    await writeJsonAtomic(path.join(target, METADATA_FILE), record.metadata);
  }

  private async createDocumentDir(
    status: Status,
    key: RecordKey,
    target: string,
    content: string,
    metadata: Record<string, unknown>,
  ) {
    const parent = path.dirname(target);
    const staging = path.join(parent, `.staging-${randomUUID()}`);
    await fs.mkdir(staging, { recursive: true });
    try {
      await writeFileAtomic(path.join(staging, CONTENT_FILE), content);
      await writeJsonAtomic(path.join(staging, METADATA_FILE), metadata);
      if (await pathExists(target)) {
        throw alreadyExists(status, key);
      }
      await fs.rename(staging, target);
    } catch (error) {
      await fs.rm(staging, { recursive: true, force: true });
      if (isErrnoException(error) && (error.code === "ENOTEMPTY" || error.code === "EEXIST")) {
        throw alreadyExists(status, key);
      }
      throw error;
    }
  }

  private async writeJournal(entry: JournalEntry) {
    await writeJsonAtomic(path.join(this.options.journalDir, `${entry.id}.json`), entry);
  }

  private async dropJournal(id: string) {
    await fs.rm(path.join(this.options.journalDir, `${id}.json`), { force: true });
  }

  private async readStageDir(status: Status, stage: Stage) {
    try {
      return await readDirSafe(this.stageDir(status, stage));
    } catch (error) {
      throw toIOFailure(error, `Failed to list ${status}/${stage}`);
    }
  }

  private stageDir(status: Status, stage: Stage) {
    const root = status === "pending" ? this.options.pendingDir : this.options.approvedDir;
    return path.join(root, stage);
  }

  private locationOf(status: Status, key: RecordKey) {
    assertSafeFilename(key.filename);
    if (isChunkKey(key) && (!Number.isInteger(key.chunkIndex) || key.chunkIndex < 0)) {
      throw new CurationError("InvalidInput", `Invalid chunk index ${key.chunkIndex}`);
    }
    const dir = path.join(this.stageDir(status, key.stage), key.filename);
    if (isChunkKey(key)) {
      return path.join(dir, chunkFileName(key.chunkIndex));
    }
    return dir;
  }
}
