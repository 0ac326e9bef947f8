import { randomUUID } from "node:crypto";
import { CurationError, ErrorKind, isCurationError, toIOFailure } from "../errors";
import { recordModeration } from "../metrics";
import type { ContentRecordStore } from "../storage/recordStore";
import {
  ChunkData,
  ChunkKey,
  ChunkRecord,
  DocumentMetadata,
  DocumentRecord,
  DocumentStage,
  ItemRecord,
  MetadataPatch,
  RecordKey,
  STAGES,
  STATUSES,
  Stage,
  Status,
  describeKey,
} from "../types/records";
import { KeyedMutex } from "../utils/keyedMutex";
import { assertSafeFilename, countCharacters } from "../utils/naming";
import { AuditLog, LoggerAuditLog } from "./auditLog";
import { ChunkSequencer } from "./chunkSequencer";

export interface ChunkPayload {
  text: string;
  overlap?: number | null;
}

export type SubmitRequest =
  | {
      stage: "raw";
      filename: string;
      content: string;
      language: string;
      source: string;
      category?: string | null;
      metadata?: MetadataPatch;
      submittedBy?: string;
    }
  | {
      stage: "cleaned";
      filename: string;
      content: string;
      sourceFilename: string;
      language?: string;
      source?: string;
      category?: string | null;
      metadata?: MetadataPatch;
      submittedBy?: string;
    }
  | {
      stage: "chunked";
      sourceFilename: string;
      chunks: ChunkPayload[];
      language?: string;
      category?: string;
      submittedBy?: string;
    };

export type SubmitOutcome =
  | { stage: DocumentStage; record: DocumentRecord }
  | { stage: "chunked"; chunks: ChunkRecord[] };

export interface ApproveOutcome {
  record: ItemRecord;
  alreadyApproved: boolean;
}

export type BatchItemOutcome =
  | { key: RecordKey; ok: true; alreadyApproved: boolean }
  | { key: RecordKey; ok: false; error: { kind: ErrorKind; message: string } };

export interface ApproveAllResult {
  stage: Stage;
  approved: number;
  failed: number;
  items: BatchItemOutcome[];
}

export interface RecordChanges {
  /** Body for raw/cleaned records, text for chunks. */
  content?: string;
  metadata?: MetadataPatch;
}

export interface ChunkGroup {
  sourceFilename: string;
  chunks: ChunkRecord[];
}

export type StageCounts = Record<Status, number>;

export interface CurationStats {
  raw: StageCounts;
  cleaned: StageCounts;
  chunked: StageCounts;
  totals: StageCounts;
}

export interface DanglingLineage {
  stage: "cleaned" | "chunked";
  status: Status;
  filename: string;
  chunkCount?: number;
  upstream: { stage: DocumentStage; filename: string };
}

export interface StagingStateMachineOptions {
  store: ContentRecordStore;
  sequencer?: ChunkSequencer;
  audit?: AuditLog;
  now?: () => Date;
  idFactory?: () => string;
}

const DOCUMENT_IDENTITY_FIELDS = [
  "id",
  "filename",
  "stage",
  "status",
  "source_filename",
  "content_length",
  "created_at",
  "submitted_at",
  "submitted_by",
  "approved_at",
  "approved_by",
  "updated_at",
  "updated_by",
];

const CHUNK_IDENTITY_FIELDS = [
  "id",
  "chunk_id",
  "chunk_index",
  "source_filename",
  "status",
  "text",
  "char_count",
  "created_at",
  "submitted_at",
  "submitted_by",
  "approved_at",
  "approved_by",
  "updated_at",
  "updated_by",
];

function requireText(value: string, field: string) {
  if (value.trim().length === 0) {
    throw new CurationError("InvalidInput", `${field} must not be empty`, { field });
  }
  return value;
}

function optionalString(patch: MetadataPatch, field: string): string | undefined {
  const value = patch[field];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new CurationError("InvalidInput", `${field} must be a non-empty string`, { field });
  }
  return value;
}

function nullableString(patch: MetadataPatch, field: string): string | null {
  return patch[field] === null ? null : optionalString(patch, field) ?? null;
}

function parseOverlap(value: unknown): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new CurationError("InvalidInput", "overlap must be a non-negative integer or null", { field: "overlap" });
  }
  return value;
}

/**
 * Moderation rules over the record store: pending -> approved, pending -> rejected,
 * lineage between stages. Approved records are never edited in place.
 */
export class StagingStateMachine {
  private readonly store: ContentRecordStore;
  private readonly sequencer: ChunkSequencer;
  private readonly audit: AuditLog;
  private readonly now: () => Date;
  private readonly idFactory: () => string;
  // per-record lock so update/approve/reject never interleave on one item
  private readonly recordLocks = new KeyedMutex();

  constructor(options: StagingStateMachineOptions) {
    this.store = options.store;
    this.sequencer = options.sequencer ?? new ChunkSequencer(options.store);
    this.audit = options.audit ?? new LoggerAuditLog();
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  async submit(request: SubmitRequest): Promise<SubmitOutcome> {
    if (request.stage === "chunked") {
      return { stage: "chunked", chunks: await this.submitChunks(request) };
    }
    const record = request.stage === "raw" ? await this.buildRaw(request) : await this.buildCleaned(request);
    const key = { stage: request.stage, filename: record.filename };
    await this.assertNotTaken(key);
    try {
      await this.store.put(record);
    } catch (error) {
      // lost a race with another submission of the same filename
      if (isCurationError(error, "Conflict")) {
        throw this.duplicatePending(key);
      }
      throw error;
    }
    recordModeration(request.stage, "submit");
    return { stage: request.stage, record };
  }

  async approve(key: RecordKey, actor: string): Promise<ApproveOutcome> {
    return this.exclusive(key, async () => {
      const stamp = this.now().toISOString();
      try {
        const record = await this.store.move(key, "pending", "approved", {
          approved_at: stamp,
          approved_by: actor,
        });
        this.audit.record({ action: "approve", key, actor });
        recordModeration(key.stage, "approve");
        return { record, alreadyApproved: false };
      } catch (error) {
        if (!isCurationError(error, "NotFound")) {
          throw error;
        }
        const approved = await this.store.find("approved", key);
        if (!approved) {
          throw new CurationError("NotFound", `No pending or approved record for ${describeKey(key)}`, { ...key });
        }
        return { record: approved, alreadyApproved: true };
      }
    });
  }

  async reject(key: RecordKey, reason: string, actor: string) {
    return this.exclusive(key, async () => {
      const record = await this.store.get("pending", key);
      await this.store.delete("pending", key);
      this.audit.record({ action: "reject", key, actor, reason });
      recordModeration(key.stage, "reject");
      return record;
    });
  }

  async approveAll(stage: Stage, filename: string | undefined, actor: string): Promise<ApproveAllResult> {
    let keys: RecordKey[];
    if (stage === "chunked") {
      if (!filename) {
        throw new CurationError("InvalidInput", "Approving chunks requires the source filename", { stage });
      }
      const chunks = await this.store.listChunks("pending", filename);
      keys = chunks.map((chunk) => chunkKey(chunk.filename, chunk.chunkIndex));
    } else {
      const documentStage = stage;
      const records = await this.store.list(documentStage, "pending");
      keys = records
        .filter((record) => !filename || record.filename === filename)
        .map((record) => documentKey(documentStage, record.filename));
    }

    const items: BatchItemOutcome[] = [];
    for (const key of keys) {
      try {
        const outcome = await this.approve(key, actor);
        items.push({ key, ok: true, alreadyApproved: outcome.alreadyApproved });
      } catch (error) {
        const failure = toIOFailure(error, `Failed to approve ${describeKey(key)}`);
        items.push({ key, ok: false, error: { kind: failure.kind, message: failure.message } });
      }
    }
    const approved = items.filter((item) => item.ok).length;
    return { stage, approved, failed: items.length - approved, items };
  }

  async update(key: RecordKey, changes: RecordChanges, actor: string) {
    return this.exclusive(key, async () => {
      const current = await this.store.find("pending", key);
      if (!current) {
        if (await this.store.find("approved", key)) {
          throw new CurationError("InvalidState", `${describeKey(key)} is approved and can no longer be edited`, {
            ...key,
          });
        }
        throw new CurationError("NotFound", `No pending record for ${describeKey(key)}`, { ...key });
      }
      const stamp = { updated_at: this.now().toISOString(), updated_by: actor };
      const updated =
        current.stage === "chunked"
          ? this.editChunk(current, changes, stamp)
          : this.editDocument(current, changes, stamp);
      await this.store.put(updated, { replace: true });
      this.audit.record({
        action: "update",
        key,
        actor,
        details: { fields: Object.keys(changes.metadata ?? {}), content: changes.content !== undefined },
      });
      recordModeration(key.stage, "update");
      return updated;
    });
  }

  async list(stage: Stage, status: Status) {
    return this.store.list(stage, status, { orderBy: status === "approved" ? "approved_at" : "submitted_at" });
  }

  async get(status: Status, key: RecordKey) {
    return this.store.get(status, key);
  }

  async listChunkGroups(status: Status): Promise<ChunkGroup[]> {
    const sources = await this.store.listChunkSources(status);
    const groups: ChunkGroup[] = [];
    for (const sourceFilename of sources) {
      const chunks = await this.store.listChunks(status, sourceFilename);
      if (chunks.length > 0) {
        groups.push({ sourceFilename, chunks });
      }
    }
    return groups;
  }

  async stats(): Promise<CurationStats> {
    const counts = async (stage: Stage, status: Status) => {
      if (stage !== "chunked") {
        return (await this.store.list(stage, status)).length;
      }
      const groups = await this.listChunkGroups(status);
      return groups.reduce((total, group) => total + group.chunks.length, 0);
    };
    const result: CurationStats = {
      raw: { pending: 0, approved: 0 },
      cleaned: { pending: 0, approved: 0 },
      chunked: { pending: 0, approved: 0 },
      totals: { pending: 0, approved: 0 },
    };
    for (const stage of STAGES) {
      for (const status of STATUSES) {
        const count = await counts(stage, status);
        result[stage][status] = count;
        result.totals[status] += count;
      }
    }
    return result;
  }

  /** Cleaned records and chunk groups whose approved upstream record is gone. */
  async findDanglingLineage(): Promise<DanglingLineage[]> {
    const approvedRaw = new Set((await this.store.list("raw", "approved")).map((record) => record.filename));
    const approvedCleaned = new Set(
      (await this.store.list("cleaned", "approved")).map((record) => record.filename),
    );
    const dangling: DanglingLineage[] = [];
    for (const status of STATUSES) {
      for (const record of await this.store.list("cleaned", status)) {
        const upstream = record.stage === "cleaned" ? record.metadata.source_filename : null;
        if (upstream && !approvedRaw.has(upstream)) {
          dangling.push({
            stage: "cleaned",
            status,
            filename: record.filename,
            upstream: { stage: "raw", filename: upstream },
          });
        }
      }
      for (const group of await this.listChunkGroups(status)) {
        if (!approvedCleaned.has(group.sourceFilename)) {
          dangling.push({
            stage: "chunked",
            status,
            filename: group.sourceFilename,
            chunkCount: group.chunks.length,
            upstream: { stage: "cleaned", filename: group.sourceFilename },
          });
        }
      }
    }
    return dangling;
  }

  private async buildRaw(request: Extract<SubmitRequest, { stage: "raw" }>): Promise<DocumentRecord> {
    assertSafeFilename(request.filename);
    const content = requireText(request.content, "content");
    return this.documentRecord("raw", request.filename, content, request.metadata, {
      language: requireText(request.language, "language"),
      source: requireText(request.source, "source"),
      category: request.category ?? null,
      source_filename: null,
      submitted_by: request.submittedBy ?? null,
    });
  }

  private async buildCleaned(request: Extract<SubmitRequest, { stage: "cleaned" }>): Promise<DocumentRecord> {
    assertSafeFilename(request.filename);
    const content = requireText(request.content, "content");
    const upstream = await this.resolveUpstream("raw", request.sourceFilename);
    return this.documentRecord("cleaned", request.filename, content, request.metadata, {
      language: request.language ?? upstream.metadata.language,
      source: request.source ?? upstream.metadata.source,
      category: request.category ?? upstream.metadata.category ?? null,
      source_filename: request.sourceFilename,
      submitted_by: request.submittedBy ?? null,
    });
  }

  private documentRecord(
    stage: DocumentStage,
    filename: string,
    content: string,
    extra: MetadataPatch | undefined,
    fields: Pick<DocumentMetadata, "language" | "source" | "category" | "source_filename" | "submitted_by">,
  ): DocumentRecord {
    const stamp = this.now().toISOString();
    const metadata: DocumentMetadata = {
      ...extra,
      ...fields,
      id: this.idFactory(),
      filename,
      stage,
      status: "pending",
      content_length: countCharacters(content),
      created_at: stamp,
      submitted_at: stamp,
    };
    return { stage, status: "pending", filename, content, metadata };
  }

  /**
   * Record lock for every key. Chunk keys also take the sequencer's source lock first, so a
   * move never lands between the two listings that compute the next index.
   */
  private async exclusive<T>(key: RecordKey, fn: () => Promise<T>): Promise<T> {
    const run = () => this.recordLocks.runExclusive(describeKey(key), fn);
    return key.stage === "chunked" ? this.sequencer.runExclusive(key.filename, run) : run();
  }

  private async submitChunks(request: Extract<SubmitRequest, { stage: "chunked" }>) {
    const source = assertSafeFilename(request.sourceFilename, "sourceFilename");
    if (request.chunks.length === 0) {
      throw new CurationError("InvalidInput", "At least one chunk is required", { field: "chunks" });
    }
    request.chunks.forEach((chunk, position) => requireText(chunk.text, `chunks[${position}].text`));
    const upstream = await this.resolveUpstream("cleaned", source);
    const language = request.language ?? upstream.metadata.language;
    const category = request.category ?? upstream.metadata.category ?? upstream.metadata.source;
    const stamp = this.now().toISOString();

    const chunks = await this.sequencer.submitBatch(source, request.chunks, (payload, index): ChunkRecord => {
      const chunk: ChunkData = {
        id: this.idFactory(),
        chunk_id: ChunkSequencer.chunkId(language, category, source, index),
        chunk_index: index,
        source_filename: source,
        language,
        category,
        text: payload.text,
        char_count: countCharacters(payload.text),
        overlap: payload.overlap ?? null,
        status: "pending",
        created_at: stamp,
        submitted_at: stamp,
        submitted_by: request.submittedBy ?? null,
      };
      return { stage: "chunked", status: "pending", filename: source, chunkIndex: index, chunk };
    });
    recordModeration("chunked", "submit");
    return chunks;
  }

  private async resolveUpstream(stage: DocumentStage, filename: string): Promise<DocumentRecord> {
    assertSafeFilename(filename, "sourceFilename");
    const upstream = await this.store.find("approved", { stage, filename });
    if (!upstream || upstream.stage === "chunked") {
      throw new CurationError(
        "LineageUnresolved",
        `Source "${filename}" has no approved ${stage} record`,
        { stage, sourceFilename: filename },
      );
    }
    return upstream;
  }

  private async assertNotTaken(key: RecordKey) {
    if (await this.store.find("pending", key)) {
      throw this.duplicatePending(key);
    }
    if (await this.store.find("approved", key)) {
      throw new CurationError(
        "Conflict",
        `${describeKey(key)} is already approved; delete it before submitting again`,
        { ...key },
      );
    }
  }

  private duplicatePending(key: RecordKey) {
    return new CurationError("DuplicatePending", `${describeKey(key)} is already pending review`, { ...key });
  }

  private editDocument(current: DocumentRecord, changes: RecordChanges, stamp: MetadataPatch): DocumentRecord {
    const patch = this.editablePatch(current.metadata, changes.metadata, DOCUMENT_IDENTITY_FIELDS);
    const content = changes.content === undefined ? current.content : requireText(changes.content, "content");
    const metadata: DocumentMetadata = {
      ...current.metadata,
      ...patch,
      ...stamp,
      language: optionalString(patch, "language") ?? current.metadata.language,
      source: optionalString(patch, "source") ?? current.metadata.source,
      category: "category" in patch ? nullableString(patch, "category") : current.metadata.category,
      content_length: countCharacters(content),
    };
    return { ...current, content, metadata };
  }

  private editChunk(current: ChunkRecord, changes: RecordChanges, stamp: MetadataPatch): ChunkRecord {
    const patch = this.editablePatch(current.chunk, changes.metadata, CHUNK_IDENTITY_FIELDS);
    const language = optionalString(patch, "language") ?? current.chunk.language;
    const category = optionalString(patch, "category") ?? current.chunk.category;
    const overlap = "overlap" in patch ? parseOverlap(patch.overlap) : current.chunk.overlap;
    const text = changes.content === undefined ? current.chunk.text : requireText(changes.content, "text");
    const chunk: ChunkData = {
      ...current.chunk,
      ...patch,
      ...stamp,
      language,
      category,
      overlap,
      text,
      char_count: countCharacters(text),
      chunk_id: ChunkSequencer.chunkId(language, category, current.filename, current.chunkIndex),
    };
    return { ...current, chunk };
  }

  /** Drops identity fields sent back unchanged; changing one is an error. */
  private editablePatch(current: DocumentMetadata | ChunkData, patch: MetadataPatch = {}, identity: string[]) {
    const editable: MetadataPatch = {};
    for (const [field, value] of Object.entries(patch)) {
      if (!identity.includes(field)) {
        editable[field] = value;
        continue;
      }
      // an absent field and an explicit null are the same value
      if ((value ?? null) !== (current[field] ?? null)) {
        throw new CurationError("InvalidInput", `${field} cannot be changed`, { field });
      }
    }
    return editable;
  }
}

export function chunkKey(sourceFilename: string, chunkIndex: number): ChunkKey {
  return { stage: "chunked", filename: sourceFilename, chunkIndex };
}

export function documentKey(stage: DocumentStage, filename: string): RecordKey {
  return { stage, filename };
}
