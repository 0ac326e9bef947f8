import { CurationError, ErrorKind, errorMessage, isCurationError } from "../errors";
import { logger } from "../logger";
import { recordModeration, recordPublish, syncDurationHistogram } from "../metrics";
import type { ContentRecordStore } from "../storage/recordStore";
import { PushLedger, PushLedgerEntry, entryKey, ledgerKey } from "../types/ledger";
import {
  ChunkRecord,
  DocumentRecord,
  DocumentStage,
  ItemRecord,
  RecordKey,
  STAGES,
  Stage,
  describeKey,
  keyOf,
} from "../types/records";
import { mapWithConcurrency } from "../utils/concurrency";
import { assertSafeFilename } from "../utils/naming";
import { withTimeout } from "../utils/timeout";
import type { AuditLog } from "./auditLog";
import { classifyRemoteError, DatasetStoreClient } from "./datasetStoreClient";
import type { DanglingLineage, StagingStateMachine } from "./stagingStateMachine";

export interface SyncScope {
  stage?: Stage;
  filename?: string;
}

export interface SyncFailure {
  stage: Stage;
  filename: string;
  chunkIndex: number | null;
  chunkId: string | null;
  kind: ErrorKind;
  message: string;
}

export interface StageSyncResult {
  uploaded: number;
  skipped: number;
  failed: number;
  /** Filenames (or chunk ids) uploaded during this run. */
  files: string[];
  failures: SyncFailure[];
}

export interface SyncResult {
  stages: Record<Stage, StageSyncResult>;
  failedChunks: string[];
  totals: { uploaded: number; skipped: number; failed: number };
  durationMs: number;
}

export type DeleteScope = "raw" | "cleaned" | "chunks" | "all";

export interface DeleteApprovedResult {
  filename: string;
  deleted: Array<"raw" | "cleaned" | "chunks">;
  chunksDeleted: number;
  ledgerEntriesDiscarded: number;
  dangling: DanglingLineage[];
}

export interface ApprovedFileSummary {
  filename: string;
  raw: boolean;
  rawPushed: boolean;
  cleaned: boolean;
  cleanedPushed: boolean;
  chunks: number;
  chunksPushed: number;
}

export interface PublishSynchronizerOptions {
  store: ContentRecordStore;
  ledger: PushLedger;
  client: DatasetStoreClient;
  lineage: Pick<StagingStateMachine, "findDanglingLineage">;
  audit: AuditLog;
  timeoutMs: number;
  concurrency: number;
}

type UnitOutcome =
  | { record: ItemRecord; outcome: "uploaded" | "skipped" }
  | { record: ItemRecord; outcome: "failed"; error: CurationError };

function emptyStage(): StageSyncResult {
  return { uploaded: 0, skipped: 0, failed: 0, files: [], failures: [] };
}

function labelOf(record: ItemRecord) {
  return record.stage === "chunked" ? record.chunk.chunk_id : record.filename;
}

function asRemoteFailure(error: unknown) {
  if (isCurationError(error)) {
    return error;
  }
  return new CurationError(classifyRemoteError(error), errorMessage(error), undefined, { cause: error });
}

/**
 * Pushes approved records to the dataset store. The ledger is the only memory of what
 * was published: an item is marked pushed after every artifact it owns was accepted,
 * so re-running a sync retries exactly the items that did not make it.
 */
export class PublishSynchronizer {
  private readonly log = logger.child({ component: "publish" });

  constructor(private readonly options: PublishSynchronizerOptions) {}

  async syncAll(scope: SyncScope = {}): Promise<SyncResult> {
    const started = Date.now();
    const stopTimer = syncDurationHistogram.startTimer();
    const records = await this.enumerate(scope);
    const outcomes = await mapWithConcurrency(records, this.options.concurrency, (record) => this.syncUnit(record));
    stopTimer();

    const result: SyncResult = {
      stages: { raw: emptyStage(), cleaned: emptyStage(), chunked: emptyStage() },
      failedChunks: [],
      totals: { uploaded: 0, skipped: 0, failed: 0 },
      durationMs: 0,
    };
    for (const unit of outcomes) {
      const stage = result.stages[unit.record.stage];
      stage[unit.outcome] += 1;
      result.totals[unit.outcome] += 1;
      if (unit.outcome === "uploaded") {
        stage.files.push(labelOf(unit.record));
      }
      if (unit.outcome === "failed") {
        const chunk = unit.record.stage === "chunked" ? unit.record : null;
        stage.failures.push({
          stage: unit.record.stage,
          filename: unit.record.filename,
          chunkIndex: chunk ? chunk.chunkIndex : null,
          chunkId: chunk ? chunk.chunk.chunk_id : null,
          kind: unit.error.kind,
          message: unit.error.message,
        });
        if (chunk) {
          result.failedChunks.push(chunk.chunk.chunk_id);
        }
      }
    }
    result.durationMs = Date.now() - started;
    this.log.info({ scope, totals: result.totals, durationMs: result.durationMs }, "Publish sync finished");
    return result;
  }

  async deleteApproved(filename: string, scope: DeleteScope, actor: string): Promise<DeleteApprovedResult> {
    assertSafeFilename(filename);
    const result: DeleteApprovedResult = {
      filename,
      deleted: [],
      chunksDeleted: 0,
      ledgerEntriesDiscarded: 0,
      dangling: [],
    };
    const { store, ledger, audit } = this.options;

    for (const stage of ["raw", "cleaned"] as const) {
      if (scope !== stage && scope !== "all") {
        continue;
      }
      const key: RecordKey = { stage, filename };
      if (!(await store.find("approved", key))) {
        continue;
      }
      // ledger first: a leftover entry would make a resubmitted file look published
      result.ledgerEntriesDiscarded += await ledger.discardFile(stage, filename);
      await store.delete("approved", key);
      result.deleted.push(stage);
      audit.record({ action: "delete", key, actor });
      recordModeration(stage, "delete");
    }

    if (scope === "chunks" || scope === "all") {
      result.ledgerEntriesDiscarded += await ledger.discardFile("chunked", filename);
      result.chunksDeleted = await store.deleteChunks("approved", filename);
      if (result.chunksDeleted > 0) {
        result.deleted.push("chunks");
        audit.record({
          action: "delete",
          key: { stage: "chunked", filename },
          actor,
          details: { chunks: result.chunksDeleted },
        });
        recordModeration("chunked", "delete");
      }
    }

    if (result.deleted.length === 0) {
      throw new CurationError("NotFound", `Nothing approved to delete for "${filename}" (${scope})`, {
        filename,
        scope,
      });
    }

    const removedUpstream = new Set<DocumentStage>(
      result.deleted.filter((stage): stage is DocumentStage => stage === "raw" || stage === "cleaned"),
    );
    const dangling = await this.options.lineage.findDanglingLineage();
    result.dangling = dangling.filter(
      (entry) => entry.upstream.filename === filename && removedUpstream.has(entry.upstream.stage),
    );
    this.log.info({ filename, deleted: result.deleted, dangling: result.dangling.length }, "Deleted approved records");
    return result;
  }

  async approvedFiles(): Promise<ApprovedFileSummary[]> {
    const { store, ledger } = this.options;
    const pushed = new Map<string, PushLedgerEntry>();
    for (const entry of await ledger.list()) {
      if (entry.pushed) {
        pushed.set(ledgerKey(entryKey(entry)), entry);
      }
    }
    const files = new Map<string, ApprovedFileSummary>();
    const summaryFor = (filename: string) => {
      let summary = files.get(filename);
      if (!summary) {
        summary = {
          filename,
          raw: false,
          rawPushed: false,
          cleaned: false,
          cleanedPushed: false,
          chunks: 0,
          chunksPushed: 0,
        };
        files.set(filename, summary);
      }
      return summary;
    };

    for (const record of await store.list("raw", "approved")) {
      const summary = summaryFor(record.filename);
      summary.raw = true;
      summary.rawPushed = pushed.has(ledgerKey(keyOf(record)));
    }
    for (const record of await store.list("cleaned", "approved")) {
      const summary = summaryFor(record.filename);
      summary.cleaned = true;
      summary.cleanedPushed = pushed.has(ledgerKey(keyOf(record)));
    }
    for (const source of await store.listChunkSources("approved")) {
      const chunks = await store.listChunks("approved", source);
      if (chunks.length === 0) {
        continue;
      }
      const summary = summaryFor(source);
      summary.chunks = chunks.length;
      summary.chunksPushed = chunks.filter((chunk) => pushed.has(ledgerKey(keyOf(chunk)))).length;
    }
    return [...files.values()].sort((a, b) => a.filename.localeCompare(b.filename));
  }

  /** Drops ledger entries whose approved record is gone. */
  async pruneLedger() {
    const { store, ledger } = this.options;
    let pruned = 0;
    for (const entry of await ledger.list()) {
      const key = entryKey(entry);
      if (!(await store.find("approved", key))) {
        if (await ledger.discard(key)) {
          pruned += 1;
        }
      }
    }
    if (pruned > 0) {
      this.log.info({ pruned }, "Pruned stale push ledger entries");
    }
    return pruned;
  }

  async publishedUrl(stage: DocumentStage, filename: string, expiresInSeconds?: number) {
    const key: RecordKey = { stage, filename };
    const entry = await this.options.ledger.get(key);
    if (!entry?.pushed) {
      throw new CurationError("NotFound", `${describeKey(key)} has not been published`, { stage, filename });
    }
    return this.options.client.getDownloadUrl(stage, filename, expiresInSeconds);
  }

  /** Objects currently in the dataset store under a stage's prefix. */
  async remoteFiles(stage: Stage) {
    const { client, timeoutMs } = this.options;
    return withTimeout(`listFiles ${stage}`, timeoutMs, (signal) => client.listFiles(stage, { signal }));
  }

  async remoteContent(stage: DocumentStage, filename: string) {
    assertSafeFilename(filename);
    const { client, timeoutMs } = this.options;
    return withTimeout(`downloadContent ${stage}/${filename}`, timeoutMs, (signal) =>
      client.downloadContent(stage, filename, { signal }),
    );
  }

  private async enumerate(scope: SyncScope): Promise<ItemRecord[]> {
    const { store } = this.options;
    if (scope.filename) {
      assertSafeFilename(scope.filename);
    }
    const records: ItemRecord[] = [];
    for (const stage of STAGES) {
      if (scope.stage && scope.stage !== stage) {
        continue;
      }
      if (stage !== "chunked") {
        const approved = await store.list(stage, "approved", { orderBy: "approved_at" });
        records.push(...approved.filter((record) => !scope.filename || record.filename === scope.filename));
        continue;
      }
      const sources = scope.filename ? [scope.filename] : await store.listChunkSources("approved");
      for (const source of sources) {
        records.push(...(await store.listChunks("approved", source)));
      }
    }
    return records;
  }

  private async syncUnit(record: ItemRecord): Promise<UnitOutcome> {
    const key = keyOf(record);
    try {
      const entry = await this.options.ledger.get(key);
      if (entry?.pushed) {
        recordPublish(record.stage, "skipped");
        return { record, outcome: "skipped" };
      }
    } catch (error) {
      return this.fail(record, asRemoteFailure(error));
    }

    let remoteRef: string;
    try {
      remoteRef = record.stage === "chunked" ? await this.pushChunk(record) : await this.pushDocument(record);
    } catch (error) {
      const failure = asRemoteFailure(error);
      try {
        await this.options.ledger.markFailed(key, `${failure.kind}: ${failure.message}`);
      } catch (ledgerError) {
        this.log.error({ err: ledgerError, key }, "Failed to record push failure");
      }
      return this.fail(record, failure);
    }

    try {
      await this.options.ledger.markPushed(key, remoteRef);
    } catch (error) {
      // uploaded but not recorded: the next sync uploads it again
      return this.fail(record, asRemoteFailure(error));
    }
    recordPublish(record.stage, "uploaded");
    return { record, outcome: "uploaded" };
  }

  private fail(record: ItemRecord, error: CurationError): UnitOutcome {
    recordPublish(record.stage, "failed");
    this.log.warn({ key: describeKey(keyOf(record)), kind: error.kind, err: error }, "Failed to publish item");
    return { record, outcome: "failed", error };
  }

  private async pushDocument(record: DocumentRecord) {
    const { client, timeoutMs } = this.options;
    const label = describeKey(keyOf(record));
    const ref = await withTimeout(`uploadContent ${label}`, timeoutMs, (signal) =>
      client.uploadContent(record.stage, record.filename, record.content, { signal }),
    );
    await withTimeout(`uploadMetadata ${label}`, timeoutMs, (signal) =>
      client.uploadMetadata(record.stage, record.filename, record.metadata, { signal }),
    );
    return ref;
  }

  private async pushChunk(record: ChunkRecord) {
    const { client, timeoutMs } = this.options;
    return withTimeout(`uploadChunk ${record.chunk.chunk_id}`, timeoutMs, (signal) =>
      client.uploadChunk(record.filename, record.chunkIndex, record.chunk, { signal }),
    );
  }
}
