import { RecordKey, Stage } from "./records";

export interface PushLedgerEntry {
  stage: Stage;
  filename: string;
  chunk_index: number | null;
  pushed: boolean;
  remote_ref: string | null;
  last_error: string | null;
  attempts: number;
  pushed_at: string | null;
  updated_at: string;
}

export interface LedgerFilter {
  stage?: Stage;
  filename?: string;
}

/**
 * Which approved items have been published. Persisted apart from the record store;
 * only the publish synchronizer writes to it.
 */
export interface PushLedger {
  get(key: RecordKey): Promise<PushLedgerEntry | null>;
  list(filter?: LedgerFilter): Promise<PushLedgerEntry[]>;
  markPushed(key: RecordKey, remoteRef: string): Promise<PushLedgerEntry>;
  markFailed(key: RecordKey, reason: string): Promise<PushLedgerEntry>;
  discard(key: RecordKey): Promise<boolean>;
  /** Drops every entry for a stage/filename pair (all chunk indices for chunked). */
  discardFile(stage: Stage, filename: string): Promise<number>;
}

export function ledgerKey(key: RecordKey) {
  return key.stage === "chunked" ? `chunked:${key.filename}:${key.chunkIndex}` : `${key.stage}:${key.filename}`;
}

export function entryKey(entry: PushLedgerEntry): RecordKey {
  if (entry.stage === "chunked") {
    return { stage: "chunked", filename: entry.filename, chunkIndex: entry.chunk_index ?? 0 };
  }
  return { stage: entry.stage, filename: entry.filename };
}
