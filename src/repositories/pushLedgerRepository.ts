import type { Pool, QueryResultRow } from "pg";
import { toIOFailure } from "../errors";
import type { RecordKey, Stage } from "../types/records";
import type { LedgerFilter, PushLedger, PushLedgerEntry } from "../types/ledger";

type PushLedgerRow = {
  stage: Stage;
  filename: string;
  chunk_index: number;
  pushed: boolean;
  remote_ref: string | null;
  last_error: string | null;
  attempts: number;
  pushed_at: Date | string | null;
  updated_at: Date | string;
};

// documents share the table with chunks; -1 keeps the primary key free of NULLs
const NO_CHUNK = -1;

function chunkIndexOf(key: RecordKey) {
  return key.stage === "chunked" ? key.chunkIndex : NO_CHUNK;
}

function toIso(value: Date | string) {
  return value instanceof Date ? value.toISOString() : value;
}

export function mapLedgerRow(row: PushLedgerRow): PushLedgerEntry {
  return {
    stage: row.stage,
    filename: row.filename,
    chunk_index: row.chunk_index === NO_CHUNK ? null : row.chunk_index,
    pushed: row.pushed,
    remote_ref: row.remote_ref,
    last_error: row.last_error,
    attempts: row.attempts,
    pushed_at: row.pushed_at === null ? null : toIso(row.pushed_at),
    updated_at: toIso(row.updated_at),
  };
}

export class PgPushLedger implements PushLedger {
  constructor(private readonly pool: Pick<Pool, "query">) {}

  async get(key: RecordKey) {
    const { rows } = await this.run<PushLedgerRow>(
      "SELECT * FROM push_ledger WHERE stage = $1 AND filename = $2 AND chunk_index = $3",
      [key.stage, key.filename, chunkIndexOf(key)],
    );
    return rows[0] ? mapLedgerRow(rows[0]) : null;
  }

  async list(filter: LedgerFilter = {}) {
    const { rows } = await this.run<PushLedgerRow>(
      `SELECT * FROM push_ledger
        WHERE ($1::text IS NULL OR stage = $1)
          AND ($2::text IS NULL OR filename = $2)
        ORDER BY stage, filename, chunk_index`,
      [filter.stage ?? null, filter.filename ?? null],
    );
    return rows.map(mapLedgerRow);
  }

  async markPushed(key: RecordKey, remoteRef: string) {
    const { rows } = await this.run<PushLedgerRow>(
      `INSERT INTO push_ledger (stage, filename, chunk_index, pushed, remote_ref, last_error, attempts, pushed_at, updated_at)
       VALUES ($1, $2, $3, true, $4, NULL, 1, now(), now())
       ON CONFLICT (stage, filename, chunk_index) DO UPDATE
          SET pushed = true,
              remote_ref = EXCLUDED.remote_ref,
              last_error = NULL,
              attempts = push_ledger.attempts + 1,
              pushed_at = now(),
              updated_at = now()
       RETURNING *`,
      [key.stage, key.filename, chunkIndexOf(key), remoteRef],
    );
    return mapLedgerRow(rows[0]);
  }

  async markFailed(key: RecordKey, reason: string) {
    const { rows } = await this.run<PushLedgerRow>(
      `INSERT INTO push_ledger (stage, filename, chunk_index, pushed, remote_ref, last_error, attempts, updated_at)
       VALUES ($1, $2, $3, false, NULL, $4, 1, now())
       ON CONFLICT (stage, filename, chunk_index) DO UPDATE
          SET pushed = false,
              remote_ref = NULL,
              last_error = EXCLUDED.last_error,
              attempts = push_ledger.attempts + 1,
              pushed_at = NULL,
              updated_at = now()
       RETURNING *`,
      [key.stage, key.filename, chunkIndexOf(key), reason],
    );
    return mapLedgerRow(rows[0]);
  }

  async discard(key: RecordKey) {
    const result = await this.run(
      "DELETE FROM push_ledger WHERE stage = $1 AND filename = $2 AND chunk_index = $3",
      [key.stage, key.filename, chunkIndexOf(key)],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async discardFile(stage: Stage, filename: string) {
    const result = await this.run("DELETE FROM push_ledger WHERE stage = $1 AND filename = $2", [
      stage,
      filename,
    ]);
    return result.rowCount ?? 0;
  }

  private async run<R extends QueryResultRow = QueryResultRow>(sql: string, values: unknown[]) {
    try {
      return await this.pool.query<R>(sql, values);
    } catch (error) {
      throw toIOFailure(error, "Push ledger query failed");
    }
  }
}
