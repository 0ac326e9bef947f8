import fs from "node:fs/promises";
import { z } from "zod";
import { logger } from "../logger";
import { toIOFailure } from "../errors";
import { RecordKey, Stage } from "../types/records";
import { LedgerFilter, PushLedger, PushLedgerEntry, entryKey, ledgerKey } from "../types/ledger";
import { KeyedMutex } from "../utils/keyedMutex";
import { isErrnoException, readJson, writeJsonAtomic } from "../storage/atomicFile";

const entrySchema = z.object({
  stage: z.enum(["raw", "cleaned", "chunked"]),
  filename: z.string(),
  chunk_index: z.number().int().nullable(),
  pushed: z.boolean(),
  remote_ref: z.string().nullable(),
  last_error: z.string().nullable(),
  attempts: z.number().int().nonnegative(),
  pushed_at: z.string().nullable(),
  updated_at: z.string(),
});

const ledgerFileSchema = z.object({
  version: z.literal(1),
  entries: z.array(entrySchema),
});

const LEDGER_LOCK = "ledger";

/**
 * JSON-file ledger. Every mutation rewrites the whole file with an atomic rename, so a
 * crash leaves either the old or the new ledger. A file that fails to parse is moved
 * aside and the ledger starts empty (items are then re-published, never lost).
 */
export class FilePushLedger implements PushLedger {
  private entries: Map<string, PushLedgerEntry> | null = null;
  private loading: Promise<Map<string, PushLedgerEntry>> | null = null;
  private readonly lock = new KeyedMutex();
  private readonly log = logger.child({ component: "push-ledger" });

  constructor(
    private readonly filePath: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async get(key: RecordKey) {
    const entries = await this.load();
    const entry = entries.get(ledgerKey(key));
    return entry ? { ...entry } : null;
  }

  async list(filter: LedgerFilter = {}) {
    const entries = await this.load();
    return [...entries.values()]
      .filter((entry) => !filter.stage || entry.stage === filter.stage)
      .filter((entry) => !filter.filename || entry.filename === filter.filename)
      .map((entry) => ({ ...entry }));
  }

  async markPushed(key: RecordKey, remoteRef: string) {
    return this.mutate(key, (previous, stamp) => ({
      ...this.blank(key, stamp),
      attempts: (previous?.attempts ?? 0) + 1,
      pushed: true,
      remote_ref: remoteRef,
      pushed_at: stamp,
    }));
  }

  async markFailed(key: RecordKey, reason: string) {
    return this.mutate(key, (previous, stamp) => ({
      ...this.blank(key, stamp),
      attempts: (previous?.attempts ?? 0) + 1,
      last_error: reason,
    }));
  }

  async discard(key: RecordKey) {
    return this.lock.runExclusive(LEDGER_LOCK, async () => {
      const entries = await this.load();
      if (!entries.has(ledgerKey(key))) {
        return false;
      }
      const next = new Map(entries);
      next.delete(ledgerKey(key));
      await this.persist(next);
      return true;
    });
  }

  async discardFile(stage: Stage, filename: string) {
    return this.lock.runExclusive(LEDGER_LOCK, async () => {
      const entries = await this.load();
      const next = new Map(entries);
      for (const [id, entry] of entries) {
        if (entry.stage === stage && entry.filename === filename) {
          next.delete(id);
        }
      }
      const removed = entries.size - next.size;
      if (removed > 0) {
        await this.persist(next);
      }
      return removed;
    });
  }

  private async mutate(
    key: RecordKey,
    build: (previous: PushLedgerEntry | undefined, stamp: string) => PushLedgerEntry,
  ) {
    return this.lock.runExclusive(LEDGER_LOCK, async () => {
      const entries = await this.load();
      const entry = build(entries.get(ledgerKey(key)), this.now().toISOString());
      const next = new Map(entries);
      next.set(ledgerKey(key), entry);
      await this.persist(next);
      return { ...entry };
    });
  }

  private blank(key: RecordKey, stamp: string): PushLedgerEntry {
    return {
      stage: key.stage,
      filename: key.filename,
      chunk_index: key.stage === "chunked" ? key.chunkIndex : null,
      pushed: false,
      remote_ref: null,
      last_error: null,
      attempts: 0,
      pushed_at: null,
      updated_at: stamp,
    };
  }

  private async persist(next: Map<string, PushLedgerEntry>) {
    try {
      await writeJsonAtomic(this.filePath, { version: 1, entries: [...next.values()] });
    } catch (error) {
      throw toIOFailure(error, "Failed to persist push ledger", { filePath: this.filePath });
    }
    this.entries = next;
  }

  private async load() {
    if (this.entries) {
      return this.entries;
    }
    this.loading ??= this.readFromDisk().finally(() => {
      this.loading = null;
    });
    const entries = await this.loading;
    this.entries ??= entries;
    return this.entries;
  }

  private async readFromDisk(): Promise<Map<string, PushLedgerEntry>> {
    let raw: unknown;
    try {
      raw = await readJson(this.filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return new Map();
      }
      if (!(error instanceof SyntaxError)) {
        throw toIOFailure(error, "Failed to read push ledger", { filePath: this.filePath });
      }
      raw = null;
    }
    const parsed = ledgerFileSchema.safeParse(raw);
    if (!parsed.success) {
      const aside = `${this.filePath}.corrupt-${Date.now()}`;
      this.log.error({ filePath: this.filePath, aside }, "Push ledger unreadable; starting with an empty ledger");
      await fs.rename(this.filePath, aside);
      return new Map();
    }
    return new Map(parsed.data.entries.map((entry) => [ledgerKey(entryKey(entry)), entry]));
  }
}
