import type { ContentRecordStore } from "../storage/recordStore";
import type { ChunkRecord } from "../types/records";
import { KeyedMutex } from "../utils/keyedMutex";
import { logger } from "../logger";
import { assertSafeFilename, slugPart } from "../utils/naming";

/**
 * Hands out chunk indices per source file. The index is recomputed from what is on
 * disk every time; the per-source lock makes "count, then write" a single step.
 */
export class ChunkSequencer {
  private readonly log = logger.child({ component: "chunk-sequencer" });

  constructor(
    private readonly store: ContentRecordStore,
    private readonly locks = new KeyedMutex(),
  ) {}

  static chunkId(language: string, category: string, source: string, index: number) {
    return [slugPart(language), slugPart(category), slugPart(source), String(index).padStart(3, "0")].join("_");
  }

  async nextIndex(source: string) {
    assertSafeFilename(source, "sourceFilename");
    return this.locks.runExclusive(source, () => this.computeNext(source));
  }

  /**
   * Assigns sequential indices to the whole batch under one lock acquisition and writes
   * every chunk. If a write fails, chunks already written by this batch are removed.
   */
  async submitBatch<P>(source: string, payloads: P[], build: (payload: P, index: number) => ChunkRecord) {
    assertSafeFilename(source, "sourceFilename");
    return this.locks.runExclusive(source, async () => {
      const first = await this.computeNext(source);
      const written: ChunkRecord[] = [];
      try {
        for (const [offset, payload] of payloads.entries()) {
          const record = build(payload, first + offset);
          await this.store.put(record);
          written.push(record);
        }
      } catch (error) {
        await this.rollback(source, written);
        throw error;
      }
      return written;
    });
  }

  /** Holds the source's lock around `fn`; no index is computed while it runs. */
  async runExclusive<T>(source: string, fn: () => Promise<T>) {
    return this.locks.runExclusive(source, fn);
  }

  isBusy(source: string) {
    return this.locks.isLocked(source);
  }

  private async computeNext(source: string) {
    const [pending, approved] = await Promise.all([
      this.store.listChunks("pending", source),
      this.store.listChunks("approved", source),
    ]);
    const indices = [...pending, ...approved].map((chunk) => chunk.chunkIndex);
    if (indices.length === 0) {
      return 0;
    }
    // a rejected chunk leaves a gap; never hand out an index that is still taken
    return Math.max(indices.length, Math.max(...indices) + 1);
  }

  private async rollback(source: string, written: ChunkRecord[]) {
    for (const record of written) {
      try {
        await this.store.delete("pending", {
          stage: "chunked",
          filename: record.filename,
          chunkIndex: record.chunkIndex,
        });
      } catch (error) {
        this.log.error({ err: error, source, chunkIndex: record.chunkIndex }, "Failed to roll back chunk");
      }
    }
  }
}
