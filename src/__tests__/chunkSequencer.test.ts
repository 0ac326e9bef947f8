import { describe, expect, it } from "vitest";
import { CurationError } from "../errors";
import { ChunkSequencer } from "../services/chunkSequencer";
import { InMemoryRecordStore } from "../storage/memoryRecordStore";
import type { PutOptions } from "../storage/recordStore";
import type { ChunkRecord, ItemRecord } from "../types/records";
import { chunkRecord } from "./fixtures";

class FlakyStore extends InMemoryRecordStore {
  puts = 0;

  constructor(private readonly failOnPut: number) {
    super();
  }

  override async put(record: ItemRecord, options?: PutOptions) {
    this.puts += 1;
    if (this.puts === this.failOnPut) {
      throw new CurationError("IOFailure", "disk full");
    }
    return super.put(record, options);
  }
}

const build = (source: string) => (text: string, index: number): ChunkRecord => {
  const record = chunkRecord(source, index);
  return { ...record, chunk: { ...record.chunk, text } };
};

describe("ChunkSequencer", () => {
  it("continues after pending and approved chunks", async () => {
    const store = new InMemoryRecordStore();
    for (const index of [0, 1, 2]) {
      await store.put(chunkRecord("grade10", index, "pending"));
    }
    for (const index of [3, 4]) {
      await store.put(chunkRecord("grade10", index, "approved"));
    }
    const sequencer = new ChunkSequencer(store);

    await expect(sequencer.nextIndex("grade10")).resolves.toBe(5);

    const written = await sequencer.submitBatch("grade10", ["a", "b", "c"], build("grade10"));
    expect(written.map((chunk) => chunk.chunkIndex)).toEqual([5, 6, 7]);
    expect(written.map((chunk) => chunk.chunk.text)).toEqual(["a", "b", "c"]);
  });

  it("starts a new source at zero", async () => {
    const sequencer = new ChunkSequencer(new InMemoryRecordStore());

    await expect(sequencer.nextIndex("fresh")).resolves.toBe(0);
  });

  it("never reissues an index left behind a gap", async () => {
    const store = new InMemoryRecordStore();
    await store.put(chunkRecord("grade10", 0));
    await store.put(chunkRecord("grade10", 2));

    await expect(new ChunkSequencer(store).nextIndex("grade10")).resolves.toBe(3);
  });

  it("keeps concurrent batches for one source apart", async () => {
    const store = new InMemoryRecordStore();
    const sequencer = new ChunkSequencer(store);

    const [first, second] = await Promise.all([
      sequencer.submitBatch("grade10", ["a", "b"], build("grade10")),
      sequencer.submitBatch("grade10", ["c", "d"], build("grade10")),
    ]);

    expect(first.map((chunk) => chunk.chunkIndex)).toEqual([0, 1]);
    expect(second.map((chunk) => chunk.chunkIndex)).toEqual([2, 3]);
    expect(sequencer.isBusy("grade10")).toBe(false);
  });

  it("removes what it wrote when a write fails", async () => {
    const store = new FlakyStore(3);
    const sequencer = new ChunkSequencer(store);

    await expect(sequencer.submitBatch("grade10", ["a", "b", "c"], build("grade10"))).rejects.toMatchObject({
      kind: "IOFailure",
    });

    await expect(store.listChunks("pending", "grade10")).resolves.toEqual([]);
    await expect(sequencer.nextIndex("grade10")).resolves.toBe(0);
  });

  it("rejects unsafe source names", async () => {
    const sequencer = new ChunkSequencer(new InMemoryRecordStore());

    await expect(sequencer.nextIndex("../up")).rejects.toMatchObject({ kind: "InvalidInput" });
  });
});
