import { beforeEach, describe, expect, it } from "vitest";
import { CurationError } from "../errors";
import { StagingStateMachine, chunkKey } from "../services/stagingStateMachine";
import { InMemoryRecordStore } from "../storage/memoryRecordStore";
import type { MetadataPatch, RecordKey, Status } from "../types/records";
import { MemoryAuditLog, steppingClock } from "./fixtures";

const lesson = { stage: "raw" as const, filename: "lesson_1" };

/** Holds the next pending chunk listing until the test opens it. */
class GatedStore extends InMemoryRecordStore {
  private held: { gate: Promise<void>; arrived: () => void } | null = null;

  holdPendingListing() {
    let open = () => {};
    let arrived = () => {};
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    const reached = new Promise<void>((resolve) => {
      arrived = resolve;
    });
    this.held = { gate, arrived };
    return { open, reached };
  }

  override async listChunks(status: Status, source: string) {
    const held = this.held;
    if (status === "pending" && held) {
      this.held = null;
      held.arrived();
      await held.gate;
    }
    return super.listChunks(status, source);
  }
}

class FailingMoveStore extends InMemoryRecordStore {
  constructor(private readonly failFor: string) {
    super();
  }

  override async move(key: RecordKey, from: Status, to: Status, patch?: MetadataPatch) {
    if (key.filename === this.failFor) {
      throw new CurationError("IOFailure", "disk full");
    }
    return super.move(key, from, to, patch);
  }
}

describe("StagingStateMachine", () => {
  let store: InMemoryRecordStore;
  let audit: MemoryAuditLog;
  let machine: StagingStateMachine;
  let ids: number;

  beforeEach(() => {
    store = new InMemoryRecordStore();
    audit = new MemoryAuditLog();
    ids = 0;
    machine = new StagingStateMachine({
      store,
      audit,
      now: steppingClock(),
      idFactory: () => `id-${++ids}`,
    });
  });

  async function submitRaw(filename = "lesson_1", content = "x".repeat(200)) {
    return machine.submit({ stage: "raw", filename, content, language: "ta", source: "textbook", category: "science" });
  }

  async function approvedCleaned(filename = "lesson_1") {
    await submitRaw(filename);
    await machine.approve({ stage: "raw", filename }, "reviewer");
    await machine.submit({ stage: "cleaned", filename, content: "clean text", sourceFilename: filename });
    await machine.approve({ stage: "cleaned", filename }, "reviewer");
  }

  describe("submit", () => {
    it("runs a raw file through approval and accepts cleaned text derived from it", async () => {
      const submitted = await submitRaw();
      expect(submitted.stage === "raw" && submitted.record.metadata).toMatchObject({
        id: "id-1",
        content_length: 200,
        status: "pending",
        submitted_at: "2025-01-01T00:00:00.000Z",
      });
      await expect(machine.list("raw", "pending")).resolves.toHaveLength(1);

      await machine.approve(lesson, "reviewer");

      await expect(machine.list("raw", "pending")).resolves.toEqual([]);
      const approved = await machine.list("raw", "approved");
      expect(approved).toHaveLength(1);
      expect(approved[0].stage === "raw" && approved[0].metadata.approved_at).toBe("2025-01-01T00:00:01.000Z");

      await expect(
        machine.submit({ stage: "cleaned", filename: "lesson_1", content: "clean", sourceFilename: "lesson_1" }),
      ).resolves.toMatchObject({ stage: "cleaned" });
      await expect(
        machine.submit({ stage: "cleaned", filename: "other", content: "clean", sourceFilename: "missing_file" }),
      ).rejects.toMatchObject({ kind: "LineageUnresolved" });
    });

    it("refuses a second pending submission of the same file", async () => {
      await submitRaw();

      await expect(submitRaw("lesson_1", "different")).rejects.toMatchObject({ kind: "DuplicatePending" });
      const record = await machine.get("pending", lesson);
      expect(record.stage === "raw" && record.content).toBe("x".repeat(200));
    });

    it("refuses to resubmit an approved file", async () => {
      await submitRaw();
      await machine.approve(lesson, "reviewer");

      await expect(submitRaw()).rejects.toMatchObject({ kind: "Conflict" });
    });

    it("requires the upstream raw record to be approved, not just pending", async () => {
      await submitRaw();

      await expect(
        machine.submit({ stage: "cleaned", filename: "lesson_1", content: "clean", sourceFilename: "lesson_1" }),
      ).rejects.toMatchObject({ kind: "LineageUnresolved" });
    });

    it("inherits language and source from the raw record", async () => {
      await submitRaw();
      await machine.approve(lesson, "reviewer");

      const outcome = await machine.submit({
        stage: "cleaned",
        filename: "lesson_1_clean",
        content: "clean",
        sourceFilename: "lesson_1",
      });

      expect(outcome.stage === "cleaned" && outcome.record.metadata).toMatchObject({
        language: "ta",
        source: "textbook",
        category: "science",
        source_filename: "lesson_1",
      });
    });

    it("rejects empty content", async () => {
      await expect(submitRaw("lesson_1", "   ")).rejects.toMatchObject({ kind: "InvalidInput" });
    });

    it("numbers chunks and derives their ids from the cleaned record", async () => {
      await approvedCleaned("grade10");

      const outcome = await machine.submit({
        stage: "chunked",
        sourceFilename: "grade10",
        chunks: [{ text: "first" }, { text: "second", overlap: 20 }],
      });

      expect(outcome.stage === "chunked" && outcome.chunks.map((chunk) => chunk.chunk)).toEqual([
        expect.objectContaining({ chunk_index: 0, chunk_id: "ta_science_grade10_000", char_count: 5, overlap: null }),
        expect.objectContaining({ chunk_index: 1, chunk_id: "ta_science_grade10_001", char_count: 6, overlap: 20 }),
      ]);
    });

    it("refuses chunks for a cleaned file that is not approved", async () => {
      await expect(
        machine.submit({ stage: "chunked", sourceFilename: "grade10", chunks: [{ text: "a" }] }),
      ).rejects.toMatchObject({ kind: "LineageUnresolved" });
    });
  });

  describe("approve", () => {
    it("treats a second approval as a no-op", async () => {
      await submitRaw();
      const first = await machine.approve(lesson, "reviewer");
      const second = await machine.approve(lesson, "someone-else");

      expect(first.alreadyApproved).toBe(false);
      expect(second.alreadyApproved).toBe(true);
      expect(second.record.stage === "raw" && second.record.metadata.approved_by).toBe("reviewer");
      expect(audit.entries.filter((entry) => entry.action === "approve")).toHaveLength(1);
    });

    it("survives concurrent approvals of the same item", async () => {
      await submitRaw();

      const outcomes = await Promise.all([machine.approve(lesson, "a"), machine.approve(lesson, "b")]);

      expect(outcomes.map((outcome) => outcome.alreadyApproved).sort()).toEqual([false, true]);
      expect(store.size("approved")).toBe(1);
      expect(store.size("pending")).toBe(0);
    });

    it("reports unknown items", async () => {
      await expect(machine.approve(lesson, "reviewer")).rejects.toMatchObject({ kind: "NotFound" });
    });
  });

  describe("reject", () => {
    it("deletes the pending record and audits the reason", async () => {
      await submitRaw();

      await machine.reject(lesson, "low quality", "reviewer");

      await expect(machine.get("pending", lesson)).rejects.toMatchObject({ kind: "NotFound" });
      await expect(machine.get("approved", lesson)).rejects.toMatchObject({ kind: "NotFound" });
      expect(audit.entries).toEqual([{ action: "reject", key: lesson, actor: "reviewer", reason: "low quality" }]);
    });

    it("reports a missing record", async () => {
      await expect(machine.reject(lesson, "low quality", "reviewer")).rejects.toMatchObject({ kind: "NotFound" });
    });
  });

  describe("approveAll", () => {
    it("approves every pending document of a stage", async () => {
      await submitRaw("a");
      await submitRaw("b");

      const result = await machine.approveAll("raw", undefined, "reviewer");

      expect(result).toMatchObject({ stage: "raw", approved: 2, failed: 0 });
      expect(store.size("approved")).toBe(2);
    });

    it("needs a source filename for chunks", async () => {
      await expect(machine.approveAll("chunked", undefined, "reviewer")).rejects.toMatchObject({
        kind: "InvalidInput",
      });
    });

    it("keeps going when one item fails", async () => {
      store = new FailingMoveStore("b");
      machine = new StagingStateMachine({ store, audit, now: steppingClock() });
      await submitRaw("a");
      await submitRaw("b");
      await submitRaw("c");

      const result = await machine.approveAll("raw", undefined, "reviewer");

      expect(result).toMatchObject({ approved: 2, failed: 1 });
      expect(result.items).toContainEqual({
        key: { stage: "raw", filename: "b" },
        ok: false,
        error: { kind: "IOFailure", message: "disk full" },
      });
      expect((await machine.list("raw", "approved")).map((record) => record.filename).sort()).toEqual(["a", "c"]);
      await expect(machine.list("raw", "pending")).resolves.toHaveLength(1);
    });

    it("approves the pending chunks of one source", async () => {
      await approvedCleaned("grade10");
      await machine.submit({ stage: "chunked", sourceFilename: "grade10", chunks: [{ text: "a" }, { text: "b" }] });

      const result = await machine.approveAll("chunked", "grade10", "reviewer");

      expect(result.approved).toBe(2);
      expect(result.items.map((item) => item.key)).toEqual([
        { stage: "chunked", filename: "grade10", chunkIndex: 0 },
        { stage: "chunked", filename: "grade10", chunkIndex: 1 },
      ]);
      await expect(store.listChunks("pending", "grade10")).resolves.toEqual([]);
    });
  });

  describe("update", () => {
    it("edits pending content and stamps the editor", async () => {
      await submitRaw();

      const updated = await machine.update(lesson, { content: "shorter", metadata: { grade: 10 } }, "editor");

      expect(updated.stage === "raw" && updated.metadata).toMatchObject({
        content_length: 7,
        grade: 10,
        updated_by: "editor",
        updated_at: "2025-01-01T00:00:01.000Z",
      });
      expect(audit.entries[0]).toMatchObject({ action: "update", actor: "editor" });
    });

    it("refuses to edit an approved record", async () => {
      await submitRaw();
      await machine.approve(lesson, "reviewer");

      await expect(machine.update(lesson, { content: "late edit" }, "editor")).rejects.toMatchObject({
        kind: "InvalidState",
      });
    });

    it("reports a missing record", async () => {
      await expect(machine.update(lesson, { content: "x" }, "editor")).rejects.toMatchObject({ kind: "NotFound" });
    });

    it("protects identity fields but tolerates unchanged ones", async () => {
      await submitRaw();

      await expect(machine.update(lesson, { metadata: { id: "forged" } }, "editor")).rejects.toMatchObject({
        kind: "InvalidInput",
      });
      await expect(
        machine.update(lesson, { metadata: { id: "id-1", language: "en" } }, "editor"),
      ).resolves.toMatchObject({ metadata: { id: "id-1", language: "en" } });
    });

    it("treats null as matching an identity field the record does not have", async () => {
      await submitRaw();

      await expect(
        machine.update(lesson, { metadata: { approved_at: null, grade: 9 } }, "editor"),
      ).resolves.toMatchObject({ metadata: { grade: 9 } });
      await expect(
        machine.update(lesson, { metadata: { approved_at: "2025-01-01T00:00:00.000Z" } }, "editor"),
      ).rejects.toMatchObject({ kind: "InvalidInput" });
    });

    it("re-derives the chunk id when the category changes", async () => {
      await approvedCleaned("grade10");
      await machine.submit({ stage: "chunked", sourceFilename: "grade10", chunks: [{ text: "a" }] });
      const key: RecordKey = { stage: "chunked", filename: "grade10", chunkIndex: 0 };

      const updated = await machine.update(key, { content: "new text", metadata: { category: "Physics" } }, "editor");

      expect(updated.stage === "chunked" && updated.chunk).toMatchObject({
        chunk_id: "ta_physics_grade10_000",
        category: "Physics",
        text: "new text",
        char_count: 8,
        chunk_index: 0,
      });
    });
  });

  describe("chunk numbering under moderation", () => {
    it("does not reuse an index while a chunk of the same source is being approved", async () => {
      const gated = new GatedStore();
      store = gated;
      machine = new StagingStateMachine({ store, audit, now: steppingClock() });
      await approvedCleaned("grade10");
      await machine.submit({
        stage: "chunked",
        sourceFilename: "grade10",
        chunks: [{ text: "a" }, { text: "b" }, { text: "c" }],
      });

      const { open, reached } = gated.holdPendingListing();
      const submitting = machine.submit({ stage: "chunked", sourceFilename: "grade10", chunks: [{ text: "d" }] });
      await reached;
      const approving = machine.approve(chunkKey("grade10", 2), "reviewer");
      await new Promise((resolve) => setTimeout(resolve, 10));
      open();
      const [outcome, approval] = await Promise.all([submitting, approving]);

      expect(outcome.stage === "chunked" && outcome.chunks.map((chunk) => chunk.chunkIndex)).toEqual([3]);
      expect(approval.alreadyApproved).toBe(false);
      expect((await store.listChunks("pending", "grade10")).map((chunk) => chunk.chunkIndex)).toEqual([0, 1, 3]);
      expect((await store.listChunks("approved", "grade10")).map((chunk) => chunk.chunkIndex)).toEqual([2]);
    });
  });

  describe("reporting", () => {
    it("counts records per stage", async () => {
      await approvedCleaned("grade10");
      await submitRaw("lesson_2");
      await machine.submit({ stage: "chunked", sourceFilename: "grade10", chunks: [{ text: "a" }, { text: "b" }] });

      await expect(machine.stats()).resolves.toEqual({
        raw: { pending: 1, approved: 1 },
        cleaned: { pending: 0, approved: 1 },
        chunked: { pending: 2, approved: 0 },
        totals: { pending: 3, approved: 2 },
      });
    });

    it("finds records whose upstream approval was deleted", async () => {
      await approvedCleaned("grade10");
      await machine.submit({ stage: "chunked", sourceFilename: "grade10", chunks: [{ text: "a" }] });
      await store.delete("approved", { stage: "raw", filename: "grade10" });
      await store.delete("approved", { stage: "cleaned", filename: "grade10" });

      await expect(machine.findDanglingLineage()).resolves.toEqual([
        {
          stage: "chunked",
          status: "pending",
          filename: "grade10",
          chunkCount: 1,
          upstream: { stage: "cleaned", filename: "grade10" },
        },
      ]);
    });

    it("groups chunks by source", async () => {
      await approvedCleaned("grade10");
      await machine.submit({ stage: "chunked", sourceFilename: "grade10", chunks: [{ text: "a" }] });

      const groups = await machine.listChunkGroups("pending");

      expect(groups.map((group) => [group.sourceFilename, group.chunks.length])).toEqual([["grade10", 1]]);
    });
  });
});
