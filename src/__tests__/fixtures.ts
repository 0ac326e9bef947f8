import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { CurationError, ErrorKind } from "../errors";
import type { AuditEntry, AuditLog } from "../services/auditLog";
import type { DatasetStoreClient, RemoteCallOptions, RemoteFile } from "../services/datasetStoreClient";
import type { ChunkRecord, DocumentRecord, DocumentStage, Stage, Status } from "../types/records";

export async function makeTempDir(prefix = "curation-") {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

/** Deterministic clock: each call is one second after the previous one. */
export function steppingClock(start = Date.UTC(2025, 0, 1)) {
  let tick = 0;
  return () => new Date(start + 1000 * tick++);
}

export function documentRecord(
  stage: DocumentStage,
  filename: string,
  options: { status?: Status; content?: string; submittedAt?: string; sourceFilename?: string | null } = {},
): DocumentRecord {
  const status = options.status ?? "pending";
  const content = options.content ?? `content of ${filename}`;
  const submittedAt = options.submittedAt ?? "2025-01-01T00:00:00.000Z";
  return {
    stage,
    status,
    filename,
    content,
    metadata: {
      id: `id-${stage}-${filename}`,
      filename,
      stage,
      status,
      language: "ta",
      source: "textbook",
      category: "science",
      content_length: content.length,
      source_filename: options.sourceFilename ?? null,
      created_at: submittedAt,
      submitted_at: submittedAt,
    },
  };
}

export function chunkRecord(source: string, index: number, status: Status = "pending"): ChunkRecord {
  const text = `chunk ${index} of ${source}`;
  return {
    stage: "chunked",
    status,
    filename: source,
    chunkIndex: index,
    chunk: {
      id: `id-${source}-${index}`,
      chunk_id: `ta_science_${source}_${String(index).padStart(3, "0")}`,
      chunk_index: index,
      source_filename: source,
      language: "ta",
      category: "science",
      text,
      char_count: text.length,
      overlap: null,
      status,
      created_at: "2025-01-01T00:00:00.000Z",
      submitted_at: "2025-01-01T00:00:00.000Z",
    },
  };
}

export class MemoryAuditLog implements AuditLog {
  readonly entries: AuditEntry[] = [];

  record(entry: AuditEntry) {
    this.entries.push(entry);
  }
}

export type RemoteOperation = "uploadContent" | "uploadMetadata" | "uploadChunk";

export interface RemoteCall {
  operation: RemoteOperation;
  target: string;
}

type FailureRule = (call: RemoteCall) => ErrorKind | "hang" | null;

/** In-process stand-in for the dataset store. `failWhen` decides per call whether it fails. */
export class FakeDatasetStore implements DatasetStoreClient {
  readonly calls: RemoteCall[] = [];
  readonly objects = new Map<string, string>();
  failWhen: FailureRule = () => null;

  async uploadContent(stage: DocumentStage, filename: string, text: string, options?: RemoteCallOptions) {
    return this.put({ operation: "uploadContent", target: `${stage}/${filename}.txt` }, text, options);
  }

  async uploadMetadata(
    stage: DocumentStage,
    filename: string,
    metadata: Record<string, unknown>,
    options?: RemoteCallOptions,
  ) {
    return this.put(
      { operation: "uploadMetadata", target: `${stage}/${filename}.meta.json` },
      JSON.stringify(metadata),
      options,
    );
  }

  async uploadChunk(source: string, index: number, chunk: Record<string, unknown>, options?: RemoteCallOptions) {
    return this.put({ operation: "uploadChunk", target: `chunked/${source}/${index}` }, JSON.stringify(chunk), options);
  }

  async listFiles(stage: Stage): Promise<RemoteFile[]> {
    return [...this.objects.keys()]
      .filter((key) => key.startsWith(`${stage}/`))
      .map((key) => ({ key, size: this.objects.get(key)?.length ?? 0, lastModified: null }));
  }

  async downloadContent(stage: DocumentStage, filename: string) {
    const body = this.objects.get(`${stage}/${filename}.txt`);
    if (body === undefined) {
      throw new CurationError("RemoteUnavailable", "missing object");
    }
    return body;
  }

  async getDownloadUrl(stage: DocumentStage, filename: string, expiresInSeconds = 3600) {
    return `https://datasets.test/${stage}/${filename}.txt?expires=${expiresInSeconds}`;
  }

  countOf(operation: RemoteOperation) {
    return this.calls.filter((call) => call.operation === operation).length;
  }

  private async put(call: RemoteCall, body: string, options?: RemoteCallOptions) {
    this.calls.push(call);
    const failure = this.failWhen(call);
    if (failure === "hang") {
      return new Promise<string>((_, reject) => {
        options?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    }
    if (failure) {
      throw new CurationError(failure, `${call.operation} ${call.target} failed`);
    }
    this.objects.set(call.target, body);
    return `remote://${call.target}`;
  }
}
