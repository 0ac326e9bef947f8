import {
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { CurationError, ErrorKind, errorMessage } from "../errors";
import { recordRemoteError, startRemoteTimer } from "../metrics";
import type { DocumentStage, Stage } from "../types/records";
import { chunkFileName } from "../utils/naming";

export interface RemoteCallOptions {
  signal?: AbortSignal;
}

export interface RemoteFile {
  key: string;
  size: number;
  lastModified: string | null;
}

/** The external dataset store, reduced to what publishing needs. */
export interface DatasetStoreClient {
  uploadContent(stage: DocumentStage, filename: string, text: string, options?: RemoteCallOptions): Promise<string>;
  uploadMetadata(
    stage: DocumentStage,
    filename: string,
    metadata: Record<string, unknown>,
    options?: RemoteCallOptions,
  ): Promise<string>;
  uploadChunk(
    source: string,
    index: number,
    chunk: Record<string, unknown>,
    options?: RemoteCallOptions,
  ): Promise<string>;
  listFiles(stage: Stage, options?: RemoteCallOptions): Promise<RemoteFile[]>;
  downloadContent(stage: DocumentStage, filename: string, options?: RemoteCallOptions): Promise<string>;
  getDownloadUrl(stage: DocumentStage, filename: string, expiresInSeconds?: number): Promise<string>;
}

export interface S3DatasetStoreOptions {
  endpoint: string;
  region: string;
  accessKey: string;
  secretKey: string;
  bucket: string;
  useSSL: boolean;
  prefixes: Record<Stage, string>;
  signedUrlTTL: number;
}

export function contentKey(prefix: string, filename: string) {
  return `${prefix}/${filename}.txt`;
}

export function metadataKey(prefix: string, filename: string) {
  return `${prefix}/${filename}.meta.json`;
}

export function chunkKey(prefix: string, source: string, index: number) {
  return `${prefix}/${source}/${chunkFileName(index)}`;
}

export function classifyRemoteError(error: unknown): ErrorKind {
  if (error instanceof CurationError && error.remote) {
    return error.kind;
  }
  const status = error instanceof S3ServiceException ? error.$metadata.httpStatusCode : undefined;
  if (status === 401 || status === 403) {
    return "AuthRejected";
  }
  if (status === 409 || status === 412) {
    return "RemoteConflict";
  }
  return "RemoteUnavailable";
}

export function clampExpiry(value: number) {
  const max = 604800; // 7 days
  const min = 60;
  if (!Number.isFinite(value)) return max;
  return Math.max(min, Math.min(max, Math.floor(value)));
}

export class S3DatasetStore implements DatasetStoreClient {
  private readonly s3: S3Client;
  private readonly endpointUrl: URL;

  constructor(private readonly options: S3DatasetStoreOptions) {
    this.endpointUrl = new URL(options.endpoint);
    this.s3 = new S3Client({
      region: options.region,
      endpoint: options.endpoint,
      forcePathStyle: true,
      credentials: {
        accessKeyId: options.accessKey,
        secretAccessKey: options.secretKey,
      },
      // MinIO and most S3-compatible stores reject the newer default checksums
      requestChecksumCalculation: "WHEN_REQUIRED",
      responseChecksumValidation: "WHEN_REQUIRED",
    });
  }

  async uploadContent(stage: DocumentStage, filename: string, text: string, options: RemoteCallOptions = {}) {
    const key = contentKey(this.options.prefixes[stage], filename);
    return this.putObject("uploadContent", key, text, "text/plain; charset=utf-8", options);
  }

  async uploadMetadata(
    stage: DocumentStage,
    filename: string,
    metadata: Record<string, unknown>,
    options: RemoteCallOptions = {},
  ) {
    const key = metadataKey(this.options.prefixes[stage], filename);
    return this.putObject("uploadMetadata", key, JSON.stringify(metadata, null, 2), "application/json", options);
  }

  async uploadChunk(source: string, index: number, chunk: Record<string, unknown>, options: RemoteCallOptions = {}) {
    const key = chunkKey(this.options.prefixes.chunked, source, index);
    return this.putObject("uploadChunk", key, JSON.stringify(chunk, null, 2), "application/json", options);
  }

  async listFiles(stage: Stage, options: RemoteCallOptions = {}) {
    const prefix = `${this.options.prefixes[stage]}/`;
    const files: RemoteFile[] = [];
    let continuationToken: string | undefined;
    do {
      const page = await this.call("listFiles", () =>
        this.s3.send(
          new ListObjectsV2Command({
            Bucket: this.options.bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken,
          }),
          { abortSignal: options.signal },
        ),
      );
      for (const object of page.Contents ?? []) {
        if (object.Key) {
          files.push({
            key: object.Key,
            size: object.Size ?? 0,
            lastModified: object.LastModified ? object.LastModified.toISOString() : null,
          });
        }
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);
    return files;
  }

  async downloadContent(stage: DocumentStage, filename: string, options: RemoteCallOptions = {}) {
    const key = contentKey(this.options.prefixes[stage], filename);
    return this.call("downloadContent", async () => {
      const response = await this.s3.send(new GetObjectCommand({ Bucket: this.options.bucket, Key: key }), {
        abortSignal: options.signal,
      });
      if (!response.Body) {
        throw new CurationError("RemoteUnavailable", `Empty body for ${key}`, { key });
      }
      return response.Body.transformToString("utf-8");
    });
  }

  async getDownloadUrl(stage: DocumentStage, filename: string, expiresInSeconds?: number) {
    const expires = clampExpiry(expiresInSeconds ?? this.options.signedUrlTTL);
    const command = new GetObjectCommand({
      Bucket: this.options.bucket,
      Key: contentKey(this.options.prefixes[stage], filename),
    });
    return this.call("getDownloadUrl", () => getSignedUrl(this.s3, command, { expiresIn: expires }));
  }

  private async putObject(
    operation: string,
    key: string,
    body: string,
    contentType: string,
    options: RemoteCallOptions,
  ) {
    await this.call(operation, () =>
      this.s3.send(
        new PutObjectCommand({
          Bucket: this.options.bucket,
          Key: key,
          Body: Buffer.from(body),
          ContentType: contentType,
        }),
        { abortSignal: options.signal },
      ),
    );
    const protocol = this.options.useSSL ? "https" : "http";
    return `${protocol}://${this.endpointUrl.host}/${this.options.bucket}/${key}`;
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const stopTimer = startRemoteTimer(operation);
    try {
      return await fn();
    } catch (error) {
      const kind = classifyRemoteError(error);
      recordRemoteError(operation, kind);
      throw new CurationError(kind, `${operation} failed: ${errorMessage(error)}`, { operation }, { cause: error });
    } finally {
      stopTimer();
    }
  }
}
