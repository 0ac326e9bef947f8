import { S3ServiceException } from "@aws-sdk/client-s3";
import { describe, expect, it } from "vitest";
import { CurationError } from "../errors";
import { chunkKey, clampExpiry, classifyRemoteError, contentKey, metadataKey } from "../services/datasetStoreClient";

function s3Error(httpStatusCode: number) {
  return new S3ServiceException({
    name: "S3Error",
    $fault: httpStatusCode >= 500 ? "server" : "client",
    $metadata: { httpStatusCode },
    message: `status ${httpStatusCode}`,
  });
}

describe("dataset store keys", () => {
  it("lays out documents and chunks under their prefixes", () => {
    expect(contentKey("raw-data", "lesson_1")).toBe("raw-data/lesson_1.txt");
    expect(metadataKey("cleaned-data", "lesson_1")).toBe("cleaned-data/lesson_1.meta.json");
    expect(chunkKey("chunked-data", "grade10", 7)).toBe("chunked-data/grade10/chunk_07.json");
  });
});

describe("classifyRemoteError", () => {
  it("maps HTTP status codes to remote error kinds", () => {
    expect(classifyRemoteError(s3Error(403))).toBe("AuthRejected");
    expect(classifyRemoteError(s3Error(401))).toBe("AuthRejected");
    expect(classifyRemoteError(s3Error(412))).toBe("RemoteConflict");
    expect(classifyRemoteError(s3Error(503))).toBe("RemoteUnavailable");
  });

  it("treats network errors as unavailable and keeps remote kinds", () => {
    expect(classifyRemoteError(new Error("ECONNREFUSED"))).toBe("RemoteUnavailable");
    expect(classifyRemoteError(new CurationError("RemoteConflict", "etag mismatch"))).toBe("RemoteConflict");
    expect(classifyRemoteError(new CurationError("IOFailure", "disk"))).toBe("RemoteUnavailable");
  });
});

describe("clampExpiry", () => {
  it("keeps link lifetimes between one minute and seven days", () => {
    expect(clampExpiry(5)).toBe(60);
    expect(clampExpiry(3600.7)).toBe(3600);
    expect(clampExpiry(10_000_000)).toBe(604800);
    expect(clampExpiry(Number.NaN)).toBe(604800);
  });
});
