import { CurationError } from "../errors";

const FILENAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;
const CHUNK_FILE_PATTERN = /^chunk_(\d+)\.json$/;

export function assertSafeFilename(filename: string, field = "filename") {
  if (!FILENAME_PATTERN.test(filename) || filename.includes("..")) {
    throw new CurationError("InvalidInput", `Invalid ${field} "${filename}"`, { field });
  }
  return filename;
}

export function isSafeFilename(filename: string) {
  return FILENAME_PATTERN.test(filename) && !filename.includes("..");
}

export function chunkFileName(index: number) {
  return `chunk_${String(index).padStart(2, "0")}.json`;
}

export function parseChunkFileName(name: string): number | null {
  const match = CHUNK_FILE_PATTERN.exec(name);
  if (!match) {
    return null;
  }
  return Number.parseInt(match[1], 10);
}

export function slugPart(value: string) {
  const slug = value
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}]+/gu, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "x";
}

export function countCharacters(text: string) {
  // code points, not UTF-16 units
  return Array.from(text).length;
}
