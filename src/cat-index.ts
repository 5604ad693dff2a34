/**
 * Catalog index parser for .cat directory tables.
 *
 * Each line describes one file stored in the companion .dat payload:
 *   <path> <size> <timestamp> <md5>
 * Files are stored back to back, so an entry's offset is the sum of the sizes
 * of every entry listed before it. Paths may contain spaces; the numeric
 * fields are taken from the end of the line.
 */
import { MalformedIndexError } from "./errors.js";
import { normalizeGamePath } from "./utils/game-path.js";

export interface IndexEntry {
  /** Normalized logical path */
  readonly path: string;
  readonly offset: number;
  readonly size: number;
  /** Lower-case md5 hex digest, or null when the table carries none */
  readonly checksum: string | null;
  readonly timestamp: number;
  /** Rank of the layer this entry belongs to */
  readonly rank: number;
}

export interface CatIndex {
  readonly rank: number;
  readonly source: string;
  readonly entries: ReadonlyMap<string, IndexEntry>;
  /** Sum of all declared sizes, i.e. the payload bytes the table accounts for */
  readonly payloadBytes: number;
}

export interface CatIndexOptions {
  rank: number;
  /** Name used in error messages, usually the .cat path */
  source: string;
  /** Actual payload size; declared sizes may not exceed it */
  payloadSize?: number;
}

const LINE_WITH_CHECKSUM = /^(.*\S)\s+(\d+)\s+(\d+)\s+([0-9a-fA-F]{32})$/;
const LINE_WITHOUT_CHECKSUM = /^(.*\S)\s+(\d+)\s+(\d+)$/;
const EMPTY_CHECKSUM = /^0{32}$/;

export function parseCatIndex(table: Buffer | string, options: CatIndexOptions): CatIndex {
  const { rank, source } = options;
  const text = (typeof table === "string" ? table : table.toString("utf8")).replace(/^\uFEFF/, "");
  const entries = new Map<string, IndexEntry>();
  let offset = 0;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    const lineNo = i + 1;

    const match = LINE_WITH_CHECKSUM.exec(line) ?? LINE_WITHOUT_CHECKSUM.exec(line);
    if (!match) {
      throw new MalformedIndexError(source, `cannot parse "${line.slice(0, 120)}"`, lineNo);
    }
    const [, rawPath, rawSize, rawTimestamp, rawChecksum] = match;

    const size = Number(rawSize);
    if (!Number.isSafeInteger(size)) {
      throw new MalformedIndexError(source, `size out of range (${rawSize})`, lineNo);
    }
    const path = normalizeGamePath(rawPath);
    if (!path) {
      throw new MalformedIndexError(source, "empty path", lineNo);
    }
    if (entries.has(path)) {
      throw new MalformedIndexError(source, `duplicate path ${path}`, lineNo);
    }

    const checksum = rawChecksum && !EMPTY_CHECKSUM.test(rawChecksum) ? rawChecksum.toLowerCase() : null;
    entries.set(path, { path, offset, size, checksum, timestamp: Number(rawTimestamp), rank });
    offset += size;
  }

  if (options.payloadSize !== undefined && offset > options.payloadSize) {
    throw new MalformedIndexError(
      source,
      `entries declare ${offset} bytes but the payload holds ${options.payloadSize}`,
    );
  }

  return { rank, source, entries, payloadBytes: offset };
}
