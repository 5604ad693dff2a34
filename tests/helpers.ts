/**
 * Catalog fixtures: build .cat/.dat pairs from a file map, in memory or on disk.
 */
import { createHash } from "crypto";
import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { type ArchiveLayer, BufferPayloadSource, createLayer } from "../src/archive-overlay.js";
import { parseCatIndex } from "../src/cat-index.js";

export type FileMap = Record<string, string | Buffer>;

export interface Catalog {
  cat: string;
  dat: Buffer;
}

export function md5(data: string | Buffer): string {
  return createHash("md5").update(data).digest("hex");
}

/** Table lines in insertion order, payloads back to back */
export function buildCatalog(files: FileMap, { checksums = true, timestamp = 1700000000 } = {}): Catalog {
  const lines: string[] = [];
  const payloads: Buffer[] = [];
  for (const [file, content] of Object.entries(files)) {
    const data = typeof content === "string" ? Buffer.from(content, "utf8") : content;
    lines.push(checksums ? `${file} ${data.length} ${timestamp} ${md5(data)}` : `${file} ${data.length} ${timestamp}`);
    payloads.push(data);
  }
  return { cat: lines.join("\n") + "\n", dat: Buffer.concat(payloads) };
}

export function memoryLayer(rank: number, files: FileMap, mount = ""): ArchiveLayer {
  const { cat, dat } = buildCatalog(files);
  const index = parseCatIndex(cat, { rank, source: `${String(rank).padStart(2, "0")}.cat`, payloadSize: dat.length });
  return createLayer(rank, index, new BufferPayloadSource(dat), mount);
}

/** Write <dir>/<base>.cat and <dir>/<base>.dat */
export async function writeCatalog(dir: string, base: string, files: FileMap): Promise<void> {
  const { cat, dat } = buildCatalog(files);
  await mkdir(dir, { recursive: true });
  await writeFile(path.join(dir, `${base}.cat`), cat);
  await writeFile(path.join(dir, `${base}.dat`), dat);
}

/** Write a plain file tree, creating directories as needed */
export async function writeTree(root: string, files: FileMap): Promise<void> {
  for (const [file, content] of Object.entries(files)) {
    const target = path.join(root, file);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}
