/**
 * ArchiveOverlay — numbered .cat/.dat layers presented as one file tree.
 *
 * Layers are probed as 01.cat/01.dat, 02.cat/02.dat, ... until the first gap.
 * When several layers list the same path, the highest rank wins; lower ranks
 * are shadowed, never merged. The winning entry per path is computed once
 * when the overlay is built. Payload bytes are only read on demand.
 *
 * Extensions live under <root>/extensions/<name>/ext_NN.cat and are mounted
 * under the logical prefix extensions/<name>/.
 */
import { createHash } from "crypto";
import { type FileHandle, open, readFile, readdir, stat } from "fs/promises";
import path from "path";
import { type CatIndex, type IndexEntry, parseCatIndex } from "./cat-index.js";
import { CorruptPayloadError, FileNotFoundError, NoLayersFoundError, isNotFoundError } from "./errors.js";
import type { GameFileEntry, GameFileSource } from "./game-files.js";
import { gameBasename, gameDirname, normalizeGameDir, normalizeGamePath } from "./utils/game-path.js";
import logger from "./utils/logger.js";

export const MAX_LAYER_RANK = 99;

// ── Payload sources ──────────────────────────────────────

export interface PayloadSource {
  readonly location: string;
  read(offset: number, size: number): Promise<Buffer>;
  close(): Promise<void>;
}

/** .dat file on disk, opened on first read */
export class FilePayloadSource implements PayloadSource {
  private fd: FileHandle | null = null;
  private opening: Promise<FileHandle> | null = null;

  constructor(public readonly location: string) {}

  private handle(): Promise<FileHandle> {
    if (this.fd) return Promise.resolve(this.fd);
    if (!this.opening) {
      this.opening = open(this.location, "r").then((fd) => {
        this.fd = fd;
        return fd;
      });
    }
    return this.opening;
  }

  async read(offset: number, size: number): Promise<Buffer> {
    const fd = await this.handle();
    const buf = Buffer.alloc(size);
    let filled = 0;
    while (filled < size) {
      const { bytesRead } = await fd.read(buf, filled, size - filled, offset + filled);
      if (bytesRead === 0) break;
      filled += bytesRead;
    }
    return filled === size ? buf : buf.subarray(0, filled);
  }

  async close(): Promise<void> {
    const pending = this.opening;
    this.opening = null;
    if (pending) {
      // a failed open was already reported by the read that started it
      const fd = await pending.catch((e: unknown) => {
        logger.debug(`Nothing to close for ${this.location}: ${e instanceof Error ? e.message : String(e)}`, { module: "archive" });
        return null;
      });
      await fd?.close();
    }
    this.fd = null;
  }
}

/** In-memory payload, used for tests and pre-loaded data */
export class BufferPayloadSource implements PayloadSource {
  constructor(
    private readonly data: Buffer,
    public readonly location = "<memory>",
  ) {}

  async read(offset: number, size: number): Promise<Buffer> {
    return this.data.subarray(offset, Math.min(offset + size, this.data.length));
  }

  async close(): Promise<void> {}
}

// ── Layers & handles ─────────────────────────────────────

export interface ArchiveLayer {
  readonly rank: number;
  readonly index: CatIndex;
  readonly payload: PayloadSource;
  /** Logical prefix ("" for the base game, "extensions/<name>/" otherwise) */
  readonly mount: string;
}

export interface OverlayHandle {
  /** Mounted logical path */
  readonly path: string;
  readonly entry: IndexEntry;
  readonly layer: ArchiveLayer;
}

export interface OverlayOptions {
  verifyChecksums?: boolean;
}

export interface DiscoverOptions extends OverlayOptions {
  /** Also mount extensions/<name>/ext_NN layers (default true) */
  extensions?: boolean;
}

export function createLayer(rank: number, index: CatIndex, payload: PayloadSource, mount = ""): ArchiveLayer {
  return Object.freeze({ rank, index, payload, mount: normalizeGameDir(mount) });
}

// ── Overlay ──────────────────────────────────────────────

export class ArchiveOverlay implements GameFileSource {
  private readonly layerList: readonly ArchiveLayer[];
  private readonly union = new Map<string, OverlayHandle>();
  private readonly directories = new Map<string, Map<string, OverlayHandle>>();
  private readonly reads = new Map<OverlayHandle, Promise<Buffer>>();
  private readonly verifyChecksums: boolean;

  constructor(layers: readonly ArchiveLayer[], options: OverlayOptions = {}) {
    this.verifyChecksums = options.verifyChecksums ?? true;
    this.layerList = [...layers].sort((a, b) => a.mount.localeCompare(b.mount) || a.rank - b.rank);

    // Rank comparison instead of insertion order: layer order never matters
    for (const layer of layers) {
      for (const entry of layer.index.entries.values()) {
        const logical = layer.mount + entry.path;
        const current = this.union.get(logical);
        if (!current || current.layer.rank < layer.rank) {
          this.union.set(logical, Object.freeze({ path: logical, entry, layer }));
        }
      }
    }

    for (const handle of this.union.values()) {
      const dir = gameDirname(handle.path);
      let files = this.directories.get(dir);
      if (!files) {
        files = new Map();
        this.directories.set(dir, files);
      }
      files.set(gameBasename(handle.path), handle);
    }
  }

  /**
   * Probe <root>/01.cat .. NN.cat and build the overlay.
   * Only the directory tables are read; payloads stay closed until needed.
   */
  static async discover(root: string, maxLayers = MAX_LAYER_RANK, options: DiscoverOptions = {}): Promise<ArchiveOverlay> {
    const limit = Math.min(Math.max(1, Math.trunc(maxLayers)), MAX_LAYER_RANK);
    const layers = await probeLayers(root, "", limit, "");
    if (!layers.length) {
      throw new NoLayersFoundError(root, path.join(root, "01.cat"));
    }

    if (options.extensions ?? true) {
      const extRoot = path.join(root, "extensions");
      for (const name of await listDirectories(extRoot)) {
        const extLayers = await probeLayers(path.join(extRoot, name), "ext_", limit, `extensions/${name}/`);
        if (!extLayers.length) {
          logger.warn(`Extension "${name}" has no ext_01.cat, skipped`, { module: "archive" });
          continue;
        }
        layers.push(...extLayers);
      }
    }

    const overlay = new ArchiveOverlay(layers, options);
    logger.info(`Overlay ready: ${layers.length} layers, ${overlay.fileCount.toLocaleString()} files`, { module: "archive" });
    return overlay;
  }

  get description(): string {
    return `catalog overlay (${this.layerList.length} layers)`;
  }

  get layers(): readonly ArchiveLayer[] {
    return this.layerList;
  }

  get fileCount(): number {
    return this.union.size;
  }

  resolve(logicalPath: string): OverlayHandle | undefined {
    return this.union.get(normalizeGamePath(logicalPath));
  }

  /** Read and verify the bytes behind a handle. Reads are memoized per handle. */
  read(handle: OverlayHandle): Promise<Buffer> {
    let pending = this.reads.get(handle);
    if (!pending) {
      pending = this.readPayload(handle);
      this.reads.set(handle, pending);
      // A failed read must be retryable
      pending.catch(() => this.reads.delete(handle));
    }
    return pending;
  }

  private async readPayload(handle: OverlayHandle): Promise<Buffer> {
    const { entry, layer } = handle;
    const data = await layer.payload.read(entry.offset, entry.size);
    if (data.length !== entry.size) {
      throw new CorruptPayloadError(handle.path, layer.rank, `expected ${entry.size} bytes, got ${data.length}`);
    }
    if (this.verifyChecksums && entry.checksum) {
      const actual = createHash("md5").update(data).digest("hex");
      if (actual !== entry.checksum) {
        throw new CorruptPayloadError(handle.path, layer.rank, `md5 ${actual} does not match ${entry.checksum}`);
      }
    }
    return data;
  }

  async readFile(logicalPath: string): Promise<Buffer> {
    const handle = this.resolve(logicalPath);
    if (!handle) throw new FileNotFoundError(normalizeGamePath(logicalPath));
    return this.read(handle);
  }

  async exists(logicalPath: string): Promise<boolean> {
    return this.union.has(normalizeGamePath(logicalPath));
  }

  async listFiles(dir: string): Promise<GameFileEntry[]> {
    const files = this.directories.get(normalizeGameDir(dir));
    if (!files) return [];
    return [...files.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, handle]) => ({ path: handle.path, name, size: handle.entry.size }));
  }

  async extensions(): Promise<string[]> {
    const names = new Set<string>();
    for (const layer of this.layerList) {
      const match = /^extensions\/([^/]+)\/$/.exec(layer.mount);
      if (match) names.add(match[1]);
    }
    return [...names].sort();
  }

  async close(): Promise<void> {
    this.reads.clear();
    await Promise.all(this.layerList.map((layer) => layer.payload.close()));
  }
}

// ── Discovery helpers ────────────────────────────────────

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (e) {
    if (isNotFoundError(e)) return false;
    throw e;
  }
}

async function listDirectories(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.filter((e) => e.isDirectory()).map((e) => e.name).sort();
  } catch (e) {
    if (isNotFoundError(e)) return [];
    throw e;
  }
}

async function probeLayers(dir: string, prefix: string, limit: number, mount: string): Promise<ArchiveLayer[]> {
  const layers: ArchiveLayer[] = [];
  for (let rank = 1; rank <= limit; rank++) {
    const base = `${prefix}${String(rank).padStart(2, "0")}`;
    const catPath = path.join(dir, `${base}.cat`);
    const datPath = path.join(dir, `${base}.dat`);
    if (!(await isFile(catPath)) || !(await isFile(datPath))) break;

    const [table, datStat] = await Promise.all([readFile(catPath), stat(datPath)]);
    const index = parseCatIndex(table, { rank, source: catPath, payloadSize: datStat.size });
    layers.push(createLayer(rank, index, new FilePayloadSource(datPath), mount));
    logger.debug(`Layer ${base}: ${index.entries.size} entries`, { module: "archive", mount });
  }
  return layers;
}
