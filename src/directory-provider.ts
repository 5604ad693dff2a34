/**
 * DirectoryProvider — GameFileSource over an already extracted game tree.
 *
 * Logical paths are lower-case while extracted files keep whatever case the
 * tool wrote, so each path segment is matched case-insensitively against a
 * cached directory listing.
 */
import type { Dirent } from "fs";
import { readFile, readdir, stat } from "fs/promises";
import path from "path";
import { FileNotFoundError, isNotFoundError } from "./errors.js";
import type { GameFileEntry, GameFileSource } from "./game-files.js";
import { normalizeGameDir, normalizeGamePath } from "./utils/game-path.js";

interface Listing {
  /** lower-case name → directory entry */
  entries: Map<string, Dirent>;
}

interface Located {
  fsPath: string;
  entry: Dirent | null;
}

export class DirectoryProvider implements GameFileSource {
  private listings = new Map<string, Promise<Listing | null>>();

  constructor(private root: string) {}

  get description(): string {
    return `directory ${this.root}`;
  }

  private listing(dir: string): Promise<Listing | null> {
    let pending = this.listings.get(dir);
    if (!pending) {
      pending = readdir(dir, { withFileTypes: true }).then(
        (dirents) => ({ entries: new Map(dirents.map((d) => [d.name.toLowerCase(), d])) }),
        (e: unknown) => {
          if (isNotFoundError(e)) return null;
          throw e;
        },
      );
      this.listings.set(dir, pending);
    }
    return pending;
  }

  /** Filesystem location of a logical path; the root itself has no entry */
  private async locate(logical: string): Promise<Located | null> {
    let located: Located = { fsPath: this.root, entry: null };
    for (const segment of logical.split("/").filter(Boolean)) {
      if (located.entry && !located.entry.isDirectory()) return null;
      const listing = await this.listing(located.fsPath);
      const entry = listing?.entries.get(segment);
      if (!entry) return null;
      located = { fsPath: path.join(located.fsPath, entry.name), entry };
    }
    return located;
  }

  async readFile(file: string): Promise<Buffer> {
    const logical = normalizeGamePath(file);
    const located = await this.locate(logical);
    if (!located?.entry?.isFile()) throw new FileNotFoundError(logical);
    return readFile(located.fsPath);
  }

  async exists(file: string): Promise<boolean> {
    const located = await this.locate(normalizeGamePath(file));
    return !!located?.entry?.isFile();
  }

  async listFiles(dir: string): Promise<GameFileEntry[]> {
    const logicalDir = normalizeGameDir(dir);
    const located = await this.locate(logicalDir);
    if (!located || (located.entry && !located.entry.isDirectory())) return [];
    const listing = await this.listing(located.fsPath);
    if (!listing) return [];

    const files: GameFileEntry[] = [];
    for (const [name, entry] of listing.entries) {
      if (!entry.isFile()) continue;
      const { size } = await stat(path.join(located.fsPath, entry.name));
      files.push({ path: logicalDir + name, name, size });
    }
    return files.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  async extensions(): Promise<string[]> {
    const located = await this.locate("extensions");
    if (!located?.entry?.isDirectory()) return [];
    const listing = await this.listing(located.fsPath);
    if (!listing) return [];
    return [...listing.entries]
      .filter(([, entry]) => entry.isDirectory())
      .map(([name]) => name)
      .sort();
  }

  async close(): Promise<void> {
    this.listings.clear();
  }
}
