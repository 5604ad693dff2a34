/**
 * Read-only view over the game's logical file tree. Implemented by the
 * archive overlay and by the plain-directory provider.
 */

export interface GameFileEntry {
  /** Normalized logical path */
  path: string;
  name: string;
  size: number;
}

export interface GameFileSource {
  readonly description: string;
  readFile(path: string): Promise<Buffer>;
  exists(path: string): Promise<boolean>;
  /** Direct file children of a logical directory, sorted by name */
  listFiles(dir: string): Promise<GameFileEntry[]>;
  /** Installed extension directory names */
  extensions(): Promise<string[]>;
  close(): Promise<void>;
}
