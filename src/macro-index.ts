/**
 * MacroIndex — maps macro and component identifiers to their defining documents.
 *
 * The game ships index/macros.xml and index/components.xml with entries like
 *   <entry name="ship_arg_s_fighter_01_a_macro" value="assets\units\size_s\macros\ship_arg_s_fighter_01_a_macro"/>
 * where the value omits the .xml extension. Extensions carry their own
 * index files under extensions/<name>/index/.
 */
import type { DefinitionNamespace } from "./definition-parser.js";
import type { GameFileSource } from "./game-files.js";
import { normalizeGamePath } from "./utils/game-path.js";
import logger from "./utils/logger.js";
import { childrenByTag, parseXml } from "./utils/xml-tree.js";

const INDEX_FILES: Partial<Record<DefinitionNamespace, string>> = {
  macro: "index/macros.xml",
  component: "index/components.xml",
};

export class MacroIndex {
  private paths = new Map<string, string>();

  get size(): number {
    return this.paths.size;
  }

  /** Load base game and extension index files; missing files are skipped */
  async load(files: GameFileSource, extensions: readonly string[] = []): Promise<number> {
    const prefixes = ["", ...extensions.map((ext) => `extensions/${ext}/`)];
    for (const prefix of prefixes) {
      for (const [namespace, file] of Object.entries(INDEX_FILES)) {
        const indexPath = `${prefix}${file}`;
        if (!(await files.exists(indexPath))) {
          logger.debug(`No index file ${indexPath}`, { module: "index" });
          continue;
        }
        this.addDocument(namespace === "component" ? "component" : "macro", await files.readFile(indexPath), indexPath);
      }
    }
    logger.info(`Macro index: ${this.paths.size.toLocaleString()} entries`, { module: "index" });
    return this.paths.size;
  }

  addDocument(namespace: DefinitionNamespace, bytes: Buffer | string, source: string): void {
    const root = parseXml(bytes, source);
    for (const entry of childrenByTag(root, "entry")) {
      const name = entry.attributes.name?.trim();
      const value = entry.attributes.value?.trim();
      if (!name || !value) continue;
      this.set(namespace, name, `${value}.xml`);
    }
  }

  set(namespace: DefinitionNamespace, id: string, path: string): void {
    this.paths.set(`${namespace}:${id.toLowerCase()}`, normalizeGamePath(path));
  }

  /** Logical path of the document defining `id`, if indexed */
  lookup(namespace: DefinitionNamespace, id: string): string | undefined {
    return this.paths.get(`${namespace}:${id.toLowerCase()}`);
  }
}
