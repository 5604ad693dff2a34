/**
 * ExtractionService — loads the definition documents for the requested object
 * classes, follows references through the macro index until nothing new
 * loads, then resolves each class with its own MacroResolver.
 */
import { DefinitionGraph, type PropertyReferences } from "./definition-graph.js";
import { parseDefinitions } from "./definition-parser.js";
import { type Diagnostic, ExtractorError, ExtractorErrorCode, dedupeDiagnostics } from "./errors.js";
import type { GameFileSource } from "./game-files.js";
import { PROPERTY_REFERENCES } from "./kind-derivations.js";
import { MacroIndex } from "./macro-index.js";
import { MacroResolver, type MacroResolverOptions, type ResolutionResult } from "./macro-resolver.js";
import {
  OBJECT_CLASS_DEFINITIONS,
  type ObjectClass,
  collectDefinitionPaths,
} from "./object-classes.js";
import { kindFamily } from "./object-kinds.js";
import logger from "./utils/logger.js";

export type DocumentErrorPolicy = "abort" | "skip";

export interface ExtractionOptions {
  /** abort: a broken document fails the run; skip: it is logged and left out */
  onDocumentError?: DocumentErrorPolicy;
  /** Extensions to load definitions from (default: all the source reports) */
  extensions?: readonly string[];
  resolver?: MacroResolverOptions;
}

export interface ExtractionStats {
  documents: number;
  nodes: number;
  records: Partial<Record<ObjectClass, number>>;
  failures: number;
  diagnostics: Diagnostic[];
  errors: string[];
  durationMs?: number;
}

export interface ExtractionResult {
  results: Map<ObjectClass, ResolutionResult>;
  stats: ExtractionStats;
}

/** Document-level failures the skip policy may tolerate */
const DOCUMENT_ERRORS: ReadonlySet<string> = new Set([
  ExtractorErrorCode.CORRUPT_PAYLOAD,
  ExtractorErrorCode.MALFORMED_DEFINITION,
]);

export class ExtractionService {
  readonly graph = new DefinitionGraph();
  readonly index = new MacroIndex();

  private loaded = new Set<string>();
  private indexLoaded = false;
  private skipped: Diagnostic[] = [];
  private errors: string[] = [];
  private readonly policy: DocumentErrorPolicy;

  constructor(
    private files: GameFileSource,
    private options: ExtractionOptions = {},
  ) {
    this.policy = options.onDocumentError ?? "abort";
  }

  get documentCount(): number {
    return this.loaded.size;
  }

  private async extensionNames(): Promise<readonly string[]> {
    return this.options.extensions ?? (await this.files.extensions());
  }

  /** Parse one document into the graph; returns false when skipped */
  async loadDocument(path: string): Promise<boolean> {
    if (this.loaded.has(path)) return true;
    this.loaded.add(path);
    try {
      const nodes = parseDefinitions(await this.files.readFile(path), path);
      this.graph.add(nodes);
      logger.debug(`Loaded ${nodes.length} definitions from ${path}`, { module: "extraction" });
      return true;
    } catch (e) {
      if (this.policy === "skip" && e instanceof ExtractorError && DOCUMENT_ERRORS.has(e.code)) {
        logger.error(`Skipping ${path}: ${e.message}`, { module: "extraction" });
        this.errors.push(e.message);
        this.skipped.push({ code: "SkippedDocument", severity: "error", path, message: e.message });
        return false;
      }
      throw e;
    }
  }

  /** Load every document the given classes are defined in, base game and extensions */
  async loadClasses(classes: readonly ObjectClass[], onProgress?: (msg: string) => void): Promise<number> {
    const extensions = await this.extensionNames();
    const before = this.loaded.size;
    for (const name of classes) {
      const definition = OBJECT_CLASS_DEFINITIONS[name];
      for (const ext of [undefined, ...extensions]) {
        const paths = await collectDefinitionPaths(this.files, definition, ext);
        for (const path of paths) await this.loadDocument(path);
        if (paths.length) onProgress?.(`${name}${ext ? ` (${ext})` : ""}: ${paths.length} documents`);
      }
    }
    return this.loaded.size - before;
  }

  /**
   * Load the documents defining referenced but missing identifiers, repeating
   * until a pass loads nothing new.
   */
  async loadDependencies(): Promise<number> {
    if (!this.indexLoaded) {
      await this.index.load(this.files, await this.extensionNames());
      this.indexLoaded = true;
    }

    const references: PropertyReferences = (node) => {
      const keys = node.kind ? PROPERTY_REFERENCES[kindFamily(node.kind)] ?? [] : [];
      return keys.map((key) => node.properties.get(key)?.trim() ?? "").filter(Boolean);
    };

    let total = 0;
    for (;;) {
      let loadedThisPass = 0;
      for (const ref of this.graph.missingReferences(references)) {
        const path = this.index.lookup(ref.namespace, ref.id);
        if (!path || this.loaded.has(path)) continue;
        if (!(await this.files.exists(path))) {
          logger.debug(`Indexed document ${path} for ${ref.id} does not exist`, { module: "extraction" });
          this.loaded.add(path);
          continue;
        }
        await this.loadDocument(path);
        loadedThisPass++;
      }
      total += loadedThisPass;
      if (!loadedThisPass) return total;
    }
  }

  /** One resolver (and memo partition) per class, run concurrently */
  async resolveClasses(classes: readonly ObjectClass[]): Promise<Map<ObjectClass, ResolutionResult>> {
    const entries = await Promise.all(
      classes.map(async (name): Promise<[ObjectClass, ResolutionResult]> => {
        const definition = OBJECT_CLASS_DEFINITIONS[name];
        const resolver = new MacroResolver(this.graph, this.options.resolver);
        return [name, resolver.resolveKind(definition.kinds, definition.namespace)];
      }),
    );
    return new Map(entries);
  }

  async extract(classes: readonly ObjectClass[], onProgress?: (msg: string) => void): Promise<ExtractionResult> {
    const startTime = Date.now();

    const documents = await this.loadClasses(classes, onProgress);
    onProgress?.(`Definitions: ${documents} documents, ${this.graph.size} nodes`);
    const dependencies = await this.loadDependencies();
    if (dependencies) onProgress?.(`Dependencies: ${dependencies} more documents`);

    const results = await this.resolveClasses(classes);

    const stats: ExtractionStats = {
      documents: this.loaded.size,
      nodes: this.graph.size,
      records: {},
      failures: 0,
      diagnostics: [],
      errors: [...this.errors],
    };
    const diagnostics: Diagnostic[] = [...this.skipped];
    const failed = new Map<string, string>();
    for (const [name, result] of results) {
      stats.records[name] = result.records.length;
      for (const failure of result.failures) failed.set(failure.objectId, failure.message);
      diagnostics.push(...result.diagnostics);
      onProgress?.(`${name}: ${result.records.length} records`);
    }
    stats.failures = failed.size;
    stats.errors.push(...failed.values());
    stats.diagnostics = dedupeDiagnostics(diagnostics);
    stats.durationMs = Date.now() - startTime;
    return { results, stats };
  }
}
