/**
 * Error taxonomy shared by the archive, definition and resolution layers.
 *
 * Fatal conditions are thrown as ExtractorError subclasses. Non-fatal ones are
 * collected as Diagnostic values and reported after output is written.
 */

export const ExtractorErrorCode = {
  NO_LAYERS_FOUND: "NoLayersFound",
  MALFORMED_INDEX: "MalformedIndex",
  CORRUPT_PAYLOAD: "CorruptPayload",
  FILE_NOT_FOUND: "FileNotFound",
  MALFORMED_DEFINITION: "MalformedDefinition",
  INHERITANCE_CYCLE: "InheritanceCycle",
} as const;

export type ExtractorErrorCode = (typeof ExtractorErrorCode)[keyof typeof ExtractorErrorCode];

export class ExtractorError extends Error {
  constructor(
    message: string,
    public readonly code: ExtractorErrorCode,
    public readonly path?: string,
  ) {
    super(message);
    this.name = "ExtractorError";
  }
}

export class NoLayersFoundError extends ExtractorError {
  constructor(root: string, probed: string) {
    super(`No archive layers found in ${root} (expected ${probed})`, ExtractorErrorCode.NO_LAYERS_FOUND, root);
    this.name = "NoLayersFoundError";
  }
}

export class MalformedIndexError extends ExtractorError {
  constructor(
    source: string,
    detail: string,
    public readonly line?: number,
  ) {
    super(`Malformed index ${source}${line !== undefined ? ` (line ${line})` : ""}: ${detail}`, ExtractorErrorCode.MALFORMED_INDEX, source);
    this.name = "MalformedIndexError";
  }
}

export class CorruptPayloadError extends ExtractorError {
  constructor(
    path: string,
    public readonly rank: number,
    detail: string,
  ) {
    super(`Corrupt payload for ${path} in layer ${String(rank).padStart(2, "0")}: ${detail}`, ExtractorErrorCode.CORRUPT_PAYLOAD, path);
    this.name = "CorruptPayloadError";
  }
}

export class FileNotFoundError extends ExtractorError {
  constructor(path: string) {
    super(`File not found: ${path}`, ExtractorErrorCode.FILE_NOT_FOUND, path);
    this.name = "FileNotFoundError";
  }
}

export class MalformedDefinitionError extends ExtractorError {
  constructor(path: string, detail: string) {
    super(`Malformed definition ${path}: ${detail}`, ExtractorErrorCode.MALFORMED_DEFINITION, path);
    this.name = "MalformedDefinitionError";
  }
}

export class InheritanceCycleError extends ExtractorError {
  /** Identifiers along the loop, first element repeated at the end */
  public readonly cycle: readonly string[];

  constructor(
    public readonly objectId: string,
    cycle: readonly string[],
    inCycle = cycle.includes(objectId),
  ) {
    const loop = describeCycle(cycle);
    super(
      inCycle ? `Inheritance cycle: ${loop}` : `${objectId} inherits from a cycle: ${loop}`,
      ExtractorErrorCode.INHERITANCE_CYCLE,
    );
    this.name = "InheritanceCycleError";
    this.cycle = cycle;
  }
}

/** Long loops are abbreviated to their first links and the closing node */
export function describeCycle(cycle: readonly string[], maxLinks = 8): string {
  if (cycle.length <= maxLinks) return cycle.join(" -> ");
  const hidden = cycle.length - maxLinks;
  return [...cycle.slice(0, maxLinks - 1), `(${hidden} more)`, cycle[cycle.length - 1]].join(" -> ");
}

// ── Diagnostics ──────────────────────────────────────────

export type DiagnosticCode = "UnresolvedReference" | "UnknownKind" | "ConnectionCycle" | "SkippedDocument";

export interface Diagnostic {
  code: DiagnosticCode;
  severity: "warning" | "error";
  message: string;
  objectId?: string;
  /** Identifier or path that could not be followed */
  reference?: string;
  path?: string;
}

export function diagnosticKey(d: Diagnostic): string {
  return `${d.code}|${d.objectId ?? ""}|${d.reference ?? ""}|${d.path ?? ""}`;
}

/** Drop repeated diagnostics, keeping first occurrence order */
export function dedupeDiagnostics(diagnostics: Iterable<Diagnostic>): Diagnostic[] {
  const seen = new Map<string, Diagnostic>();
  for (const d of diagnostics) {
    const key = diagnosticKey(d);
    if (!seen.has(key)) seen.set(key, d);
  }
  return [...seen.values()];
}

/** True for fs errors raised because a path does not exist */
export function isNotFoundError(e: unknown): boolean {
  return e instanceof Error && "code" in e && (e.code === "ENOENT" || e.code === "ENOTDIR");
}
