/**
 * Export encoders: tabular CSV with fixed per-class columns, and structured
 * JSON / YAML keyed by object id.
 */
import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { stringify } from "yaml";
import type { ResolvedRecord } from "./macro-resolver.js";
import { OBJECT_CLASS_DEFINITIONS, type ObjectClass } from "./object-classes.js";
import type { AttributeValue, ConnectionSlot } from "./object-kinds.js";
import type { ExportFormat } from "./utils/config.js";
import logger from "./utils/logger.js";

export type FileFormat = Exclude<ExportFormat, "mysql">;

export const FORMAT_EXTENSIONS: Readonly<Record<FileFormat, string>> = {
  csv: "csv",
  json: "json",
  yaml: "yaml",
};

export interface ExportOutput {
  /** Written file, null when rendered to memory only */
  path: string | null;
  content: string;
  rows: number;
}

function byId(a: ResolvedRecord, b: ResolvedRecord): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

// ── CSV ──────────────────────────────────────────────────

/** Lists joined with spaces, records as space-separated key:value pairs */
export function csvValue(value: AttributeValue | undefined): string {
  if (value === null || value === undefined) return "";
  let str: string;
  if (Array.isArray(value)) str = value.join(" ");
  else if (typeof value === "object") {
    str = Object.entries(value)
      .map(([key, n]) => `${key}:${n}`)
      .join(" ");
  } else str = String(value);
  return str.includes(",") || str.includes('"') || str.includes("\n") ? `"${str.replace(/"/g, '""')}"` : str;
}

export function recordsToCsv(columns: readonly string[], records: readonly ResolvedRecord[]): string {
  const lines = [["id", ...columns].join(",")];
  for (const record of [...records].sort(byId)) {
    lines.push([csvValue(record.id), ...columns.map((column) => csvValue(record.attributes[column]))].join(","));
  }
  return lines.join("\n") + "\n";
}

// ── JSON / YAML ──────────────────────────────────────────

/** Deep copy with object keys in sorted order */
export function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (typeof value !== "object" || value === null) return value;
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    out[key] = sortKeys(inner);
  }
  return out;
}

function slotDocument(slot: ConnectionSlot): Record<string, unknown> {
  const doc: Record<string, unknown> = { role: slot.role, target: slot.target, kind: slot.kind };
  if (slot.attributes) doc.attributes = slot.attributes;
  if (slot.connections.length) doc.connections = slot.connections.map(slotDocument);
  return doc;
}

/** id → { kind, source, attributes, connections, subrecords } */
export function recordsToDocument(records: readonly ResolvedRecord[]): Record<string, unknown> {
  const doc: Record<string, unknown> = {};
  for (const record of [...records].sort(byId)) {
    doc[record.id] = {
      kind: record.kind,
      source: record.source,
      attributes: record.attributes,
      connections: record.connections.map(slotDocument),
      subrecords: record.subrecords,
    };
  }
  return doc;
}

export function renderRecords(objectClass: ObjectClass, records: readonly ResolvedRecord[], format: FileFormat): string {
  switch (format) {
    case "csv":
      return recordsToCsv(OBJECT_CLASS_DEFINITIONS[objectClass].columns, records);
    case "json":
      return JSON.stringify(sortKeys(recordsToDocument(records)), null, 2) + "\n";
    case "yaml":
      return stringify(sortKeys(recordsToDocument(records)));
  }
}

/**
 * Render one object class. With a destination directory the result is
 * written to <destination>/<class>.<ext>.
 */
export async function writeRecords(
  objectClass: ObjectClass,
  records: readonly ResolvedRecord[],
  destination?: string,
  format: FileFormat = "csv",
): Promise<ExportOutput> {
  const content = renderRecords(objectClass, records, format);
  if (destination === undefined) return { path: null, content, rows: records.length };

  await mkdir(destination, { recursive: true });
  const file = path.join(destination, `${objectClass}.${FORMAT_EXTENSIONS[format]}`);
  await writeFile(file, content, "utf8");
  logger.info(`Wrote ${records.length} ${objectClass} to ${file}`, { module: "export" });
  return { path: file, content, rows: records.length };
}
