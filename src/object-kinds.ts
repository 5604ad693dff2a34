/**
 * Per-kind attribute schemas.
 *
 * data/attributes.json lists, for every known object kind, which raw property
 * keys become which attributes and how they are coerced. Keys no schema
 * consumes are passed through unchanged under their dotted name.
 */
import { readFileSync } from "fs";
import { z } from "zod";
import type { ConnectionRef, PropertyBag } from "./definition-parser.js";
import { dataFilePath } from "./utils/data-files.js";
import logger from "./utils/logger.js";

// ── Records ──────────────────────────────────────────────

export type AttributeValue = string | number | boolean | null | readonly string[] | Readonly<Record<string, number>>;
export type AttributeMap = Record<string, AttributeValue>;

export interface ConnectionSlot {
  readonly role: string;
  /** Referenced macro, null for an empty connection point */
  readonly target: string | null;
  readonly kind: string | null;
  /** "nested" embeds the full record, "summary" only identifying fields, null for placeholders */
  readonly embed: "nested" | "summary" | null;
  readonly attributes: Readonly<AttributeMap> | null;
  readonly connections: readonly ConnectionSlot[];
}

export interface DerivationContext {
  readonly id: string;
  readonly kind: string;
  readonly family: string;
  readonly raw: PropertyBag;
  /** Coerced attributes, filled in place by the derivation */
  readonly attributes: AttributeMap;
  readonly component: { readonly id: string; readonly connections: readonly ConnectionRef[] } | null;
  readonly connections: readonly ConnectionSlot[];
  readonly subrecords: Record<string, AttributeMap[]>;
}

// ── Attribute table ──────────────────────────────────────

const AttributeSpecSchema = z.object({
  name: z.string().min(1),
  from: z.string().min(1),
  type: z.enum(["int", "float", "string", "text", "tags"]),
  default: z.union([z.number(), z.string(), z.array(z.string())]).optional(),
});

export type AttributeSpec = z.infer<typeof AttributeSpecSchema>;

export const AttributeTableSchema = z
  .object({
    groups: z.record(z.array(AttributeSpecSchema)),
    kinds: z.record(z.array(z.string())),
  })
  .superRefine((table, ctx) => {
    for (const [kind, groups] of Object.entries(table.kinds)) {
      for (const group of groups) {
        if (!(group in table.groups)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["kinds", kind], message: `unknown group "${group}"` });
        }
      }
    }
  });

export type AttributeTable = z.infer<typeof AttributeTableSchema>;

export interface KindSchema {
  readonly kind: string;
  readonly attributes: readonly AttributeSpec[];
  /** Raw keys read by the schema, excluded from pass-through */
  readonly consumed: ReadonlySet<string>;
}

/** ship_xs, ship_s, … all share the "ship" schema */
export function kindFamily(kind: string): string {
  return kind.startsWith("ship_") ? "ship" : kind;
}

export class KindTable {
  private schemas = new Map<string, KindSchema>();

  constructor(table: AttributeTable) {
    for (const [kind, groups] of Object.entries(table.kinds)) {
      const attributes = groups.flatMap((group) => table.groups[group] ?? []);
      this.schemas.set(kind, { kind, attributes, consumed: new Set(attributes.map((a) => a.from)) });
    }
  }

  static load(file = dataFilePath("attributes.json")): KindTable {
    const parsed = AttributeTableSchema.safeParse(JSON.parse(readFileSync(file, "utf8")));
    if (!parsed.success) {
      throw new Error(`Invalid attribute table ${file}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }
    return new KindTable(parsed.data);
  }

  get kinds(): string[] {
    return [...this.schemas.keys()];
  }

  has(kind: string): boolean {
    return this.schemas.has(kindFamily(kind));
  }

  schema(kind: string): KindSchema | undefined {
    return this.schemas.get(kindFamily(kind));
  }

  /** Coerce the schema's attributes, then append unconsumed raw keys */
  coerce(kind: string, raw: PropertyBag, objectId = ""): AttributeMap {
    const schema = this.schema(kind);
    const out: AttributeMap = {};
    for (const spec of schema?.attributes ?? []) {
      out[spec.name] = coerceValue(spec, raw.get(spec.from), objectId);
    }
    for (const [key, value] of raw) {
      if (!schema?.consumed.has(key) && !(key in out)) out[key] = value;
    }
    return out;
  }
}

let defaultTable: KindTable | null = null;

export function defaultKindTable(): KindTable {
  defaultTable ??= KindTable.load();
  return defaultTable;
}

// ── Coercion ─────────────────────────────────────────────

export function splitTags(value: string): string[] {
  return value.split(/\s+/).filter(Boolean);
}

function fallback(spec: AttributeSpec): AttributeValue {
  if (spec.default !== undefined) return spec.default;
  return spec.type === "tags" ? [] : null;
}

function coerceValue(spec: AttributeSpec, raw: string | undefined, objectId: string): AttributeValue {
  const value = raw?.trim();
  if (value === undefined || value === "") return fallback(spec);

  switch (spec.type) {
    case "int":
    case "float": {
      const n = Number(value);
      if (!Number.isFinite(n)) {
        logger.debug(`${objectId}: ${spec.from}="${value}" is not numeric`, { module: "kinds" });
        return fallback(spec);
      }
      return spec.type === "int" ? Math.trunc(n) : n;
    }
    case "tags":
      return splitTags(value);
    default:
      return value;
  }
}

/** Numeric view of an attribute, 0 when absent or not a number */
export function num(value: AttributeValue | undefined): number {
  return typeof value === "number" ? value : 0;
}

export function tags(value: AttributeValue | undefined): readonly string[] {
  if (typeof value === "string") return splitTags(value);
  return Array.isArray(value) ? value : [];
}
