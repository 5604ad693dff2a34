/**
 * LocalizationService — resolves `{page,text}` placeholders against the
 * game's language files (t/0001-l044.xml and friends).
 *
 * A language file looks like:
 *   <language id="44">
 *     <page id="20101">
 *       <t id="30302">Behemoth {20111,1101}</t>
 *     </page>
 *   </language>
 *
 * Substituted text may contain further placeholders, so substitution runs
 * until the text stops changing.
 */
import { readFileSync } from "fs";
import { z } from "zod";
import type { GameFileSource } from "./game-files.js";
import type { ResolvedRecord } from "./macro-resolver.js";
import type { AttributeMap, AttributeValue, ConnectionSlot } from "./object-kinds.js";
import { dataFilePath } from "./utils/data-files.js";
import logger from "./utils/logger.js";
import { childrenByTag, parseXml } from "./utils/xml-tree.js";

const PLACEHOLDER = /\{\s*(\d+)\s*,\s*(\d+)\s*\}/g;
/** ( … ) not preceded by a backslash is an author comment */
const COMMENT = /(?<!\\)\(.*?(?<!\\)\)/g;
const ESCAPE = /\\(.)/g;
const MAX_PASSES = 32;

const LanguageTableSchema = z.record(z.array(z.string().min(1)).min(1));

let languageTable: Map<string, string> | null = null;

/** alias (lower-case) → language file */
function languageFiles(): Map<string, string> {
  if (!languageTable) {
    const file = dataFilePath("languages.json");
    const table = LanguageTableSchema.parse(JSON.parse(readFileSync(file, "utf8")));
    languageTable = new Map();
    for (const [path, aliases] of Object.entries(table)) {
      for (const alias of aliases) languageTable.set(alias.toLowerCase(), path);
    }
  }
  return languageTable;
}

/** Language file for a locale alias, undefined when the alias is unknown */
export function languageFileFor(locale: string): string | undefined {
  return languageFiles().get(locale.trim().toLowerCase());
}

export interface TextResolver {
  resolve(template: string, locale?: string): string;
}

export class LocalizationService implements TextResolver {
  /** locale → "page:text" → text */
  private languages = new Map<string, Map<string, string>>();
  private defaultLocale: string | null = null;
  private unresolvedFields = new Set<string>();

  get isLoaded(): boolean {
    return this.languages.size > 0;
  }
  get entryCount(): number {
    let count = 0;
    for (const entries of this.languages.values()) count += entries.size;
    return count;
  }
  /** Placeholders that could not be resolved, in first-seen order */
  get unresolved(): string[] {
    return [...this.unresolvedFields];
  }

  /** Load the language file for a locale alias; the first locale loaded is the default */
  async loadLanguage(files: GameFileSource, locale: string): Promise<number> {
    const path = languageFileFor(locale);
    if (!path) throw new Error(`Unknown language "${locale}"`);
    return this.loadLanguageFile(locale, await files.readFile(path), path);
  }

  /** Parse one language document into the locale's table */
  loadLanguageFile(locale: string, bytes: Buffer | string, source = locale): number {
    const key = locale.toLowerCase();
    const root = parseXml(bytes, source);
    let entries = this.languages.get(key);
    if (!entries) {
      entries = new Map();
      this.languages.set(key, entries);
    }
    let parsed = 0;
    for (const page of childrenByTag(root, "page")) {
      const pageId = page.attributes.id?.trim();
      if (!pageId) continue;
      for (const text of childrenByTag(page, "t")) {
        const textId = text.attributes.id?.trim();
        if (!textId) continue;
        entries.set(`${Number(pageId)}:${Number(textId)}`, text.content ?? "");
        parsed++;
      }
    }
    this.defaultLocale ??= key;
    logger.info(`Localization ${key}: ${parsed.toLocaleString()} entries from ${source}`, { module: "localization" });
    return parsed;
  }

  /**
   * Replace every `{page,text}` placeholder. Unknown placeholders are kept
   * verbatim; `\x` escapes are undone once substitution is finished.
   */
  resolve(template: string, locale?: string, strip = true): string {
    if (!template) return template;
    const key = (locale ?? this.defaultLocale ?? "").toLowerCase();
    const entries = this.languages.get(key);
    if (!entries) throw new Error(`Language "${locale ?? ""}" is not loaded`);

    let text = template;
    let previous: string | null = null;
    let passes = 0;
    while (text !== previous) {
      if (passes++ === MAX_PASSES) {
        logger.warn(`Placeholders still expanding after ${MAX_PASSES} passes: ${template}`, { module: "localization" });
        break;
      }
      previous = text;
      text = text.replace(PLACEHOLDER, (field: string, page: string, id: string) => {
        const value = entries.get(`${Number(page)}:${Number(id)}`);
        if (value === undefined) {
          if (!this.unresolvedFields.has(field)) {
            this.unresolvedFields.add(field);
            logger.warn(`Unresolved text ${field}`, { module: "localization" });
          }
          return field;
        }
        return value.replace(COMMENT, "");
      });
    }

    text = text.replace(ESCAPE, "$1");
    return strip ? text.trim() : text;
  }
}

// ── Records ──────────────────────────────────────────────

function localizeValue(value: AttributeValue, resolver: TextResolver, locale?: string): AttributeValue {
  return typeof value === "string" && value.includes("{") ? resolver.resolve(value, locale) : value;
}

function localizeMap(attributes: Readonly<AttributeMap>, resolver: TextResolver, locale?: string): AttributeMap {
  const out: AttributeMap = {};
  for (const [key, value] of Object.entries(attributes)) out[key] = localizeValue(value, resolver, locale);
  return out;
}

function localizeSlot(slot: ConnectionSlot, resolver: TextResolver, locale?: string): ConnectionSlot {
  return Object.freeze({
    ...slot,
    attributes: slot.attributes ? Object.freeze(localizeMap(slot.attributes, resolver, locale)) : null,
    connections: Object.freeze(slot.connections.map((c) => localizeSlot(c, resolver, locale))),
  });
}

/** Copies of the records with every placeholder-bearing string resolved */
export function localizeRecords(
  records: readonly ResolvedRecord[],
  resolver: TextResolver,
  locale?: string,
): ResolvedRecord[] {
  return records.map((record) => {
    const subrecords: Record<string, readonly Readonly<AttributeMap>[]> = {};
    for (const [name, rows] of Object.entries(record.subrecords)) {
      subrecords[name] = Object.freeze(rows.map((row) => Object.freeze(localizeMap(row, resolver, locale))));
    }
    return Object.freeze({
      ...record,
      attributes: Object.freeze(localizeMap(record.attributes, resolver, locale)),
      connections: Object.freeze(record.connections.map((slot) => localizeSlot(slot, resolver, locale))),
      subrecords: Object.freeze(subrecords),
    });
  });
}
