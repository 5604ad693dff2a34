#!/usr/bin/env node
/**
 * X4 data extractor CLI
 *
 * Reads the game's catalog archives (or an extracted copy of them), resolves
 * ship, equipment and ware definitions, and writes them as CSV, JSON, YAML
 * or MySQL rows.
 *
 * Usage:
 *   npx tsx extract.ts -g /path/to/X4 export ships engines -f json -d ./export
 *   npx tsx extract.ts -g /path/to/X4 resolve-string '{20101,30302}'
 *
 * Environment variables (or .env file): see .env.example
 */
import "dotenv/config";
import { ArchiveOverlay } from "./src/archive-overlay.js";
import { HELP, UsageError, parseArgs } from "./src/cli-args.js";
import { DatabaseExporter } from "./src/database-exporter.js";
import { DirectoryProvider } from "./src/directory-provider.js";
import { writeRecords } from "./src/export-service.js";
import { ExtractionService } from "./src/extraction-service.js";
import type { GameFileSource } from "./src/game-files.js";
import { LocalizationService, languageFileFor, localizeRecords } from "./src/localization-service.js";
import type { ObjectClass } from "./src/object-classes.js";
import { type ExtractorConfig, dbConfigFrom, loadConfig } from "./src/utils/config.js";
import logger from "./src/utils/logger.js";

async function openGameFiles(config: ExtractorConfig): Promise<GameFileSource> {
  if (config.FILE_LOADER === "fs") return new DirectoryProvider(config.GAME_ROOT);
  return ArchiveOverlay.discover(config.GAME_ROOT, config.MAX_LAYERS, { verifyChecksums: config.VERIFY_CHECKSUMS });
}

async function loadLocalization(files: GameFileSource, language: string): Promise<LocalizationService> {
  const localization = new LocalizationService();
  const file = languageFileFor(language);
  if (file && (await files.exists(file))) await localization.loadLanguage(files, language);
  else logger.warn(`Language file ${file ?? language} not found, text placeholders stay unresolved`);
  return localization;
}

// ── Commands ────────────────────────────────────────────────

async function resolveStrings(files: GameFileSource, config: ExtractorConfig, templates: readonly string[]) {
  const localization = new LocalizationService();
  await localization.loadLanguage(files, config.LANGUAGE);
  for (const template of templates) console.log(localization.resolve(template));
}

async function exportObjects(files: GameFileSource, config: ExtractorConfig, objects: readonly ObjectClass[]) {
  const database = config.EXPORT_FORMAT === "mysql" ? DatabaseExporter.connect(dbConfigFrom(config)) : null;

  try {
    const localization = await loadLocalization(files, config.LANGUAGE);
    const extractor = new ExtractionService(files, { onDocumentError: config.ON_DOCUMENT_ERROR });
    const { results, stats } = await extractor.extract(objects, (msg) => logger.info(msg));

    if (database) await database.ensureSchema();
    const written: string[] = [];
    for (const [objectClass, result] of results) {
      const records = localization.isLoaded ? localizeRecords(result.records, localization) : result.records;
      if (database) {
        await database.write(objectClass, records);
        written.push(`${objectClass} → game_objects (${records.length})`);
      } else if (config.EXPORT_FORMAT !== "mysql") {
        const output = await writeRecords(objectClass, records, config.EXPORT_DIR, config.EXPORT_FORMAT);
        written.push(`${output.path ?? objectClass} (${output.rows})`);
      }
    }

    const duration = ((stats.durationMs ?? 0) / 1000).toFixed(1);
    logger.info("═══════════════════════════════════════════");
    logger.info(`✅ Extraction complete in ${duration}s`);
    logger.info(`   Source:       ${files.description}`);
    logger.info(`   Documents:    ${stats.documents}`);
    logger.info(`   Definitions:  ${stats.nodes}`);
    for (const line of written) logger.info(`   Wrote ${line}`);
    if (localization.unresolved.length) {
      logger.warn(`   Unresolved text: ${localization.unresolved.length}`);
    }
    if (stats.diagnostics.length) {
      logger.warn(`   Diagnostics:  ${stats.diagnostics.length}`);
      for (const d of stats.diagnostics) logger.warn(`     - [${d.code}] ${d.message}`);
    }
    if (stats.errors.length) {
      logger.warn(`   Errors:       ${stats.errors.length}`);
      for (const e of stats.errors) logger.warn(`     - ${e}`);
    }
    logger.info("═══════════════════════════════════════════");
  } finally {
    await database?.close();
  }
}

// ── Main ────────────────────────────────────────────────────

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(HELP);
    return;
  }
  if (args.verbose) logger.level = "debug";

  const config = loadConfig({ ...process.env, ...args.env });
  if (!languageFileFor(config.LANGUAGE)) throw new UsageError(`Unknown language "${config.LANGUAGE}"`);

  const files = await openGameFiles(config);
  try {
    if (args.command === "resolve-string") await resolveStrings(files, config, args.templates);
    else await exportObjects(files, config, args.objects);
  } finally {
    await files.close();
  }
}

main().catch((e: unknown) => {
  console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
  if (e instanceof UsageError) console.error("Run with --help for usage.");
  process.exit(1);
});
