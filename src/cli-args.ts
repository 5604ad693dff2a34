/**
 * Command-line parsing for extract.ts.
 *
 * Flags are turned into environment overrides so that the same zod schema
 * validates flags, .env values and defaults.
 */
import { OBJECT_CLASSES, type ObjectClass, isObjectClass } from "./object-classes.js";

export const HELP = `
X4 data extractor — catalog archives → CSV / JSON / YAML / MySQL

Usage:
  npx tsx extract.ts [global options] export [objects...] [-d <dir>] [-f <format>] [--skip-broken]
  npx tsx extract.ts [global options] resolve-string <template...>

Global options:
  --game-root, -g <dir>      Game installation directory (default: .)
  --file-loader <cat|fs>     Read catalog archives or an extracted tree (default: cat)
  --lang, -l <language>      Language for text placeholders (default: en)
  --max-layers <n>           Highest catalog rank to probe, 1-99 (default: 99)
  --verbose, -v              Debug logging
  --help, -h                 Show this help

export:
  objects                    ${OBJECT_CLASSES.join(", ")} or all (default: all)
  --dir, -d <dir>            Output directory (default: .)
  --format, -f <format>      csv | json | yaml | mysql (default: csv)
  --skip-broken              Log and skip unreadable documents instead of failing

Example:
  npx tsx extract.ts resolve-string 'This ship is {20101,30302}'

Environment:
  GAME_ROOT, FILE_LOADER, LANGUAGE, MAX_LAYERS, EXPORT_DIR, EXPORT_FORMAT,
  ON_DOCUMENT_ERROR, VERIFY_CHECKSUMS, DB_HOST, DB_PORT, DB_USER, DB_PASSWORD,
  DB_NAME, LOG_LEVEL, LOG_DIR
`;

export type CliCommand = "export" | "resolve-string";

export interface CliArgs {
  command: CliCommand | null;
  help: boolean;
  verbose: boolean;
  /** Environment keys set by flags */
  env: Record<string, string>;
  objects: ObjectClass[];
  templates: string[];
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const GLOBAL_FLAGS: Readonly<Record<string, string>> = {
  "--game-root": "GAME_ROOT",
  "-g": "GAME_ROOT",
  "--file-loader": "FILE_LOADER",
  "--lang": "LANGUAGE",
  "-l": "LANGUAGE",
  "--max-layers": "MAX_LAYERS",
};

const EXPORT_FLAGS: Readonly<Record<string, string>> = {
  "--dir": "EXPORT_DIR",
  "-d": "EXPORT_DIR",
  "--format": "EXPORT_FORMAT",
  "-f": "EXPORT_FORMAT",
};

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { command: null, help: false, verbose: false, env: {}, objects: [], templates: [] };
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      args.help = true;
      continue;
    }
    if (arg === "--verbose" || arg === "-v") {
      args.verbose = true;
      continue;
    }
    if (args.command === "export" && arg === "--skip-broken") {
      args.env.ON_DOCUMENT_ERROR = "skip";
      continue;
    }

    const key = GLOBAL_FLAGS[arg] ?? (args.command === "export" ? EXPORT_FLAGS[arg] : undefined);
    if (key) {
      const value = argv[i + 1];
      if (value === undefined) throw new UsageError(`${arg} requires a value`);
      args.env[key] = value;
      i++;
      continue;
    }
    if (arg.startsWith("-") && arg.length > 1 && args.command !== "resolve-string") {
      throw new UsageError(`Unknown option ${arg}`);
    }

    if (args.command === null) {
      if (arg !== "export" && arg !== "resolve-string") throw new UsageError(`Unknown command "${arg}"`);
      args.command = arg;
    } else positionals.push(arg);
  }

  if (args.help) return args;
  if (args.command === null) throw new UsageError("A command is required: export or resolve-string");

  if (args.command === "resolve-string") {
    if (!positionals.length) throw new UsageError("resolve-string needs at least one template");
    args.templates = positionals;
    return args;
  }

  const requested = positionals.length ? positionals.map((p) => p.toLowerCase()) : ["all"];
  const objects = new Set<ObjectClass>();
  for (const name of requested) {
    if (name === "all") OBJECT_CLASSES.forEach((c) => objects.add(c));
    else if (isObjectClass(name)) objects.add(name);
    else throw new UsageError(`Unknown object class "${name}" (expected ${OBJECT_CLASSES.join(", ")} or all)`);
  }
  args.objects = [...objects];
  return args;
}
