/**
 * Centralized configuration, read from the environment (.env via dotenv)
 */
import { z } from "zod";

export const EXPORT_FORMATS = ["csv", "json", "yaml", "mysql"] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

export const EnvSchema = z.object({
  GAME_ROOT: z.string().min(1).default("."),
  FILE_LOADER: z.enum(["cat", "fs"]).default("cat"),
  MAX_LAYERS: z.coerce.number().int().min(1).max(99).default(99),
  LANGUAGE: z.string().min(1).default("en"),
  EXPORT_DIR: z.string().min(1).default("."),
  EXPORT_FORMAT: z.enum(EXPORT_FORMATS).default("csv"),
  ON_DOCUMENT_ERROR: z.enum(["abort", "skip"]).default("abort"),
  VERIFY_CHECKSUMS: booleanFlag.default("true"),
  DB_HOST: z.string().default("localhost"),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(3306),
  DB_USER: z.string().optional(),
  DB_PASSWORD: z.string().optional(),
  DB_NAME: z.string().optional(),
});

export type ExtractorConfig = z.infer<typeof EnvSchema>;

/** Empty strings in .env mean "unset" */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value.trim();
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExtractorConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

export interface DbConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  waitForConnections: boolean;
  connectionLimit: number;
}

/** MySQL settings are only required when exporting to a database */
export function dbConfigFrom(config: ExtractorConfig): DbConfig {
  const { DB_USER: user, DB_PASSWORD: password, DB_NAME: database } = config;
  if (!user || !password || !database) {
    throw new Error("DB_USER, DB_PASSWORD, and DB_NAME environment variables are required for the mysql format.");
  }
  return {
    host: config.DB_HOST,
    port: config.DB_PORT,
    user,
    password,
    database,
    waitForConnections: true,
    connectionLimit: 5,
  };
}
