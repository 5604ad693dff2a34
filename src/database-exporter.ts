/**
 * DatabaseExporter — writes resolved records into MySQL.
 *
 * Every object class is replaced as a whole inside one transaction: stale
 * rows of the class are deleted, then the records are upserted in batches.
 * A failure rolls back, leaving the previous export in place.
 */
import * as mysql from "mysql2/promise";
import type { Pool, PoolConnection, ResultSetHeader } from "mysql2/promise";
import type { ResolvedRecord } from "./macro-resolver.js";
import type { ObjectClass } from "./object-classes.js";
import type { DbConfig } from "./utils/config.js";
import logger from "./utils/logger.js";

export const GAME_OBJECTS_SCHEMA = `CREATE TABLE IF NOT EXISTS game_objects (
  object_id VARCHAR(255) NOT NULL,
  object_class VARCHAR(32) NOT NULL,
  kind VARCHAR(64) NOT NULL,
  name VARCHAR(512) NULL,
  attributes JSON NOT NULL,
  subrecords JSON NOT NULL,
  updated_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP ON UPDATE CURRENT_TIMESTAMP,
  PRIMARY KEY (object_class, object_id)
)`;

const COLUMNS = ["object_id", "object_class", "kind", "name", "attributes", "subrecords"] as const;
const INSERT_HEAD = `INSERT INTO game_objects (${COLUMNS.join(", ")}) VALUES`;
const UPDATE_TAIL = `ON DUPLICATE KEY UPDATE ${COLUMNS.slice(2)
  .map((c) => `${c}=VALUES(${c})`)
  .join(", ")}`;

type Row = (string | number | null)[];

export function toRow(objectClass: ObjectClass, record: ResolvedRecord): Row {
  const name = record.attributes.name;
  return [
    record.id,
    objectClass,
    record.kind,
    typeof name === "string" ? name : null,
    JSON.stringify(record.attributes),
    JSON.stringify(record.subrecords),
  ];
}

export class DatabaseExporter {
  static readonly BATCH_SIZE = 50;

  constructor(private pool: Pool) {}

  static connect(config: DbConfig): DatabaseExporter {
    return new DatabaseExporter(mysql.createPool(config));
  }

  async ensureSchema(): Promise<void> {
    await this.pool.query(GAME_OBJECTS_SCHEMA);
  }

  /**
   * Multi-row INSERT … ON DUPLICATE KEY UPDATE in batches.
   * @returns Number of rows affected
   */
  private async batchUpsert(conn: PoolConnection, rows: Row[], batchSize = DatabaseExporter.BATCH_SIZE): Promise<number> {
    if (!rows.length) return 0;
    const placeholder = `(${Array(COLUMNS.length).fill("?").join(",")})`;
    let affected = 0;

    for (let i = 0; i < rows.length; i += batchSize) {
      const batch = rows.slice(i, i + batchSize);
      const sql = `${INSERT_HEAD} ${batch.map(() => placeholder).join(",")} ${UPDATE_TAIL}`;
      const [result] = await conn.execute<ResultSetHeader>(sql, batch.flat());
      affected += result.affectedRows ?? batch.length;
    }
    return affected;
  }

  /** Replace the stored rows of one object class */
  async write(objectClass: ObjectClass, records: readonly ResolvedRecord[]): Promise<number> {
    const conn = await this.pool.getConnection();
    try {
      await conn.beginTransaction();
      await conn.execute("DELETE FROM game_objects WHERE object_class = ?", [objectClass]);
      const affected = await this.batchUpsert(
        conn,
        records.map((record) => toRow(objectClass, record)),
      );
      await conn.commit();
      logger.info(`Saved ${records.length} ${objectClass} (${affected} rows affected)`, { module: "database" });
      return records.length;
    } catch (e) {
      try {
        await conn.rollback();
      } catch (rollbackError) {
        logger.error(`Rollback failed: ${String(rollbackError)}`, { module: "database" });
      }
      logger.error(`Export of ${objectClass} failed, transaction rolled back`, { module: "database" });
      throw e;
    } finally {
      conn.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
