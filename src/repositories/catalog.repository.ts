/**
 * CatalogRepository
 *
 * Repository over information_schema.tables for a single schema, plus the
 * two DDL statements the service issues (DROP and CREATE TABLE AS).
 *
 * Catalog reads propagate their errors: a failed enumeration is fatal to the
 * phase that asked for it. DDL errors propagate too; the phases decide that
 * they are per-table failures.
 */

import type { Queryable } from '../database/client';
import { prefixPattern, qualifiedName } from '../database/identifiers';

export interface TableCatalog {
  /** Tables whose names start with `prefix` (backup tables). */
  findBackupTables(prefix: string): Promise<string[]>;
  /** Tables whose names do not start with `prefix` (backup sources). */
  findSourceTables(prefix: string): Promise<string[]>;
  dropTable(tableName: string): Promise<void>;
  createTableAs(backupTableName: string, sourceTableName: string): Promise<void>;
}

interface TableNameRow {
  table_name: string;
}

export class CatalogRepository implements TableCatalog {
  constructor(
    private db: Queryable,
    private schema: string = 'public'
  ) {}

  async findBackupTables(prefix: string): Promise<string[]> {
    const query = `
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = $1
        AND table_name LIKE $2
      ORDER BY table_name
    `;
    const rows = await this.db.query<TableNameRow>(query, [this.schema, prefixPattern(prefix)]);
    return rows.map((row) => row.table_name);
  }

  async findSourceTables(prefix: string): Promise<string[]> {
    const query = `
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = $1
        AND table_name NOT LIKE $2
      ORDER BY table_name
    `;
    const rows = await this.db.query<TableNameRow>(query, [this.schema, prefixPattern(prefix)]);
    return rows.map((row) => row.table_name);
  }

  async dropTable(tableName: string): Promise<void> {
    await this.db.query(`DROP TABLE IF EXISTS ${qualifiedName(this.schema, tableName)}`);
  }

  async createTableAs(backupTableName: string, sourceTableName: string): Promise<void> {
    await this.db.query(
      `CREATE TABLE ${qualifiedName(this.schema, backupTableName)} AS SELECT * FROM ${qualifiedName(this.schema, sourceTableName)}`
    );
  }
}
