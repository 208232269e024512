/**
 * Schema Catalog Accessor
 * One information_schema read per investigation, returned frozen
 */

import { StoreUnavailableError } from "@salesiq/core";
import type { SqlClient } from "@salesiq/db";
import type { SchemaColumn, SchemaDescriptor } from "./types.js";

function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function buildSchemaQuery(schemaName: string): string {
  const schema = quoteLiteral(schemaName);
  return `SELECT c.table_name, c.column_name, c.data_type, c.is_nullable,
       fk.foreign_table, fk.foreign_column
FROM information_schema.columns c
LEFT JOIN (
  SELECT kcu.table_name, kcu.column_name,
         ccu.table_name AS foreign_table, ccu.column_name AS foreign_column
  FROM information_schema.table_constraints tc
  JOIN information_schema.key_column_usage kcu
    ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
  JOIN information_schema.constraint_column_usage ccu
    ON tc.constraint_name = ccu.constraint_name AND tc.table_schema = ccu.table_schema
  WHERE tc.constraint_type = 'FOREIGN KEY' AND tc.table_schema = ${schema}
) fk ON fk.table_name = c.table_name AND fk.column_name = c.column_name
WHERE c.table_schema = ${schema}
ORDER BY c.table_name, c.ordinal_position`;
}

function text(value: unknown): string | null {
  return typeof value === "string" && value !== "" ? value : null;
}

export class SchemaCatalog {
  constructor(
    private readonly client: SqlClient,
    private readonly schemaName = "public"
  ) {}

  get schema(): string {
    return this.schemaName;
  }

  /**
   * @throws StoreUnavailableError on any store failure or unreadable row
   */
  async fetch(): Promise<SchemaDescriptor> {
    let rows: Array<Record<string, unknown>>;
    try {
      rows = (await this.client.query(buildSchemaQuery(this.schemaName))).rows;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new StoreUnavailableError(`Schema lookup failed: ${reason}`, error);
    }

    const tables: Record<string, SchemaColumn[]> = {};

    for (const row of rows) {
      const table = text(row.table_name);
      const column = text(row.column_name);
      if (!table || !column) {
        throw new StoreUnavailableError("Schema lookup returned a row without table or column name");
      }

      const foreignTable = text(row.foreign_table);
      const foreignColumn = text(row.foreign_column);

      (tables[table] ??= []).push(
        Object.freeze({
          name: column,
          type: text(row.data_type) ?? "unknown",
          nullable: row.is_nullable === "YES",
          references:
            foreignTable && foreignColumn ? Object.freeze({ table: foreignTable, column: foreignColumn }) : null,
        })
      );
    }

    for (const columns of Object.values(tables)) {
      Object.freeze(columns);
    }
    return Object.freeze(tables);
  }
}

export function hasColumns(schema: SchemaDescriptor, table: string, columns: readonly string[]): boolean {
  const available = schema[table];
  if (!available) return false;
  const names = new Set(available.map((c) => c.name));
  return columns.every((c) => names.has(c));
}

/**
 * Table → column names, for the scratchpad
 */
export function summarizeSchema(schema: SchemaDescriptor): Record<string, string[]> {
  const summary: Record<string, string[]> = {};
  for (const [table, columns] of Object.entries(schema)) {
    summary[table] = columns.map((c) => (c.references ? `${c.name} → ${c.references.table}.${c.references.column}` : c.name));
  }
  return summary;
}
