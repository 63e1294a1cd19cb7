import type { Catalog } from './catalog';
import { defaultCatalog } from './catalog';
import type {
  CanonicalIR,
  ColumnDef,
  DefaultExpr,
  ForeignKeyDef,
  IndexDef,
  LogicalType,
  PrimaryKeyDef,
  ReferentialAction,
  UniqueDef,
} from './model';
import { createIR, createSchema } from './model';
import { parseSqlDefault } from './literals';
import { UnsupportedConstructError } from './errors';

const REPR = 'DeclarativeQuery';

/**
 * Database client interface - compatible with both pg.Client and PGlite
 */
export interface DbClient {
  query<T = unknown>(sql: string, params?: unknown[]): Promise<{ rows: T[] }>;
}

/**
 * List the base tables of a PostgreSQL schema.
 */
export async function listTables(client: DbClient, schemaName = 'public'): Promise<string[]> {
  const result = await client.query<{ table_name: string }>(`
    SELECT table_name
    FROM information_schema.tables
    WHERE table_schema = $1
      AND table_type = 'BASE TABLE'
    ORDER BY table_name
  `, [schemaName]);

  return result.rows.map(r => r.table_name);
}

/**
 * Read one table definition from a PostgreSQL database into the canonical IR.
 * Constraint names PostgreSQL derives itself are left out, so they read back as unnamed.
 */
export async function extractTable(
  client: DbClient,
  tableName: string,
  schemaName = 'public',
  catalog: Catalog = defaultCatalog
): Promise<CanonicalIR> {
  const description = await extractTableDescription(client, schemaName, tableName);
  const columns = await extractColumns(client, schemaName, tableName, catalog);
  if (columns.length === 0) {
    throw new Error(`Table "${schemaName}.${tableName}" not found`);
  }
  const constraints = await extractConstraints(client, schemaName, tableName);
  const indexes = await extractIndexes(client, schemaName, tableName);

  const schema = createSchema(tableName, columns, {
    description,
    primaryKey: constraints.primaryKey,
    uniques: constraints.uniques,
    foreignKeys: constraints.foreignKeys,
    indexes,
  });
  return createIR(schema);
}

async function extractTableDescription(client: DbClient, schemaName: string, tableName: string): Promise<string | undefined> {
  const result = await client.query<{ description: string | null }>(`
    SELECT obj_description(c.oid, 'pg_class') AS description
    FROM pg_class c
    JOIN pg_namespace n ON n.oid = c.relnamespace
    WHERE n.nspname = $1 AND c.relname = $2
  `, [schemaName, tableName]);

  return result.rows[0]?.description ?? undefined;
}

async function extractColumns(client: DbClient, schemaName: string, tableName: string, catalog: Catalog): Promise<ColumnDef[]> {
  const result = await client.query<{
    column_name: string;
    data_type: string;
    is_nullable: boolean;
    column_default: string | null;
    description: string | null;
  }>(`
    SELECT
      a.attname AS column_name,
      format_type(a.atttypid, a.atttypmod) AS data_type,
      NOT a.attnotnull AS is_nullable,
      pg_get_expr(d.adbin, d.adrelid) AS column_default,
      col_description(a.attrelid, a.attnum) AS description
    FROM pg_attribute a
    JOIN pg_class c ON c.oid = a.attrelid
    JOIN pg_namespace n ON n.oid = c.relnamespace
    LEFT JOIN pg_attrdef d ON d.adrelid = a.attrelid AND d.adnum = a.attnum
    WHERE n.nspname = $1
      AND c.relname = $2
      AND a.attnum > 0
      AND NOT a.attisdropped
    ORDER BY a.attnum
  `, [schemaName, tableName]);

  return result.rows.map(row => {
    const type = catalog.resolveType(row.data_type, REPR);
    return {
      name: row.column_name,
      type,
      nullable: row.is_nullable,
      default: row.column_default === null ? undefined : normalizeDefault(row.column_default, type, catalog),
      description: row.description ?? undefined,
    };
  });
}

const numericBases: readonly LogicalType['base'][] = ['smallint', 'integer', 'bigint', 'decimal', 'double'];

/**
 * PostgreSQL reports defaults as stored expressions: `'x'::text`, `'-1'::integer`, `now()`.
 * Strip the casts and read the rest the way DDL is read.
 */
export function normalizeDefault(expression: string, type: LogicalType, catalog: Catalog = defaultCatalog): DefaultExpr {
  let text = expression.trim();
  for (;;) {
    const stripped = text
      .replace(/::[a-z_][a-z0-9_ ]*(\(\d+(,\s*\d+)?\))?(\[\])?$/i, '')
      .replace(/^\((.*)\)$/, '$1')
      .trim();
    if (stripped === text) break;
    text = stripped;
  }
  const quotedNumber = /^'(-?\d+(\.\d+)?)'$/.exec(text);
  if (quotedNumber && numericBases.includes(type.base)) {
    text = quotedNumber[1];
  }
  return parseSqlDefault(text, REPR, catalog);
}

/**
 * Parse a PostgreSQL array string like "{a,b,c}" into a JavaScript array.
 * Handles the case where pg driver returns arrays as strings.
 */
function parsePostgresArray(value: string | string[]): string[] {
  if (Array.isArray(value)) {
    return value;
  }
  // PostgreSQL array format: {element1,element2,...}
  if (value.startsWith('{') && value.endsWith('}')) {
    const inner = value.slice(1, -1);
    if (inner === '') return [];
    return inner.split(',').map(v => v.replace(/^"(.*)"$/, '$1'));
  }
  return [value];
}

const referentialActions: Record<string, ReferentialAction | undefined> = {
  // NO ACTION is what an unspecified action reads back as
  a: undefined,
  r: 'restrict',
  c: 'cascade',
  n: 'set-null',
  d: 'set-default',
};

interface ExtractedConstraints {
  primaryKey?: PrimaryKeyDef;
  uniques: UniqueDef[];
  foreignKeys: ForeignKeyDef[];
}

async function extractConstraints(client: DbClient, schemaName: string, tableName: string): Promise<ExtractedConstraints> {
  const result = await client.query<{
    constraint_name: string;
    constraint_type: string;
    columns: string | string[];
    to_table: string | null;
    to_columns: string | string[];
    delete_rule: string;
    update_rule: string;
    definition: string;
  }>(`
    SELECT
      c.conname AS constraint_name,
      c.contype::text AS constraint_type,
      ARRAY(
        SELECT a.attname::text
        FROM unnest(c.conkey) WITH ORDINALITY AS cols(col, ord)
        JOIN pg_attribute a ON a.attrelid = c.conrelid AND a.attnum = cols.col
        ORDER BY cols.ord
      ) AS columns,
      cl2.relname AS to_table,
      ARRAY(
        SELECT a.attname::text
        FROM unnest(c.confkey) WITH ORDINALITY AS cols(col, ord)
        JOIN pg_attribute a ON a.attrelid = c.confrelid AND a.attnum = cols.col
        ORDER BY cols.ord
      ) AS to_columns,
      c.confdeltype::text AS delete_rule,
      c.confupdtype::text AS update_rule,
      pg_get_constraintdef(c.oid) AS definition
    FROM pg_constraint c
    JOIN pg_class cl ON cl.oid = c.conrelid
    JOIN pg_namespace n ON n.oid = cl.relnamespace
    LEFT JOIN pg_class cl2 ON cl2.oid = c.confrelid
    WHERE n.nspname = $1
      AND cl.relname = $2
      AND c.contype IN ('p', 'u', 'f', 'c', 'x')
    ORDER BY c.conname
  `, [schemaName, tableName]);

  const extracted: ExtractedConstraints = { uniques: [], foreignKeys: [] };
  for (const row of result.rows) {
    const columns = parsePostgresArray(row.columns);
    const derived = (suffix: string) => (row.constraint_name === `${tableName}_${suffix}` ? undefined : row.constraint_name);

    switch (row.constraint_type) {
      case 'p':
        extracted.primaryKey = { name: derived('pkey'), columns };
        break;
      case 'u':
        extracted.uniques.push({ name: derived(`${columns.join('_')}_key`), columns });
        break;
      case 'f':
        extracted.foreignKeys.push({
          name: derived(`${columns.join('_')}_fkey`),
          columns,
          referencedTable: row.to_table ?? '',
          referencedColumns: parsePostgresArray(row.to_columns),
          onDelete: referentialActions[row.delete_rule],
          onUpdate: referentialActions[row.update_rule],
        });
        break;
      default:
        // CHECK and EXCLUDE have no canonical form
        throw new UnsupportedConstructError(row.definition, REPR, 'IR');
    }
  }
  return extracted;
}

/**
 * Only plain btree indexes over columns in ascending order have a canonical form;
 * partial, expression, INCLUDE and other access-method indexes are refused.
 */
async function extractIndexes(client: DbClient, schemaName: string, tableName: string): Promise<IndexDef[]> {
  const result = await client.query<{
    index_name: string;
    definition: string;
    method: string;
    is_unique: boolean;
    is_partial: boolean;
    has_expressions: boolean;
    has_included_columns: boolean;
    has_column_options: boolean;
    columns: string | string[];
  }>(`
    SELECT
      ic.relname AS index_name,
      pg_get_indexdef(i.indexrelid) AS definition,
      am.amname AS method,
      i.indisunique AS is_unique,
      i.indpred IS NOT NULL AS is_partial,
      i.indexprs IS NOT NULL OR 0 = ANY(i.indkey::int2[]) AS has_expressions,
      i.indnatts <> i.indnkeyatts AS has_included_columns,
      EXISTS (SELECT 1 FROM unnest(i.indoption::int2[]) AS o(flags) WHERE o.flags <> 0) AS has_column_options,
      ARRAY(
        SELECT a.attname::text
        FROM unnest(i.indkey::int2[]) WITH ORDINALITY AS k(attnum, ord)
        JOIN pg_attribute a ON a.attrelid = i.indrelid AND a.attnum = k.attnum
        ORDER BY k.ord
      ) AS columns
    FROM pg_index i
    JOIN pg_class ic ON ic.oid = i.indexrelid
    JOIN pg_am am ON am.oid = ic.relam
    JOIN pg_class c ON c.oid = i.indrelid
    JOIN pg_namespace n ON n.oid = c.relnamespace
    WHERE n.nspname = $1
      AND c.relname = $2
      AND NOT EXISTS (SELECT 1 FROM pg_constraint con WHERE con.conindid = i.indexrelid AND con.conrelid = i.indrelid)
    ORDER BY ic.relname
  `, [schemaName, tableName]);

  return result.rows.map(row => {
    if (
      row.method !== 'btree' ||
      row.is_partial ||
      row.has_expressions ||
      row.has_included_columns ||
      row.has_column_options
    ) {
      throw new UnsupportedConstructError(row.definition, REPR, 'IR');
    }
    return {
      name: row.index_name,
      columns: parsePostgresArray(row.columns),
      unique: row.is_unique,
    };
  });
}
