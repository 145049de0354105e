import { randomUUID } from 'node:crypto'

import { StatementType, type DuckDBConnection } from '@duckdb/node-api'
import { z } from 'zod'

import { makeError } from '../errors.js'
import { logger } from '../logger.js'
import { METADATA_TABLE, RESERVED_PREFIX, quoteIdent, quoteLiteral, validateTableName } from '../schema/identifiers.js'
import { isExplainAnalyze } from '../schema/sqlGuard.js'
import { DuckDbDatabase, readAll, readParsed } from './database.js'
import { parseColumnComments } from './metadataRecords.js'
import type {
    BoundedQueryResult,
    ColumnInfo,
    FileKind,
    ImportOptions,
    ImportedTable,
    PageOptions,
    QueryResult,
    TableStore,
} from './types.js'

const TableRowSchema = z.object({
    table_name: z.string(),
    comment: z.string().nullable(),
})

const ColumnRowSchema = z.object({
    column_name: z.string(),
    data_type: z.string(),
    is_nullable: z.boolean(),
    column_default: z.string().nullable(),
})

const ColumnCommentRowSchema = z.object({
    table_name: z.string(),
    column_name: z.string(),
    comment: z.string(),
})

const SourceMetadataRowSchema = z.object({
    table_name: z.string(),
    display_name: z.string().nullable(),
    comment: z.string().nullable(),
    column_comments: z.string(),
})

const CountSchema = z.object({ row_count: z.number() })

// SHOW, DESCRIBE and SUMMARIZE parse as SELECT
const READ_STATEMENT_TYPES: ReadonlySet<StatementType> = new Set([
    StatementType.SELECT,
    StatementType.EXPLAIN,
    StatementType.PRAGMA,
])

// The metadata side table is never a user table
async function tableExists(conn: DuckDBConnection, table: string): Promise<boolean> {
    const rows = await readParsed(
        conn,
        TableRowSchema,
        `SELECT table_name, comment FROM duckdb_tables()
         WHERE database_name = current_database() AND schema_name = 'main' AND table_name = $1
           AND NOT starts_with(table_name, $2)`,
        [table, RESERVED_PREFIX],
    )
    return rows.length > 0
}

async function ensureTable(conn: DuckDBConnection, table: string): Promise<void> {
    if (!(await tableExists(conn, table))) {
        throw makeError('NotFound', `Table "${table}" does not exist`, { table })
    }
}

async function countRows(conn: DuckDBConnection, table: string): Promise<number> {
    const [row] = await readParsed(conn, CountSchema, `SELECT CAST(count(*) AS DOUBLE) AS row_count FROM ${quoteIdent(table)}`)
    return row?.row_count ?? 0
}

export class DuckDbTableStore implements TableStore {
    constructor(private readonly db: DuckDbDatabase) {}

    async listTables(): Promise<string[]> {
        return this.db.withConnection('listTables', async (conn) => {
            const rows = await readParsed(
                conn,
                TableRowSchema,
                `SELECT table_name, comment FROM duckdb_tables()
                 WHERE database_name = current_database() AND schema_name = 'main'
                   AND NOT internal AND NOT temporary AND NOT starts_with(table_name, $1)
                 ORDER BY table_name`,
                [RESERVED_PREFIX],
            )
            return rows.map((r) => r.table_name)
        })
    }

    async tableExists(table: string): Promise<boolean> {
        return this.db.withConnection('tableExists', (conn) => tableExists(conn, table))
    }

    async countRows(table: string): Promise<number> {
        return this.db.withConnection('countRows', async (conn) => {
            await ensureTable(conn, table)
            return countRows(conn, table)
        })
    }

    async getSchema(table: string): Promise<ColumnInfo[]> {
        return this.db.withConnection('getSchema', async (conn) => {
            await ensureTable(conn, table)
            const rows = await readParsed(
                conn,
                ColumnRowSchema,
                `SELECT column_name, data_type, is_nullable, column_default FROM duckdb_columns()
                 WHERE database_name = current_database() AND schema_name = 'main' AND table_name = $1
                 ORDER BY column_index`,
                [table],
            )
            return rows.map((r) => ({
                name: r.column_name,
                type: r.data_type,
                nullable: r.is_nullable,
                default: r.column_default,
            }))
        })
    }

    async readRows(table: string, page: PageOptions): Promise<QueryResult> {
        const limit = Math.max(0, Math.trunc(page.limit))
        const offset = Math.max(0, Math.trunc(page.offset))
        return this.db.withConnection('readRows', async (conn) => {
            await ensureTable(conn, table)
            return readAll(conn, `SELECT * FROM ${quoteIdent(table)} LIMIT ${limit} OFFSET ${offset}`)
        })
    }

    /**
     * Parses `sql` with DuckDB itself, accepts exactly one read statement and
     * streams at most `maxRows` rows. The statement runs in a transaction that
     * is rolled back, so nothing it writes is kept.
     */
    async runQuery(sql: string, maxRows: number): Promise<BoundedQueryResult> {
        return this.db.rolledBack('runQuery', async (conn) => {
            const extracted = await conn.extractStatements(sql)
            if (extracted.count !== 1) {
                throw makeError(
                    'ValidationError',
                    extracted.count === 0 ? 'Query is empty' : `Expected a single statement but got ${extracted.count}`,
                )
            }
            const prepared = await extracted.prepare(0)
            if (!READ_STATEMENT_TYPES.has(prepared.statementType) || isExplainAnalyze(sql)) {
                throw makeError('ValidationError', 'Only read statements (SELECT, SHOW, DESCRIBE, SUMMARIZE, EXPLAIN, PRAGMA) can be executed')
            }
            const cap = Math.max(0, Math.trunc(maxRows))
            const reader = await prepared.streamAndReadUntil(cap + 1)
            const rows = reader.getRowObjectsJson()
            return {
                columns: reader.columnNames(),
                rows: rows.slice(0, cap),
                truncated: rows.length > cap,
            }
        })
    }

    async importFile(path: string, kind: FileKind, options: ImportOptions = {}): Promise<ImportedTable[]> {
        if (kind === 'duckdb') {
            return this.importDatabase(path, options.replace ?? false)
        }
        if (!options.tableName) {
            throw makeError('ValidationError', 'A table name is required to import a delimited file')
        }
        const table = validateTableName(options.tableName)
        const replace = options.replace ?? false
        const delim = kind === 'tsv' ? `, delim = '\\t'` : ''

        return this.db.transaction('importFile', async (conn) => {
            if (!replace && (await tableExists(conn, table))) {
                throw makeError('ConflictError', `Table "${table}" already exists`, { table })
            }
            const create = replace ? 'CREATE OR REPLACE TABLE' : 'CREATE TABLE'
            await conn.run(`${create} ${quoteIdent(table)} AS SELECT * FROM read_csv_auto(${quoteLiteral(path)}${delim})`)
            const rowCount = await countRows(conn, table)
            logger.info({ table, kind, row_count: rowCount }, 'Imported delimited file')
            return [{ name: table, row_count: rowCount, display_name: null, comment: null, column_comments: {} }]
        })
    }

    private async importDatabase(path: string, replace: boolean): Promise<ImportedTable[]> {
        const alias = `upload_${randomUUID().replace(/-/g, '')}`
        return this.db.withConnection('importDatabase', async (conn) => {
            await conn.run(`ATTACH ${quoteLiteral(path)} AS ${quoteIdent(alias)} (READ_ONLY)`)
            try {
                return await this.copyAttachedTables(conn, alias, replace)
            } finally {
                await conn.run(`DETACH ${quoteIdent(alias)}`)
            }
        })
    }

    private async copyAttachedTables(conn: DuckDBConnection, alias: string, replace: boolean): Promise<ImportedTable[]> {
        const sourceTables = await readParsed(
            conn,
            TableRowSchema,
            `SELECT table_name, comment FROM duckdb_tables()
             WHERE database_name = $1 AND schema_name = 'main' AND NOT internal
             ORDER BY table_name`,
            [alias],
        )
        const tables = sourceTables.filter((t) => !t.table_name.startsWith(RESERVED_PREFIX))
        if (tables.length === 0) {
            throw makeError('ValidationError', 'The uploaded database contains no tables')
        }
        for (const t of tables) validateTableName(t.table_name)

        const columnComments = await readParsed(
            conn,
            ColumnCommentRowSchema,
            `SELECT table_name, column_name, comment FROM duckdb_columns()
             WHERE database_name = $1 AND schema_name = 'main' AND comment IS NOT NULL AND comment <> ''`,
            [alias],
        )
        // A database exported by this server carries its curated metadata along
        const carried = sourceTables.some((t) => t.table_name === METADATA_TABLE)
            ? await readParsed(
                  conn,
                  SourceMetadataRowSchema,
                  `SELECT table_name, display_name, comment, column_comments FROM ${quoteIdent(alias)}.main.${quoteIdent(METADATA_TABLE)}`,
              )
            : []

        if (!replace) {
            const conflicts: string[] = []
            for (const t of tables) {
                if (await tableExists(conn, t.table_name)) conflicts.push(t.table_name)
            }
            if (conflicts.length) {
                throw makeError('ConflictError', `Tables already exist: ${conflicts.join(', ')}`, { tables: conflicts })
            }
        }

        await conn.run('BEGIN TRANSACTION')
        try {
            const imported: ImportedTable[] = []
            for (const t of tables) {
                const create = replace ? 'CREATE OR REPLACE TABLE' : 'CREATE TABLE'
                await conn.run(
                    `${create} ${quoteIdent(t.table_name)} AS SELECT * FROM ${quoteIdent(alias)}.main.${quoteIdent(t.table_name)}`,
                )
                const meta = carried.find((m) => m.table_name === t.table_name)
                const fromColumns = Object.fromEntries(
                    columnComments.filter((c) => c.table_name === t.table_name).map((c) => [c.column_name, c.comment]),
                )
                imported.push({
                    name: t.table_name,
                    row_count: await countRows(conn, t.table_name),
                    display_name: meta?.display_name ?? null,
                    comment: meta?.comment || t.comment || null,
                    column_comments: { ...fromColumns, ...(meta ? parseColumnComments(meta.column_comments) : {}) },
                })
            }
            await conn.run('COMMIT')
            logger.info({ tables: imported.map((t) => t.name) }, 'Imported DuckDB database')
            return imported
        } catch (error) {
            await conn.run('ROLLBACK')
            throw error
        }
    }

    async dropTable(table: string): Promise<boolean> {
        return this.db.withConnection('dropTable', async (conn) => {
            if (!(await tableExists(conn, table))) return false
            await conn.run(`DROP TABLE ${quoteIdent(table)}`)
            return true
        })
    }

    async renameColumn(table: string, from: string, to: string): Promise<void> {
        await this.db.withConnection('renameColumn', async (conn) => {
            await ensureTable(conn, table)
            await conn.run(`ALTER TABLE ${quoteIdent(table)} RENAME COLUMN ${quoteIdent(from)} TO ${quoteIdent(to)}`)
        })
    }

    async databaseFile(): Promise<string | undefined> {
        if (this.db.inMemory) return undefined
        await this.db.checkpoint()
        return this.db.path
    }
}
