import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { makeError } from '../errors.js'
import { logger } from '../logger.js'
import type { ColumnInfo, ImportedTable, QueryResult, TableStore } from '../duckdb/types.js'
import { tableNameFromFilename } from '../duckdb/utils.js'
import { ColumnNameSchema, validateTableName } from '../schema/identifiers.js'
import type { TableMetadataService } from './metadataService.js'
import { decodeDelimitedText, detectFileKind } from './upload.js'

export interface TableSummary {
    name: string
    display_name: string
    comment: string
    row_count: number
}

export type SearchField = 'name' | 'display_name' | 'comment'

export interface TableSearchHit extends TableSummary {
    matched: SearchField[]
}

export interface UploadInput {
    filename: string
    content: Uint8Array
    replace?: boolean
}

export type UploadResult =
    | { kind: 'table'; message: string; table_name: string; row_count: number }
    | { kind: 'database'; message: string; imported_tables: string[]; row_count: number }

export interface TablePage extends QueryResult {
    table: string
    limit: number
    offset: number
    row_count: number
}

/** Table-level use cases shared by the HTTP routes and the MCP tools. */
export class TableCatalog {
    constructor(
        readonly store: TableStore,
        readonly metadata: TableMetadataService,
    ) {}

    async listTables(): Promise<TableSummary[]> {
        const [names, records] = await Promise.all([this.store.listTables(), this.metadata.listRecords()])
        const byName = new Map(records.map((r) => [r.table_name, r]))
        return Promise.all(
            names.map(async (name) => {
                const record = byName.get(name)
                return {
                    name,
                    display_name: record?.display_name || name,
                    comment: record?.comment ?? '',
                    row_count: await this.store.countRows(name),
                }
            }),
        )
    }

    async searchTables(term: string): Promise<TableSearchHit[]> {
        const needle = term.trim().toLowerCase()
        if (!needle) {
            throw makeError('ValidationError', 'Search term must not be empty')
        }
        const hits: TableSearchHit[] = []
        for (const summary of await this.listTables()) {
            const matched = (['name', 'display_name', 'comment'] as const).filter((field) =>
                summary[field].toLowerCase().includes(needle),
            )
            if (matched.length) hits.push({ ...summary, matched })
        }
        return hits
    }

    async getSchema(table: string): Promise<ColumnInfo[]> {
        return this.store.getSchema(validateTableName(table))
    }

    async readPage(table: string, limit: number, offset: number): Promise<TablePage> {
        validateTableName(table)
        const page = await this.store.readRows(table, { limit, offset })
        const rowCount = await this.store.countRows(table)
        return { table, ...page, limit, offset, row_count: rowCount }
    }

    async importUpload({ filename, content, replace = false }: UploadInput): Promise<UploadResult> {
        const kind = detectFileKind(filename)
        const dir = await mkdtemp(join(tmpdir(), 'localdb-upload-'))
        let imported: ImportedTable[]
        try {
            const path = join(dir, `upload.${kind}`)
            if (kind === 'duckdb') {
                await writeFile(path, content)
                imported = await this.store.importFile(path, kind, { replace })
            } else {
                const tableName = validateTableName(tableNameFromFilename(filename))
                await writeFile(path, decodeDelimitedText(content), 'utf-8')
                imported = await this.store.importFile(path, kind, { tableName, replace })
            }
        } finally {
            await rm(dir, { recursive: true, force: true })
        }

        for (const table of imported) {
            await this.recordImportedMetadata(table, replace)
        }
        logger.info({ filename, kind, tables: imported.map((t) => t.name) }, 'Upload imported')

        const [first] = imported
        if (kind !== 'duckdb' && first) {
            return {
                kind: 'table',
                message: `File "${filename}" was imported`,
                table_name: first.name,
                row_count: first.row_count,
            }
        }
        return {
            kind: 'database',
            message: `Database "${filename}" was imported`,
            imported_tables: imported.map((t) => t.name),
            row_count: imported.reduce((sum, t) => sum + t.row_count, 0),
        }
    }

    private async recordImportedMetadata(table: ImportedTable, replaced: boolean): Promise<void> {
        const hasCurated = Boolean(table.display_name || table.comment || Object.keys(table.column_comments).length)
        if (hasCurated) {
            await this.metadata.putRecord({
                table_name: table.name,
                display_name: table.display_name,
                comment: table.comment,
                column_comments: table.column_comments,
                updated_at: new Date().toISOString(),
            })
        } else if (replaced) {
            await this.metadata.deleteMetadata(table.name)
        }
    }

    /**
     * Drops a table together with its metadata record. Once the table is gone
     * the call succeeds; a record that cannot be removed is left for
     * `pruneOrphanMetadata`.
     */
    async deleteTable(table: string): Promise<void> {
        validateTableName(table)
        if (!(await this.store.dropTable(table))) {
            await this.metadata.deleteMetadata(table)
            throw makeError('NotFound', `Table "${table}" does not exist`, { table })
        }
        logger.info({ table }, 'Table deleted')
        try {
            await this.metadata.deleteMetadata(table)
        } catch (error) {
            logger.error({ err: error, table }, 'Failed to remove metadata of deleted table')
        }
    }

    async renameColumn(table: string, from: string, to: string): Promise<void> {
        validateTableName(table)
        const parsed = ColumnNameSchema.safeParse(to)
        if (!parsed.success) {
            throw makeError('ValidationError', `Invalid column name "${to}": ${parsed.error.issues[0]?.message ?? 'rejected'}`)
        }
        await this.store.renameColumn(table, from, to)

        const record = await this.metadata.getRecord(table)
        const comment = record?.column_comments[from]
        if (record && comment !== undefined) {
            const { [from]: _moved, ...rest } = record.column_comments
            await this.metadata.putRecord({
                ...record,
                column_comments: { ...rest, [to]: comment },
                updated_at: new Date().toISOString(),
            })
        }
    }

    /** Removes metadata records whose table no longer exists. */
    async pruneOrphanMetadata(): Promise<string[]> {
        const existing = new Set(await this.store.listTables())
        const orphans = (await this.metadata.listRecords()).filter((r) => !existing.has(r.table_name))
        for (const record of orphans) {
            await this.metadata.deleteMetadata(record.table_name)
        }
        if (orphans.length) {
            logger.warn({ tables: orphans.map((r) => r.table_name) }, 'Removed metadata of missing tables')
        }
        return orphans.map((r) => r.table_name)
    }
}
