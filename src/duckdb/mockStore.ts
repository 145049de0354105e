import { readFile } from 'node:fs/promises'

import { makeError } from '../errors.js'
import { quoteIdent, validateTableName } from '../schema/identifiers.js'
import type {
    BoundedQueryResult,
    ColumnInfo,
    FileKind,
    ImportOptions,
    ImportedTable,
    MetadataRecord,
    MetadataRecords,
    PageOptions,
    QueryResult,
    Row,
    TableStore,
} from './types.js'

interface MockTable {
    columns: ColumnInfo[]
    rows: Row[]
}

const SELECT_ALL = /^\s*SELECT\s+\*\s+FROM\s+("(?:[^"]|"")+"|[A-Za-z_][A-Za-z0-9_]*)\s*(?:LIMIT\s+(\d+))?\s*;?\s*$/i

function column(name: string): ColumnInfo {
    return { name, type: 'VARCHAR', nullable: true, default: null }
}

// A simple in-memory store for tests and DX. Delimited files are split on the
// delimiter without quoting rules; queries are limited to SELECT * FROM <table>.
export class MockTableStore implements TableStore {
    private tables = new Map<string, MockTable>()

    seedTable(name: string, rows: Row[], columns: string[] = Object.keys(rows[0] ?? {})) {
        this.tables.set(name, { columns: columns.map(column), rows: [...rows] })
    }

    private table(name: string): MockTable {
        const t = this.tables.get(name)
        if (!t) throw makeError('NotFound', `Table "${name}" does not exist`, { table: name })
        return t
    }

    async listTables(): Promise<string[]> {
        return Array.from(this.tables.keys()).sort((a, b) => a.localeCompare(b))
    }

    async tableExists(table: string): Promise<boolean> {
        return this.tables.has(table)
    }

    async countRows(table: string): Promise<number> {
        return this.table(table).rows.length
    }

    async getSchema(table: string): Promise<ColumnInfo[]> {
        return this.table(table).columns.map((c) => ({ ...c }))
    }

    async readRows(table: string, page: PageOptions): Promise<QueryResult> {
        const t = this.table(table)
        return {
            columns: t.columns.map((c) => c.name),
            rows: t.rows.slice(page.offset, page.offset + page.limit),
        }
    }

    async runQuery(sql: string, maxRows: number): Promise<BoundedQueryResult> {
        const match = SELECT_ALL.exec(sql)
        if (!match) {
            throw new Error('Parser Error: mock store only understands SELECT * FROM <table> [LIMIT n]')
        }
        const [, rawName = '', limit] = match
        const name = rawName.startsWith('"') ? rawName.slice(1, -1).replace(/""/g, '"') : rawName
        const t = this.tables.get(name)
        if (!t) throw new Error(`Catalog Error: Table with name ${name} does not exist!`)
        const rows = limit === undefined ? t.rows : t.rows.slice(0, Number(limit))
        return {
            columns: t.columns.map((c) => c.name),
            rows: rows.slice(0, maxRows),
            truncated: rows.length > maxRows,
        }
    }

    async importFile(path: string, kind: FileKind, options: ImportOptions = {}): Promise<ImportedTable[]> {
        if (kind === 'duckdb') {
            throw makeError('StoreError', 'mock: DuckDB database files cannot be imported into the in-memory store')
        }
        const name = validateTableName(options.tableName ?? '')
        if (this.tables.has(name) && !options.replace) {
            throw makeError('ConflictError', `Table "${name}" already exists`, { table: name })
        }
        const text = await readFile(path, 'utf-8')
        const delimiter = kind === 'tsv' ? '\t' : ','
        const lines = text.split(/\r?\n/).filter((line) => line.length > 0)
        const header = (lines.shift() ?? '').split(delimiter)
        if (header.length === 0 || header[0] === '') {
            throw new Error(`Invalid Input Error: ${quoteIdent(name)} has no header row`)
        }
        const rows = lines.map((line) => {
            const cells = line.split(delimiter)
            return Object.fromEntries(header.map((h, i) => [h, cells[i] ?? null]))
        })
        this.tables.set(name, { columns: header.map(column), rows })
        return [{ name, row_count: rows.length, display_name: null, comment: null, column_comments: {} }]
    }

    async dropTable(table: string): Promise<boolean> {
        return this.tables.delete(table)
    }

    async renameColumn(table: string, from: string, to: string): Promise<void> {
        const t = this.table(table)
        const col = t.columns.find((c) => c.name === from)
        if (!col) throw new Error(`Binder Error: Table "${table}" does not have a column with name "${from}"`)
        if (t.columns.some((c) => c.name === to)) {
            throw new Error(`Catalog Error: Column with name ${to} already exists!`)
        }
        col.name = to
        t.rows = t.rows.map(({ [from]: value, ...rest }) => ({ ...rest, [to]: value }))
    }

    async databaseFile(): Promise<string | undefined> {
        return undefined
    }
}

export class InMemoryMetadataRecords implements MetadataRecords {
    private records = new Map<string, MetadataRecord>()

    async get(table: string): Promise<MetadataRecord | undefined> {
        const record = this.records.get(table)
        return record ? { ...record, column_comments: { ...record.column_comments } } : undefined
    }

    async put(record: MetadataRecord): Promise<void> {
        this.records.set(record.table_name, { ...record, column_comments: { ...record.column_comments } })
    }

    async delete(table: string): Promise<void> {
        this.records.delete(table)
    }

    async list(): Promise<MetadataRecord[]> {
        return Array.from(this.records.values()).sort((a, b) => a.table_name.localeCompare(b.table_name))
    }
}
