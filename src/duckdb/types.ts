// Store-facing types shared by the DuckDB adapter and the in-memory store

export type Row = Record<string, unknown>

export interface ColumnInfo {
    name: string
    type: string
    nullable: boolean
    default: string | null
}

export interface QueryResult {
    columns: string[]
    rows: Row[]
}

export interface BoundedQueryResult extends QueryResult {
    // More rows were available than were read
    truncated: boolean
}

export type FileKind = 'csv' | 'tsv' | 'duckdb'

export interface ImportOptions {
    // Target table for delimited files; database files keep their own names
    tableName?: string
    replace?: boolean
}

export interface ImportedTable {
    name: string
    row_count: number
    display_name: string | null
    comment: string | null
    column_comments: Record<string, string>
}

export interface PageOptions {
    limit: number
    offset: number
}

export interface TableStore {
    listTables(): Promise<string[]>
    tableExists(table: string): Promise<boolean>
    countRows(table: string): Promise<number>
    getSchema(table: string): Promise<ColumnInfo[]>
    readRows(table: string, page: PageOptions): Promise<QueryResult>
    // Runs one read statement and reads at most `maxRows` rows of its result
    runQuery(sql: string, maxRows: number): Promise<BoundedQueryResult>
    importFile(path: string, kind: FileKind, options?: ImportOptions): Promise<ImportedTable[]>
    dropTable(table: string): Promise<boolean>
    renameColumn(table: string, from: string, to: string): Promise<void>
    // Flushes pending writes and returns the database file, or undefined for in-memory stores
    databaseFile(): Promise<string | undefined>
}

export interface MetadataRecord {
    table_name: string
    display_name: string | null
    comment: string | null
    column_comments: Record<string, string>
    updated_at: string
}

// Explicit mapping from table name to its curated metadata
export interface MetadataRecords {
    get(table: string): Promise<MetadataRecord | undefined>
    put(record: MetadataRecord): Promise<void>
    delete(table: string): Promise<void>
    list(): Promise<MetadataRecord[]>
}
