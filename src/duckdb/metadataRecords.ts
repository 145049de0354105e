import { z } from 'zod'

import { METADATA_TABLE, quoteIdent } from '../schema/identifiers.js'
import { DuckDbDatabase, readParsed } from './database.js'
import type { MetadataRecord, MetadataRecords } from './types.js'

const ColumnCommentsSchema = z.record(z.string(), z.string())

const RecordRowSchema = z.object({
    table_name: z.string(),
    display_name: z.string().nullable(),
    comment: z.string().nullable(),
    column_comments: z.string(),
    updated_at: z.string(),
})

const TABLE = quoteIdent(METADATA_TABLE)
const COLUMNS = 'table_name, display_name, comment, column_comments, updated_at'

export function parseColumnComments(raw: string): Record<string, string> {
    let json: unknown
    try {
        json = JSON.parse(raw)
    } catch {
        return {}
    }
    const parsed = ColumnCommentsSchema.safeParse(json)
    return parsed.success ? parsed.data : {}
}

function toRecord(row: z.infer<typeof RecordRowSchema>): MetadataRecord {
    return { ...row, column_comments: parseColumnComments(row.column_comments) }
}

/** Metadata side table living next to the user tables in the DuckDB file. */
export class DuckDbMetadataRecords implements MetadataRecords {
    private constructor(private readonly db: DuckDbDatabase) {}

    static async create(db: DuckDbDatabase): Promise<DuckDbMetadataRecords> {
        await db.withConnection('metadata.init', async (conn) => {
            await conn.run(
                `CREATE TABLE IF NOT EXISTS ${TABLE} (
                    table_name VARCHAR PRIMARY KEY,
                    display_name VARCHAR,
                    comment VARCHAR,
                    column_comments VARCHAR NOT NULL DEFAULT '{}',
                    updated_at VARCHAR NOT NULL
                )`,
            )
        })
        return new DuckDbMetadataRecords(db)
    }

    async get(table: string): Promise<MetadataRecord | undefined> {
        const [row] = await this.db.withConnection('metadata.get', (conn) =>
            readParsed(conn, RecordRowSchema, `SELECT ${COLUMNS} FROM ${TABLE} WHERE table_name = $1`, [table]),
        )
        return row ? toRecord(row) : undefined
    }

    async put(record: MetadataRecord): Promise<void> {
        await this.db.withConnection('metadata.put', async (conn) => {
            await conn.run(`INSERT OR REPLACE INTO ${TABLE} (${COLUMNS}) VALUES ($1, $2, $3, $4, $5)`, [
                record.table_name,
                record.display_name,
                record.comment,
                JSON.stringify(record.column_comments),
                record.updated_at,
            ])
        })
    }

    async delete(table: string): Promise<void> {
        await this.db.withConnection('metadata.delete', async (conn) => {
            await conn.run(`DELETE FROM ${TABLE} WHERE table_name = $1`, [table])
        })
    }

    async list(): Promise<MetadataRecord[]> {
        const rows = await this.db.withConnection('metadata.list', (conn) =>
            readParsed(conn, RecordRowSchema, `SELECT ${COLUMNS} FROM ${TABLE} ORDER BY table_name`),
        )
        return rows.map(toRecord)
    }
}
