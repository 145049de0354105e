import { z } from 'zod'

import { makeError } from '../errors.js'
import type { MetadataRecord, MetadataRecords, TableStore } from '../duckdb/types.js'
import { validateTableName } from '../schema/identifiers.js'

export const MetadataPatchSchema = z
    .object({
        display_name: z.string().max(256).nullable().optional().describe('Human readable table name; null resets it to the table name'),
        comment: z.string().nullable().optional().describe('Free-text description of the table; null clears it'),
        column_comments: z
            .record(z.string(), z.string())
            .optional()
            .describe('Column name to comment; an empty string clears that column comment'),
    })
    .strict()
export type MetadataPatch = z.infer<typeof MetadataPatchSchema>

export interface ColumnMetadata {
    name: string
    type: string
    nullable: boolean
    comment: string
}

export interface TableMetadata {
    table: string
    display_name: string
    comment: string
    row_count: number
    columns: ColumnMetadata[]
    updated_at: string | null
}

/**
 * Human-curated annotations layered on top of the raw tables. A table without
 * a stored record reports its own name as display name and empty comments.
 */
export class TableMetadataService {
    constructor(
        private readonly store: TableStore,
        private readonly records: MetadataRecords,
    ) {}

    async getMetadata(table: string): Promise<TableMetadata> {
        validateTableName(table)
        const schema = await this.store.getSchema(table)
        const [record, rowCount] = await Promise.all([this.records.get(table), this.store.countRows(table)])
        const columnComments = record?.column_comments ?? {}
        return {
            table,
            display_name: record?.display_name || table,
            comment: record?.comment ?? '',
            row_count: rowCount,
            columns: schema.map((c) => ({
                name: c.name,
                type: c.type,
                nullable: c.nullable,
                comment: columnComments[c.name] ?? '',
            })),
            updated_at: record?.updated_at ?? null,
        }
    }

    async setMetadata(table: string, patch: MetadataPatch): Promise<TableMetadata> {
        validateTableName(table)
        if (!(await this.store.tableExists(table))) {
            throw makeError('NotFound', `Table "${table}" does not exist`, { table })
        }
        const { display_name, comment, column_comments } = MetadataPatchSchema.parse(patch)

        if (column_comments) {
            const known = new Set((await this.store.getSchema(table)).map((c) => c.name))
            const unknown = Object.keys(column_comments).filter((name) => !known.has(name))
            if (unknown.length) {
                throw makeError('ValidationError', `Unknown columns for table "${table}": ${unknown.join(', ')}`, {
                    table,
                    unknownColumns: unknown,
                })
            }
        }

        const existing = await this.records.get(table)
        const merged: Record<string, string> = { ...(existing?.column_comments ?? {}) }
        for (const [name, text] of Object.entries(column_comments ?? {})) {
            if (text === '') delete merged[name]
            else merged[name] = text
        }

        await this.records.put({
            table_name: table,
            display_name: display_name === undefined ? existing?.display_name ?? null : display_name || null,
            comment: comment === undefined ? existing?.comment ?? null : comment || null,
            column_comments: merged,
            updated_at: new Date().toISOString(),
        })
        return this.getMetadata(table)
    }

    async deleteMetadata(table: string): Promise<void> {
        await this.records.delete(table)
    }

    async getRecord(table: string): Promise<MetadataRecord | undefined> {
        return this.records.get(table)
    }

    async listRecords(): Promise<MetadataRecord[]> {
        return this.records.list()
    }

    async putRecord(record: MetadataRecord): Promise<void> {
        await this.records.put(record)
    }
}
