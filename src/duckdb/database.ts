import { mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'

import { DuckDBInstance, type DuckDBConnection } from '@duckdb/node-api'
import { z } from 'zod'

import { toCodedStoreError } from '../errors.js'
import type { QueryResult } from './types.js'
import { logStoreError } from './utils.js'

export const IN_MEMORY = ':memory:'

/**
 * Owns the single DuckDB instance for a database file. Every operation runs on
 * a fresh connection that is closed again when the operation settles.
 */
export class DuckDbDatabase {
    private constructor(
        private readonly instance: DuckDBInstance,
        readonly path: string,
    ) {}

    static async open(path: string): Promise<DuckDbDatabase> {
        if (path !== IN_MEMORY) {
            await mkdir(dirname(path), { recursive: true })
        }
        const instance = await DuckDBInstance.create(path)
        return new DuckDbDatabase(instance, path)
    }

    get inMemory(): boolean {
        return this.path === IN_MEMORY
    }

    async withConnection<T>(op: string, fn: (conn: DuckDBConnection) => Promise<T>): Promise<T> {
        const conn = await this.instance.connect()
        try {
            return await fn(conn)
        } catch (error) {
            const coded = toCodedStoreError(error, op)
            logStoreError(coded, op)
            throw coded
        } finally {
            conn.closeSync()
        }
    }

    /** Runs `fn` inside BEGIN/COMMIT on one connection, rolling back on failure. */
    async transaction<T>(op: string, fn: (conn: DuckDBConnection) => Promise<T>): Promise<T> {
        return this.withConnection(op, async (conn) => {
            await conn.run('BEGIN TRANSACTION')
            try {
                const result = await fn(conn)
                await conn.run('COMMIT')
                return result
            } catch (error) {
                await conn.run('ROLLBACK')
                throw error
            }
        })
    }

    /** Runs `fn` inside a transaction that is always rolled back. */
    async rolledBack<T>(op: string, fn: (conn: DuckDBConnection) => Promise<T>): Promise<T> {
        return this.withConnection(op, async (conn) => {
            await conn.run('BEGIN TRANSACTION')
            try {
                return await fn(conn)
            } finally {
                await conn.run('ROLLBACK')
            }
        })
    }

    async checkpoint(): Promise<void> {
        await this.withConnection('checkpoint', async (conn) => {
            await conn.run('CHECKPOINT')
        })
    }
}

export async function readAll(conn: DuckDBConnection, sql: string, params: Array<string | null> = []): Promise<QueryResult> {
    const reader = params.length ? await conn.runAndReadAll(sql, params) : await conn.runAndReadAll(sql)
    return { columns: reader.columnNames(), rows: reader.getRowObjectsJson() }
}

/** Runs an internal query and validates every row against `schema`. */
export async function readParsed<T extends z.ZodTypeAny>(
    conn: DuckDBConnection,
    schema: T,
    sql: string,
    params: Array<string | null> = [],
): Promise<Array<z.infer<T>>> {
    const { rows } = await readAll(conn, sql, params)
    return z.array(schema).parse(rows)
}
