import { z } from 'zod'

import { makeError } from '../errors.js'

export const RESERVED_PREFIX = '_localdb_'
export const METADATA_TABLE = `${RESERVED_PREFIX}table_metadata`

// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/

export const TableNameSchema = z
    .string()
    .min(1, 'Table name must not be empty')
    .max(128, 'Table name must be at most 128 characters')
    .refine((name) => name.trim().length > 0, 'Table name must not be blank')
    .refine((name) => !CONTROL_CHARS.test(name), 'Table name must not contain control characters')
    .refine((name) => !name.startsWith(RESERVED_PREFIX), `Table names starting with ${RESERVED_PREFIX} are reserved`)

export const ColumnNameSchema = z
    .string()
    .min(1, 'Column name must not be empty')
    .refine((name) => !CONTROL_CHARS.test(name), 'Column name must not contain control characters')

export function validateTableName(name: string): string {
    const parsed = TableNameSchema.safeParse(name)
    if (!parsed.success) {
        throw makeError('ValidationError', `Invalid table name "${name}": ${parsed.error.issues[0]?.message ?? 'rejected'}`, {
            table: name,
        })
    }
    return parsed.data
}

export function quoteIdent(name: string): string {
    return `"${name.replace(/"/g, '""')}"`
}

export function quoteLiteral(value: string): string {
    return `'${value.replace(/'/g, "''")}'`
}
