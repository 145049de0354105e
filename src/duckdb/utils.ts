import type { CodedError } from '../errors.js'
import { logger } from '../logger.js'

export function logStoreError(error: CodedError, op: string) {
    // Caller-side mistakes are expected traffic; only engine failures are errors
    const level = error.code === 'StoreError' ? 'error' : 'warn'
    logger[level](
        {
            op,
            error_code: error.code,
            error_message: error.message,
        },
        'DuckDB operation failed',
    )
}

/** Table name for a delimited upload: the file name without its extension. */
export function tableNameFromFilename(filename: string): string {
    const base = filename.split(/[\\/]/).pop() ?? filename
    const dot = base.lastIndexOf('.')
    return dot > 0 ? base.slice(0, dot) : base
}
