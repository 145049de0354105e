import { makeError } from '../errors.js'
import type { FileKind } from '../duckdb/types.js'

const EXTENSIONS: Record<string, FileKind> = {
    '.csv': 'csv',
    '.tsv': 'tsv',
    '.duckdb': 'duckdb',
}

export function detectFileKind(filename: string): FileKind {
    const lower = filename.toLowerCase()
    for (const [ext, kind] of Object.entries(EXTENSIONS)) {
        if (lower.endsWith(ext)) return kind
    }
    throw makeError('ValidationError', 'Only CSV, TSV and DuckDB files are supported', { filename })
}

// Spreadsheet exports from Japanese locales are commonly Shift_JIS
const TEXT_ENCODINGS = ['utf-8', 'shift_jis'] as const

export function decodeDelimitedText(content: Uint8Array): string {
    for (const encoding of TEXT_ENCODINGS) {
        try {
            return new TextDecoder(encoding, { fatal: true }).decode(content)
        } catch {
            continue
        }
    }
    throw makeError('ValidationError', 'Unsupported text encoding; save the file as UTF-8 or Shift_JIS')
}
