import { makeError } from '../errors.js'

export const READ_KEYWORDS = [
    'SELECT',
    'WITH',
    'FROM',
    'VALUES',
    'TABLE',
    'SHOW',
    'DESCRIBE',
    'SUMMARIZE',
    'EXPLAIN',
    'PRAGMA',
] as const

const DOLLAR_QUOTE = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/

/**
 * Splits SQL text on top-level semicolons, skipping quoted strings,
 * dollar-quoted strings, quoted identifiers and comments. Comments are
 * dropped from the output.
 */
export function splitStatements(sql: string): string[] {
    const statements: string[] = []
    let current = ''
    let i = 0
    while (i < sql.length) {
        const ch = sql[i]
        const next = sql[i + 1]
        if (ch === '-' && next === '-') {
            const end = sql.indexOf('\n', i)
            i = end === -1 ? sql.length : end
            current += ' '
            continue
        }
        if (ch === '/' && next === '*') {
            const end = sql.indexOf('*/', i + 2)
            i = end === -1 ? sql.length : end + 2
            current += ' '
            continue
        }
        if (ch === '$') {
            const tag = DOLLAR_QUOTE.exec(sql.slice(i))?.[0]
            if (tag) {
                const close = sql.indexOf(tag, i + tag.length)
                const end = close === -1 ? sql.length : close + tag.length
                current += sql.slice(i, end)
                i = end
                continue
            }
        }
        if (ch === "'" || ch === '"') {
            let j = i + 1
            while (j < sql.length) {
                if (sql[j] === ch) {
                    if (sql[j + 1] === ch) {
                        j += 2
                        continue
                    }
                    break
                }
                j++
            }
            current += sql.slice(i, j + 1)
            i = j + 1
            continue
        }
        if (ch === ';') {
            if (current.trim()) statements.push(current.trim())
            current = ''
            i++
            continue
        }
        current += ch
        i++
    }
    if (current.trim()) statements.push(current.trim())
    return statements
}

/** The first two words of a statement, upper-cased, skipping opening parentheses. */
export function leadingKeywords(statement: string): string[] {
    const match = /^[\s(]*([A-Za-z]+)(?:[\s(]+([A-Za-z]+))?/.exec(statement)
    if (!match) return []
    return match
        .slice(1)
        .filter((word) => word !== undefined)
        .map((word) => word.toUpperCase())
}

/** EXPLAIN ANALYZE executes the statement it explains. */
export function isExplainAnalyze(sql: string): boolean {
    return splitStatements(sql).some((statement) => {
        const [first, second] = leadingKeywords(statement)
        return first === 'EXPLAIN' && (second === 'ANALYZE' || second === 'ANALYSE')
    })
}

/** Returns the single read statement in `sql`, or throws ValidationError. */
export function assertReadOnlyQuery(sql: string): string {
    const statements = splitStatements(sql)
    if (statements.length === 0) {
        throw makeError('ValidationError', 'Query is empty')
    }
    if (statements.length > 1) {
        throw makeError('ValidationError', `Expected a single statement but got ${statements.length}`)
    }
    const [statement] = statements
    const [keyword = ''] = leadingKeywords(statement)
    if (!READ_KEYWORDS.some((k) => k === keyword)) {
        throw makeError('ValidationError', `execute_query only runs read statements (${READ_KEYWORDS.join(', ')}); got ${keyword || 'nothing'}`, {
            keyword,
        })
    }
    if (isExplainAnalyze(statement)) {
        throw makeError('ValidationError', 'EXPLAIN ANALYZE runs the explained statement and is not allowed', { keyword })
    }
    return statement
}
