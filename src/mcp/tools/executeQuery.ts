import { z } from 'zod'

import { assertReadOnlyQuery, READ_KEYWORDS } from '../../schema/sqlGuard.js'
import { defineTool, resolveLimit } from './types.js'

export const executeQueryTool = defineTool({
    name: 'execute_query',
    title: 'Execute Query',
    description: [
        'Run one read-only SQL statement against the local DuckDB database and return column names and rows.',
        `Allowed statements start with ${READ_KEYWORDS.join(', ')}.`,
        "Table names that contain special characters must be double quoted, e.g. SELECT * FROM \"sales 2024\".",
        'At most `limit` rows are returned (default 100); `truncated` tells whether rows were cut off.',
    ].join(' '),
    input: z.object({
        query: z.string().refine((sql) => sql.trim().length > 0, 'SQL query cannot be empty').describe('SQL statement to execute'),
        limit: z.number().int().min(1).optional().describe('Maximum number of rows to return'),
    }),
    run: async ({ query, limit }, { catalog, limits }) => {
        assertReadOnlyQuery(query)
        const { columns, rows, truncated } = await catalog.store.runQuery(query, resolveLimit(limit, limits))
        return { columns, rows, row_count: rows.length, truncated }
    },
})
