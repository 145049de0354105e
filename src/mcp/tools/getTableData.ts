import { z } from 'zod'

import { TableNameSchema } from '../../schema/identifiers.js'
import { defineTool, resolveLimit } from './types.js'

export const getTableDataTool = defineTool({
    name: 'get_table_data',
    title: 'Get Table Data',
    description: 'Return a page of rows from a table (default 100 rows, capped by the server maximum)',
    input: z.object({
        table_name: TableNameSchema.describe('Table name as returned by list_tables'),
        limit: z.number().int().min(1).optional().describe('Maximum number of rows to return'),
        offset: z.number().int().min(0).default(0).describe('Number of rows to skip'),
    }),
    run: async ({ table_name, limit, offset }, { catalog, limits }) =>
        catalog.readPage(table_name, resolveLimit(limit, limits), offset),
})
