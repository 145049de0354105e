import { z } from 'zod'

import { TableNameSchema } from '../../schema/identifiers.js'
import { defineTool } from './types.js'

export const getTableSchemaTool = defineTool({
    name: 'get_table_schema',
    title: 'Get Table Schema',
    description: 'Return the columns of a table with their data types, nullability and defaults',
    input: z.object({
        table_name: TableNameSchema.describe('Table name as returned by list_tables'),
    }),
    run: async ({ table_name }, { catalog }) => ({
        table: table_name,
        columns: await catalog.getSchema(table_name),
    }),
})
