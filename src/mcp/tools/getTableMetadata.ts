import { z } from 'zod'

import { TableNameSchema } from '../../schema/identifiers.js'
import { defineTool } from './types.js'

export const getTableMetadataTool = defineTool({
    name: 'get_table_metadata',
    title: 'Get Table Metadata',
    description:
        'Return the curated metadata of a table: display name, description, row count and every column with its type and comment',
    input: z.object({
        table_name: TableNameSchema.describe('Table name as returned by list_tables'),
    }),
    run: async ({ table_name }, { metadata }) => metadata.getMetadata(table_name),
})
