import { z } from 'zod'

import { defineTool } from './types.js'

export const listTablesTool = defineTool({
    name: 'list_tables',
    title: 'List Tables',
    description: 'List every table in the local database with its display name, comment and row count',
    input: z.object({}),
    run: async (_args, { catalog }) => ({ tables: await catalog.listTables() }),
})
