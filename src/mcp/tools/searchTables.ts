import { z } from 'zod'

import { defineTool } from './types.js'

export const searchTablesTool = defineTool({
    name: 'search_tables',
    title: 'Search Tables',
    description: 'Find tables whose name, display name or comment contains the search term (case-insensitive)',
    input: z.object({
        term: z.string().refine((t) => t.trim().length > 0, 'Search term cannot be empty').describe('Text to look for'),
    }),
    run: async ({ term }, { catalog }) => ({ term, tables: await catalog.searchTables(term) }),
})
