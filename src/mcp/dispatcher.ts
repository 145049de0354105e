import type { ListToolsResult } from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'
import { zodToJsonSchema } from 'zod-to-json-schema'

import { makeError, toCodedStoreError } from '../errors.js'
import { logger } from '../logger.js'
import { executeQueryTool } from './tools/executeQuery.js'
import { getTableDataTool } from './tools/getTableData.js'
import { getTableMetadataTool } from './tools/getTableMetadata.js'
import { getTableSchemaTool } from './tools/getTableSchema.js'
import { listTablesTool } from './tools/listTables.js'
import { searchTablesTool } from './tools/searchTables.js'
import type { ToolContext, ToolDefinition, ToolEnvelope } from './tools/types.js'

// Every key must equal its tool's name
function registry<T extends { [K in keyof T]: ToolDefinition<K & string, z.ZodTypeAny> }>(tools: T): T {
    return tools
}

export const TOOLS = registry({
    list_tables: listTablesTool,
    get_table_schema: getTableSchemaTool,
    get_table_metadata: getTableMetadataTool,
    get_table_data: getTableDataTool,
    execute_query: executeQueryTool,
    search_tables: searchTablesTool,
})

export type ToolName = keyof typeof TOOLS

export type ToolCall = {
    [K in ToolName]: { name: K; arguments: z.input<(typeof TOOLS)[K]['input']> }
}[ToolName]

export type ToolDescriptor = ListToolsResult['tools'][number]

const TOOL_NAMES = Object.keys(TOOLS)

export function isToolName(name: string): name is ToolName {
    return Object.prototype.hasOwnProperty.call(TOOLS, name)
}

// Helper function to convert Zod schemas to JSON Schema for MCP tools
export const getInputSchema = (schema: z.ZodTypeAny): ToolDescriptor['inputSchema'] => {
    const jsonSchema = zodToJsonSchema(schema, { $refStrategy: 'none' })

    if (!('type' in jsonSchema) || jsonSchema.type !== 'object') {
        throw new Error(`Invalid input schema: expected an object but got ${
            'type' in jsonSchema ? String(jsonSchema.type) : 'no type'
        }`)
    }

    return { ...jsonSchema, type: 'object' }
}

/**
 * Single entry point for tool calls. Never throws: every outcome is an envelope.
 */
export class ToolDispatcher {
    constructor(private readonly ctx: ToolContext) {}

    listTools(): ToolDescriptor[] {
        return Object.values(TOOLS).map((tool) => ({
            name: tool.name,
            title: tool.title,
            description: tool.description,
            inputSchema: getInputSchema(tool.input),
        }))
    }

    async call(call: ToolCall): Promise<ToolEnvelope> {
        return this.dispatch(call.name, call.arguments)
    }

    async dispatch(name: string, args: unknown): Promise<ToolEnvelope> {
        const log = logger.child({ tool: name })
        const started = Date.now()
        try {
            if (!isToolName(name)) {
                throw makeError('ValidationError', `Unknown tool: ${name}. Available tools: ${TOOL_NAMES.join(', ')}`)
            }
            const data = await TOOLS[name].execute(args, this.ctx)
            log.debug({ duration_ms: Date.now() - started }, 'Tool call succeeded')
            return { ok: true, data }
        } catch (error) {
            const coded = toCodedStoreError(error, name)
            log.info({ duration_ms: Date.now() - started, error_code: coded.code, error_message: coded.message }, 'Tool call failed')
            return {
                ok: false,
                error: { code: coded.code, message: coded.message, ...(coded.meta ? { details: coded.meta } : {}) },
            }
        }
    }
}
