import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js'
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    type CallToolRequest,
    type CallToolResult,
    type ListToolsResult,
} from '@modelcontextprotocol/sdk/types.js'

import { logger } from '../logger.js'
import { SERVER_NAME, SERVER_VERSION } from '../version.js'
import type { ToolDispatcher } from './dispatcher.js'
import type { ToolEnvelope } from './tools/types.js'

export const formatToolResponse = (envelope: ToolEnvelope): CallToolResult => {
    return {
        content: [{
            type: 'text',
            text: JSON.stringify(envelope),
        }],
        isError: !envelope.ok,
    }
}

export class LocalDbMcpServer {
    private readonly server: Server

    constructor(private readonly dispatcher: ToolDispatcher) {
        this.server = new Server(
            {
                name: SERVER_NAME,
                version: SERVER_VERSION,
            },
            {
                capabilities: {
                    tools: {},
                },
                instructions: [
                    'Tables come from CSV, TSV and DuckDB files uploaded through the web UI.',
                    'Start with list_tables or search_tables, read get_table_metadata for column meanings,',
                    'then use get_table_data or execute_query (read-only SQL) to answer questions.',
                ].join('\n'),
            },
        )
        this.initializeHandlers()
    }

    async connect(transport: Transport): Promise<void> {
        await this.server.connect(transport)
    }

    async close(): Promise<void> {
        await this.server.close()
    }

    private initializeHandlers(): void {
        this.server.setRequestHandler(ListToolsRequestSchema, this.handleListTools.bind(this))
        this.server.setRequestHandler(CallToolRequestSchema, this.handleCallTool.bind(this))
    }

    private async handleListTools(): Promise<ListToolsResult> {
        return { tools: this.dispatcher.listTools() }
    }

    private async handleCallTool(request: CallToolRequest): Promise<CallToolResult> {
        logger.debug({ tool: request.params.name }, 'MCP tool call')
        const envelope = await this.dispatcher.dispatch(request.params.name, request.params.arguments ?? {})
        return formatToolResponse(envelope)
    }
}
