import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'

import { getEnv, setEnvOverrides } from './config/env.js'
import { buildContext, buildServer } from './context.js'
import { startHttpServer } from './http/server.js'
import { logger } from './logger.js'

export { createApp } from './http/app.js'
export { startHttpServer } from './http/server.js'
export { buildContext, buildServer, createContext, type AppContext } from './context.js'
export { ToolDispatcher, TOOLS, type ToolCall, type ToolName } from './mcp/dispatcher.js'
export { LocalDbMcpServer } from './mcp/server.js'
export type { ToolEnvelope } from './mcp/tools/types.js'
export { DuckDbTableStore } from './duckdb/tableStore.js'
export { MockTableStore, InMemoryMetadataRecords } from './duckdb/mockStore.js'

export interface McpServerConfig {
    databasePath?: string
    mock?: boolean
}

export async function createMcpServer(config?: McpServerConfig) {
    if (config) {
        setEnvOverrides({
            LOCALDB_PATH: config.databasePath,
            LOCALDB_MOCK: config.mock === undefined ? undefined : config.mock ? '1' : '0',
        })
    }
    return buildServer(await buildContext())
}

type TransportMode = 'stdio' | 'http'

export function resolveTransport(argv: string[], fallback: TransportMode): TransportMode {
    if (argv.includes('--http')) return 'http'
    if (argv.includes('--stdio')) return 'stdio'

    const transportArg = argv.find((arg) => arg.startsWith('--transport='))
    if (transportArg) {
        const value = transportArg.split('=')[1]?.toLowerCase()
        if (value === 'http' || value === 'sse') return 'http'
        if (value === 'stdio') return 'stdio'
    }

    return fallback
}

async function main(argv: string[]) {
    const env = getEnv()
    const ctx = await buildContext(env)

    if (resolveTransport(argv, env.MCP_TRANSPORT) === 'http') {
        const server = await startHttpServer(ctx)
        logger.info('Local DB server running (HTTP + MCP over SSE)')
        await new Promise<void>((resolve, reject) => {
            server.on('close', resolve)
            server.on('error', reject)
        })
        return
    }

    const server = buildServer(ctx)
    await server.connect(new StdioServerTransport())
    logger.info('Local DB MCP server running (stdio)')
}

// Exported CLI entry for the bin launcher
export async function runCli(argv: string[] = process.argv.slice(2)) {
    return main(argv)
}
