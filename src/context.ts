import { TableMetadataService } from './catalog/metadataService.js'
import { TableCatalog } from './catalog/tableCatalog.js'
import { getEnv, type Env } from './config/env.js'
import { DuckDbDatabase } from './duckdb/database.js'
import { DuckDbMetadataRecords } from './duckdb/metadataRecords.js'
import { InMemoryMetadataRecords, MockTableStore } from './duckdb/mockStore.js'
import { DuckDbTableStore } from './duckdb/tableStore.js'
import type { MetadataRecords, TableStore } from './duckdb/types.js'
import { logger } from './logger.js'
import { ToolDispatcher } from './mcp/dispatcher.js'
import { LocalDbMcpServer } from './mcp/server.js'
import type { QueryLimits } from './mcp/tools/types.js'

export interface AppContext {
    env: Env
    store: TableStore
    metadata: TableMetadataService
    catalog: TableCatalog
    dispatcher: ToolDispatcher
    limits: QueryLimits
}

export function createContext(env: Env, store: TableStore, records: MetadataRecords): AppContext {
    const metadata = new TableMetadataService(store, records)
    const catalog = new TableCatalog(store, metadata)
    const limits = { defaultLimit: env.QUERY_DEFAULT_LIMIT, maxLimit: env.QUERY_MAX_LIMIT }
    const dispatcher = new ToolDispatcher({ catalog, metadata, limits })
    return { env, store, metadata, catalog, dispatcher, limits }
}

/** Opens the configured store (DuckDB file, or the in-memory mock) and wires the services on top. */
export async function buildContext(env: Env = getEnv()): Promise<AppContext> {
    if (env.LOCALDB_MOCK) {
        logger.info('Using in-memory mock store')
        return createContext(env, new MockTableStore(), new InMemoryMetadataRecords())
    }
    const db = await DuckDbDatabase.open(env.LOCALDB_PATH)
    const records = await DuckDbMetadataRecords.create(db)
    const ctx = createContext(env, new DuckDbTableStore(db), records)
    await ctx.catalog.pruneOrphanMetadata()
    logger.info({ path: env.LOCALDB_PATH }, 'DuckDB database opened')
    return ctx
}

export function buildServer(ctx: AppContext): LocalDbMcpServer {
    const server = new LocalDbMcpServer(ctx.dispatcher)
    logger.debug('MCP server built')
    return server
}
