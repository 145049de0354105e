import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js'
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js'

import { getEnv } from '../src/config/env.js'
import { buildServer, createContext } from '../src/context.js'
import { InMemoryMetadataRecords, MockTableStore } from '../src/duckdb/mockStore.js'
import { formatToolResponse, type LocalDbMcpServer } from '../src/mcp/server.js'

function firstText(result: unknown): string {
  const [first] = CallToolResultSchema.parse(result).content
  return first?.type === 'text' ? first.text : ''
}

describe('formatToolResponse', () => {
  it('wraps the envelope as JSON text', () => {
    expect(formatToolResponse({ ok: true, data: { tables: [] } })).toEqual({
      content: [{ type: 'text', text: '{"ok":true,"data":{"tables":[]}}' }],
      isError: false,
    })
  })
  it('flags failures', () => {
    const res = formatToolResponse({ ok: false, error: { code: 'NotFound', message: 'gone' } })
    expect(res.isError).toBe(true)
  })
})

describe('LocalDbMcpServer over an in-memory transport', () => {
  let server: LocalDbMcpServer
  let client: Client

  beforeEach(async () => {
    const store = new MockTableStore()
    store.seedTable('people', [{ name: 'ann' }, { name: 'bob' }])
    server = buildServer(createContext(getEnv(), store, new InMemoryMetadataRecords()))
    client = new Client({ name: 'test-client', version: '0.0.0' })

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair()
    await server.connect(serverTransport)
    await client.connect(clientTransport)
  })

  afterEach(async () => {
    await client.close()
    await server.close()
  })

  it('advertises the six tools', async () => {
    const { tools } = await client.listTools()
    expect(tools.map((t) => t.name).sort()).toEqual([
      'execute_query',
      'get_table_data',
      'get_table_metadata',
      'get_table_schema',
      'list_tables',
      'search_tables',
    ])
  })

  it('returns the success envelope as text content', async () => {
    const result = await client.callTool({ name: 'list_tables', arguments: {} })
    expect(JSON.parse(firstText(result))).toEqual({
      ok: true,
      data: { tables: [{ name: 'people', display_name: 'people', comment: '', row_count: 2 }] },
    })
  })

  it('returns the error envelope with isError', async () => {
    const result = CallToolResultSchema.parse(
      await client.callTool({ name: 'get_table_data', arguments: { table_name: 'ghost' } }),
    )
    expect(result.isError).toBe(true)
    expect(JSON.parse(firstText(result))).toEqual({
      ok: false,
      error: { code: 'NotFound', message: 'Table "ghost" does not exist', details: { table: 'ghost' } },
    })
  })
})
