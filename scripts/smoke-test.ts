#!/usr/bin/env tsx
/**
 * smoke-test.ts
 * Uploads a small CSV to a running server, reads it back over HTTP and calls
 * list_tables through the MCP SSE endpoint.
 *
 * Usage:
 *   tsx scripts/smoke-test.ts --baseUrl=http://localhost:8000
 */
import axios from 'axios'
import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js'
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js'

function parseArgs(): { baseUrl: string } {
    let baseUrl = 'http://localhost:8000'
    for (const arg of process.argv.slice(2)) {
        const [key, value] = arg.split('=')
        if (key === '--baseUrl' && value) baseUrl = value.replace(/\/$/, '')
    }
    return { baseUrl }
}

async function main() {
    const { baseUrl } = parseArgs()
    const http = axios.create({ baseURL: baseUrl, timeout: 15000 })
    const table = `smoke_${Date.now()}`

    const health = await http.get('/health')
    console.log('health:', health.data)

    const form = new FormData()
    form.append('file', new Blob(['id,label\n1,alpha\n2,beta\n'], { type: 'text/csv' }), `${table}.csv`)
    const upload = await http.post('/upload', form)
    console.log('upload:', upload.data)

    const page = await http.get(`/query/${encodeURIComponent(table)}`, { params: { limit: 10 } })
    console.log('rows:', page.data.rows)

    const client = new Client({ name: 'smoke-test', version: '0.1.0' })
    await client.connect(new SSEClientTransport(new URL(`${baseUrl}/mcp`)))
    try {
        const result = CallToolResultSchema.parse(await client.callTool({ name: 'list_tables', arguments: {} }))
        const [first] = result.content
        console.log('list_tables:', first?.type === 'text' ? first.text : result.content)
    } finally {
        await client.close()
    }

    await http.delete(`/table/${encodeURIComponent(table)}`)
    console.log(`Removed ${table}`)
}

main().catch((err) => {
    console.error(err instanceof Error ? err.message : err)
    process.exit(1)
})
