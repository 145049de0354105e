import type { IncomingMessage, ServerResponse } from 'node:http'

import { SSEServerTransport, type SSEServerTransportOptions } from '@modelcontextprotocol/sdk/server/sse.js'

import { logger } from '../logger.js'
import type { LocalDbMcpServer } from '../mcp/server.js'

export interface SseOptions {
    messagePath?: string
    transportOptions?: SSEServerTransportOptions
}

type ActiveSession = {
    transport: SSEServerTransport
    close: () => Promise<void>
}

async function parseJsonBody(req: IncomingMessage): Promise<unknown> {
    return await new Promise((resolve, reject) => {
        const chunks: Buffer[] = []
        req.on('data', (chunk: Buffer | string) => {
            chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk)
        })
        req.on('end', () => {
            if (!chunks.length) {
                resolve(undefined)
                return
            }
            try {
                const data = Buffer.concat(chunks).toString('utf-8')
                resolve(JSON.parse(data))
            } catch (error) {
                reject(error)
            }
        })
        req.on('error', reject)
    })
}

/**
 * MCP over SSE: one MCP server per GET stream, messages POSTed back with
 * `?sessionId=` of that stream.
 */
export class SseSessions {
    private readonly sessions = new Map<string, ActiveSession>()
    private readonly messagePath: string

    constructor(
        private readonly buildServer: () => LocalDbMcpServer,
        private readonly options: SseOptions = {},
    ) {
        this.messagePath = options.messagePath ?? '/messages'
    }

    async handleSseConnection(_req: IncomingMessage, res: ServerResponse): Promise<void> {
        const server = this.buildServer()
        const transport = new SSEServerTransport(this.messagePath, res, this.options.transportOptions)
        const sessionId = transport.sessionId

        let cleaned = false
        const cleanup = async () => {
            if (cleaned) return
            cleaned = true
            this.sessions.delete(sessionId)
            try {
                await transport.close()
            } catch (error) {
                logger.debug({ err: error, sessionId }, 'Error closing SSE transport')
            }
            try {
                await server.close()
            } catch (error) {
                logger.debug({ err: error, sessionId }, 'Error closing MCP server for SSE session')
            }
            logger.info({ sessionId }, 'SSE session closed')
        }

        transport.onclose = () => {
            void cleanup()
        }
        transport.onerror = (error) => {
            logger.error({ err: error, sessionId }, 'SSE transport error')
        }

        res.on('close', () => {
            void cleanup()
        })

        this.sessions.set(sessionId, { transport, close: cleanup })
        logger.info({ sessionId }, 'Accepted SSE connection')

        try {
            await server.connect(transport)
        } catch (error) {
            logger.error({ err: error, sessionId }, 'Failed to establish SSE connection')
            await cleanup()
            if (!res.headersSent) {
                res.writeHead(500, { 'content-type': 'text/plain' }).end('Failed to establish SSE connection')
            }
        }
    }

    async handlePostMessage(req: IncomingMessage, res: ServerResponse, sessionId: string | undefined): Promise<void> {
        const session = sessionId ? this.sessions.get(sessionId) : undefined
        if (!session) {
            res.writeHead(404, { 'content-type': 'text/plain' }).end('Session not found')
            return
        }

        let body: unknown
        try {
            body = await parseJsonBody(req)
        } catch (error) {
            res.writeHead(400, { 'content-type': 'text/plain' }).end('Invalid JSON payload')
            logger.warn({ err: error }, 'Failed to parse SSE message payload')
            return
        }

        try {
            await session.transport.handlePostMessage(req, res, body)
        } catch (error) {
            logger.error({ err: error }, 'Error handling SSE message')
            if (!res.headersSent) {
                res.writeHead(500, { 'content-type': 'text/plain' }).end('Failed to handle message')
            }
        }
    }

    async closeAll(): Promise<void> {
        for (const [sessionId, session] of this.sessions.entries()) {
            logger.debug({ sessionId }, 'Closing SSE session during shutdown')
            await session.close()
        }
    }
}
