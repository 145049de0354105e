import { createServer, type Server } from 'node:http'

import type { AppContext } from '../context.js'
import { logger } from '../logger.js'
import { createApp, type CreateAppOptions } from './app.js'

export interface StartHttpServerOptions extends CreateAppOptions {
    host?: string
    port?: number
}

export async function startHttpServer(ctx: AppContext, options: StartHttpServerOptions = {}): Promise<Server> {
    const host = options.host ?? ctx.env.HOST
    const port = options.port ?? ctx.env.PORT
    const { app, sessions } = createApp(ctx, options)
    const server = createServer(app)

    await new Promise<void>((resolve, reject) => {
        server.once('listening', () => resolve())
        server.once('error', (error) => reject(error))
        server.listen(port, host)
    })

    logger.info({ host, port }, 'HTTP server listening')

    const shutdown = async () => {
        await sessions.closeAll()
        await new Promise<void>((resolve) => server.close(() => resolve()))
    }

    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']
    for (const signal of signals) {
        process.once(signal, () => {
            logger.info({ signal }, 'Received shutdown signal for HTTP server')
            shutdown().catch((error) => {
                logger.error({ err: error }, 'Error during HTTP server shutdown')
            })
        })
    }

    return server
}
