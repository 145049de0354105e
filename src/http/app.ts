import { stat } from 'node:fs/promises'

import express, { type NextFunction, type Request, type Response } from 'express'
import multer from 'multer'
import { z } from 'zod'

import { MetadataPatchSchema } from '../catalog/metadataService.js'
import type { AppContext } from '../context.js'
import { buildServer } from '../context.js'
import { HTTP_STATUS, makeError, toCodedStoreError } from '../errors.js'
import { logger, withRequest } from '../logger.js'
import { resolveLimit } from '../mcp/tools/types.js'
import { SERVER_NAME } from '../version.js'
import { SseSessions } from './sseServer.js'

type AsyncRoute = (req: Request, res: Response) => Promise<void>

// Express 4 does not forward rejected promises to the error middleware
const route = (handler: AsyncRoute) => (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next)
}

const RenameColumnSchema = z.object({
    new_name: z.string().min(1),
})

const PageQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).optional(),
    offset: z.coerce.number().int().min(0).default(0),
})

function isTruthyFlag(value: unknown): boolean {
    return value === 'true' || value === '1' || value === true
}

// busboy hands back multipart filenames decoded as latin1
function decodeFilename(name: string): string {
    return Buffer.from(name, 'latin1').toString('utf-8')
}

export interface CreateAppOptions {
    ssePath?: string
    messagePath?: string
}

export interface LocalDbApp {
    app: express.Express
    sessions: SseSessions
}

export function createApp(ctx: AppContext, options: CreateAppOptions = {}): LocalDbApp {
    const ssePath = options.ssePath ?? '/mcp'
    const messagePath = options.messagePath ?? '/messages'
    const sessions = new SseSessions(() => buildServer(ctx), { messagePath })
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: ctx.env.UPLOAD_MAX_BYTES, files: 1 },
    })

    const app = express()
    app.disable('x-powered-by')

    app.use((req, res, next) => {
        const started = Date.now()
        res.on('finish', () => {
            withRequest({ method: req.method, path: req.path }).info(
                { status: res.statusCode, duration_ms: Date.now() - started },
                'HTTP request',
            )
        })
        next()
    })

    app.get('/health', (_req, res) => {
        res.json({ status: 'healthy', service: SERVER_NAME })
    })

    app.get('/tables', route(async (_req, res) => {
        res.json({ tables: await ctx.catalog.listTables() })
    }))

    app.get('/table/:name/schema', route(async (req, res) => {
        const table = req.params.name
        res.json({ table, columns: await ctx.catalog.getSchema(table) })
    }))

    app.get('/table/:name/metadata', route(async (req, res) => {
        res.json(await ctx.metadata.getMetadata(req.params.name))
    }))

    app.put('/table/:name/metadata', express.json(), route(async (req, res) => {
        const patch = MetadataPatchSchema.parse(req.body ?? {})
        res.json(await ctx.metadata.setMetadata(req.params.name, patch))
    }))

    app.put('/table/:name/column/:column', express.json(), route(async (req, res) => {
        const { new_name } = RenameColumnSchema.parse(req.body ?? {})
        const { name, column } = req.params
        await ctx.catalog.renameColumn(name, column, new_name)
        res.json({ message: `Column "${column}" renamed to "${new_name}"`, table: name, column: new_name })
    }))

    app.get('/query/:name', route(async (req, res) => {
        const { limit, offset } = PageQuerySchema.parse(req.query)
        res.json(await ctx.catalog.readPage(req.params.name, resolveLimit(limit, ctx.limits), offset))
    }))

    app.post('/upload', upload.single('file'), route(async (req, res) => {
        if (!req.file) {
            throw makeError('ValidationError', 'No file uploaded; send it in the "file" form field')
        }
        const body: unknown = req.body
        const replaceField = typeof body === 'object' && body !== null && 'replace' in body ? body.replace : undefined
        const result = await ctx.catalog.importUpload({
            filename: decodeFilename(req.file.originalname),
            content: req.file.buffer,
            replace: isTruthyFlag(req.query.replace) || isTruthyFlag(replaceField),
        })
        res.json(result)
    }))

    app.delete('/table/:name', route(async (req, res) => {
        const table = req.params.name
        await ctx.catalog.deleteTable(table)
        res.json({ message: `Table "${table}" deleted` })
    }))

    app.get('/download/database', route(async (_req, res) => {
        const file = await ctx.store.databaseFile()
        if (!file) {
            throw makeError('NotFound', 'The database is held in memory; there is no file to download')
        }
        try {
            await stat(file)
        } catch {
            throw makeError('NotFound', 'Database file not found', { file })
        }
        res.download(file, 'database.duckdb')
    }))

    app.get(ssePath, route(async (req, res) => {
        await sessions.handleSseConnection(req, res)
    }))

    app.post(messagePath, route(async (req, res) => {
        const sessionId = typeof req.query.sessionId === 'string' ? req.query.sessionId : undefined
        await sessions.handlePostMessage(req, res, sessionId)
    }))

    app.use((_req, res) => {
        res.status(404).json({ detail: 'Not found' })
    })

    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (error instanceof multer.MulterError) {
            const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400
            res.status(status).json({ detail: error.message, code: 'ValidationError' })
            return
        }
        // express.json() parse failures
        if (error instanceof SyntaxError && 'body' in error) {
            res.status(400).json({ detail: 'Request body is not valid JSON', code: 'ValidationError' })
            return
        }
        const coded = toCodedStoreError(error, `${req.method} ${req.path}`)
        const status = HTTP_STATUS[coded.code]
        if (status >= 500) {
            logger.error({ err: error, path: req.path }, 'Request failed')
        }
        res.status(status).json({ detail: coded.message, code: coded.code })
    })

    return { app, sessions }
}
