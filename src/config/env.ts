import { config as loadEnv } from 'dotenv'
import { z } from 'zod'

loadEnv()

const flag = z
    .string()
    .optional()
    .transform((v) => v === '1' || v === 'true')

const positiveInt = (fallback: number) =>
    z
        .string()
        .optional()
        .transform((v) => (v ? Number(v) : fallback))
        .pipe(z.number().int().positive())

const EnvSchema = z
    .object({
        LOCALDB_PATH: z.string().min(1).default('./data/database.duckdb'),
        LOCALDB_MOCK: flag,
        HOST: z.string().min(1).default('0.0.0.0'),
        PORT: positiveInt(8000),
        MCP_TRANSPORT: z.enum(['stdio', 'http']).default('stdio'),
        LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
        QUERY_DEFAULT_LIMIT: positiveInt(100),
        QUERY_MAX_LIMIT: positiveInt(1000),
        UPLOAD_MAX_BYTES: positiveInt(100 * 1024 * 1024),
    })
    .refine((env) => env.QUERY_DEFAULT_LIMIT <= env.QUERY_MAX_LIMIT, {
        message: 'QUERY_DEFAULT_LIMIT must not exceed QUERY_MAX_LIMIT',
        path: ['QUERY_DEFAULT_LIMIT'],
    })

export type Env = z.infer<typeof EnvSchema>

type EnvOverrides = Partial<Record<keyof Env, string>>

let overrides: Record<string, string> | undefined

function buildEnvSource(): Record<string, string | undefined> {
    const base = { ...process.env }
    return overrides ? { ...base, ...overrides } : base
}

export function setEnvOverrides(values: EnvOverrides | undefined): void {
    if (!values) return
    overrides = overrides ?? {}
    for (const [key, value] of Object.entries(values)) {
        if (typeof value === 'string') {
            overrides[key] = value
        } else if (value === undefined) {
            delete overrides[key]
        }
    }
}

export function clearEnvOverrides(): void {
    overrides = undefined
}

export function getEnv(): Env {
    const parsed = EnvSchema.safeParse(buildEnvSource())
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n')
        throw new Error(`Invalid environment configuration:\n${issues}`)
    }
    return parsed.data
}
