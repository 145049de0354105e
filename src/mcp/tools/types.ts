import type { z } from 'zod'

import type { TableCatalog } from '../../catalog/tableCatalog.js'
import type { TableMetadataService } from '../../catalog/metadataService.js'
import type { ErrorCode } from '../../errors.js'

export interface QueryLimits {
    defaultLimit: number
    maxLimit: number
}

export interface ToolContext {
    catalog: TableCatalog
    metadata: TableMetadataService
    limits: QueryLimits
}

export interface ToolSpec<N extends string, S extends z.ZodTypeAny> {
    name: N
    title: string
    description: string
    input: S
    run(args: z.infer<S>, ctx: ToolContext): Promise<unknown>
}

export interface ToolDefinition<N extends string, S extends z.ZodTypeAny> extends ToolSpec<N, S> {
    // Validates raw arguments against `input` before running
    execute(raw: unknown, ctx: ToolContext): Promise<unknown>
}

export function defineTool<N extends string, S extends z.ZodTypeAny>(spec: ToolSpec<N, S>): ToolDefinition<N, S> {
    return {
        ...spec,
        execute: async (raw, ctx) => spec.run(spec.input.parse(raw ?? {}), ctx),
    }
}

export type ToolError = { code: ErrorCode; message: string; details?: Record<string, unknown> }

export type ToolEnvelope<T = unknown> = { ok: true; data: T } | { ok: false; error: ToolError }

export function resolveLimit(requested: number | undefined, limits: QueryLimits): number {
    return Math.min(requested ?? limits.defaultLimit, limits.maxLimit)
}
