import { compile, evaluate, TemplateEvaluationError, TemplateSyntaxError } from '../engine'
import type { Row, Scalar } from '../engine'
import { loadNamingConfig, resolvePreset } from '../config'
import { getLogger } from '../logger'

const log = getLogger('worker')

export type Msg =
    | { type: 'ping' }
    | { type: 'render'; id: string; configYaml: string; row: Record<string, unknown>; preset?: string }

export interface RenderFailure {
    name: string
    message: string
    kind?: string
    field?: string
    operation?: string
    offset?: number
}

export type Reply =
    | { type: 'pong' }
    | { type: 'render_result'; id: string; ok: true; output: string }
    | { type: 'render_result'; id: string; ok: false; error: RenderFailure }

function isScalar(v: unknown): v is Scalar {
    return v == null || typeof v === 'string' || typeof v === 'number' || v instanceof Date
}

export function toRow(record: Record<string, unknown>): Row {
    const row: Record<string, Scalar> = {}
    for (const [k, v] of Object.entries(record)) if (isScalar(v)) row[k] = v
    return row
}

function describe(err: unknown): RenderFailure {
    if (err instanceof TemplateEvaluationError) {
        return { name: err.name, message: err.message, kind: err.kind, field: err.field, operation: err.operation, offset: err.offset }
    }
    if (err instanceof TemplateSyntaxError) {
        return { name: err.name, message: err.message, kind: err.kind, operation: err.operation, offset: err.offset }
    }
    if (err instanceof Error) return { name: err.name, message: err.message }
    return { name: 'Error', message: String(err) }
}

export function handleMessage(msg: Msg): Reply {
    if (msg.type === 'ping') return { type: 'pong' }

    try {
        const settings = resolvePreset(loadNamingConfig(msg.configYaml), msg.preset)
        const output = evaluate(compile(settings.output_template), toRow(msg.row))
        return { type: 'render_result', id: msg.id, ok: true, output }
    } catch (err) {
        const error = describe(err)
        log.warn('render failed', { id: msg.id, ...error })
        return { type: 'render_result', id: msg.id, ok: false, error }
    }
}

export interface Port {
    on(event: 'message', listener: (msg: Msg) => void): unknown
    postMessage(reply: Reply): void
}

/** Answers every message arriving on `port` with its reply. */
export function attach(port: Port): void {
    port.on('message', msg => port.postMessage(handleMessage(msg)))
}
