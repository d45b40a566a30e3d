export type Level = 'trace' | 'debug' | 'info' | 'warn' | 'error'
export type LogFormat = 'json' | 'pretty'
export type LogContext = Record<string, unknown>

export interface LogOptions {
    level?: Level
    format?: LogFormat
    sink?: (line: string) => void
}

export interface Logger {
    child(ctx: LogContext): Logger
    trace(msg: string, ctx?: LogContext): void
    debug(msg: string, ctx?: LogContext): void
    info(msg: string, ctx?: LogContext): void
    warn(msg: string, ctx?: LogContext): void
    error(msg: string, ctx?: LogContext): void
}

const LEVELS: readonly Level[] = ['trace', 'debug', 'info', 'warn', 'error']

function isLevel(v: unknown): v is Level {
    return typeof v === 'string' && (LEVELS as readonly string[]).includes(v)
}

export function getLogger(service?: string, opts: LogOptions = {}): Logger {
    const envLevel = process.env.LOG_LEVEL
    const threshold = LEVELS.indexOf(opts.level ?? (isLevel(envLevel) ? envLevel : 'info'))
    const format: LogFormat = opts.format ?? (process.env.LOG_FORMAT === 'json' ? 'json' : 'pretty')
    // eslint-disable-next-line no-console
    const sink = opts.sink ?? ((line: string) => console.log(line))

    function emit(base: LogContext, level: Level, msg: string, extra?: LogContext) {
        if (LEVELS.indexOf(level) < threshold) return
        const ts = new Date().toISOString()
        if (format === 'json') {
            sink(JSON.stringify({ ts, level, msg, service, ...base, ...extra }))
            return
        }
        const ctx = { ...base, ...extra }
        const head = `[${ts}] ${level.toUpperCase()}${service ? ` ${service}` : ''}`
        const ctxStr = Object.keys(ctx).length ? ` ${JSON.stringify(ctx)}` : ''
        sink(`${head} - ${msg}${ctxStr}`)
    }

    function create(base: LogContext): Logger {
        return {
            child: ctx => create({ ...base, ...ctx }),
            trace: (msg, ctx) => emit(base, 'trace', msg, ctx),
            debug: (msg, ctx) => emit(base, 'debug', msg, ctx),
            info: (msg, ctx) => emit(base, 'info', msg, ctx),
            warn: (msg, ctx) => emit(base, 'warn', msg, ctx),
            error: (msg, ctx) => emit(base, 'error', msg, ctx),
        }
    }

    return create({})
}
