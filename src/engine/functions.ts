import type { Arity, OperationName, OperationSpec, Scalar } from './types'
import { OperationError } from './errors'

const pad = (n: number, width = 2) => String(n).padStart(width, '0')

function isValidDate(d: Date): boolean {
    return !isNaN(+d)
}

/** Default rendering for values leaving a pipeline or entering a string operation. */
export function toText(value: Scalar): string {
    if (value == null) return ''
    if (value instanceof Date) return isValidDate(value) ? strftime(value, '%Y-%m-%d') : ''
    return String(value)
}

// Tried in order; all three read day-first or year-first numeric dates.
const DATE_FORMATS: { re: RegExp; ymd(m: RegExpExecArray): [number, number, number] }[] = [
    { re: /^(\d{1,2})_(\d{1,2})_(\d{4})$/, ymd: m => [+m[3], +m[2], +m[1]] },
    { re: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, ymd: m => [+m[1], +m[2], +m[3]] },
    { re: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, ymd: m => [+m[3], +m[2], +m[1]] },
]

function parseDateString(s: string): Date | null {
    for (const { re, ymd } of DATE_FORMATS) {
        const m = re.exec(s)
        if (!m) continue
        const [y, mo, d] = ymd(m)
        const date = new Date(y, mo - 1, d)
        // rejects rollovers such as 31/02
        if (date.getFullYear() === y && date.getMonth() === mo - 1 && date.getDate() === d) return date
    }
    return null
}

export function toDate(value: Scalar): Date {
    if (value instanceof Date) {
        if (isValidDate(value)) return value
        throw new OperationError('TypeMismatch', 'invalid date value')
    }
    if (typeof value === 'string') {
        const parsed = parseDateString(value)
        if (parsed) return parsed
        throw new OperationError('TypeMismatch', `could not parse "${value}" as a date`)
    }
    throw new OperationError('TypeMismatch', `expected a date, got ${value == null ? 'an empty value' : typeof value}`)
}

const MONTHS = ['January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December']
const DAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday']

function dayOfYear(d: Date): number {
    const start = Date.UTC(d.getFullYear(), 0, 1)
    return Math.round((Date.UTC(d.getFullYear(), d.getMonth(), d.getDate()) - start) / 86_400_000) + 1
}

const DIRECTIVES = new Map<string, (d: Date) => string>([
    ['Y', d => pad(d.getFullYear(), 4)],
    ['y', d => pad(d.getFullYear() % 100)],
    ['m', d => pad(d.getMonth() + 1)],
    ['d', d => pad(d.getDate())],
    ['e', d => String(d.getDate()).padStart(2, ' ')],
    ['H', d => pad(d.getHours())],
    ['I', d => pad(d.getHours() % 12 || 12)],
    ['M', d => pad(d.getMinutes())],
    ['S', d => pad(d.getSeconds())],
    ['p', d => (d.getHours() < 12 ? 'AM' : 'PM')],
    ['B', d => MONTHS[d.getMonth()]],
    ['b', d => MONTHS[d.getMonth()].slice(0, 3)],
    ['A', d => DAYS[d.getDay()]],
    ['a', d => DAYS[d.getDay()].slice(0, 3)],
    ['j', d => pad(dayOfYear(d), 3)],
    ['%', () => '%'],
])

export function strftime(d: Date, spec: string): string {
    let out = ''
    for (let i = 0; i < spec.length; i++) {
        const ch = spec.charAt(i)
        if (ch !== '%') {
            out += ch
            continue
        }
        const directive = spec.charAt(++i)
        if (directive === '') throw new OperationError('InvalidFormatSpec', `dangling "%" at end of "${spec}"`)
        const fmt = DIRECTIVES.get(directive)
        if (!fmt) throw new OperationError('InvalidFormatSpec', `unsupported directive "%${directive}" in "${spec}"`)
        out += fmt(d)
    }
    return out
}

// a word starts at any letter not preceded by a letter or digit: "o'neil" -> "O'Neil"
function toTitleCase(input: string): string {
    return input.toLowerCase().replace(/(^|[^\p{L}\p{N}])(\p{L})/gu, (_: string, sep: string, ch: string) => sep + ch.toUpperCase())
}

function toIndex(arg: string | undefined, fallback: number): number {
    const trimmed = arg?.trim() ?? ''
    if (trimmed === '') return fallback
    if (!/^\d+$/.test(trimmed)) throw new OperationError('InvalidArgs', `"${arg}" is not a non-negative integer`)
    return parseInt(trimmed, 10)
}

// filesystem-hostile characters and what they become
const PATH_REPLACEMENTS: [string, string][] = [
    ['/', '_'], ['\\', '_'], [':', '-'], ['*', '+'], ['?', ''], ['"', "'"],
    ['<', '('], ['>', ')'], ['|', '-'], ['\0', ''], ['\n', ' '], ['\r', ' '], ['\t', ' '],
]

function sanitizePath(s: string): string {
    let out = s
    for (const [from, to] of PATH_REPLACEMENTS) out = out.replaceAll(from, to)
    out = out.replace(/^[. ]+|[. ]+$/g, '')
    return out.split(/\s+/).filter(w => w.length > 0).join(' ')
}

const NUMERO = 'N°'

function splitNumeroLast(s: string): string {
    if (!s.includes(NUMERO)) return s.trim()
    const parts = s.split(NUMERO)
    return NUMERO + parts[parts.length - 1].trim()
}

const NO_ARGS: Arity = { min: 0, max: 0 }

function str(fn: (s: string, args: readonly string[]) => string, arity: Arity = NO_ARGS): OperationSpec {
    return { arity, apply: (value, args) => fn(toText(value), args) }
}

function date(fn: (d: Date, args: readonly string[]) => string, arity: Arity = NO_ARGS): OperationSpec {
    return { arity, apply: (value, args) => fn(toDate(value), args) }
}

export const operations: Readonly<Record<OperationName, OperationSpec>> = Object.freeze({
    'date.year': date(d => strftime(d, '%Y')),
    'date.month': date(d => strftime(d, '%m')),
    'date.year_month': date(d => strftime(d, '%Y-%m')),
    'date.format': date((d, [spec]) => strftime(d, spec), { min: 1, max: 1 }),
    'str.upper': str(s => s.toUpperCase()),
    'str.lower': str(s => s.toLowerCase()),
    'str.title': str(toTitleCase),
    'str.replace': str((s, [from, to]) => s.replaceAll(from, to), { min: 2, max: 2 }),
    'str.slice': str((s, [start, end]) => s.slice(toIndex(start, 0), toIndex(end, s.length)), { min: 1, max: 2 }),
    'str.sanitize': str(sanitizePath),
    'str.first_word': str(s => s.trim().split(/\s+/)[0]),
    'str.split_no_last': str(splitNumeroLast),
})

export function isOperationName(name: string): name is OperationName {
    return Object.prototype.hasOwnProperty.call(operations, name)
}
