import type { OperationCall, Segment, Template } from './types'
import { TemplateSyntaxError } from './errors'
import { isOperationName, operations } from './functions'

function parseCall(token: string, offset: number): OperationCall {
    const [rawName, ...args] = token.split(':')
    const name = rawName.trim()
    const at = offset + (rawName.length - rawName.trimStart().length)
    if (name === '') throw new TemplateSyntaxError('EmptyOperation', 'empty operation', { offset: at })
    if (!isOperationName(name)) {
        throw new TemplateSyntaxError('UnknownOperation', `unknown operation "${name}"`, { offset: at, operation: name })
    }
    const { arity } = operations[name]
    if (args.length < arity.min || args.length > arity.max) {
        const expected = arity.min === arity.max ? `${arity.min}` : `${arity.min}-${arity.max}`
        throw new TemplateSyntaxError(
            'ArityMismatch',
            `${name} expects ${expected} argument(s), got ${args.length}`,
            { offset: at, operation: name, expected: { ...arity }, got: args.length }
        )
    }
    return { name, args: Object.freeze(args) }
}

// `body` is the text between the braces; `open` is the offset of the opening brace
function parseField(body: string, open: number): Segment {
    const [head, ...tokens] = body.split('|')
    const field = head.trim()
    if (field === '') throw new TemplateSyntaxError('EmptyFieldName', 'empty field name', { offset: open })

    const pipeline: OperationCall[] = []
    let at = open + 1 + head.length + 1
    for (const token of tokens) {
        pipeline.push(parseCall(token, at))
        at += token.length + 1
    }
    return { kind: 'field', field, pipeline: Object.freeze(pipeline), offset: open }
}

/**
 * Splits a template into literal text and `{field|op:arg|...}` placeholders.
 * A `}` outside a placeholder is plain text; there is no escape for a literal `{`.
 */
export function parse(source: string): Template {
    const segments: Segment[] = []
    let literal = ''
    let i = 0
    while (i < source.length) {
        const open = source.indexOf('{', i)
        if (open === -1) {
            literal += source.slice(i)
            break
        }
        literal += source.slice(i, open)
        const close = source.indexOf('}', open + 1)
        if (close === -1) throw new TemplateSyntaxError('UnterminatedField', 'unterminated "{"', { offset: open })
        if (literal) {
            segments.push({ kind: 'literal', text: literal })
            literal = ''
        }
        segments.push(parseField(source.slice(open + 1, close), open))
        i = close + 1
    }
    if (literal) segments.push({ kind: 'literal', text: literal })
    return Object.freeze({ source, segments: Object.freeze(segments) })
}

export const CACHE_LIMIT = 256

// least recently used first; Map keeps insertion order
const cache = new Map<string, Template>()

/** Cached `parse`; templates are frozen so one instance serves every row. */
export function compile(source: string): Template {
    let template = cache.get(source)
    if (template) {
        cache.delete(source)
    } else {
        template = parse(source)
        if (cache.size >= CACHE_LIMIT) {
            const oldest = cache.keys().next()
            if (!oldest.done) cache.delete(oldest.value)
        }
    }
    cache.set(source, template)
    return template
}
