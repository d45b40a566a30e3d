import type { Arity, OperationName } from './types'

export type SyntaxErrorKind =
    | 'UnterminatedField'
    | 'EmptyFieldName'
    | 'EmptyOperation'
    | 'UnknownOperation'
    | 'ArityMismatch'

export type OperationErrorKind = 'TypeMismatch' | 'InvalidFormatSpec' | 'InvalidArgs'

export class TemplateSyntaxError extends Error {
    readonly kind: SyntaxErrorKind
    readonly offset: number
    readonly operation?: string
    readonly expected?: Arity
    readonly got?: number

    constructor(
        kind: SyntaxErrorKind,
        message: string,
        detail: { offset: number; operation?: string; expected?: Arity; got?: number }
    ) {
        super(`${message} (at offset ${detail.offset})`)
        this.name = 'TemplateSyntaxError'
        this.kind = kind
        this.offset = detail.offset
        this.operation = detail.operation
        this.expected = detail.expected
        this.got = detail.got
    }
}

/** Raised by a registry operation; the evaluator rewraps it with field context. */
export class OperationError extends Error {
    readonly kind: OperationErrorKind

    constructor(kind: OperationErrorKind, message: string) {
        super(message)
        this.name = 'OperationError'
        this.kind = kind
    }
}

export class TemplateEvaluationError extends Error {
    readonly kind: OperationErrorKind
    readonly field: string
    readonly operation: OperationName
    readonly offset: number

    constructor(field: string, operation: OperationName, offset: number, cause: OperationError) {
        super(`Field "${field}": ${operation} failed (${cause.kind}): ${cause.message}`, { cause })
        this.name = 'TemplateEvaluationError'
        this.kind = cause.kind
        this.field = field
        this.operation = operation
        this.offset = offset
    }
}
