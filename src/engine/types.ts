export type Scalar = string | number | Date | null | undefined
export type Row = Readonly<Record<string, Scalar>>

export type OperationName =
    | 'date.year'
    | 'date.month'
    | 'date.year_month'
    | 'date.format'
    | 'str.upper'
    | 'str.lower'
    | 'str.title'
    | 'str.replace'
    | 'str.slice'
    | 'str.sanitize'
    | 'str.first_word'
    | 'str.split_no_last'

export interface OperationCall {
    readonly name: OperationName
    readonly args: readonly string[]
}

export type Segment =
    | { readonly kind: 'literal'; readonly text: string }
    | {
        readonly kind: 'field'
        readonly field: string
        readonly pipeline: readonly OperationCall[]
        readonly offset: number                 // position of the opening brace in the source
    }

export interface Template {
    readonly source: string
    readonly segments: readonly Segment[]
}

export interface Arity { min: number; max: number }

export interface OperationSpec {
    readonly arity: Arity
    apply(value: Scalar, args: readonly string[]): Scalar
}
