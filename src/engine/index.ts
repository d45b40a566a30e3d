export type { Arity, OperationCall, OperationName, OperationSpec, Row, Scalar, Segment, Template } from './types'
export type { OperationErrorKind, SyntaxErrorKind } from './errors'
export { OperationError, TemplateEvaluationError, TemplateSyntaxError } from './errors'
export { isOperationName, operations, strftime, toDate, toText } from './functions'
export { CACHE_LIMIT, compile, parse } from './parse'
export { evaluate, render } from './apply'
