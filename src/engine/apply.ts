import type { OperationCall, Row, Scalar, Template } from './types'
import { OperationError, TemplateEvaluationError } from './errors'
import { operations, toText } from './functions'
import { compile } from './parse'

function lookup(row: Row, field: string): Scalar {
    return Object.prototype.hasOwnProperty.call(row, field) ? row[field] : undefined
}

function runPipeline(pipeline: readonly OperationCall[], value: Scalar, field: string, offset: number): Scalar {
    let tmp = value
    for (const step of pipeline) {
        try {
            tmp = operations[step.name].apply(tmp, step.args)
        } catch (err) {
            if (err instanceof OperationError) throw new TemplateEvaluationError(field, step.name, offset, err)
            throw err
        }
    }
    return tmp
}

/**
 * Substitutes every placeholder with its field value run through the pipeline.
 * A field missing from the row (or null, or an invalid Date) renders as the empty string without running its pipeline.
 * @throws {TemplateEvaluationError} when an operation rejects its input
 */
export function evaluate(template: Template, row: Row): string {
    let out = ''
    for (const seg of template.segments) {
        if (seg.kind === 'literal') {
            out += seg.text
            continue
        }
        const raw = lookup(row, seg.field)
        // absent, null and invalid-date values render empty, pipeline skipped
        if (raw == null || (raw instanceof Date && isNaN(+raw))) continue
        out += toText(runPipeline(seg.pipeline, raw, seg.field, seg.offset))
    }
    return out
}

export function render(source: string, row: Row): string {
    return evaluate(compile(source), row)
}
