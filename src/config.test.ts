import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'
import { ConfigError, DEFAULT_OUTPUT_TEMPLATE, loadNamingConfig, readNamingConfig, resolvePreset, toYaml } from './config'
import { TemplateSyntaxError } from './engine'

const SAMPLE = `
source_folder: ./inbox
processed_folder: ./done
filter1_column: Client
output_template: '{processed_folder}/{filter1|str.upper}.pdf'
presets:
  monthly:
    output_template: '{processed_folder}/{Date|date.year}/{Date|date.month}/{Client}.pdf'
`

function configError(text: string): ConfigError {
    try {
        loadNamingConfig(text)
    } catch (err) {
        if (err instanceof ConfigError) return err
        throw err
    }
    throw new Error('expected a ConfigError')
}

describe('loadNamingConfig', () => {
    it('fills defaults for an empty document', () => {
        const config = loadNamingConfig('')
        expect(config.output_template).toBe(DEFAULT_OUTPUT_TEMPLATE)
        expect(config.processed_folder).toBe('')
        expect(config.presets).toEqual({})
    })

    it('reads settings and presets', () => {
        const config = loadNamingConfig(SAMPLE)
        expect(config.source_folder).toBe('./inbox')
        expect(config.filter1_column).toBe('Client')
        expect(Object.keys(config.presets)).toEqual(['monthly'])
    })

    it('refuses a template that does not parse', () => {
        const err = configError(`output_template: '{a|nope}'`)
        expect(err.message).toBe('output_template: unknown operation "nope" (at offset 3)')
        expect(err.cause).toBeInstanceOf(TemplateSyntaxError)
    })

    it('refuses a preset template that does not parse', () => {
        expect(configError("presets:\n  p:\n    output_template: '{a'").message)
            .toBe('presets.p.output_template: unterminated "{" (at offset 0)')
    })

    it('rejects unknown keys and malformed YAML', () => {
        expect(configError('bogus: 1').message).toMatch(/^invalid config: <root>: Unrecognized key/)
        expect(configError('output_template: 3').message).toMatch(/^invalid config: output_template: /)
        expect(configError('a: [').message).toBe('config is not valid YAML')
    })

    it('round-trips through YAML', () => {
        const config = loadNamingConfig(SAMPLE)
        expect(loadNamingConfig(toYaml(config))).toEqual(config)
    })
})

describe('resolvePreset', () => {
    const config = loadNamingConfig(SAMPLE)

    it('returns the base settings without a preset', () => {
        const settings = resolvePreset(config)
        expect(settings.output_template).toBe('{processed_folder}/{filter1|str.upper}.pdf')
        expect('presets' in settings).toBe(false)
    })

    it('overlays a preset on the base', () => {
        const settings = resolvePreset(config, 'monthly')
        expect(settings.output_template).toBe('{processed_folder}/{Date|date.year}/{Date|date.month}/{Client}.pdf')
        expect(settings.processed_folder).toBe('./done')
    })

    it('fails on an unknown preset', () => {
        expect(() => resolvePreset(config, 'weekly')).toThrow(new ConfigError('unknown preset "weekly"'))
    })
})

describe('readNamingConfig', () => {
    it('loads a config file from disk', async () => {
        const dir = await mkdtemp(join(tmpdir(), 'pdf-filer-'))
        try {
            const file = join(dir, 'config.yaml')
            await writeFile(file, SAMPLE, 'utf8')
            const config = await readNamingConfig(file)
            expect(config.processed_folder).toBe('./done')
        } finally {
            await rm(dir, { recursive: true, force: true })
        }
    })
})
