import { readFile } from 'node:fs/promises'
import { parse as parseYaml, stringify } from 'yaml'
import { z } from 'zod'
import { compile } from './engine'
import { getLogger } from './logger'

const log = getLogger('config')

export const DEFAULT_OUTPUT_TEMPLATE = '{processed_folder}/{filter1|str.upper} - {filter2|str.upper}.pdf'

const SettingsSchema = z.object({
    source_folder: z.string().default(''),
    processed_folder: z.string().default(''),
    excel_file: z.string().default(''),
    excel_sheet: z.string().default(''),
    filter1_column: z.string().default(''),
    filter2_column: z.string().default(''),
    filter3_column: z.string().default(''),
    output_template: z.string().default(DEFAULT_OUTPUT_TEMPLATE),
})

const PresetSchema = SettingsSchema.partial().strict()

const ConfigSchema = SettingsSchema.extend({
    presets: z.record(PresetSchema).default({}),
}).strict()

export type Preset = z.infer<typeof PresetSchema>
export type NamingConfig = z.infer<typeof ConfigSchema>
export type NamingSettings = z.infer<typeof SettingsSchema>

export class ConfigError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = 'ConfigError'
    }
}

function checkTemplate(source: string, where: string) {
    try {
        compile(source)
    } catch (err) {
        throw new ConfigError(`${where}: ${err instanceof Error ? err.message : String(err)}`, { cause: err })
    }
}

/** Parses and validates a YAML naming config; every template must compile. */
export function loadNamingConfig(text: string): NamingConfig {
    let raw: unknown
    try {
        raw = parseYaml(text)
    } catch (err) {
        throw new ConfigError('config is not valid YAML', { cause: err })
    }
    const result = ConfigSchema.safeParse(raw ?? {})
    if (!result.success) {
        const detail = result.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ')
        throw new ConfigError(`invalid config: ${detail}`, { cause: result.error })
    }
    const config = result.data
    checkTemplate(config.output_template, 'output_template')
    for (const [name, preset] of Object.entries(config.presets)) {
        if (preset.output_template !== undefined) checkTemplate(preset.output_template, `presets.${name}.output_template`)
    }
    log.debug('config loaded', { presets: Object.keys(config.presets).length })
    return config
}

export async function readNamingConfig(path: string): Promise<NamingConfig> {
    const text = await readFile(path, 'utf8')
    log.debug('reading config', { path })
    return loadNamingConfig(text)
}

/** Overlays the named preset on the base settings. */
export function resolvePreset(config: NamingConfig, name?: string): NamingSettings {
    const { presets, ...base } = config
    if (name === undefined) return base
    if (!Object.prototype.hasOwnProperty.call(presets, name)) throw new ConfigError(`unknown preset "${name}"`)
    return SettingsSchema.parse({ ...base, ...presets[name] })
}

export function toYaml(config: NamingConfig): string {
    return stringify(config)
}
