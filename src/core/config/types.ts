import { z } from 'zod'

export const OUTPUT_FORMATS = ['list', 'table', 'json'] as const

export type OutputFormat = (typeof OUTPUT_FORMATS)[number]

export const configSchema = z.object({
  updateUrl: z.url().optional(),
  defaultFormat: z.enum(OUTPUT_FORMATS).optional()
})

export type ConfigData = z.infer<typeof configSchema>

export type ConfigKey = keyof ConfigData

export const CONFIG_KEYS: readonly ConfigKey[] = ['updateUrl', 'defaultFormat']

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some(known => known === key)
}
