import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs'
import { dirname } from 'path'

import { UPDATE_METADATA_URL } from '@/shared/constants'

import { ConfigError } from './errors'
import {
  configSchema,
  isConfigKey,
  type ConfigData,
  type OutputFormat
} from './types'

export class ConfigService {
  private configPath: string
  public config: ConfigData
  /** Why the file on disk was ignored, when it was */
  public loadError: string | null = null

  constructor(configPath: string) {
    this.configPath = configPath
    this.config = this.load()
  }

  get path(): string {
    return this.configPath
  }

  get updateUrl(): string {
    return this.config.updateUrl ?? UPDATE_METADATA_URL
  }

  get defaultFormat(): OutputFormat {
    return this.config.defaultFormat ?? 'list'
  }

  private load(): ConfigData {
    if (!existsSync(this.configPath)) {
      return {}
    }
    let content: unknown
    try {
      content = JSON.parse(readFileSync(this.configPath, 'utf-8'))
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e)
      this.loadError = `Unreadable config file: ${reason}`
      return {}
    }
    const parsed = configSchema.safeParse(content)
    if (!parsed.success) {
      this.loadError = `Invalid config file: ${parsed.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`
      return {}
    }
    return parsed.data
  }

  save(): void {
    try {
      const dir = dirname(this.configPath)
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true })
      }
      writeFileSync(
        this.configPath,
        JSON.stringify(this.config, null, 2),
        'utf-8'
      )
    } catch (e) {
      throw new ConfigError(`Failed to save config: ${e}`, { cause: e })
    }
  }

  set(key: string, value: string): void {
    if (!isConfigKey(key)) {
      throw new ConfigError(`Unknown config key: ${key}`)
    }
    const parsed = configSchema.safeParse({ ...this.config, [key]: value })
    if (!parsed.success) {
      throw new ConfigError(`Invalid value for ${key}: ${value}`)
    }
    this.config = parsed.data
    this.save()
  }

  unset(key: string): void {
    if (!isConfigKey(key)) {
      throw new ConfigError(`Unknown config key: ${key}`)
    }
    const { [key]: _removed, ...rest } = this.config
    this.config = rest
    this.save()
  }
}
