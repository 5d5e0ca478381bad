import { table } from 'table'

import { logger } from '@/cli/utils/logger'
import { ConfigService } from '@/core/config/config-service'
import { CONFIG_KEYS } from '@/core/config/types'

export class ConfigCommandCLI {
  constructor(private configService: ConfigService) {}

  show(json: boolean = false): void {
    if (json) {
      console.log(JSON.stringify(this.configService.config, null, 2))
      return
    }

    logger.info(`Config file: ${this.configService.path}`)
    if (this.configService.loadError) {
      logger.warn(`${this.configService.loadError}. Using defaults.`)
    }

    const effective: Record<string, string> = {
      updateUrl: this.configService.updateUrl,
      defaultFormat: this.configService.defaultFormat
    }
    const rows = CONFIG_KEYS.map(key => [
      key,
      effective[key],
      this.configService.config[key] === undefined ? 'default' : 'file'
    ])
    console.log(table([['Key', 'Value', 'Source'], ...rows]))
  }

  set(key: string, value: string): void {
    this.update(() => this.configService.set(key, value), `${key} = ${value}`)
  }

  unset(key: string): void {
    this.update(() => this.configService.unset(key), `${key} reset to default`)
  }

  private update(change: () => void, summary: string): void {
    try {
      change()
      logger.success(summary)
    } catch (e) {
      logger.error(e instanceof Error ? e.message : String(e))
      process.exitCode = 1
    }
  }
}
