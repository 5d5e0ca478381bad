import { logger } from '@/cli/utils/logger'
import { APP_VERSION } from '@/cli/version'
import { ConfigService } from '@/core/config/config-service'
import { UpdateService } from '@/core/update/update-service'

export class UpdateCommandCLI {
  constructor(
    private updateService: UpdateService,
    private configService: ConfigService
  ) {}

  async run(url?: string): Promise<void> {
    const updateUrl = url ?? this.configService.updateUrl
    logger.debug(`Checking ${updateUrl}`)

    const result = await this.updateService.check(updateUrl, APP_VERSION)
    switch (result.status) {
      case 'available':
        logger.success(result.message)
        if (result.releaseUrl) {
          logger.info(`Download: ${result.releaseUrl}`)
        }
        break
      case 'current':
        logger.info(result.message)
        break
      case 'failed':
        logger.error(result.message)
        process.exitCode = 1
        break
    }
  }
}
