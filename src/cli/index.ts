import { Command, Option } from 'commander'

import { logger } from '@/cli/utils/logger'
import { APP_VERSION_LABEL } from '@/cli/version'
import { ConfigService } from '@/core/config/config-service'
import { OUTPUT_FORMATS } from '@/core/config/types'
import { RenameService } from '@/core/rename/rename-service'
import { UpdateService } from '@/core/update/update-service'
import { APP_NAME, CONFIG_FILE } from '@/shared/constants'

import { ConfigCommandCLI } from './commands/config'
import { PreviewCommandCLI, type PreviewOptions } from './commands/preview'
import { UpdateCommandCLI } from './commands/update'

async function main(): Promise<void> {
  const program = new Command()

  program
    .name(APP_NAME)
    .description('Rename EPUB and PDF files to Title-Author-Year from metadata')
    .version(APP_VERSION_LABEL, '-V, --version')

  const configService = new ConfigService(CONFIG_FILE)
  if (configService.loadError) {
    logger.debug(configService.loadError)
  }
  const renameService = new RenameService()
  const updateService = new UpdateService()

  const previewCLI = new PreviewCommandCLI(renameService, configService)
  const updateCLI = new UpdateCommandCLI(updateService, configService)
  const configCLI = new ConfigCommandCLI(configService)

  program
    .command('preview', { isDefault: true })
    .description('Show proposed names for the books in a directory')
    .argument('[dir]', 'Directory with .epub and .pdf files', '.')
    .addOption(
      new Option('-f, --format <format>', 'Output format').choices(
        OUTPUT_FORMATS
      )
    )
    .option('--apply', 'Rename the files')
    .option('-i, --interactive', 'Edit proposed names before renaming')
    .action(async (dir: string, options: PreviewOptions) => {
      await previewCLI.run(dir, options)
    })

  program
    .command('check-update')
    .description('Check whether a newer release is available')
    .option('--url <url>', 'Release metadata URL')
    .action(async options => {
      await updateCLI.run(options.url)
    })

  const configCmd = program
    .command('config')
    .description('Show or change settings')
    .option('--json', 'Output settings as JSON')
    .action(options => configCLI.show(options.json))
  configCmd
    .command('set')
    .description('Change a setting')
    .argument('<key>', 'updateUrl or defaultFormat')
    .argument('<value>', 'New value')
    .action((key: string, value: string) => configCLI.set(key, value))
  configCmd
    .command('unset')
    .description('Reset a setting to its default')
    .argument('<key>', 'updateUrl or defaultFormat')
    .action((key: string) => configCLI.unset(key))

  await program.parseAsync(process.argv)
}

main().catch(e => {
  logger.error(e instanceof Error ? e.message : String(e))
  process.exitCode = 1
})
