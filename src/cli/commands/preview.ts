import { stat } from 'fs/promises'
import { resolve } from 'path'
import { stdin, stdout } from 'process'
import { createInterface, type Interface } from 'readline'
import { table } from 'table'

import { logger } from '@/cli/utils/logger'
import {
  formatPlanLines,
  isUnchanged,
  planRows,
  planToJson
} from '@/cli/utils/preview'
import { getTerminalWidth } from '@/cli/utils/text'
import { ConfigService } from '@/core/config/config-service'
import type { OutputFormat } from '@/core/config/types'
import type { Batch } from '@/core/naming/types'
import { editProposedName, validateBatch } from '@/core/naming/validate'
import { RenameConflictError, RenameFailedError } from '@/core/rename/errors'
import { RenameService, type ScanProgress } from '@/core/rename/rename-service'

export interface PreviewOptions {
  format?: OutputFormat
  apply?: boolean
  interactive?: boolean
}

export class PreviewCommandCLI {
  constructor(
    private renameService: RenameService,
    private configService: ConfigService
  ) {}

  async run(dir: string, options: PreviewOptions): Promise<void> {
    const format = options.format ?? this.configService.defaultFormat
    const json = format === 'json'
    if (json) logger.useStderr()

    if (json && options.interactive) {
      logger.error('--interactive cannot be combined with --format json')
      process.exitCode = 1
      return
    }

    const directory = resolve(dir)
    if (!(await this.isDirectory(directory))) {
      logger.error(`Not a directory: ${directory}`)
      process.exitCode = 1
      return
    }

    try {
      const { batch, existingNames } = await this.renameService.scan(
        directory,
        progress => this.reportProgress(progress, json)
      )
      if (!json) {
        process.stderr.write('\r' + ' '.repeat(getTerminalWidth() - 1) + '\r')
      }

      if (batch.length === 0) {
        if (json) {
          console.log('[]')
        } else {
          logger.warn('No .epub or .pdf files found.')
        }
        return
      }

      this.display(batch, format)

      let apply = options.apply ?? false
      if (options.interactive) {
        apply = await this.editInteractively(batch, apply)
      }

      const issues = validateBatch(batch, existingNames)
      if (issues.length) {
        for (const issue of issues) {
          const { source, proposedName } = issue.plan
          logger.error(
            `${source.fileName} -> ${proposedName}: ${issue.message}`
          )
        }
        process.exitCode = 1
        return
      }

      if (!apply) {
        logger.info('Preview only. Use --apply to rename files.')
        return
      }

      const { changed } = await this.renameService.apply(batch)
      logger.success(`Rename complete. Changed ${changed} file(s).`)
    } catch (e) {
      this.reportError(e)
      process.exitCode = 1
    }
  }

  private display(batch: Batch, format: OutputFormat): void {
    if (format === 'json') {
      console.log(JSON.stringify(batch.map(planToJson), null, 2))
    } else if (format === 'table') {
      console.log(table(planRows(batch, getTerminalWidth())))
    } else {
      console.log('=== Rename Preview ===')
      for (const plan of batch) {
        console.log(formatPlanLines(plan).join('\n'))
      }
    }
  }

  private reportProgress(progress: ScanProgress, json: boolean): void {
    if (progress.status === 'error') {
      process.stderr.write('\r' + ' '.repeat(getTerminalWidth() - 1) + '\r')
      const reason = progress.error?.message
      logger.warn(
        `Could not read metadata of ${progress.file.fileName}: ${reason}`
      )
    } else if (progress.status === 'processing' && !json) {
      const { current, total, file } = progress
      process.stderr.write(`\rScanning ${current}/${total}: ${file.fileName}`)
    }
  }

  private reportError(e: unknown): void {
    if (e instanceof RenameConflictError) {
      logger.error('Nothing was renamed:')
      for (const conflict of e.conflicts) {
        logger.error(`  ${conflict}`)
      }
    } else if (e instanceof RenameFailedError) {
      logger.error(`${e.message}. Renamed files were moved back.`)
      for (const failure of e.rollbackErrors) {
        logger.error(`  Could not restore: ${failure.message}`)
      }
    } else if (e instanceof Error) {
      logger.error(`Error: ${e.message}`)
    } else {
      logger.error(`Error: ${e}`)
    }
  }

  /** Returns whether to apply the edited batch */
  private async editInteractively(
    batch: Batch,
    confirmed: boolean
  ): Promise<boolean> {
    const rl = createInterface({ input: stdin, output: stdout })
    try {
      logger.info('Press Enter to keep a proposed name, or type a new one.')
      for (const plan of batch) {
        const answer = await this.ask(
          rl,
          `\n${plan.source.fileName}\n  [${plan.proposedName}] > `
        )
        if (answer) {
          editProposedName(plan, answer)
          console.log(formatPlanLines(plan).slice(1).join('\n'))
        }
      }

      if (confirmed) return true
      const pending = batch.filter(plan => !isUnchanged(plan)).length
      const answer = await this.ask(
        rl,
        `\nRename ${pending} file(s)? [y/N] `
      )
      return /^y(es)?$/i.test(answer)
    } finally {
      rl.close()
    }
  }

  private ask(rl: Interface, question: string): Promise<string> {
    return new Promise(resolve => {
      rl.question(question, input => resolve(input.trim()))
    })
  }

  private async isDirectory(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isDirectory()
    } catch {
      return false
    }
  }
}
