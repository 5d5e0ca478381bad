import { randomBytes } from 'crypto'
import { constants } from 'fs'
import { access, rename } from 'fs/promises'
import { basename, dirname, join } from 'path'

import { collectBookFiles, listExistingNames } from '@/core/book/library'
import type { SourceFileRef } from '@/core/book/types'
import { extractMetadata } from '@/core/metadata/extract'
import type { MetadataRecord } from '@/core/metadata/types'
import { nameKey } from '@/core/naming/collisions'
import { resolveBatch, type PlanInput } from '@/core/naming/pipeline'
import type { Batch, RenamePlan } from '@/core/naming/types'
import { describeProblem, validateTargetName } from '@/core/naming/validate'

import { RenameConflictError, RenameFailedError } from './errors'

export interface ScanProgress {
  file: SourceFileRef
  current: number
  total: number
  status: 'processing' | 'success' | 'error'
  error?: Error
}

export interface ScanResult {
  directory: string
  batch: Batch
  existingNames: Set<string>
}

export type MetadataReader = (file: SourceFileRef) => Promise<MetadataRecord>

interface StagedMove {
  original: string
  temp: string
  target: string
  done: boolean
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.F_OK)
    return true
  } catch {
    return false
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

export class RenameService {
  constructor(private readMetadata: MetadataReader = extractMetadata) {}

  /**
   * Reads every book in `dir` and builds the rename batch. A file whose
   * metadata cannot be read is reported and resolved from its name alone.
   */
  async scan(
    dir: string,
    onProgress?: (progress: ScanProgress) => void
  ): Promise<ScanResult> {
    const files = await collectBookFiles(dir)
    const inputs: PlanInput[] = []

    for (let i = 0; i < files.length; i++) {
      const file = files[i]
      const base = { file, current: i + 1, total: files.length }
      onProgress?.({ ...base, status: 'processing' })

      let metadata: MetadataRecord = {}
      try {
        metadata = await this.readMetadata(file)
        onProgress?.({ ...base, status: 'success' })
      } catch (e) {
        onProgress?.({ ...base, status: 'error', error: toError(e) })
      }
      inputs.push({ source: file, metadata })
    }

    const existingNames = await listExistingNames(dir)
    return {
      directory: dir,
      batch: resolveBatch(inputs, existingNames),
      existingNames
    }
  }

  /**
   * Renames the given plans in two steps, through temporary names, so that
   * files may swap names. On failure every file is moved back.
   */
  async apply(plans: readonly RenamePlan[]): Promise<{ changed: number }> {
    await this.checkConflicts(plans)

    const pending = plans.filter(
      plan => plan.proposedName !== plan.source.fileName
    )
    const staged: StagedMove[] = []

    try {
      for (const [idx, plan] of pending.entries()) {
        const original = plan.source.path
        const temp = await this.tempPathFor(original, idx)
        const target = join(dirname(original), plan.proposedName)
        await rename(original, temp)
        staged.push({ original, temp, target, done: false })
      }

      for (const move of staged) {
        await rename(move.temp, move.target)
        move.done = true
      }
    } catch (e) {
      const rollbackErrors = await this.rollback(staged)
      throw new RenameFailedError(e, rollbackErrors)
    }

    return { changed: staged.length }
  }

  private async checkConflicts(plans: readonly RenamePlan[]): Promise<void> {
    const sources = new Set(plans.map(plan => nameKey(plan.source.path)))
    const seen = new Set<string>()
    const conflicts: string[] = []

    for (const plan of plans) {
      const problem = validateTargetName(plan.proposedName)
      if (problem) {
        conflicts.push(`${plan.proposedName}: ${describeProblem(problem)}`)
        continue
      }

      const target = join(dirname(plan.source.path), plan.proposedName)
      const key = nameKey(target)
      if (seen.has(key)) {
        conflicts.push(`Duplicate target filename: ${plan.proposedName}`)
      } else if (!sources.has(key) && (await pathExists(target))) {
        conflicts.push(`Target already exists: ${plan.proposedName}`)
      }
      seen.add(key)
    }

    if (conflicts.length) throw new RenameConflictError(conflicts)
  }

  private async tempPathFor(original: string, idx: number): Promise<string> {
    const dir = dirname(original)
    const name = basename(original)
    let temp = join(dir, `.rename_tmp_${process.pid}_${idx}_${name}`)
    while (await pathExists(temp)) {
      const salt = randomBytes(2).toString('hex')
      temp = join(dir, `.rename_tmp_${process.pid}_${idx}_${salt}_${name}`)
    }
    return temp
  }

  /**
   * Undoes `apply` in reverse: finished moves go back to their temporary
   * names first, so no original name is occupied when the temporaries are
   * moved back.
   */
  private async rollback(staged: StagedMove[]): Promise<Error[]> {
    const errors: Error[] = []
    for (const move of [...staged].reverse()) {
      if (!move.done) continue
      try {
        await rename(move.target, move.temp)
        move.done = false
      } catch (e) {
        errors.push(toError(e))
      }
    }
    for (const move of staged) {
      // still sitting at its target; moving the temporary would clobber it
      if (move.done) continue
      try {
        await rename(move.temp, move.original)
      } catch (e) {
        errors.push(toError(e))
      }
    }
    return errors
  }
}
