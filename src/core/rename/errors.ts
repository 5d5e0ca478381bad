/**
 * Thrown before anything is renamed: the batch would overwrite a file or
 * give two files the same name.
 */
export class RenameConflictError extends Error {
  readonly conflicts: readonly string[]

  constructor(conflicts: readonly string[]) {
    super(`Cannot rename: ${conflicts.join('; ')}`)
    this.name = 'RenameConflictError'
    this.conflicts = conflicts
  }
}

/**
 * Thrown when a rename failed part way. Files already moved were put back;
 * `rollbackErrors` lists the ones that could not be.
 */
export class RenameFailedError extends Error {
  readonly rollbackErrors: readonly Error[]

  constructor(cause: unknown, rollbackErrors: readonly Error[] = []) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Rename failed: ${reason}`, { cause })
    this.name = 'RenameFailedError'
    this.rollbackErrors = rollbackErrors
  }
}
