import type { ShellErrorKind } from './types'

export class ShellError extends Error {
  readonly kind: ShellErrorKind

  constructor(kind: ShellErrorKind, message: string) {
    super(message)
    this.name = 'ShellError'
    this.kind = kind
  }
}

export class DirectoryNotFoundError extends ShellError {
  readonly path: string

  constructor(path: string) {
    super('DirectoryNotFound', `${path}: No such directory`)
    this.name = 'DirectoryNotFoundError'
    this.path = path
  }
}

export class InvalidVariableNameError extends ShellError {
  readonly variable: string

  constructor(variable: string) {
    super('InvalidVariableName', `'${variable}': not a valid identifier`)
    this.name = 'InvalidVariableNameError'
    this.variable = variable
  }
}

export class InvalidModeError extends ShellError {
  readonly mode: string

  constructor(mode: string, valid: readonly string[]) {
    super('InvalidModeName', `invalid mode: ${mode} (expected one of: ${valid.join(', ')})`)
    this.name = 'InvalidModeError'
    this.mode = mode
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class TranslationError extends ShellError {
  constructor(message: string) {
    super('TranslationFailure', message)
    this.name = 'TranslationError'
  }
}
