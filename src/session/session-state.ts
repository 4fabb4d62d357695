import type { CommandResult, ShellMode } from '../types'
import type { ProcessBinding } from './process-binding'
import { statSync } from 'node:fs'
import { homedir } from 'node:os'
import { resolve } from 'node:path'
import process from 'node:process'
import { DirectoryNotFoundError, InvalidModeError, InvalidVariableNameError } from '../errors'
import { nodeProcessBinding, processEnvironment } from './process-binding'

export const SHELL_MODES: readonly ShellMode[] = ['shell', 'nl', 'ai']

export interface SessionStateOptions {
  cwd?: string
  /** Initial environment; defaults to the current process environment */
  environment?: Record<string, string>
  mode?: ShellMode
  aliases?: Record<string, string>
  binding?: ProcessBinding
}

export interface ExitRequest {
  code: number
}

export function isShellMode(value: string): value is ShellMode {
  return SHELL_MODES.some(mode => mode === value)
}

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(path: string): string {
  if (path === '~')
    return homedir()
  if (path.startsWith('~/'))
    return resolve(homedir(), path.slice(2))
  return path
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory()
  }
  catch {
    return false
  }
}

/**
 * Everything one interactive session reads and mutates.
 *
 * Fields are private; every change goes through a named operation so each
 * mutation site can be found by searching for it.
 */
export class SessionState {
  private cwd: string
  private prevDir: string | undefined
  private readonly env: Map<string, string>
  private currentMode: ShellMode
  private readonly entries: string[] = []
  private readonly aliasTable: ReadonlyMap<string, string>
  private exitCode = 0
  private last: CommandResult | undefined
  private exit: ExitRequest | undefined
  private queue: readonly string[] = []
  private readonly binding: ProcessBinding

  constructor(options: SessionStateOptions = {}) {
    this.binding = options.binding ?? nodeProcessBinding
    this.cwd = resolve(options.cwd ?? process.cwd())
    this.env = new Map(Object.entries(options.environment ?? processEnvironment()))
    this.currentMode = options.mode ?? 'nl'
    this.aliasTable = new Map(Object.entries(options.aliases ?? {}))
  }

  get workingDirectory(): string {
    return this.cwd
  }

  get previousDirectory(): string | undefined {
    return this.prevDir
  }

  get mode(): ShellMode {
    return this.currentMode
  }

  get history(): readonly string[] {
    return this.entries
  }

  get lastExitCode(): number {
    return this.exitCode
  }

  get lastResult(): CommandResult | undefined {
    return this.last
  }

  get exitRequest(): ExitRequest | undefined {
    return this.exit
  }

  /**
   * Translated commands waiting to run, in order. The first one is the
   * command offered for confirmation.
   */
  get pendingCommands(): readonly string[] {
    return this.queue
  }

  get aliases(): ReadonlyMap<string, string> {
    return this.aliasTable
  }

  getEnvVar(name: string): string | undefined {
    return this.env.get(name)
  }

  /**
   * Environment handed to spawned children. A copy, so nothing a child
   * does can reach back into the session.
   */
  environmentSnapshot(): Record<string, string> {
    return Object.fromEntries(this.env)
  }

  /**
   * Variables sorted by name.
   */
  listEnvironment(): Array<[string, string]> {
    return [...this.env.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  }

  recentHistory(count: number): string[] {
    return count > 0 ? this.entries.slice(-count) : []
  }

  /**
   * Change directory. Relative paths resolve against the current working
   * directory. Returns the new absolute directory.
   */
  setWorkingDirectory(path: string): string {
    const target = resolve(this.cwd, expandHome(path))
    if (!isDirectory(target))
      throw new DirectoryNotFoundError(target)

    // chdir first: if the process refuses, the session keeps its old directory
    this.binding.chdir(target)

    const previous = this.cwd
    this.cwd = target
    this.prevDir = previous
    this.setEnvVar('OLDPWD', previous)
    this.setEnvVar('PWD', target)
    return target
  }

  setEnvVar(name: string, value: string): void {
    if (!name || /[=\s\0]/.test(name))
      throw new InvalidVariableNameError(name)

    this.env.set(name, value)
    this.binding.setEnv(name, value)
  }

  setMode(name: string): ShellMode {
    const normalized = name.trim().toLowerCase()
    if (!isShellMode(normalized))
      throw new InvalidModeError(normalized, SHELL_MODES)

    this.currentMode = normalized
    return normalized
  }

  appendHistory(entry: string): void {
    this.entries.push(entry)
  }

  setLastExitCode(code: number): void {
    this.exitCode = code
  }

  recordResult(result: CommandResult): void {
    this.last = result
    this.setLastExitCode(result.exitCode)
  }

  setPendingCommands(commands: readonly string[]): void {
    this.queue = [...commands]
  }

  requestExit(code: number): void {
    this.exit = { code }
  }
}
