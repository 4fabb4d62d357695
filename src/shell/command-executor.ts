import type { ChildProcess, StdioOptions } from 'node:child_process'
import type { Logger } from '../logger'
import type { SessionState } from '../session/session-state'
import type { CommandResult, ExecuteOptions, ExecutionConfig, ShellErrorKind } from '../types'
import type { BuiltinManager } from './builtin-manager'
import { spawn } from 'node:child_process'
import { constants } from 'node:os'
import process from 'node:process'
import { errorMessage } from '../errors'
import { CommandParser, ParseError } from '../parser'

export const TIMEOUT_EXIT_CODE = 124
export const INTERRUPTED_EXIT_CODE = 130
export const DEFAULT_TIMEOUT_MS = 300_000

const MAX_ALIAS_DEPTH = 10

interface StageExit {
  code: number | null
  signal: NodeJS.Signals | null
  launchError?: NodeJS.ErrnoException
}

interface Stage {
  command: string
  child: ChildProcess
  exited: Promise<StageExit>
  closed: boolean
}

export interface HostShell {
  file: string
  args: (command: string) => string[]
  verbatim: boolean
}

export function hostShell(platform: NodeJS.Platform = process.platform): HostShell {
  if (platform === 'win32') {
    return {
      file: process.env.ComSpec || 'cmd.exe',
      args: command => ['/d', '/s', '/c', `"${command}"`],
      verbatim: true,
    }
  }
  return { file: '/bin/sh', args: command => ['-c', command], verbatim: false }
}

export function signalNumber(signal: NodeJS.Signals): number {
  return Object.entries(constants.signals).find(([name]) => name === signal)?.[1] ?? 0
}

function launchExitCode(error: NodeJS.ErrnoException): number {
  return error.code === 'EACCES' || error.code === 'EPERM' ? 126 : 127
}

/**
 * Runs built-ins in process and everything else through the host shell.
 *
 * A command containing `|` becomes a pipeline: one host-shell process per
 * stage, each stage's stdout handed to the next stage as its stdin at the
 * OS level, so data never passes through this process until the final
 * stage. Only the last stage's stdout is captured; stderr is collected from
 * every stage. Every process started by a call is reaped before the call
 * returns, including after a timeout or an abort.
 */
export class CommandExecutor {
  private readonly shell: HostShell

  constructor(
    private readonly config: ExecutionConfig,
    private readonly builtins: BuiltinManager,
    private readonly log: Logger,
    private readonly parser: CommandParser = new CommandParser(),
    shell: HostShell = hostShell(),
  ) {
    this.shell = shell
  }

  async execute(commandText: string, state: SessionState, options: ExecuteOptions = {}): Promise<CommandResult> {
    const start = performance.now()
    const command = commandText.trim()

    if (!command || command.startsWith('#')) {
      return { exitCode: 0, stdout: '', stderr: '', command, duration: 0 }
    }

    const expanded = this.expandAliases(command, state)
    const result = this.builtins.has(this.firstWord(expanded))
      ? await this.executeBuiltin(expanded, state, start)
      : await this.executeExternal(expanded, state, options, start)

    state.recordResult(result)
    return result
  }

  private firstWord(command: string): string {
    return command.split(/\s+/, 1)[0] ?? ''
  }

  /**
   * Replace the first word while it names an alias. A name is expanded at
   * most once, so `ls='ls -la'` terminates.
   */
  private expandAliases(command: string, state: SessionState): string {
    const seen = new Set<string>()
    let current = command

    for (let depth = 0; depth < MAX_ALIAS_DEPTH; depth++) {
      const name = this.firstWord(current)
      const replacement = state.aliases.get(name)
      if (replacement === undefined || seen.has(name))
        break
      seen.add(name)
      current = `${replacement}${current.slice(name.length)}`
      this.log.debug(`alias ${name} -> ${current}`)
    }

    return current
  }

  private async executeBuiltin(command: string, state: SessionState, start: number): Promise<CommandResult> {
    let tokens: string[]
    try {
      tokens = this.parser.tokenize(command)
    }
    catch (error) {
      if (!(error instanceof ParseError))
        throw error
      return {
        exitCode: 2,
        stdout: '',
        stderr: `wraith: syntax error: ${error.message}\n`,
        command,
        duration: performance.now() - start,
      }
    }

    const [name, ...args] = tokens
    const result = await this.builtins.run(name, args, state)
    return { ...result, command }
  }

  private async executeExternal(
    command: string,
    state: SessionState,
    options: ExecuteOptions,
    start: number,
  ): Promise<CommandResult> {
    const segments = this.parser.splitPipeline(command)
    const timeoutMs = this.config.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS
    const env = state.environmentSnapshot()
    const cwd = state.workingDirectory
    const stages: Stage[] = []
    const stderrParts: string[] = segments.map(() => '')
    let stdout = ''
    let launchFailure: { command: string, error: NodeJS.ErrnoException } | undefined

    if (segments.length > 1)
      this.log.debug(`pipeline of ${segments.length} stages: ${segments.join(' | ')}`)

    for (const [index, segment] of segments.entries()) {
      const previous = stages[index - 1]
      const isLast = index === segments.length - 1
      const stdio: StdioOptions = [previous?.child.stdout ?? 'ignore', 'pipe', 'pipe']

      let child: ChildProcess
      try {
        child = spawn(this.shell.file, this.shell.args(segment), {
          cwd,
          env,
          stdio,
          // Own process group, so the whole stage can be signalled at once
          detached: process.platform !== 'win32',
          windowsHide: true,
          windowsVerbatimArguments: this.shell.verbatim,
        })
      }
      catch (error) {
        launchFailure = { command: segment, error: toErrno(error) }
        break
      }

      // The child holds its own copy of the pipe now; dropping ours lets the
      // upstream stage see EPIPE when this one exits early
      previous?.child.stdout?.destroy()

      const stage: Stage = {
        command: segment,
        child,
        closed: false,
        exited: waitForExit(child).then((exit) => {
          stage.closed = true
          return exit
        }),
      }
      stages.push(stage)

      if (child.pid !== undefined) {
        this.log.debug(`spawned pid ${child.pid}: ${segment}`)
        options.onSpawn?.(child.pid)
      }

      child.stderr?.setEncoding('utf8')
      child.stderr?.on('data', (chunk: string) => {
        stderrParts[index] += chunk
        options.stream?.stderr(chunk)
      })

      if (isLast) {
        child.stdout?.setEncoding('utf8')
        child.stdout?.on('data', (chunk: string) => {
          stdout += chunk
          options.stream?.stdout(chunk)
        })
      }
    }

    let stopReason: 'timeout' | 'interrupted' | undefined
    let escalation: NodeJS.Timeout | undefined

    const terminate = (reason: 'timeout' | 'interrupted'): void => {
      if (stopReason)
        return
      stopReason = reason
      this.log.debug(`terminating ${stages.length} process(es): ${reason}`)
      this.signalAll(stages, this.config.killSignal ?? 'SIGTERM')
      escalation = setTimeout(() => this.signalAll(stages, 'SIGKILL'), this.config.killGraceMs ?? 100)
    }

    if (launchFailure)
      terminate('interrupted')

    const timer = setTimeout(() => terminate('timeout'), timeoutMs)
    const onAbort = (): void => terminate('interrupted')
    if (options.signal?.aborted)
      onAbort()
    else
      options.signal?.addEventListener('abort', onAbort, { once: true })

    let exits: StageExit[]
    try {
      exits = await Promise.all(stages.map(stage => stage.exited))
    }
    finally {
      clearTimeout(timer)
      clearTimeout(escalation)
      options.signal?.removeEventListener('abort', onAbort)
    }

    const stderr = stderrParts.join('')
    const base = { command, duration: performance.now() - start, streamed: Boolean(options.stream) }

    const failedStage = exits.findIndex(exit => exit.launchError)
    const launchError = launchFailure?.error ?? exits[failedStage]?.launchError
    if (launchError) {
      const target = launchFailure?.command ?? stages[failedStage]?.command ?? command
      const message = `wraith: failed to start '${target}': ${launchError.message}\n`
      options.stream?.stderr(message)
      return this.failure(launchExitCode(launchError), stdout, stderr + message, 'ProcessLaunchFailure', base)
    }

    if (stopReason === 'timeout') {
      const message = `wraith: command timed out after ${timeoutMs}ms\n`
      options.stream?.stderr(message)
      return this.failure(TIMEOUT_EXIT_CODE, stdout, stderr + message, 'CommandTimeout', base)
    }

    if (stopReason === 'interrupted') {
      const message = 'wraith: interrupted\n'
      options.stream?.stderr(message)
      return this.failure(INTERRUPTED_EXIT_CODE, stdout, stderr + message, 'Interrupted', base)
    }

    const last = exits[exits.length - 1]
    const exitCode = last?.code ?? (last?.signal ? 128 + signalNumber(last.signal) : 1)
    return { ...base, exitCode, stdout, stderr }
  }

  private failure(
    exitCode: number,
    stdout: string,
    stderr: string,
    error: ShellErrorKind,
    base: { command: string, duration: number, streamed: boolean },
  ): CommandResult {
    return { ...base, exitCode, stdout, stderr, error }
  }

  /**
   * Signal every stage that has not been reaped yet. On POSIX the whole
   * process group goes, so grandchildren started by the host shell are
   * included.
   */
  private signalAll(stages: Stage[], signal: NodeJS.Signals): void {
    for (const stage of stages) {
      const { pid } = stage.child
      if (stage.closed || pid === undefined)
        continue
      try {
        if (process.platform === 'win32')
          stage.child.kill(signal)
        else
          process.kill(-pid, signal)
      }
      catch (error) {
        // ESRCH: the group is already gone
        this.log.debug(`signal ${signal} to ${pid} failed:`, errorMessage(error))
      }
    }
  }
}

function toErrno(error: unknown): NodeJS.ErrnoException {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Resolves once the child has exited and its stdio is closed, which is also
 * when Node has collected its exit status. A child that never started
 * resolves with the launch error instead.
 */
function waitForExit(child: ChildProcess): Promise<StageExit> {
  return new Promise((resolve) => {
    // After a successful spawn 'error' only reports a failed kill; 'close' still follows
    child.on('error', (error: NodeJS.ErrnoException) => {
      if (child.pid === undefined)
        resolve({ code: null, signal: null, launchError: error })
    })

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({ code, signal })
    })
  })
}
