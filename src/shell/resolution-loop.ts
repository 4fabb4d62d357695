import type { ContextAssembler } from '../input/context-assembler'
import type { Logger } from '../logger'
import type { SessionState } from '../session/session-state'
import type { Translator } from '../translation/translator'
import type { CommandResult, OutputSinks, Resolution, WraithConfig } from '../types'
import type { CommandExecutor } from './command-executor'
import process from 'node:process'
import { TranslationError } from '../errors'
import { classify, extractAssistantRequest, firstWord } from '../input/classifier'
import { isReleasePhrase, shouldAutorun } from '../translation/safety'
import { INTERRUPTED_EXIT_CODE } from './command-executor'

export interface ResolveOptions {
  signal?: AbortSignal
  stream?: OutputSinks
  /** Called before each translated command runs */
  onCommand?: (command: string) => void
  /** Called with each `#` line of a translation before its commands run */
  onNote?: (line: string) => void
}

type Route = 'execute' | 'confirm' | 'release' | 'translate' | 'assistant' | 'skip'

/**
 * One pass per input line: assemble context, classify the cleaned text,
 * then run it, translate it, or hand it to the assistant.
 *
 * Translated commands go through a queue on the session. Safe ones run
 * straight away; the first risky one stops the queue until the user types
 * it back, or says "run it" to release everything left.
 */
export class ResolutionLoop {
  constructor(
    private readonly state: SessionState,
    private readonly assembler: ContextAssembler,
    private readonly executor: CommandExecutor,
    private readonly translator: Translator,
    private readonly config: WraithConfig,
    private readonly log: Logger,
  ) {}

  async resolve(input: string, options: ResolveOptions = {}): Promise<Resolution> {
    const bundle = await this.assembler.assemble(input, this.state)
    const classification = classify(bundle.command)
    const resolution: Resolution = { input, classification, bundle, results: [] }
    const route = this.route(resolution)

    this.log.debug(`${classification} -> ${route}: ${bundle.command}`)

    if (route === 'skip')
      return resolution

    try {
      switch (route) {
        case 'execute':
          resolution.results.push(await this.run(bundle.command, options))
          break
        case 'confirm':
          this.state.setPendingCommands(this.state.pendingCommands.slice(1))
          resolution.results.push(await this.run(bundle.command, options))
          await this.drainQueue(resolution, options, false)
          break
        case 'release':
          if (this.state.pendingCommands.length === 0)
            resolution.notice = 'Nothing queued to run.'
          else
            await this.drainQueue(resolution, options, true)
          break
        case 'assistant':
          resolution.assistantRequest = extractAssistantRequest(bundle.command)
          break
        case 'translate':
          await this.translateAndRun(resolution, options)
          break
      }
    }
    finally {
      // Recorded after the work is done, whether or not it succeeded
      this.state.appendHistory(input)
    }

    return resolution
  }

  private route({ classification, bundle }: Resolution): Route {
    if (classification === 'empty' || classification === 'comment')
      return 'skip'
    if (bundle.command === this.state.pendingCommands[0])
      return 'confirm'

    switch (classification) {
      case 'shell-command':
        return 'execute'
      case 'assistant-request':
        return 'assistant'
      case 'natural-language':
        break
    }

    if (this.state.aliases.has(firstWord(bundle.command)))
      return 'execute'
    if (this.state.mode === 'shell')
      return 'execute'
    if (this.state.mode === 'ai')
      return 'assistant'
    if (isReleasePhrase(bundle.command))
      return 'release'
    return 'translate'
  }

  private run(command: string, options: ResolveOptions): Promise<CommandResult> {
    return this.executor.execute(command, this.state, { signal: options.signal, stream: options.stream })
  }

  private async translateAndRun(resolution: Resolution, options: ResolveOptions): Promise<void> {
    const translation = this.config.translation ?? {}
    const context = {
      cwd: this.state.workingDirectory,
      recentCommands: this.state.recentHistory(translation.recentHistory ?? 3),
      blocks: resolution.bundle.blocks,
      lastResult: this.state.lastResult,
      platform: process.platform,
      shell: this.state.getEnvVar('SHELL') ?? this.state.getEnvVar('ComSpec'),
    }

    try {
      const { text, commands, notes } = await this.translator.translate(resolution.bundle.command, context, options.signal)
      resolution.translation = text
      resolution.notes = notes
      for (const note of notes)
        options.onNote?.(note)

      this.state.setPendingCommands(commands)
      await this.drainQueue(resolution, options, false)
    }
    catch (error) {
      if (!(error instanceof TranslationError))
        throw error
      this.log.debug(error.message)

      if (options.signal?.aborted) {
        this.state.setLastExitCode(INTERRUPTED_EXIT_CODE)
        resolution.error = 'interrupted'
        resolution.errorKind = 'Interrupted'
        return
      }
      resolution.error = error.message
      resolution.errorKind = error.kind
    }
  }

  /**
   * Run queued commands in order. Unless the user already confirmed, stop
   * at the first one that needs confirmation and leave it at the head of
   * the queue. An interrupt or an `exit` empties the queue.
   */
  private async drainQueue(resolution: Resolution, options: ResolveOptions, confirmed: boolean): Promise<void> {
    for (const command of this.state.pendingCommands) {
      if (options.signal?.aborted) {
        this.state.setLastExitCode(INTERRUPTED_EXIT_CODE)
        break
      }
      if (this.state.exitRequest)
        break

      if (!confirmed && !shouldAutorun(command, this.state.workingDirectory)) {
        resolution.prepared = command
        return
      }

      this.state.setPendingCommands(this.state.pendingCommands.slice(1))
      options.onCommand?.(command)
      resolution.results.push(await this.run(command, options))
    }

    this.state.setPendingCommands([])
  }
}
