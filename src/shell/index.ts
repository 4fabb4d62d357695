import type { ClipboardReader } from '../input/clipboard'
import type { StdinSource } from '../input/stdin'
import type { ProcessBinding } from '../session/process-binding'
import type { TranslationGateway } from '../translation/translator'
import type { CommandResult, ExecuteOptions, Resolution, WraithConfig } from '../types'
import type { ReplIO } from './repl-manager'
import type { ResolveOptions } from './resolution-loop'
import { defaultConfig } from '../config'
import { SystemClipboard } from '../input/clipboard'
import { ContextAssembler } from '../input/context-assembler'
import { noStdin } from '../input/stdin'
import { Logger } from '../logger'
import { renderPrompt } from '../prompt'
import { nodeProcessBinding, processEnvironment } from '../session/process-binding'
import { SessionState } from '../session/session-state'
import { AiSdkGateway } from '../translation/gateway'
import { Translator } from '../translation/translator'
import { BuiltinManager } from './builtin-manager'
import { CommandExecutor } from './command-executor'
import { ReplManager } from './repl-manager'
import { ResolutionLoop } from './resolution-loop'

export { BuiltinManager } from './builtin-manager'
export { CommandExecutor } from './command-executor'
export { ReplManager } from './repl-manager'
export { ResolutionLoop } from './resolution-loop'

export interface WraithShellOptions {
  config?: WraithConfig
  log?: Logger
  /** Defaults to the real process; pass the detached binding to keep the process untouched */
  binding?: ProcessBinding
  cwd?: string
  /** Base environment before `config.environment` is applied; defaults to the process environment */
  environment?: Record<string, string>
  gateway?: TranslationGateway
  clipboard?: ClipboardReader
  stdin?: StdinSource
}

/**
 * Wires one session together: state, context assembly, execution and
 * translation. Collaborators with side effects outside the process can be
 * replaced through the options.
 */
export class WraithShell {
  readonly config: WraithConfig
  readonly state: SessionState
  readonly log: Logger
  readonly builtins: BuiltinManager

  private readonly executor: CommandExecutor
  private readonly loop: ResolutionLoop

  constructor(options: WraithShellOptions = {}) {
    this.config = options.config ?? defaultConfig
    this.log = options.log ?? new Logger(this.config.verbose, 'wraith', this.config.logging)

    this.state = new SessionState({
      cwd: options.cwd,
      environment: { ...(options.environment ?? processEnvironment()), ...this.config.environment },
      mode: this.config.mode,
      aliases: this.config.aliases,
      binding: options.binding ?? nodeProcessBinding,
    })

    this.builtins = new BuiltinManager(this.log.withScope('builtins'))
    this.executor = new CommandExecutor(this.config.execution ?? {}, this.builtins, this.log.withScope('exec'))

    const assembler = new ContextAssembler(
      options.clipboard ?? new SystemClipboard(),
      options.stdin ?? noStdin,
      this.log.withScope('context'),
    )
    const translation = this.config.translation ?? {}
    const translator = new Translator(
      options.gateway ?? new AiSdkGateway(translation),
      translation,
      this.log.withScope('translate'),
    )

    this.loop = new ResolutionLoop(this.state, assembler, this.executor, translator, this.config, this.log)
  }

  /**
   * Handle one line of input the way the interactive session would.
   */
  resolve(input: string, options?: ResolveOptions): Promise<Resolution> {
    return this.loop.resolve(input, options)
  }

  /**
   * Run a command directly, skipping classification and translation.
   */
  execute(command: string, options?: ExecuteOptions): Promise<CommandResult> {
    return this.executor.execute(command, this.state, options)
  }

  renderPrompt(): string {
    return renderPrompt(this.state, this.config)
  }

  createRepl(io: ReplIO): ReplManager {
    return new ReplManager(this, io, this.log.withScope('repl'))
  }

  startRepl(io: ReplIO): Promise<number> {
    return this.createRepl(io).start()
  }
}
