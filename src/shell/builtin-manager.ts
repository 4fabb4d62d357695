import type { Logger } from '../logger'
import type { SessionState } from '../session/session-state'
import type { BuiltinCommand, CommandResult } from '../types'
import { createBuiltins } from '../builtins'
import { errorMessage, ShellError } from '../errors'

/**
 * Static name -> handler table. Handlers get the remaining arguments and the
 * session state; nothing is looked up dynamically.
 */
export class BuiltinManager {
  private builtins: Map<string, BuiltinCommand>

  constructor(private readonly log: Logger, builtins: Map<string, BuiltinCommand> = createBuiltins()) {
    this.builtins = builtins
  }

  getBuiltins(): Map<string, BuiltinCommand> {
    return this.builtins
  }

  has(name: string): boolean {
    return this.builtins.has(name)
  }

  get(name: string): BuiltinCommand | undefined {
    return this.builtins.get(name)
  }

  async run(name: string, args: string[], state: SessionState): Promise<CommandResult> {
    const start = performance.now()
    const command = [name, ...args].join(' ')
    const builtin = this.builtins.get(name)

    if (!builtin) {
      return {
        exitCode: 127,
        stdout: '',
        stderr: `wraith: ${name}: not a builtin\n`,
        command,
        duration: performance.now() - start,
      }
    }

    try {
      return await builtin.execute(args, state)
    }
    catch (error) {
      this.log.debug(`builtin ${name} failed:`, errorMessage(error))
      return {
        exitCode: 1,
        stdout: '',
        stderr: `${name}: ${errorMessage(error)}\n`,
        command,
        duration: performance.now() - start,
        error: error instanceof ShellError ? error.kind : undefined,
      }
    }
  }
}
