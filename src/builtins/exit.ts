import type { SessionState } from '../session/session-state'
import type { BuiltinCommand, CommandResult } from '../types'

/**
 * Exit command - ends the session with an optional status code.
 * A non-numeric argument counts as no argument.
 */
export const exitCommand: BuiltinCommand = {
  name: 'exit',
  description: 'Exit the shell',
  usage: 'exit [code]',
  async execute(args: string[], state: SessionState): Promise<CommandResult> {
    const start = performance.now()
    const arg = args[0]
    const exitCode = arg && /^\d+$/.test(arg) ? Number(BigInt(arg) % 256n) : 0

    state.requestExit(exitCode)

    return {
      exitCode,
      stdout: '',
      stderr: '',
      command: arg ? `exit ${arg}` : 'exit',
      duration: performance.now() - start,
    }
  },
}
