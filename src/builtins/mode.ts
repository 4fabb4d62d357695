import type { SessionState } from '../session/session-state'
import type { BuiltinCommand, CommandResult } from '../types'
import { InvalidModeError } from '../errors'
import { SHELL_MODES } from '../session/session-state'

/**
 * Mode command - shows or switches how ambiguous input is routed
 */
export const modeCommand: BuiltinCommand = {
  name: 'mode',
  description: 'Show or switch the input mode (shell, nl, ai)',
  usage: 'mode [shell|nl|ai]',
  examples: ['mode', 'mode shell', 'mode NL'],
  async execute(args: string[], state: SessionState): Promise<CommandResult> {
    const start = performance.now()

    if (args.length === 0) {
      return {
        exitCode: 0,
        stdout: `Current mode: ${state.mode}\nAvailable: ${SHELL_MODES.join(', ')}\n`,
        stderr: '',
        command: 'mode',
        duration: performance.now() - start,
      }
    }

    try {
      const mode = state.setMode(args[0])
      return {
        exitCode: 0,
        stdout: `Switched to ${mode} mode\n`,
        stderr: '',
        command: `mode ${args[0]}`,
        duration: performance.now() - start,
      }
    }
    catch (error) {
      if (!(error instanceof InvalidModeError))
        throw error
      return {
        exitCode: 1,
        stdout: '',
        stderr: `mode: ${error.message}\n`,
        command: `mode ${args[0]}`,
        duration: performance.now() - start,
        error: 'InvalidModeName',
      }
    }
  },
}
