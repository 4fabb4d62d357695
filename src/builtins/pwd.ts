import type { SessionState } from '../session/session-state'
import type { BuiltinCommand, CommandResult } from '../types'

/**
 * PWD (Print Working Directory) command - outputs the current working directory
 */
export const pwdCommand: BuiltinCommand = {
  name: 'pwd',
  description: 'Print the current working directory',
  usage: 'pwd',
  async execute(_args: string[], state: SessionState): Promise<CommandResult> {
    return {
      exitCode: 0,
      stdout: `${state.workingDirectory}\n`,
      stderr: '',
      command: 'pwd',
      duration: 0,
    }
  },
}
