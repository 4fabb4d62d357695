import type { SessionState } from '../session/session-state'
import type { BuiltinCommand, CommandResult } from '../types'
import { InvalidVariableNameError } from '../errors'

/**
 * Export command - sets environment variables
 * Values land in the session and in the environment of every later child process
 */
export const exportCommand: BuiltinCommand = {
  name: 'export',
  description: 'Set environment variables',
  usage: 'export [name=value ...]',
  examples: ['export', 'export EDITOR=vim', 'export PATH="$HOME/bin:/usr/bin"'],
  async execute(args: string[], state: SessionState): Promise<CommandResult> {
    const start = performance.now()
    const command = ['export', ...args].join(' ')

    if (args.length === 0) {
      const output = state.listEnvironment()
        .map(([name, value]) => `${name}=${value}`)
        .join('\n')

      return {
        exitCode: 0,
        stdout: output ? `${output}\n` : '',
        stderr: '',
        command,
        duration: performance.now() - start,
      }
    }

    let stderr = ''
    for (const arg of args) {
      const eq = arg.indexOf('=')
      // `export NAME` marks an existing variable; every variable is already exported
      if (eq === -1)
        continue

      try {
        state.setEnvVar(arg.slice(0, eq), arg.slice(eq + 1))
      }
      catch (error) {
        if (!(error instanceof InvalidVariableNameError))
          throw error
        stderr += `export: '${arg}': not a valid identifier\n`
      }
    }

    return {
      exitCode: stderr ? 1 : 0,
      stdout: '',
      stderr,
      command,
      duration: performance.now() - start,
      error: stderr ? 'InvalidVariableName' : undefined,
    }
  },
}
