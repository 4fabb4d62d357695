import type { SessionState } from '../session/session-state'
import type { BuiltinCommand, CommandResult } from '../types'
import { homedir } from 'node:os'
import { DirectoryNotFoundError, errorMessage } from '../errors'

/**
 * CD (Change Directory) command - changes the current working directory
 * Supports `~`, relative paths, and `cd -` for the previous directory
 */
export const cdCommand: BuiltinCommand = {
  name: 'cd',
  description: 'Change the current directory',
  usage: 'cd [directory | -]',
  examples: ['cd', 'cd ~/projects', 'cd ..', 'cd -'],
  async execute(args: string[], state: SessionState): Promise<CommandResult> {
    const start = performance.now()
    const target = args[0] || homedir()
    const command = args.length ? `cd ${args[0]}` : 'cd'

    if (target === '-') {
      const prev = state.previousDirectory
      if (!prev) {
        return { exitCode: 1, stdout: '', stderr: 'cd: OLDPWD not set\n', command, duration: performance.now() - start }
      }
      try {
        const cwd = state.setWorkingDirectory(prev)
        // POSIX shells echo the new directory on `cd -`
        return { exitCode: 0, stdout: `${cwd}\n`, stderr: '', command, duration: performance.now() - start }
      }
      catch (error) {
        return failure(error, command, start)
      }
    }

    try {
      state.setWorkingDirectory(target)
      return { exitCode: 0, stdout: '', stderr: '', command, duration: performance.now() - start }
    }
    catch (error) {
      return failure(error, command, start)
    }
  },
}

function failure(error: unknown, command: string, start: number): CommandResult {
  if (error instanceof DirectoryNotFoundError) {
    return {
      exitCode: 1,
      stdout: '',
      stderr: `cd: ${error.path}: No such directory\n`,
      command,
      duration: performance.now() - start,
      error: 'DirectoryNotFound',
    }
  }
  return {
    exitCode: 1,
    stdout: '',
    stderr: `cd: ${errorMessage(error)}\n`,
    command,
    duration: performance.now() - start,
  }
}
