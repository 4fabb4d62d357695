import type { BuiltinCommand } from '../src/types'
import { mkdir, mkdtemp, rm } from 'node:fs/promises'
import { homedir, tmpdir } from 'node:os'
import { join, resolve } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createBuiltins } from '../src/builtins'
import { silentLogger } from '../src/logger'
import { detachedProcessBinding } from '../src/session/process-binding'
import { SessionState } from '../src/session/session-state'
import { BuiltinManager } from '../src/shell/builtin-manager'
import { createTestShell } from '../src/test'

describe('Builtin Commands', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'wraith-builtins-'))
    await mkdir(join(tempDir, 'sub'))
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  describe('cd', () => {
    it('changes into a relative directory', async () => {
      const { shell } = createTestShell({ cwd: tempDir })
      const result = await shell.execute('cd sub')

      expect(result.exitCode).toBe(0)
      expect(result.stdout).toBe('')
      expect(shell.state.workingDirectory).toBe(join(tempDir, 'sub'))
    })

    it('fails on a missing directory and stays put', async () => {
      const { shell } = createTestShell({ cwd: tempDir })
      const result = await shell.execute('cd /nonexistent-path-xyz')

      expect(result.exitCode).toBe(1)
      expect(result.stderr).toBe('cd: /nonexistent-path-xyz: No such directory\n')
      expect(result.error).toBe('DirectoryNotFound')
      expect(shell.state.workingDirectory).toBe(tempDir)
      expect(shell.state.lastExitCode).toBe(1)
    })

    it('goes back with cd - and prints the directory', async () => {
      const { shell } = createTestShell({ cwd: tempDir })
      await shell.execute('cd sub')
      const result = await shell.execute('cd -')

      expect(result.stdout).toBe(`${tempDir}\n`)
      expect(shell.state.workingDirectory).toBe(tempDir)
    })

    it('fails cd - without a previous directory', async () => {
      const { shell } = createTestShell({ cwd: tempDir })
      const result = await shell.execute('cd -')

      expect(result.exitCode).toBe(1)
      expect(result.stderr).toBe('cd: OLDPWD not set\n')
    })

    it('goes home without arguments', async () => {
      const { shell } = createTestShell({ cwd: tempDir })
      await shell.execute('cd')
      expect(shell.state.workingDirectory).toBe(resolve(homedir()))
    })
  })

  describe('export', () => {
    it('sets variables and lists them sorted', async () => {
      const { shell } = createTestShell({ cwd: tempDir, environment: { ZED: '1' } })

      expect((await shell.execute('export FOO=bar')).exitCode).toBe(0)
      const listing = await shell.execute('export')

      expect(listing.stdout).toBe('FOO=bar\nZED=1\n')
      expect(listing.stdout.split('\n')).toContain('FOO=bar')
    })

    it('handles quoted values and several assignments', async () => {
      const { shell } = createTestShell({ cwd: tempDir })
      await shell.execute('export MSG="hello world" COUNT=2')

      expect(shell.state.getEnvVar('MSG')).toBe('hello world')
      expect(shell.state.getEnvVar('COUNT')).toBe('2')
    })

    it('accepts a bare name without changing anything', async () => {
      const { shell } = createTestShell({ cwd: tempDir, environment: {} })
      const result = await shell.execute('export BARE')

      expect(result.exitCode).toBe(0)
      expect(shell.state.getEnvVar('BARE')).toBeUndefined()
    })

    it('rejects an invalid name', async () => {
      const { shell } = createTestShell({ cwd: tempDir })
      const result = await shell.execute('export =bad')

      expect(result.exitCode).toBe(1)
      expect(result.stderr).toBe('export: \'=bad\': not a valid identifier\n')
      expect(result.error).toBe('InvalidVariableName')
    })
  })

  describe('mode', () => {
    it('shows the current mode', async () => {
      const { shell } = createTestShell({ cwd: tempDir })
      const result = await shell.execute('mode')

      expect(result.stdout).toBe('Current mode: nl\nAvailable: shell, nl, ai\n')
    })

    it('switches mode case-insensitively', async () => {
      const { shell } = createTestShell({ cwd: tempDir })
      const result = await shell.execute('mode SHELL')

      expect(result.stdout).toBe('Switched to shell mode\n')
      expect(shell.state.mode).toBe('shell')
    })

    it('rejects an unknown mode', async () => {
      const { shell } = createTestShell({ cwd: tempDir })
      const result = await shell.execute('mode loud')

      expect(result.exitCode).toBe(1)
      expect(result.stderr).toBe('mode: invalid mode: loud (expected one of: shell, nl, ai)\n')
      expect(result.error).toBe('InvalidModeName')
      expect(shell.state.mode).toBe('nl')
    })
  })

  describe('exit', () => {
    it('requests the end of the session with a status', async () => {
      const { shell } = createTestShell({ cwd: tempDir })
      const result = await shell.execute('exit 3')

      expect(result.exitCode).toBe(3)
      expect(shell.state.exitRequest).toEqual({ code: 3 })
    })

    it('wraps large statuses and ignores non-numeric ones', async () => {
      const { shell } = createTestShell({ cwd: tempDir })

      expect((await shell.execute('exit 300')).exitCode).toBe(44)
      expect((await shell.execute('exit 99999999999999999999')).exitCode).toBe(255)
      expect((await shell.execute('exit soon')).exitCode).toBe(0)
      expect(shell.state.exitRequest).toEqual({ code: 0 })
    })
  })

  it('pwd prints the working directory', async () => {
    const { shell } = createTestShell({ cwd: tempDir })
    expect((await shell.execute('pwd')).stdout).toBe(`${tempDir}\n`)
  })

  describe('BuiltinManager', () => {
    const state = new SessionState({ cwd: tmpdir(), environment: {}, binding: detachedProcessBinding })

    it('registers exactly the session built-ins', () => {
      expect([...createBuiltins().keys()].sort()).toEqual(['cd', 'exit', 'export', 'mode', 'pwd'])
    })

    it('reports an unknown name', async () => {
      const result = await new BuiltinManager(silentLogger()).run('nope', [], state)

      expect(result.exitCode).toBe(127)
      expect(result.stderr).toBe('wraith: nope: not a builtin\n')
    })

    it('turns a thrown error into a failed result', async () => {
      const boom: BuiltinCommand = {
        name: 'boom',
        description: 'Always fails',
        usage: 'boom',
        execute: async () => {
          throw new Error('kaput')
        },
      }
      const manager = new BuiltinManager(silentLogger(), new Map([['boom', boom]]))
      const result = await manager.run('boom', ['now'], state)

      expect(result.exitCode).toBe(1)
      expect(result.stderr).toBe('boom: kaput\n')
      expect(result.command).toBe('boom now')
    })
  })
})
