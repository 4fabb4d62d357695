import { existsSync } from 'node:fs'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import process from 'node:process'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createTestShell, replyAfterAbort } from '../src/test'

describe.skipIf(process.platform === 'win32')('ResolutionLoop', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'wraith-loop-'))
    await writeFile(join(tempDir, 'marker.txt'), '')
    await writeFile(join(tempDir, 'notes.txt'), 'hello\n')
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  it('executes shell commands directly', async () => {
    const { shell, gateway } = createTestShell({ cwd: tempDir })
    const resolution = await shell.resolve('echo hello')

    expect(resolution.classification).toBe('shell-command')
    expect(resolution.results.map(result => result.stdout)).toEqual(['hello\n'])
    expect(gateway.requests).toHaveLength(0)
    expect(shell.state.history).toEqual(['echo hello'])
  })

  it('ignores empty input and comments', async () => {
    const { shell } = createTestShell({ cwd: tempDir })

    expect((await shell.resolve('   ')).classification).toBe('empty')
    expect((await shell.resolve('# just a note')).classification).toBe('comment')
    expect(shell.state.history).toEqual([])
  })

  it('translates natural language and runs each command', async () => {
    const { shell, gateway } = createTestShell({ cwd: tempDir, replies: ['```\n# list the files\nls\n```'] })
    const resolution = await shell.resolve('show me the files')

    expect(resolution.classification).toBe('natural-language')
    expect(resolution.translation).toBe('# list the files\nls')
    expect(resolution.results.map(result => result.stdout)).toEqual(['marker.txt\nnotes.txt\n'])
    expect(gateway.requests[0].prompt.endsWith('Request: show me the files')).toBe(true)
    expect(shell.state.history).toEqual(['show me the files'])
  })

  it('runs translated commands in order and reports each one first', async () => {
    const { shell } = createTestShell({ cwd: tempDir, replies: ['echo one\n# then\necho two'] })
    const announced: string[] = []

    const resolution = await shell.resolve('say one then two', { onCommand: command => announced.push(command) })

    expect(announced).toEqual(['echo one', 'echo two'])
    expect(resolution.results.map(result => result.stdout)).toEqual(['one\n', 'two\n'])
  })

  it('reports a translation failure without touching the exit code', async () => {
    const { shell } = createTestShell({ cwd: tempDir, replies: [new Error('offline')] })
    await shell.execute('sh -c "exit 4"')

    const resolution = await shell.resolve('show me the files')

    expect(resolution.error).toBe('translation failed: offline')
    expect(resolution.errorKind).toBe('TranslationFailure')
    expect(resolution.results).toEqual([])
    expect(shell.state.lastExitCode).toBe(4)
    expect(shell.state.history).toEqual(['show me the files'])
  })

  it('hands assistant requests back without running anything', async () => {
    const { shell, gateway } = createTestShell({ cwd: tempDir })
    const resolution = await shell.resolve('ai: summarize this')

    expect(resolution.classification).toBe('assistant-request')
    expect(resolution.assistantRequest).toBe('summarize this')
    expect(resolution.results).toEqual([])
    expect(gateway.requests).toHaveLength(0)
  })

  it('runs natural language directly in shell mode', async () => {
    const { shell, gateway } = createTestShell({ cwd: tempDir, config: { mode: 'shell' } })
    const resolution = await shell.resolve('show me the files')

    expect(resolution.results).toHaveLength(1)
    expect(resolution.results[0].exitCode).toBe(127)
    expect(gateway.requests).toHaveLength(0)
  })

  it('sends natural language to the assistant in ai mode', async () => {
    const { shell } = createTestShell({ cwd: tempDir, config: { mode: 'ai' } })
    const resolution = await shell.resolve('tell me about this repo')

    expect(resolution.assistantRequest).toBe('tell me about this repo')
    expect(resolution.results).toEqual([])
  })

  it('runs an alias even when the text reads like a request', async () => {
    const { shell, gateway } = createTestShell({ cwd: tempDir, config: { aliases: { hello: 'echo hi' } } })
    const resolution = await shell.resolve('hello there')

    expect(resolution.results.map(result => result.stdout)).toEqual(['hi there\n'])
    expect(gateway.requests).toHaveLength(0)
  })

  it('classifies the text left after references are removed', async () => {
    const { shell } = createTestShell({ cwd: tempDir })
    const resolution = await shell.resolve('@missing.txt')

    expect(resolution.classification).toBe('empty')
    expect(resolution.bundle.blocks[0].status).toBe('not-found')
    expect(shell.state.history).toEqual([])
  })

  it('gives the translator referenced files, history and the last result', async () => {
    const { shell, gateway } = createTestShell({ cwd: tempDir, replies: ['ls'] })
    await shell.resolve('echo a')
    await shell.resolve('echo b')

    await shell.resolve('explain @notes.txt')
    const { prompt } = gateway.requests[0]

    expect(prompt).toContain('# File: notes.txt\nhello\n')
    expect(prompt).toContain('Recent commands:\necho a\necho b')
    expect(prompt).toContain('Previous command: echo b\nExit code: 0\nStdout:\nb\n')
    expect(prompt.endsWith('Request: explain')).toBe(true)
  })

  it('changes directory through the cd built-in', async () => {
    const { shell } = createTestShell({ cwd: tempDir })
    await shell.resolve(`cd ${tmpdir()}`)

    expect(shell.state.workingDirectory).toBe(tmpdir())
  })

  it('shows the translation notes before running its commands', async () => {
    const { shell } = createTestShell({ cwd: tempDir, replies: ['# show the files\nls'] })
    const events: string[] = []

    const resolution = await shell.resolve('show me the files', {
      onNote: note => events.push(`note ${note}`),
      onCommand: command => events.push(`run ${command}`),
    })

    expect(resolution.notes).toEqual(['# show the files'])
    expect(events).toEqual(['note # show the files', 'run ls'])
  })

  it('holds a risky translated command until it is typed back', async () => {
    const { shell } = createTestShell({ cwd: tempDir, replies: ['echo start\nrm -f marker.txt\necho after'] })

    const first = await shell.resolve('clean up the marker')

    expect(first.results.map(result => result.stdout)).toEqual(['start\n'])
    expect(first.prepared).toBe('rm -f marker.txt')
    expect(shell.state.pendingCommands).toEqual(['rm -f marker.txt', 'echo after'])
    expect(existsSync(join(tempDir, 'marker.txt'))).toBe(true)

    const second = await shell.resolve('rm -f marker.txt')

    expect(second.results.map(result => result.stdout)).toEqual(['', 'after\n'])
    expect(shell.state.pendingCommands).toEqual([])
    expect(existsSync(join(tempDir, 'marker.txt'))).toBe(false)
  })

  it('runs everything queued when asked to go ahead', async () => {
    const { shell, gateway } = createTestShell({ cwd: tempDir, replies: ['mv marker.txt moved.txt\nchmod 600 moved.txt'] })
    await shell.resolve('rename the marker')

    const resolution = await shell.resolve('Go ahead')

    expect(resolution.results.map(result => result.exitCode)).toEqual([0, 0])
    expect(existsSync(join(tempDir, 'moved.txt'))).toBe(true)
    expect(shell.state.pendingCommands).toEqual([])
    expect(gateway.requests).toHaveLength(1)
    expect(shell.state.history).toEqual(['rename the marker', 'Go ahead'])
  })

  it('says so when there is nothing queued', async () => {
    const { shell, gateway } = createTestShell({ cwd: tempDir })
    const resolution = await shell.resolve('run it')

    expect(resolution.notice).toBe('Nothing queued to run.')
    expect(resolution.results).toEqual([])
    expect(gateway.requests).toHaveLength(0)
  })

  it('stops running translated commands once one exits the session', async () => {
    const { shell } = createTestShell({ cwd: tempDir, replies: ['mv marker.txt moved.txt\nexit 3\necho never'] })
    await shell.resolve('move it and quit')

    const resolution = await shell.resolve('run those')

    expect(resolution.results.map(result => result.command)).toEqual(['mv marker.txt moved.txt', 'exit 3'])
    expect(shell.state.exitRequest).toEqual({ code: 3 })
    expect(shell.state.pendingCommands).toEqual([])
  })

  it('records an interrupted translation as exit code 130', async () => {
    const { shell } = createTestShell({ cwd: tempDir, replies: [replyAfterAbort] })
    await shell.execute('sh -c "exit 7"')
    const controller = new AbortController()
    setTimeout(() => controller.abort(), 20)

    const resolution = await shell.resolve('show me the files', { signal: controller.signal })

    expect(resolution.error).toBe('interrupted')
    expect(resolution.errorKind).toBe('Interrupted')
    expect(shell.state.lastExitCode).toBe(130)
  })
})
