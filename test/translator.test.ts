import type { TranslationContext } from '../src/types'
import { describe, expect, it } from 'vitest'
import { TranslationError } from '../src/errors'
import { silentLogger } from '../src/logger'
import { ScriptedGateway } from '../src/test'
import { createLanguageModel, resolveModelName } from '../src/translation/gateway'
import { actionableLines, buildTranslationPrompt, cleanTranslation, SYSTEM_PROMPT, Translator } from '../src/translation/translator'

const baseContext: TranslationContext = {
  cwd: '/work',
  recentCommands: [],
  blocks: [],
  platform: 'linux',
  shell: '/bin/bash',
}

describe('cleanTranslation', () => {
  it('unwraps a fenced block with a language tag', () => {
    expect(cleanTranslation('```bash\n# list\nls -la\n```')).toBe('# list\nls -la')
  })

  it('unwraps a bare fence', () => {
    expect(cleanTranslation('Here you go:\n```\ngit status\n```\nDone.')).toBe('git status')
  })

  it('drops the opening line of an unterminated fence', () => {
    expect(cleanTranslation('```sh\nls -la')).toBe('ls -la')
  })

  it('leaves plain text alone', () => {
    expect(cleanTranslation('  ls -la \n')).toBe('ls -la')
  })
})

describe('actionableLines', () => {
  it('keeps only commands', () => {
    expect(actionableLines('# comment\n\nbash\nls -la\n  git status  \nPowerShell')).toEqual(['ls -la', 'git status'])
  })
})

describe('buildTranslationPrompt', () => {
  it('includes directory, environment and request', () => {
    const prompt = buildTranslationPrompt('list files', baseContext)

    expect(prompt).toContain('Current directory: /work')
    expect(prompt).toContain('Environment:\n- Platform: linux\n- Shell: /bin/bash')
    expect(prompt.endsWith('\n\nRequest: list files')).toBe(true)
    expect(prompt).not.toContain('Recent commands:')
  })

  it('includes history and the previous command', () => {
    const prompt = buildTranslationPrompt('try again', {
      ...baseContext,
      recentCommands: ['ls', 'make'],
      lastResult: { exitCode: 2, stdout: '', stderr: 'boom', command: 'make', duration: 5 },
    })

    expect(prompt).toContain('Recent commands:\nls\nmake')
    expect(prompt).toContain('Previous command: make\nExit code: 2\nStderr:\nboom')
    expect(prompt).not.toContain('Stdout:')
  })

  it('keeps only the tail of long output', () => {
    const prompt = buildTranslationPrompt('why', {
      ...baseContext,
      lastResult: { exitCode: 0, stdout: 'abcdefgh', stderr: '', command: 'cat x', duration: 1 },
    }, 4)

    expect(prompt).toContain('Stdout:\n...efgh')
  })

  it('renders referenced content', () => {
    const prompt = buildTranslationPrompt('fix it', {
      ...baseContext,
      blocks: [
        { source: { kind: 'file', path: '/work/app.log' }, status: 'ok', content: 'E42' },
        { source: { kind: 'clipboard' }, status: 'unavailable', content: '' },
      ],
    })

    expect(prompt).toContain('Referenced content:\n\n# File: app.log\nE42\n\n\nRequest: fix it')
  })
})

describe('Translator', () => {
  it('returns the runnable lines of a fenced reply', async () => {
    const gateway = new ScriptedGateway(['```bash\n# Listing files\nls -la\n```'])
    const translator = new Translator(gateway, {}, silentLogger())

    const translation = await translator.translate('show me the files', baseContext)

    expect(translation).toEqual({ text: '# Listing files\nls -la', commands: ['ls -la'], notes: ['# Listing files'] })
    expect(gateway.requests).toHaveLength(1)
    expect(gateway.requests[0].system).toBe(SYSTEM_PROMPT)
    expect(gateway.requests[0].prompt.endsWith('Request: show me the files')).toBe(true)
  })

  it('passes the abort signal through', async () => {
    const gateway = new ScriptedGateway(['ls'])
    const controller = new AbortController()

    await new Translator(gateway, {}, silentLogger()).translate('list', baseContext, controller.signal)
    expect(gateway.requests[0].signal).toBe(controller.signal)
  })

  it('wraps gateway failures', async () => {
    const translator = new Translator(new ScriptedGateway([new Error('offline')]), {}, silentLogger())
    const attempt = translator.translate('list', baseContext)

    await expect(attempt).rejects.toBeInstanceOf(TranslationError)
    await expect(attempt).rejects.toThrow('translation failed: offline')
  })

  it('fails when nothing runnable comes back', async () => {
    const translator = new Translator(new ScriptedGateway(['# I am not sure what you mean']), {}, silentLogger())

    await expect(translator.translate('hmm', baseContext)).rejects.toThrow('no command produced for: hmm')
  })
})

describe('gateway models', () => {
  it('picks the provider default model when none is configured', () => {
    expect(resolveModelName({})).toBe('gpt-4o-mini')
    expect(resolveModelName({ provider: 'ollama' })).toBe('llama3.1')
    expect(resolveModelName({ provider: 'anthropic', model: 'claude-custom' })).toBe('claude-custom')
  })

  it('creates a model for a local ollama server', () => {
    const model = createLanguageModel({ provider: 'ollama', model: 'qwen2.5-coder' })
    expect(model.modelId).toBe('qwen2.5-coder')
  })
})
