import type { ClipboardReader } from './input/clipboard'
import type { StdinSource } from './input/stdin'
import type { CompletionRequest, TranslationGateway } from './translation/translator'
import type { WraithConfig } from './types'
import process from 'node:process'
import { defaultConfig, mergeConfig } from './config'
import { silentLogger } from './logger'
import { detachedProcessBinding } from './session/process-binding'
import { WraithShell } from './shell'

/**
 * A canned reply: the text, an error to throw, or a function that answers
 * the request itself.
 */
export type ScriptedReply = string | Error | ((request: CompletionRequest) => Promise<string>)

/**
 * Gateway that answers from a queue and remembers every request.
 */
export class ScriptedGateway implements TranslationGateway {
  readonly requests: CompletionRequest[] = []

  constructor(private readonly replies: ScriptedReply[] = []) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request)
    const reply = this.replies.shift()
    if (reply === undefined)
      throw new Error('no scripted reply left')
    if (reply instanceof Error)
      throw reply
    if (typeof reply === 'function')
      return reply(request)
    return reply
  }
}

/**
 * A reply that never arrives: rejects once the request is aborted.
 */
export function replyAfterAbort({ signal }: CompletionRequest): Promise<string> {
  return new Promise((_resolve, reject) => {
    if (signal?.aborted)
      reject(new Error('aborted'))
    signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true })
  })
}

export function fixedClipboard(text: string | Error): ClipboardReader {
  return {
    read: async () => {
      if (text instanceof Error)
        throw text
      return text
    },
  }
}

export function fixedStdin(text: string | null): StdinSource {
  return { read: async () => text }
}

export interface TestShellOptions {
  cwd?: string
  config?: Partial<WraithConfig>
  replies?: ScriptedReply[]
  clipboard?: ClipboardReader
  stdin?: StdinSource
  environment?: Record<string, string>
}

/**
 * A shell that never touches the real process: detached binding, silent
 * logger, scripted translations, and no clipboard or piped stdin unless given.
 */
export function createTestShell(options: TestShellOptions = {}): { shell: WraithShell, gateway: ScriptedGateway } {
  const gateway = new ScriptedGateway(options.replies)
  const shell = new WraithShell({
    config: mergeConfig(defaultConfig, { streamOutput: false, ...options.config }),
    log: silentLogger(),
    binding: detachedProcessBinding,
    cwd: options.cwd,
    environment: options.environment ?? { PATH: process.env.PATH ?? '/usr/bin:/bin', HOME: process.env.HOME ?? '/tmp' },
    gateway,
    clipboard: options.clipboard ?? fixedClipboard(new Error('no clipboard in tests')),
    stdin: options.stdin ?? fixedStdin(null),
  })
  return { shell, gateway }
}
