import type { Logger } from '../logger'
import type { CommandResult, TranslationConfig, TranslationContext } from '../types'
import { errorMessage, TranslationError } from '../errors'
import { renderContextBlock } from '../input/context-assembler'

export interface CompletionRequest {
  system: string
  prompt: string
  signal?: AbortSignal
}

/**
 * Anything that turns a prompt into text. The shell never talks to a model
 * directly; it goes through this.
 */
export interface TranslationGateway {
  complete: (request: CompletionRequest) => Promise<string>
}

export interface Translation {
  /** Gateway output with code fences removed */
  text: string
  /** Lines to run, in order */
  commands: string[]
  notes: string[]
}

export const DEFAULT_OUTPUT_TAIL_CHARS = 2000

export const SYSTEM_PROMPT = 'You translate requests into shell commands. Reply with shell commands and # comments only.'

const INSTRUCTIONS = `Turn the user's request into commands for their shell.

Rules:
1. Reply with shell commands and comments only, nothing else.
2. Comments start with # and say what the next command does.
3. Commands must run as written, with no placeholders.
4. Follow the conventions of the user's platform: PowerShell or cmd syntax on Windows, POSIX sh elsewhere.
5. Prefer one command over a script.
6. When the request is ambiguous, pick the likely meaning and note the assumption in a comment.
7. Flag destructive commands with a warning comment.
8. If the previous command failed, take its output into account.
9. Never start an interpreter on its own line (bash, sh, cmd, powershell); write the commands it would run.

Examples:

Request: list every typescript file
# TypeScript files under the current directory
find . -name '*.ts'

Request: what branch am I on
# Current git branch
git branch --show-current

Request: stage everything and commit with message initial import
# Stage and commit all changes
git add -A
git commit -m "initial import"

Request: list every typescript file (Windows)
# TypeScript files under the current directory
dir /s /b *.ts

Wrong:
bash
find . -name '*.ts'`

const INTERPRETERS = new Set(['bash', 'sh', 'zsh', 'fish', 'cmd', 'cmd.exe', 'powershell', 'pwsh'])

const FENCE = /```(?:[\w-]*\n)?([\s\S]*?)```/

function tail(text: string, max: number): string {
  return text.length > max ? `...${text.slice(-max)}` : text
}

function describePrevious(result: CommandResult, maxChars: number): string {
  let section = `Previous command: ${result.command}\nExit code: ${result.exitCode}`
  if (result.stdout)
    section += `\nStdout:\n${tail(result.stdout, maxChars)}`
  if (result.stderr)
    section += `\nStderr:\n${tail(result.stderr, maxChars)}`
  return section
}

/**
 * Assemble the prompt from fixed instructions, whatever context is known,
 * and the request itself, in that order.
 */
export function buildTranslationPrompt(
  request: string,
  context: TranslationContext,
  outputTailChars: number = DEFAULT_OUTPUT_TAIL_CHARS,
): string {
  const sections = [INSTRUCTIONS, `Current directory: ${context.cwd}`]

  sections.push(`Environment:\n- Platform: ${context.platform}\n- Shell: ${context.shell ?? 'unknown'}`)

  if (context.recentCommands.length)
    sections.push(`Recent commands:\n${context.recentCommands.join('\n')}`)

  if (context.lastResult)
    sections.push(describePrevious(context.lastResult, outputTailChars))

  const rendered = context.blocks
    .map(block => renderContextBlock(block, context.cwd))
    .filter(Boolean)
  if (rendered.length)
    sections.push(`Referenced content:\n\n${rendered.join('\n')}`)

  sections.push(`Request: ${request}`)
  return sections.join('\n\n')
}

/**
 * Remove a markdown code fence around the reply. Only the first fenced block
 * is kept; an unterminated fence loses just its opening line.
 */
export function cleanTranslation(text: string): string {
  const trimmed = text.trim()
  const match = FENCE.exec(trimmed)
  if (match)
    return match[1].trim()
  if (trimmed.startsWith('```'))
    return trimmed.slice(trimmed.indexOf('\n') + 1 || trimmed.length).trim()
  return trimmed
}

/**
 * The explanation lines of a reply, `#` included.
 */
export function commentLines(text: string): string[] {
  return text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.startsWith('#'))
}

/**
 * Lines worth running: not blank, not a comment, not a bare interpreter.
 */
export function actionableLines(text: string): string[] {
  return text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line && !line.startsWith('#') && !INTERPRETERS.has(line.toLowerCase()))
}

export class Translator {
  constructor(
    private readonly gateway: TranslationGateway,
    private readonly config: TranslationConfig,
    private readonly log: Logger,
  ) {}

  /**
   * @throws TranslationError when the gateway fails or replies with nothing runnable
   */
  async translate(request: string, context: TranslationContext, signal?: AbortSignal): Promise<Translation> {
    const prompt = buildTranslationPrompt(request, context, this.config.outputTailChars)
    this.log.debug(`translating: ${request}`)

    let reply: string
    try {
      reply = await this.gateway.complete({ system: SYSTEM_PROMPT, prompt, signal })
    }
    catch (error) {
      throw new TranslationError(`translation failed: ${errorMessage(error)}`)
    }

    const text = cleanTranslation(reply)
    const commands = actionableLines(text)
    if (commands.length === 0)
      throw new TranslationError(`no command produced for: ${request}`)

    this.log.debug(`translated into ${commands.length} command(s)`)
    return { text, commands, notes: commentLines(text) }
  }
}
