import type { Classification } from '../types'
import process from 'node:process'

export const ASSISTANT_PREFIX = 'ai:'

const POSIX_COMMANDS = [
  'ls', 'cd', 'pwd', 'cat', 'echo', 'grep', 'find', 'git',
  'python', 'node', 'npm', 'pip', 'docker', 'kubectl',
  'mkdir', 'rm', 'cp', 'mv', 'touch', 'chmod', 'chown',
  'ps', 'kill', 'top', 'df', 'du', 'tar', 'gzip', 'curl', 'wget',
  'export', 'mode', 'exit',
]

const WINDOWS_COMMANDS = ['dir', 'type', 'cls', 'copy', 'del']

/**
 * First words that always mean "run this". Fixed for the lifetime of the
 * process.
 */
export const RECOGNIZED_COMMANDS: ReadonlySet<string> = new Set(
  process.platform === 'win32' ? [...POSIX_COMMANDS, ...WINDOWS_COMMANDS] : POSIX_COMMANDS,
)

const SHELL_OPERATORS = ['|', '>', '<', '&&', '||', ';', '>>']

const ASSIGNMENT = /^[A-Z_]\w*=/i

function firstToken(text: string): string {
  return text.split(/\s+/, 1)[0] ?? ''
}

function looksLikeShell(text: string, commands: ReadonlySet<string>): boolean {
  const first = firstToken(text)

  if (commands.has(first))
    return true
  if (SHELL_OPERATORS.some(op => text.includes(op)))
    return true
  if (first.startsWith('./') || first.startsWith('/'))
    return true

  return ASSIGNMENT.test(first)
}

/**
 * Decide how raw input is handled. Pure: the answer depends on the text
 * alone, never on session state.
 */
export function classify(text: string, commands: ReadonlySet<string> = RECOGNIZED_COMMANDS): Classification {
  const trimmed = text.trim()

  if (!trimmed)
    return 'empty'
  if (trimmed.startsWith('#'))
    return 'comment'
  if (trimmed.toLowerCase().startsWith(ASSISTANT_PREFIX))
    return 'assistant-request'
  if (looksLikeShell(trimmed, commands))
    return 'shell-command'

  return 'natural-language'
}

/**
 * `ai: summarize this` -> `summarize this`. Text without the prefix comes back trimmed.
 */
export function extractAssistantRequest(text: string): string {
  const trimmed = text.trim()
  if (trimmed.toLowerCase().startsWith(ASSISTANT_PREFIX))
    return trimmed.slice(ASSISTANT_PREFIX.length).trim()
  return trimmed
}

export function firstWord(text: string): string {
  return firstToken(text.trim())
}
