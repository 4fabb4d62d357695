import { statSync } from 'node:fs'
import { resolve } from 'node:path'

const SAFE_PREFIXES = [
  'ls', 'pwd', 'cd', 'whoami', 'date', 'cat', 'echo',
  'git status', 'git diff', 'head', 'tail', 'dir',
]

const RISKY_KEYWORDS = [
  'rm', 'mv', 'chmod', 'chown', 'docker', 'kubectl',
  'git push', 'git commit', 'pip install', 'npm install',
  'apt', 'brew', 'systemctl', 'shutdown', 'reboot', 'sudo',
]

const RISKY = RISKY_KEYWORDS.map(keyword => new RegExp(`\\b${keyword.split(' ').join('\\s+')}\\b`))

/**
 * Phrases that release every queued command, whatever its risk.
 */
export const RELEASE_PHRASES: ReadonlySet<string> = new Set([
  'run it', 'run that', 'execute it', 'do it', 'go ahead',
  'please run it', 'run the command', 'run those',
])

export function isReleasePhrase(text: string): boolean {
  return RELEASE_PHRASES.has(text.trim().toLowerCase())
}

function startsWithWords(command: string, prefix: string): boolean {
  return command === prefix || command.startsWith(`${prefix} `)
}

function isLocalScript(command: string, cwd: string): boolean {
  const [interpreter, script] = command.split(/\s+/)
  if (!script || !['python', 'python3', 'py'].includes(interpreter.toLowerCase()) || !script.endsWith('.py'))
    return false
  try {
    return statSync(resolve(cwd, script)).isFile()
  }
  catch {
    return false
  }
}

/**
 * Whether a translated command may run without confirmation. A risky word
 * anywhere in the line wins over a safe leading command, so `ls; rm x` waits.
 */
export function shouldAutorun(command: string, cwd: string): boolean {
  const trimmed = command.trim()
  const lower = trimmed.toLowerCase()

  // Redirection can overwrite files whatever the command is
  if (lower.includes('>') || RISKY.some(pattern => pattern.test(lower)))
    return false
  if (SAFE_PREFIXES.some(prefix => startsWithWords(lower, prefix)))
    return true
  return isLocalScript(trimmed, cwd)
}
