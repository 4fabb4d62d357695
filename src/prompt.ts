import type { SessionState } from './session/session-state'
import type { WraithConfig } from './types'
import { homedir, userInfo } from 'node:os'
import process from 'node:process'
import { resolveModelName } from './translation/gateway'

function currentUser(): string {
  try {
    return userInfo().username
  }
  catch {
    // No passwd entry (some containers)
    return process.env.USER || process.env.USERNAME || 'user'
  }
}

/**
 * Show paths under the home directory as `~/...`.
 */
export function displayPath(cwd: string, home: string = homedir()): string {
  if (cwd === home)
    return '~'
  if (home && cwd.startsWith(`${home}/`))
    return `~${cwd.slice(home.length)}`
  return cwd
}

export function promptSymbol(state: SessionState): string {
  return state.mode === 'ai' ? 'ai>' : '$'
}

/**
 * `user@provider/model ~/path $ `, or `~/path $ ` with the provider hidden.
 */
export function renderPrompt(state: SessionState, config: WraithConfig, user: string = currentUser()): string {
  const path = displayPath(state.workingDirectory)
  const symbol = promptSymbol(state)

  if (config.prompt?.showProvider === false)
    return `${path} ${symbol} `

  const translation = config.translation ?? {}
  const provider = translation.provider ?? 'openai'
  return `${user}@${provider}/${resolveModelName(translation)} ${path} ${symbol} `
}
