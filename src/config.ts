import type { ExecutionConfig, PromptConfig, TranslationConfig, WraithConfig } from './types'
import { homedir } from 'node:os'
import { resolve } from 'node:path'
import process from 'node:process'
import { pathToFileURL } from 'node:url'
import { isShellMode, SHELL_MODES } from './session/session-state'

export const defaultConfig: WraithConfig = {
  verbose: false,
  mode: 'nl',
  streamOutput: true,
  execution: {
    // Five minutes per command or pipeline
    defaultTimeoutMs: 300_000,
    killSignal: 'SIGTERM',
    killGraceMs: 100,
  },
  translation: {
    provider: 'openai',
    recentHistory: 3,
    outputTailChars: 2000,
  },
  logging: {
    timestamps: false,
    prefixes: {
      debug: 'DEBUG',
      info: 'INFO',
      warn: 'WARN',
      error: 'ERROR',
    },
  },
  prompt: {
    showProvider: true,
  },
  aliases: {},
  environment: {},
}

const PROVIDERS = new Set(['openai', 'anthropic', 'ollama'])

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Lay a user config over the defaults one section at a time, so a config
 * that sets only `translation.model` keeps the default provider.
 */
export function mergeConfig(base: WraithConfig, overrides: Partial<WraithConfig>): WraithConfig {
  const execution: ExecutionConfig = { ...base.execution, ...overrides.execution }
  const translation: TranslationConfig = { ...base.translation, ...overrides.translation }
  const prompt: PromptConfig = { ...base.prompt, ...overrides.prompt }

  return {
    ...base,
    ...overrides,
    execution,
    translation,
    prompt,
    logging: {
      ...base.logging,
      ...overrides.logging,
      prefixes: { ...base.logging?.prefixes, ...overrides.logging?.prefixes },
    },
    aliases: { ...base.aliases, ...overrides.aliases },
    environment: { ...base.environment, ...overrides.environment },
  }
}

function resolvePath(p: string): string {
  if (p === '~' || p.startsWith('~/'))
    return resolve(homedir(), p.slice(2))
  return resolve(p)
}

const SECTIONS = ['execution', 'translation', 'logging', 'prompt', 'aliases', 'environment']

/**
 * Shape check only: top-level fields have the right kind of value. Values
 * inside sections are checked by {@link validateWraithConfig}.
 */
export function isConfigObject(value: unknown): value is Partial<WraithConfig> {
  if (!isRecord(value))
    return false
  if (value.verbose !== undefined && typeof value.verbose !== 'boolean')
    return false
  if (value.streamOutput !== undefined && typeof value.streamOutput !== 'boolean')
    return false
  if (value.mode !== undefined && (typeof value.mode !== 'string' || !isShellMode(value.mode)))
    return false
  for (const section of SECTIONS) {
    if (value[section] !== undefined && !isRecord(value[section]))
      return false
  }
  return true
}

async function importConfig(path: string): Promise<Partial<WraithConfig>> {
  const mod: unknown = await import(pathToFileURL(resolvePath(path)).href)
  const userConfig = isRecord(mod) && 'default' in mod ? mod.default : mod
  if (!isConfigObject(userConfig))
    throw new Error(`${path} does not export a valid config object`)
  return userConfig
}

/**
 * Load the configuration.
 * 1. An explicit path (argument or `WRAITH_CONFIG`) is imported directly.
 * 2. Otherwise bunfig searches for `wraith.config.ts` and friends.
 * Either way the result is merged over {@link defaultConfig}.
 */
export async function loadWraithConfig(options: { path?: string } = {}): Promise<WraithConfig> {
  const explicitPath = options.path || process.env.WRAITH_CONFIG
  if (explicitPath)
    return mergeConfig(defaultConfig, await importConfig(explicitPath))

  try {
    const { loadConfig } = await import('bunfig')
    const loaded = await loadConfig<WraithConfig>({ name: 'wraith', defaultConfig })
    return mergeConfig(defaultConfig, loaded)
  }
  catch {
    // No config file, or one bunfig cannot read: run on defaults
    return defaultConfig
  }
}

function checkPositive(value: unknown, name: string, errors: string[]): void {
  if (value != null && (typeof value !== 'number' || !Number.isFinite(value) || value <= 0))
    errors.push(`${name} must be a positive number (got: ${String(value)})`)
}

/**
 * Validate a loaded config and return errors/warnings without throwing.
 */
export function validateWraithConfig(cfg: WraithConfig): { valid: boolean, errors: string[], warnings: string[] } {
  const errors: string[] = []
  const warnings: string[] = []

  if (!isShellMode(cfg.mode))
    errors.push(`mode must be one of ${SHELL_MODES.join(', ')} (got: ${String(cfg.mode)})`)

  checkPositive(cfg.execution?.defaultTimeoutMs, 'execution.defaultTimeoutMs', errors)
  if (cfg.execution?.killGraceMs != null && cfg.execution.killGraceMs < 0)
    errors.push(`execution.killGraceMs must not be negative (got: ${cfg.execution.killGraceMs})`)

  const translation = cfg.translation
  if (translation?.provider && !PROVIDERS.has(translation.provider))
    errors.push(`translation.provider must be one of ${[...PROVIDERS].join(', ')} (got: ${translation.provider})`)
  checkPositive(translation?.recentHistory, 'translation.recentHistory', errors)
  checkPositive(translation?.outputTailChars, 'translation.outputTailChars', errors)

  if (translation?.provider === 'ollama' && translation.apiKey)
    warnings.push('translation.apiKey is ignored by most ollama servers')

  for (const [name, value] of Object.entries(cfg.aliases ?? {})) {
    if (!name || /\s/.test(name))
      errors.push(`alias name must be a single word (got: '${name}')`)
    else if (!value.trim())
      warnings.push(`alias '${name}' expands to nothing`)
  }

  for (const name of Object.keys(cfg.environment ?? {})) {
    if (!name || /[=\s\0]/.test(name))
      errors.push(`environment variable name is not valid: '${name}'`)
  }

  return { valid: errors.length === 0, errors, warnings }
}
