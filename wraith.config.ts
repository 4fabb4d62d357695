import type { WraithConfig } from './src/types'

/**
 * Wraith Configuration
 *
 * Starts in natural-language mode and translates through OpenAI by default.
 * Switch `translation.provider` to `anthropic` or `ollama` to use another backend.
 */
export default {
  verbose: false,
  mode: 'nl',
  streamOutput: true,

  execution: {
    // Whole pipelines count against one timeout
    defaultTimeoutMs: 300_000,
    killSignal: 'SIGTERM',
    killGraceMs: 100,
  },

  translation: {
    provider: 'openai',
    model: 'gpt-4o-mini',
    // For ollama: baseUrl: 'http://localhost:11434/v1'
    recentHistory: 3,
    outputTailChars: 2000,
  },

  aliases: {
    ll: 'ls -la',
    gs: 'git status',
  },

  environment: {},

  prompt: {
    showProvider: true,
  },
} satisfies WraithConfig
