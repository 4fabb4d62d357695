import type { LanguageModel } from 'ai'
import type { TranslationConfig, TranslationProvider } from '../types'
import type { CompletionRequest, TranslationGateway } from './translator'
import { createAnthropic } from '@ai-sdk/anthropic'
import { createOpenAI } from '@ai-sdk/openai'
import { createOpenAICompatible } from '@ai-sdk/openai-compatible'
import { generateText } from 'ai'

export const DEFAULT_MODELS: Record<TranslationProvider, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
  ollama: 'llama3.1',
}

export const OLLAMA_BASE_URL = 'http://localhost:11434/v1'

export function resolveModelName(config: TranslationConfig): string {
  return config.model || DEFAULT_MODELS[config.provider ?? 'openai']
}

/**
 * Creates the language model named by the translation config.
 *
 * OpenAI and Anthropic read `OPENAI_API_KEY` / `ANTHROPIC_API_KEY` from the
 * environment when no key is configured. Ollama is reached through its
 * OpenAI-compatible endpoint.
 *
 * @example
 * ```ts
 * const model = createLanguageModel({ provider: 'anthropic' })
 * await generateText({ model, prompt: '...' })
 * ```
 */
export function createLanguageModel(config: TranslationConfig): LanguageModel {
  const modelName = resolveModelName(config)
  const provider: TranslationProvider = config.provider ?? 'openai'

  switch (provider) {
    case 'anthropic':
      return createAnthropic({ apiKey: config.apiKey, baseURL: config.baseUrl })(modelName)
    case 'ollama':
      return createOpenAICompatible({
        name: 'ollama',
        apiKey: config.apiKey,
        baseURL: config.baseUrl || OLLAMA_BASE_URL,
      })(modelName)
    case 'openai':
      return createOpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl })(modelName)
  }
}

/**
 * Gateway backed by the AI SDK. Temperature 0 keeps translations repeatable.
 */
export class AiSdkGateway implements TranslationGateway {
  private readonly model: LanguageModel

  constructor(config: TranslationConfig) {
    this.model = createLanguageModel(config)
  }

  async complete({ system, prompt, signal }: CompletionRequest): Promise<string> {
    const { text } = await generateText({
      model: this.model,
      system,
      prompt,
      temperature: 0,
      abortSignal: signal,
    })
    return text
  }
}
