import type { SessionState } from './session/session-state'

export type ShellMode = 'shell' | 'nl' | 'ai'

export type TranslationProvider = 'openai' | 'anthropic' | 'ollama'

export interface WraithConfig {
  verbose: boolean
  /** Mode the session starts in */
  mode: ShellMode
  /**
   * Write external command output to the terminal while it runs.
   * Results still carry the captured text either way.
   */
  streamOutput?: boolean
  execution?: ExecutionConfig
  translation?: TranslationConfig
  aliases?: Record<string, string>
  environment?: Record<string, string>
  logging?: LoggingConfig
  prompt?: PromptConfig
}

export interface ExecutionConfig {
  /** Hard wall-clock bound for one command or one whole pipeline */
  defaultTimeoutMs?: number
  /** Signal sent first when a command times out or is interrupted */
  killSignal?: NodeJS.Signals
  /** Delay before escalating to SIGKILL */
  killGraceMs?: number
}

export interface TranslationConfig {
  provider?: TranslationProvider
  model?: string
  /** Endpoint override; required shape for ollama is an OpenAI-compatible `/v1` URL */
  baseUrl?: string
  /** Falls back to OPENAI_API_KEY / ANTHROPIC_API_KEY when unset */
  apiKey?: string
  /** How many history entries go into the translation prompt */
  recentHistory?: number
  /** Tail of the previous command's output included in the prompt */
  outputTailChars?: number
}

export interface LoggingConfig {
  timestamps?: boolean
  prefixes?: {
    debug?: string
    info?: string
    warn?: string
    error?: string
  }
}

export interface PromptConfig {
  /** Show `user@provider/model` ahead of the working directory */
  showProvider?: boolean
}

/**
 * Failure categories surfaced on results. None of them ends the session.
 */
export type ShellErrorKind =
  | 'DirectoryNotFound'
  | 'InvalidModeName'
  | 'InvalidVariableName'
  | 'CommandTimeout'
  | 'ProcessLaunchFailure'
  | 'Interrupted'
  | 'FileReferenceNotFound'
  | 'FileReferenceUnreadable'
  | 'ClipboardUnavailable'
  | 'TranslationFailure'

export interface CommandResult {
  readonly exitCode: number
  readonly stdout: string
  readonly stderr: string
  /** The command text that produced this result */
  readonly command: string
  readonly duration: number
  /**
   * Indicates whether the command's output was already streamed live.
   * If true, callers should avoid re-printing stdout/stderr to prevent duplicates.
   */
  readonly streamed?: boolean
  readonly error?: ShellErrorKind
}

export interface BuiltinCommand {
  name: string
  description: string
  usage: string
  examples?: string[]
  execute: (args: string[], state: SessionState) => Promise<CommandResult>
}

export type Classification =
  | 'empty'
  | 'comment'
  | 'shell-command'
  | 'natural-language'
  | 'assistant-request'

export type ContextSource =
  | { kind: 'file', path: string }
  | { kind: 'clipboard' }
  | { kind: 'stdin' }

export type ContextBlockStatus = 'ok' | 'not-found' | 'unreadable' | 'unavailable'

export interface ContextBlock {
  source: ContextSource
  status: ContextBlockStatus
  content: string
  /** Set for failed blocks */
  error?: ShellErrorKind
}

export interface ContextBundle {
  /** Input text with every reference marker removed, trimmed */
  command: string
  blocks: ContextBlock[]
  /** Resolved paths of files that were actually read */
  files: string[]
}

export interface OutputSinks {
  stdout: (chunk: string) => void
  stderr: (chunk: string) => void
}

export interface ExecuteOptions {
  /** Aborting terminates every process the call started */
  signal?: AbortSignal
  /** Receive output as it arrives; the result is then marked `streamed` */
  stream?: OutputSinks
  /** Called with the pid of every process the call starts */
  onSpawn?: (pid: number) => void
}

export interface TranslationContext {
  cwd: string
  recentCommands: string[]
  blocks: ContextBlock[]
  lastResult?: CommandResult
  platform: NodeJS.Platform
  shell?: string
}

export interface Resolution {
  /** Raw input as typed */
  input: string
  classification: Classification
  bundle: ContextBundle
  /** Results in execution order; translated input may produce several */
  results: CommandResult[]
  /** Cleaned gateway output for natural-language input */
  translation?: string
  /** `#` lines of the translation, in order */
  notes?: string[]
  /** Translated command held back until the user confirms it */
  prepared?: string
  notice?: string
  /** Request text with the `ai:` prefix removed */
  assistantRequest?: string
  error?: string
  errorKind?: ShellErrorKind
}
