export { cdCommand, createBuiltins, exitCommand, exportCommand, modeCommand, pwdCommand } from './builtins'
export { defaultConfig, isConfigObject, loadWraithConfig, mergeConfig, validateWraithConfig } from './config'
export * from './errors'
export { ASSISTANT_PREFIX, classify, extractAssistantRequest, RECOGNIZED_COMMANDS } from './input/classifier'
export type { ClipboardReader } from './input/clipboard'
export { clipboardCommands, SystemClipboard } from './input/clipboard'
export { ContextAssembler, findFileReferences, renderContextBlock, stripMarkers } from './input/context-assembler'
export type { StdinSource } from './input/stdin'
export { noStdin, ProcessStdin } from './input/stdin'
export { Logger, silentLogger } from './logger'
export { CommandParser, ParseError } from './parser'
export { displayPath, renderPrompt } from './prompt'
export type { ProcessBinding } from './session/process-binding'
export { detachedProcessBinding, nodeProcessBinding } from './session/process-binding'
export { isShellMode, SessionState, SHELL_MODES } from './session/session-state'
export type { SessionStateOptions } from './session/session-state'
export { BuiltinManager, CommandExecutor, ReplManager, ResolutionLoop, WraithShell } from './shell'
export type { WraithShellOptions } from './shell'
export { hostShell, INTERRUPTED_EXIT_CODE, TIMEOUT_EXIT_CODE } from './shell/command-executor'
export type { ReplIO } from './shell/repl-manager'
export type { ResolveOptions } from './shell/resolution-loop'
export { onTerminationSignals, TERMINATION_SIGNALS } from './shell/signals'
export type { TerminationSignal } from './shell/signals'
export { AiSdkGateway, createLanguageModel, DEFAULT_MODELS } from './translation/gateway'
export type { CompletionRequest, Translation, TranslationGateway } from './translation/translator'
export { isReleasePhrase, RELEASE_PHRASES, shouldAutorun } from './translation/safety'
export { actionableLines, buildTranslationPrompt, cleanTranslation, commentLines, Translator } from './translation/translator'
export type * from './types'
