import type { EventEmitter } from 'node:events'
import process from 'node:process'

/**
 * Signals that end the shell. Children run in their own process groups, so
 * these never reach them unless the shell passes the stop on.
 */
export const TERMINATION_SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP'] as const

export type TerminationSignal = typeof TERMINATION_SIGNALS[number]

/**
 * Install one handler for every termination signal. Installing it also
 * replaces Node's default of exiting at once. Returns a function that
 * removes the handlers again.
 */
export function onTerminationSignals(
  handler: (signal: TerminationSignal) => void,
  emitter: EventEmitter = process,
): () => void {
  const listeners = TERMINATION_SIGNALS.map((signal) => {
    const listener = (): void => handler(signal)
    emitter.on(signal, listener)
    return { signal, listener }
  })

  return () => {
    for (const { signal, listener } of listeners)
      emitter.off(signal, listener)
  }
}
