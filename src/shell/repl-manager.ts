import type { Interface } from 'node:readline'
import type { Readable, Writable } from 'node:stream'
import type { Logger } from '../logger'
import type { CommandResult, Resolution } from '../types'
import type { WraithShell } from './index'
import { createInterface } from 'node:readline'
import { errorMessage } from '../errors'
import { ANSI_COLORS } from '../logger'

export interface ReplIO {
  input: Readable
  output: Writable
  error: Writable
  /** Colour command echoes and stderr */
  colors: boolean
  terminal?: boolean
}

export class ReplManager {
  private running = false
  private stopping = false
  private inFlight: AbortController | undefined
  private rl: Interface | undefined
  /** Prepared command typed into the next prompt */
  private prefill: string | undefined

  constructor(
    private readonly shell: WraithShell,
    private readonly io: ReplIO,
    private readonly log: Logger,
  ) {}

  /**
   * Read, resolve, print until `exit` or end of input. Resolves with the
   * session's exit status.
   */
  async start(): Promise<number> {
    if (this.running)
      return this.shell.state.lastExitCode

    this.running = true
    this.stopping = false
    const rl = createInterface({
      input: this.io.input,
      output: this.io.output,
      terminal: this.io.terminal ?? false,
      historySize: 1000,
    })
    this.rl = rl

    rl.on('SIGINT', () => {
      if (this.interrupt())
        return
      this.io.output.write('\nUse \'exit\' to quit\n')
      this.prompt(rl)
    })

    try {
      this.prompt(rl)

      for await (const line of rl) {
        if (this.stopping)
          break

        await this.handleLine(line)

        if (this.shell.state.exitRequest || this.stopping)
          break

        this.prompt(rl)
      }
    }
    finally {
      rl.close()
      this.rl = undefined
      this.running = false
    }

    this.io.output.write('Goodbye!\n')
    return this.shell.state.exitRequest?.code ?? this.shell.state.lastExitCode
  }

  /**
   * Abort the line being handled. Returns false when nothing is in flight.
   */
  interrupt(): boolean {
    if (!this.inFlight)
      return false
    this.inFlight.abort()
    return true
  }

  /**
   * End the session: abort the line in flight and stop reading. `start`
   * resolves once that line has finished and its processes are reaped.
   */
  stop(): void {
    this.stopping = true
    this.interrupt()
    this.rl?.close()
  }

  isRunning(): boolean {
    return this.running
  }

  private async handleLine(line: string): Promise<void> {
    const controller = new AbortController()
    this.inFlight = controller

    try {
      const resolution = await this.shell.resolve(line, {
        signal: controller.signal,
        stream: this.shell.config.streamOutput ? { stdout: this.writeOut, stderr: this.writeErr } : undefined,
        onCommand: command => this.io.output.write(`${this.paint(`→ ${command}`, 'cyan')}\n`),
        onNote: note => this.io.output.write(`${this.paint(note, 'dim')}\n`),
      })
      this.print(resolution)
    }
    catch (error) {
      // One bad line never ends the session
      this.log.error('Shell error:', errorMessage(error))
    }
    finally {
      this.inFlight = undefined
    }
  }

  private readonly writeOut = (chunk: string): void => {
    this.io.output.write(chunk)
  }

  private readonly writeErr = (chunk: string): void => {
    this.io.error.write(this.paint(chunk, 'red'))
  }

  private print(resolution: Resolution): void {
    for (const result of resolution.results)
      this.printResult(result)

    if (resolution.prepared !== undefined)
      this.offer(resolution.prepared)

    if (resolution.notice)
      this.io.output.write(`${resolution.notice}\n`)

    if (resolution.assistantRequest !== undefined)
      this.io.output.write(`Assistant mode is not available yet (request: ${resolution.assistantRequest})\n`)

    if (resolution.error)
      this.io.error.write(`${this.paint(`wraith: ${resolution.error}`, 'red')}\n`)
  }

  /**
   * Show a command held back for confirmation. On a terminal it is typed
   * into the next prompt, ready to run or edit.
   */
  private offer(command: string): void {
    this.io.output.write(`${this.paint('[wraith prepared command]', 'dim')}\n${this.paint(`→ ${command}`, 'cyan')}\n`)
    if (this.io.terminal) {
      this.prefill = command
      this.io.output.write('Press Enter to run or edit the prepared command, or say \'run it\' to run everything queued.\n')
    }
    else {
      this.io.output.write('Type the command or say \'run it\' to run everything queued.\n')
    }
  }

  private prompt(rl: Interface): void {
    rl.setPrompt(this.shell.renderPrompt())
    rl.prompt()
    if (this.prefill !== undefined) {
      rl.write(this.prefill)
      this.prefill = undefined
    }
  }

  private printResult(result: CommandResult): void {
    if (result.streamed)
      return

    if (result.stdout) {
      this.io.output.write(result.stdout)
      if (!result.stdout.endsWith('\n'))
        this.io.output.write('\n')
    }

    if (result.stderr) {
      this.io.error.write(this.paint(result.stderr, 'red'))
      if (!result.stderr.endsWith('\n'))
        this.io.error.write('\n')
    }
  }

  private paint(text: string, color: 'red' | 'cyan' | 'dim'): string {
    return this.io.colors ? `${ANSI_COLORS[color]}${text}${ANSI_COLORS.reset}` : text
  }
}
