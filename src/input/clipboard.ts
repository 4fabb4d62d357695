import { execFile } from 'node:child_process'
import process from 'node:process'
import { promisify } from 'node:util'
import { errorMessage } from '../errors'

const execFileAsync = promisify(execFile)

export interface ClipboardReader {
  /** Rejects when no clipboard can be read on this host */
  read: () => Promise<string>
}

type ClipboardCommand = [file: string, args: string[]]

export function clipboardCommands(platform: NodeJS.Platform = process.platform): ClipboardCommand[] {
  switch (platform) {
    case 'darwin':
      return [['pbpaste', []]]
    case 'win32':
      return [['powershell.exe', ['-NoProfile', '-NonInteractive', '-Command', 'Get-Clipboard -Raw']]]
    default:
      return [
        ['wl-paste', ['--no-newline']],
        ['xclip', ['-selection', 'clipboard', '-o']],
        ['xsel', ['--clipboard', '--output']],
      ]
  }
}

/**
 * Reads the system clipboard through whichever platform tool is installed.
 */
export class SystemClipboard implements ClipboardReader {
  constructor(
    private readonly commands: ClipboardCommand[] = clipboardCommands(),
    private readonly timeoutMs = 2000,
  ) {}

  async read(): Promise<string> {
    const failures: string[] = []
    for (const [file, args] of this.commands) {
      try {
        const { stdout } = await execFileAsync(file, args, {
          encoding: 'utf8',
          timeout: this.timeoutMs,
          maxBuffer: 16 * 1024 * 1024,
          windowsHide: true,
        })
        return stdout
      }
      catch (error) {
        failures.push(`${file}: ${errorMessage(error)}`)
      }
    }
    throw new Error(`clipboard unavailable (${failures.join('; ') || 'no reader for this platform'})`)
  }
}
