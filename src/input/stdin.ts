import { Buffer } from 'node:buffer'
import process from 'node:process'

export interface StdinSource {
  /**
   * Full piped input, or null when stdin is a terminal or nothing was piped.
   * Implementations read the stream at most once and return the same text afterwards.
   */
  read: () => Promise<string | null>
}

/**
 * Piped standard input of this process.
 */
export class ProcessStdin implements StdinSource {
  private pending: Promise<string | null> | undefined

  constructor(private readonly stream: NodeJS.ReadStream = process.stdin) {}

  read(): Promise<string | null> {
    this.pending ??= this.readAll()
    return this.pending
  }

  private async readAll(): Promise<string | null> {
    if (this.stream.isTTY)
      return null

    const chunks: Buffer[] = []
    for await (const chunk of this.stream)
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))

    const text = Buffer.concat(chunks).toString('utf8')
    return text || null
  }
}

/**
 * For sessions whose stdin carries the commands themselves.
 */
export const noStdin: StdinSource = {
  read: async () => null,
}
