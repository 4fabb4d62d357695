import type { Logger } from '../logger'
import type { SessionState } from '../session/session-state'
import type { ContextBlock, ContextBundle } from '../types'
import type { ClipboardReader } from './clipboard'
import type { StdinSource } from './stdin'
import { readFileSync, statSync } from 'node:fs'
import { relative, resolve } from 'node:path'
import { errorMessage } from '../errors'
import { expandHome } from '../session/session-state'
import { expandGlob, hasGlobMagic } from '../utils/glob'

const FILE_REFERENCE = /(^|\s)@(\S+)/g
const CLIPBOARD_MARKERS = ['{clipboard}', '{clip}']
const ANY_MARKER = /(^|\s)@\S+|\{clipboard\}|\{clip\}/g

/**
 * Paths named by `@path` tokens, in order of appearance. A token only counts
 * when `@` starts it, so `user@host` is left alone.
 */
export function findFileReferences(text: string): string[] {
  return [...text.matchAll(FILE_REFERENCE)].map(match => match[2])
}

export function hasClipboardMarker(text: string): boolean {
  return CLIPBOARD_MARKERS.some(marker => text.includes(marker))
}

/**
 * Remove every reference marker in one pass and trim the rest.
 */
export function stripMarkers(text: string): string {
  return text.replace(ANY_MARKER, (_match, lead: string | undefined) => lead ?? '').trim()
}

function isRegularFile(path: string): boolean {
  try {
    return statSync(path).isFile()
  }
  catch {
    return false
  }
}

function notFound(path: string): ContextBlock {
  return {
    source: { kind: 'file', path },
    status: 'not-found',
    content: `File not found: ${path}`,
    error: 'FileReferenceNotFound',
  }
}

/**
 * Render a block the way the translator sees it.
 */
export function renderContextBlock(block: ContextBlock, cwd: string): string {
  const { source } = block
  switch (source.kind) {
    case 'file':
      if (block.status === 'ok')
        return `# File: ${relative(cwd, source.path) || source.path}\n${block.content}\n`
      if (block.status === 'unreadable')
        return `# Error reading ${source.path}: ${block.content}\n`
      return `# Error: File not found: ${source.path}\n`
    case 'clipboard':
      return block.status === 'ok' ? `# Clipboard:\n${block.content}` : ''
    case 'stdin':
      return `# Stdin:\n${block.content}`
  }
}

/**
 * Pulls referenced content out of raw input: `@file` / `@glob` tokens,
 * `{clipboard}` / `{clip}` markers, and piped standard input.
 *
 * Each scan looks at the original text; markers are removed in a single
 * sweep at the end. Nothing here mutates session state, and a reference that
 * cannot be satisfied becomes a block with a failure status instead of an
 * exception.
 */
export class ContextAssembler {
  constructor(
    private readonly clipboard: ClipboardReader,
    private readonly stdin: StdinSource,
    private readonly log: Logger,
  ) {}

  async assemble(text: string, state: SessionState): Promise<ContextBundle> {
    const blocks: ContextBlock[] = []
    const files: string[] = []

    for (const ref of findFileReferences(text)) {
      const path = resolve(state.workingDirectory, expandHome(ref))
      if (hasGlobMagic(ref)) {
        const matches = expandGlob(path).filter(isRegularFile)
        if (matches.length === 0)
          blocks.push(notFound(path))
        for (const match of matches)
          blocks.push(this.readFile(match, files))
      }
      else {
        blocks.push(this.readFile(path, files))
      }
    }

    if (hasClipboardMarker(text))
      blocks.push(await this.readClipboard())

    const piped = await this.stdin.read()
    if (piped !== null)
      blocks.push({ source: { kind: 'stdin' }, status: 'ok', content: piped })

    return { command: stripMarkers(text), blocks, files }
  }

  private readFile(path: string, files: string[]): ContextBlock {
    if (!isRegularFile(path)) {
      this.log.debug(`file reference not found: ${path}`)
      return notFound(path)
    }

    try {
      // toString replaces invalid UTF-8 sequences with U+FFFD
      const content = readFileSync(path).toString('utf8')
      files.push(path)
      return { source: { kind: 'file', path }, status: 'ok', content }
    }
    catch (error) {
      this.log.debug(`file reference unreadable: ${path}`, errorMessage(error))
      return {
        source: { kind: 'file', path },
        status: 'unreadable',
        content: errorMessage(error),
        error: 'FileReferenceUnreadable',
      }
    }
  }

  private async readClipboard(): Promise<ContextBlock> {
    try {
      const content = await this.clipboard.read()
      return { source: { kind: 'clipboard' }, status: 'ok', content }
    }
    catch (error) {
      this.log.debug('clipboard read failed:', errorMessage(error))
      return { source: { kind: 'clipboard' }, status: 'unavailable', content: '', error: 'ClipboardUnavailable' }
    }
  }
}
