import { existsSync, readdirSync } from 'node:fs'
import { join, parse } from 'node:path'

const MAGIC = /[*?[]/

export function hasGlobMagic(pattern: string): boolean {
  return MAGIC.test(pattern)
}

/**
 * Translate one path segment (`*.ts`, `file?.md`, `[ab]*`) into an anchored
 * regular expression. `*` and `?` never cross a separator.
 */
export function segmentToRegExp(segment: string): RegExp {
  let source = ''
  for (let i = 0; i < segment.length; i++) {
    const char = segment[i]
    if (char === '*') {
      source += '[^/]*'
    }
    else if (char === '?') {
      source += '[^/]'
    }
    else if (char === '[') {
      const close = segment.indexOf(']', i + 2)
      if (close === -1) {
        source += '\\['
        continue
      }
      let body = segment.slice(i + 1, close)
      if (body.startsWith('!'))
        body = `^${body.slice(1)}`
      source += `[${body.replace(/\\/g, '\\\\')}]`
      i = close
    }
    else {
      source += char.replace(/[.+^${}()|\\\]]/g, '\\$&')
    }
  }
  return new RegExp(`^${source}$`)
}

function readEntries(dir: string, directoriesOnly: boolean): string[] {
  try {
    return readdirSync(dir, { withFileTypes: true })
      .filter(entry => !directoriesOnly || (entry.isDirectory() && !entry.isSymbolicLink()))
      .map(entry => entry.name)
  }
  catch {
    return []
  }
}

function walk(base: string, segments: string[], out: Set<string>): void {
  if (segments.length === 0) {
    if (existsSync(base))
      out.add(base)
    return
  }

  const [head, ...rest] = segments

  if (head === '**') {
    walk(base, rest, out)
    for (const dir of readEntries(base, true)) {
      if (!dir.startsWith('.'))
        walk(join(base, dir), segments, out)
    }
    return
  }

  if (!hasGlobMagic(head)) {
    walk(join(base, head), rest, out)
    return
  }

  const matcher = segmentToRegExp(head)
  const showHidden = head.startsWith('.')
  for (const name of readEntries(base, false)) {
    if (!showHidden && name.startsWith('.'))
      continue
    if (matcher.test(name))
      walk(join(base, name), rest, out)
  }
}

/**
 * Expand an absolute glob pattern to the existing paths it names, sorted.
 * Supports `*`, `?`, `[...]` (with `!` negation) and `**` for any depth.
 * Hidden entries only match segments that start with a dot.
 */
export function expandGlob(pattern: string): string[] {
  const { root } = parse(pattern)
  const segments = pattern.slice(root.length).split(/[\\/]+/).filter(Boolean)
  const out = new Set<string>()
  walk(root || '.', segments, out)
  return [...out].sort()
}
