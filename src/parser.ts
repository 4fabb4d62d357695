export class ParseError extends Error {
  index?: number
  constructor(message: string, index?: number) {
    super(message)
    this.name = 'ParseError'
    this.index = index
  }
}

const NESTING_OR_LIST = new Set([';', '\n', '(', ')', '`'])

/**
 * Just enough shell syntax for built-ins and pipeline splitting. Everything
 * else (globbing, expansion, redirection) is left to the host shell.
 */
export class CommandParser {
  /**
   * Tokenizes a string into arguments. Quotes group words and are removed;
   * a backslash escapes the next character outside single quotes.
   * @throws ParseError on an unterminated quote
   */
  tokenize(input: string): string[] {
    const tokens: string[] = []
    let current = ''
    let started = false
    let quoteChar = ''
    let escaped = false

    for (let i = 0; i < input.length; i++) {
      const char = input[i]

      if (escaped) {
        current += char
        escaped = false
        continue
      }

      if (char === '\\' && quoteChar !== '\'') {
        escaped = true
        started = true
        continue
      }

      if (quoteChar) {
        if (char === quoteChar)
          quoteChar = ''
        else
          current += char
        continue
      }

      if (char === '"' || char === '\'') {
        quoteChar = char
        started = true
        continue
      }

      if (/\s/.test(char)) {
        if (started) {
          tokens.push(current)
          current = ''
          started = false
        }
        continue
      }

      current += char
      started = true
    }

    if (quoteChar)
      throw new ParseError('unterminated quote', input.length)

    // A trailing lone backslash stays literal
    if (escaped)
      current += '\\'

    if (started)
      tokens.push(current)

    return tokens
  }

  /**
   * Split a simple pipeline on its top-level `|`. Anything the host shell
   * parses as more than one pipeline (`;`, `&`, `&&`, `||`, a newline), or
   * that nests commands (`$(...)`, backticks, parentheses), stays one
   * segment so the host shell sees it whole. So does malformed input.
   */
  splitPipeline(input: string): string[] {
    const whole = [input.trim()]
    if (this.hasUnterminatedQuotes(input))
      return whole

    const segments: string[] = []
    let current = ''
    let quoteChar = ''
    let escaped = false

    for (let i = 0; i < input.length; i++) {
      const char = input[i]
      const previous = input[i - 1]

      if (escaped) {
        current += char
        escaped = false
        continue
      }

      if (char === '\\' && quoteChar !== '\'') {
        escaped = true
        current += char
        continue
      }

      if (quoteChar) {
        if (char === quoteChar)
          quoteChar = ''
        current += char
        continue
      }

      if (char === '"' || char === '\'') {
        quoteChar = char
        current += char
        continue
      }

      if (NESTING_OR_LIST.has(char))
        return whole

      // `2>&1` and `<&3` are redirections, not background jobs
      if (char === '&' && previous !== '>' && previous !== '<')
        return whole

      // `>|` is the clobbering redirection
      if (char === '|' && previous !== '>') {
        if (input[i + 1] === '|')
          return whole
        segments.push(current.trim())
        current = ''
        continue
      }

      current += char
    }

    segments.push(current.trim())

    // `ls |` or `| sort` is a syntax error; let the host shell say so
    if (segments.length > 1 && segments.some(s => s.length === 0))
      return whole

    return segments
  }

  hasUnterminatedQuotes(input: string): boolean {
    let quoteChar = ''
    let escaped = false

    for (const char of input) {
      if (escaped) {
        escaped = false
        continue
      }

      if (char === '\\' && quoteChar !== '\'') {
        escaped = true
        continue
      }

      if (quoteChar) {
        if (char === quoteChar)
          quoteChar = ''
        continue
      }

      if (char === '"' || char === '\'')
        quoteChar = char
    }

    return quoteChar !== ''
  }
}
