import { describe, expect, it } from 'vitest'
import { CommandParser, ParseError } from '../src/parser'

describe('CommandParser', () => {
  const parser = new CommandParser()

  describe('tokenize', () => {
    it('splits on whitespace and removes quotes', () => {
      expect(parser.tokenize('echo "hello world" \'a b\' c\\ d')).toEqual(['echo', 'hello world', 'a b', 'c d'])
    })

    it('keeps empty quoted arguments', () => {
      expect(parser.tokenize('echo ""')).toEqual(['echo', ''])
    })

    it('keeps backslashes inside single quotes', () => {
      expect(parser.tokenize('echo \'a\\b\'')).toEqual(['echo', 'a\\b'])
    })

    it('joins adjacent quoted and bare parts', () => {
      expect(parser.tokenize('export MSG="hello world"')).toEqual(['export', 'MSG=hello world'])
    })

    it('throws on an unterminated quote', () => {
      expect(() => parser.tokenize('echo "open')).toThrow(ParseError)
      expect(() => parser.tokenize('echo "open')).toThrow('unterminated quote')
    })

    it('returns nothing for blank input', () => {
      expect(parser.tokenize('   ')).toEqual([])
    })
  })

  describe('splitPipeline', () => {
    it('splits stages on a single pipe', () => {
      expect(parser.splitPipeline('ls -la | grep ts | wc -l')).toEqual(['ls -la', 'grep ts', 'wc -l'])
    })

    it('ignores pipes inside quotes', () => {
      expect(parser.splitPipeline('echo \'a|b\' | cat')).toEqual(['echo \'a|b\'', 'cat'])
    })

    it('does not split on ||', () => {
      expect(parser.splitPipeline('false || echo fallback')).toEqual(['false || echo fallback'])
    })

    it('does not split on an escaped pipe', () => {
      expect(parser.splitPipeline('echo a \\| b')).toEqual(['echo a \\| b'])
    })

    it('keeps pipes inside command substitution in one segment', () => {
      expect(parser.splitPipeline('echo $(printf abc | tr a-z A-Z)')).toEqual(['echo $(printf abc | tr a-z A-Z)'])
      expect(parser.splitPipeline('echo `printf abc | tr a-z A-Z`')).toEqual(['echo `printf abc | tr a-z A-Z`'])
    })

    it('leaves command lists whole', () => {
      expect(parser.splitPipeline('echo first; echo second | tr a-z A-Z')).toEqual(['echo first; echo second | tr a-z A-Z'])
      expect(parser.splitPipeline('false && echo x | cat')).toEqual(['false && echo x | cat'])
      expect(parser.splitPipeline('false || echo x | cat')).toEqual(['false || echo x | cat'])
      expect(parser.splitPipeline('sleep 1 & echo x | cat')).toEqual(['sleep 1 & echo x | cat'])
      expect(parser.splitPipeline('echo a\necho b | cat')).toEqual(['echo a\necho b | cat'])
      expect(parser.splitPipeline('(echo a | cat)')).toEqual(['(echo a | cat)'])
    })

    it('still splits around redirections', () => {
      expect(parser.splitPipeline('ls missing 2>&1 | wc -l')).toEqual(['ls missing 2>&1', 'wc -l'])
      expect(parser.splitPipeline('echo a >| out.txt')).toEqual(['echo a >| out.txt'])
    })

    it('leaves malformed pipelines whole', () => {
      expect(parser.splitPipeline('ls |')).toEqual(['ls |'])
      expect(parser.splitPipeline('| sort')).toEqual(['| sort'])
      expect(parser.splitPipeline('echo "a | b')).toEqual(['echo "a | b'])
    })
  })

  it('detects unterminated quotes', () => {
    expect(parser.hasUnterminatedQuotes('echo "a')).toBe(true)
    expect(parser.hasUnterminatedQuotes('echo "a" \'b\'')).toBe(false)
    expect(parser.hasUnterminatedQuotes('echo \\"a')).toBe(false)
  })
})
