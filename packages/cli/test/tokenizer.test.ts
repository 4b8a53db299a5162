import { describe, it, expect } from 'vitest'
import { tokenize, parseToken, cliToIdentifier, identifierToCli } from '../src/lib/tokenizer.js'

describe('parseToken', () => {
  it('reads a short flag', () => {
    expect(parseToken('-x')).toEqual(['x', true])
  })

  it('reads a long flag', () => {
    expect(parseToken('--create-new')).toEqual(['create_new', true])
  })

  it('reads a short option with an inline value', () => {
    expect(parseToken('-o:out.txt')).toEqual(['o', 'out.txt'])
  })

  it('reads a long option with an inline value', () => {
    expect(parseToken('--create-new=yes')).toEqual(['create_new', 'yes'])
  })

  it('keeps everything after the first = as the value', () => {
    expect(parseToken('--filter=a=b')).toEqual(['filter', 'a=b'])
  })

  it('treats other shapes as positional', () => {
    for (const token of ['input.txt', '-', '--', '-5', '-xy', '--name=', '-x:', '--2nd', '---x']) {
      expect(parseToken(token)).toBeUndefined()
    }
  })
})

describe('tokenize', () => {
  it('splits positionals from options', () => {
    const { positionals, options } = tokenize(['input.txt', 'output.txt', '--create-new'])
    expect(positionals).toEqual(['input.txt', 'output.txt'])
    expect(Object.fromEntries(options)).toEqual({ create_new: true })
  })

  it('keeps the last value of a repeated option', () => {
    const { options } = tokenize(['--x=1', '--x=2'])
    expect(Object.fromEntries(options)).toEqual({ x: '2' })
  })

  it('lets a flag overwrite a valued option of the same name', () => {
    const { options } = tokenize(['--level=3', '--level'])
    expect(options.get('level')).toBe(true)
  })

  it('preserves positional order and first-seen option order', () => {
    const { positionals, options } = tokenize(['b', '--beta', 'a', '--alpha=1', '--beta=2', 'c'])
    expect(positionals).toEqual(['b', 'a', 'c'])
    expect([...options.keys()]).toEqual(['beta', 'alpha'])
  })

  it('is deterministic', () => {
    const args = ['x', '-v', '--name=value', 'y']
    expect(tokenize(args)).toEqual(tokenize(args))
  })

  it('returns empty results for no arguments', () => {
    const { positionals, options } = tokenize([])
    expect(positionals).toEqual([])
    expect(options.size).toBe(0)
  })
})

describe('name conversion', () => {
  it('converts between CLI and identifier styles', () => {
    expect(cliToIdentifier('dry-run-mode')).toBe('dry_run_mode')
    expect(identifierToCli('dry_run_mode')).toBe('dry-run-mode')
  })
})
