import { describe, it, expect } from 'vitest'
import { createArgSpec, lintArgSpec } from '../src/lib/arg-spec.js'
import { param, specOf } from './helpers.js'

describe('createArgSpec', () => {
  it('derives arity counts', () => {
    const spec = specOf(
      param('src', 'positional-only'),
      param('dest', 'positional-only', { default: '.' }),
      param('mode', 'ambiguous'),
      param('force', 'named-only', { default: false }),
      param('owner', 'named-only'),
    )
    expect(spec.minPositional).toBe(2)
    expect(spec.maxPositional).toBe(3)
    expect(spec.minNamed).toBe(1)
    expect(spec.maxNamed).toBe(3)
    expect(spec.hasVariadicPositional).toBe(false)
    expect(spec.hasVariadicNamed).toBe(false)
  })

  it('flags variadic parameters', () => {
    const spec = specOf(param('files', 'variadic-positional'), param('extra', 'variadic-named'))
    expect(spec.hasVariadicPositional).toBe(true)
    expect(spec.hasVariadicNamed).toBe(true)
    expect(spec.maxPositional).toBe(0)
  })

  it('returns a frozen spec', () => {
    const spec = specOf(param('a', 'positional-only'))
    expect(Object.isFrozen(spec)).toBe(true)
    expect(Object.isFrozen(spec.params)).toBe(true)
    expect(Object.isFrozen(spec.params[0])).toBe(true)
  })

  it('keeps name and description', () => {
    const result = createArgSpec([], { name: 'noop', description: 'Does nothing.' })
    expect(result.ok && result.value.name).toBe('noop')
    expect(result.ok && result.value.description).toBe('Does nothing.')
  })

  it('rejects duplicate and empty names', () => {
    const result = createArgSpec([param('a', 'positional-only'), param('a', 'named-only'), param('', 'named-only')])
    expect(result).toEqual({
      ok: false,
      error: [
        { path: 'params/1', message: 'Duplicate parameter name: a' },
        { path: 'params/2', message: 'Parameter name must not be empty' },
      ],
    })
  })

  it('rejects a second variadic of either kind', () => {
    const result = createArgSpec([
      param('a', 'variadic-positional'),
      param('b', 'variadic-positional'),
      param('c', 'variadic-named'),
      param('d', 'variadic-named'),
    ])
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.map(e => e.path)).toEqual(['params/1', 'params/3'])
    }
  })

  it('rejects positional parameters after the variadic positional one', () => {
    const result = createArgSpec([param('rest', 'variadic-positional'), param('last', 'ambiguous')])
    expect(result).toEqual({
      ok: false,
      error: [{ path: 'params/1', message: 'Positional parameter last follows the variadic positional parameter' }],
    })
  })

  it('rejects positional-only parameters after an ambiguous one', () => {
    const result = createArgSpec([param('amb', 'ambiguous', { default: 'z' }), param('pos', 'positional-only')])
    expect(result).toEqual({
      ok: false,
      error: [{ path: 'params/1', message: 'Positional-only parameter pos follows the ambiguous parameter amb' }],
    })
  })

  it('allows named-only parameters after the variadic positional one', () => {
    expect(createArgSpec([param('rest', 'variadic-positional'), param('force', 'named-only')]).ok).toBe(true)
  })

  it('requires the variadic named parameter to come last', () => {
    const result = createArgSpec([param('extra', 'variadic-named'), param('force', 'named-only')])
    expect(result).toEqual({
      ok: false,
      error: [{ path: 'params/0', message: 'The variadic named parameter must be declared last' }],
    })
  })

  it('rejects defaults on variadic parameters', () => {
    const result = createArgSpec([param('rest', 'variadic-positional', { default: 'x' })])
    expect(result).toEqual({
      ok: false,
      error: [{ path: 'params/0', message: 'Variadic parameter rest cannot have a default' }],
    })
  })
})

describe('lintArgSpec', () => {
  it('warns about a required parameter after a defaulted one', () => {
    const spec = specOf(param('a', 'positional-only', { default: 1 }), param('b', 'ambiguous'))
    expect(lintArgSpec(spec)).toEqual([
      {
        severity: 'warning',
        code: 'ORDER-REQUIRED-AFTER-DEFAULT',
        message: 'Required parameter b follows a, which has a default',
        param: 'b',
      },
    ])
  })

  it('accepts that order when a variadic parameter follows', () => {
    const spec = specOf(param('a', 'positional-only', { default: 1 }), param('b', 'ambiguous'), param('rest', 'variadic-positional'))
    expect(lintArgSpec(spec)).toEqual([])
  })

  it('reports names that cannot be typed as options', () => {
    const spec = specOf(param('level2', 'named-only', { default: 0 }))
    expect(lintArgSpec(spec).map(issue => issue.code)).toEqual(['NAME-NOT-ADDRESSABLE'])
  })

  it('ignores option-name problems on positional-only parameters', () => {
    const spec = specOf(param('file2', 'positional-only'), param('h', 'positional-only'))
    expect(lintArgSpec(spec)).toEqual([])
  })

  it('reports parameters named like built-in flags', () => {
    const spec = specOf(param('help', 'named-only', { default: false }))
    expect(lintArgSpec(spec).map(issue => issue.code)).toEqual(['NAME-SHADOWS-UNIVERSAL'])
  })

  it('reports a name that is a prefix of another', () => {
    const spec = specOf(param('verb', 'named-only', { default: '' }), param('verbose', 'named-only', { default: false }))
    expect(lintArgSpec(spec)).toEqual([
      {
        severity: 'info',
        code: 'PREFIX-SHADOWED',
        message: 'verb is a prefix of verbose; it can only be given in full',
        param: 'verb',
      },
    ])
  })
})
