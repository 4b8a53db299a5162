import { describe, it, expect } from 'vitest'
import { formatBindError, formatValidationErrors } from '../src/lib/errors.js'

describe('formatBindError', () => {
  it('describes arity failures', () => {
    expect(formatBindError({ type: 'InsufficientArguments', expected: 2, received: 0 }))
      .toBe('Expected at least 2 positional arguments, got 0')
    expect(formatBindError({ type: 'TooManyPositionals', expected: 1, received: 3 }))
      .toBe('Expected at most 1 positional argument, got 3')
  })

  it('describes option failures in command-line spelling', () => {
    expect(formatBindError({ type: 'AmbiguousOption', name: 'create', candidates: ['create_dir', 'create_file'] }))
      .toBe('Ambiguous option --create could be: --create-dir, --create-file')
    expect(formatBindError({ type: 'UnknownOption', name: 'dry_run' })).toBe('Unknown option: --dry-run')
    expect(formatBindError({ type: 'TooManyNamed', name: 'v', parameter: 'verbose' }))
      .toBe('-v supplies verbose, which already has a value')
  })

  it('names the missing argument', () => {
    expect(formatBindError({ type: 'MissingDefault', name: 'out_file' })).toBe('Missing required argument: out_file')
  })
})

describe('formatValidationErrors', () => {
  it('prints one line per error', () => {
    expect(formatValidationErrors([
      { path: 'params/0', message: 'first' },
      { path: '/params/1/kind', message: 'second' },
    ])).toBe('params/0: first\n/params/1/kind: second')
  })
})
