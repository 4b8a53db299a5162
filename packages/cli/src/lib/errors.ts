import type { BindError, ValidationError } from 'shared'
import { identifierToCli } from './tokenizer.js'

function option(name: string): string {
  return name.length === 1 ? `-${name}` : `--${identifierToCli(name)}`
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`
}

export function formatBindError(error: BindError): string {
  switch (error.type) {
    case 'InsufficientArguments':
      return `Expected at least ${plural(error.expected, 'positional argument')}, got ${error.received}`
    case 'TooManyPositionals':
      return `Expected at most ${plural(error.expected, 'positional argument')}, got ${error.received}`
    case 'TooManyNamed':
      return `${option(error.name)} supplies ${error.parameter}, which already has a value`
    case 'MissingDefault':
      return `Missing required argument: ${error.name}`
    case 'AmbiguousOption':
      return `Ambiguous option ${option(error.name)} could be: ${error.candidates.map(option).join(', ')}`
    case 'UnknownOption':
      return `Unknown option: ${option(error.name)}`
  }
}

export function formatValidationErrors(errors: readonly ValidationError[]): string {
  return errors.map(e => `${e.path}: ${e.message}`).join('\n')
}
