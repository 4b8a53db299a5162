import type { RawOptions, RawPositionals, Tokens } from 'shared'

// Tried in order; each pattern must match the whole token.
const SHORT_FLAG = /^-([a-zA-Z])$/
const LONG_FLAG = /^--([a-zA-Z][-a-zA-Z]*)$/
const SHORT_OPTION = /^-([a-zA-Z]):(.+)$/s
const LONG_OPTION = /^--([a-zA-Z][-a-zA-Z]*)=(.+)$/s

/**
 * Convert an option name from CLI style (`create-new`) to identifier style (`create_new`).
 */
export function cliToIdentifier(name: string): string {
  return name.replace(/-/g, '_')
}

/**
 * Convert an identifier (`create_new`) back to CLI style (`create-new`).
 */
export function identifierToCli(name: string): string {
  return name.replace(/_/g, '-')
}

/**
 * Classify a single token. Returns the normalized option name and its value,
 * or `undefined` when the token is a positional value.
 */
export function parseToken(token: string): [name: string, value: string | true] | undefined {
  let match = SHORT_FLAG.exec(token) ?? LONG_FLAG.exec(token)
  if (match) return [cliToIdentifier(match[1]), true]

  match = SHORT_OPTION.exec(token) ?? LONG_OPTION.exec(token)
  if (match) return [cliToIdentifier(match[1]), match[2]]

  return undefined
}

/**
 * Split an argument vector (program name already stripped) into positional
 * values and options. A repeated option keeps its last value.
 */
export function tokenize(args: readonly string[]): Tokens {
  const positionals: RawPositionals = []
  const options: RawOptions = new Map()

  for (const arg of args) {
    const option = parseToken(arg)
    if (option) {
      options.set(option[0], option[1])
    } else {
      positionals.push(arg)
    }
  }

  return { positionals, options }
}
