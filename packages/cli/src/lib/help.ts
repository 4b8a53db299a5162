import type { ArgSpec, ParamSpec } from 'shared'
import { UNIVERSAL_FLAGS, isNameable } from './arg-spec.js'
import { identifierToCli } from './tokenizer.js'

const BUILTIN_OPTIONS: readonly [label: string, text: string][] = [
  ['-h, --help', 'view this help message.'],
  ['-d, --debug', 'print debugging information.'],
]

function longOption(param: ParamSpec): string {
  const flag = `--${identifierToCli(param.name)}`
  if (param.default.given && typeof param.default.value === 'boolean') return flag
  return `${flag}=<${param.name}>`
}

function positionalUsage(param: ParamSpec): string {
  return param.default.given ? `[${param.name}]` : `<${param.name}>`
}

function helpText(param: ParamSpec): string {
  const text = param.help ?? ''
  if (!param.default.given) return text
  const suffix = `(default: ${JSON.stringify(param.default.value)})`
  return text ? `${text} ${suffix}` : suffix
}

/**
 * Single-letter alias for a parameter, when its first letter is unique among
 * the parameters that can be given by name and is not taken by a built-in flag.
 */
export function shortAlias(param: ParamSpec, spec: ArgSpec): string | undefined {
  const letter = param.name[0]
  if (!letter || !/[A-Za-z]/.test(letter) || UNIVERSAL_FLAGS.has(letter)) return undefined
  const clashes = spec.params.filter(p => isNameable(p.kind) && p.name.startsWith(letter))
  return clashes.length === 1 ? `-${letter}` : undefined
}

export function formatUsage(spec: ArgSpec, program = spec.name ?? 'command'): string {
  const parts = [`Usage: ${program}`]
  const ordered = [
    ...spec.params.filter(p => p.kind === 'positional-only'),
    ...spec.params.filter(p => p.kind !== 'positional-only'),
  ]

  for (const param of ordered) {
    switch (param.kind) {
      case 'positional-only':
      case 'ambiguous':
        parts.push(positionalUsage(param))
        break
      case 'variadic-positional':
        parts.push(`[${param.name}...]`)
        break
      case 'named-only':
        parts.push(param.default.given ? `[${longOption(param)}]` : longOption(param))
        break
      case 'variadic-named':
        parts.push('[--<name>=<value>...]')
        break
    }
  }

  return parts.join(' ')
}

export function formatHelp(spec: ArgSpec, program?: string): string {
  const sections = [formatUsage(spec, program)]
  if (spec.description) sections.push(spec.description.trim())

  const positional: [string, string][] = spec.params
    .filter(p => p.kind === 'positional-only' || p.kind === 'ambiguous' || p.kind === 'variadic-positional')
    .map((p): [string, string] => [p.kind === 'variadic-positional' ? `${p.name}...` : p.name, helpText(p)])

  const options: [string, string][] = [
    ...BUILTIN_OPTIONS,
    ...spec.params
      .filter(p => isNameable(p.kind))
      .map((p): [string, string] => {
        const alias = shortAlias(p, spec)
        return [`${alias ? `${alias}, ` : '    '}${longOption(p)}`, helpText(p)]
      }),
  ]
  const variadicNamed = spec.params.find(p => p.kind === 'variadic-named')
  if (variadicNamed) {
    options.push(['    --<name>=<value>', variadicNamed.help ?? `collected into ${variadicNamed.name}.`])
  }

  if (positional.length > 0) sections.push(formatTable('Arguments:', positional))
  sections.push(formatTable('Options:', options))

  return sections.join('\n\n') + '\n'
}

function formatTable(title: string, rows: readonly [string, string][]): string {
  const width = Math.max(...rows.map(([label]) => label.length))
  const lines = rows.map(([label, text]) => `    ${label.padEnd(width)}${text ? ` : ${text}` : ''}`)
  return [title, '', ...lines].join('\n')
}
