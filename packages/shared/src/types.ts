export type ParamKind =
  | 'positional-only'
  | 'ambiguous'
  | 'named-only'
  | 'variadic-positional'
  | 'variadic-named'

export type DefaultValue = string | number | boolean | null

/** Any value a bound parameter can hold: a raw token, a bare flag, or a default. */
export type ArgValue = DefaultValue

export type Default = { given: true; value: DefaultValue } | { given: false }

export const NoDefault: Default = Object.freeze({ given: false } as const)

export function withDefault(value: DefaultValue): Default {
  return { given: true, value }
}

export interface ParamSpec {
  name: string
  kind: ParamKind
  default: Default
  help?: string
}

export interface ArgSpec {
  readonly name?: string
  readonly description?: string
  readonly params: readonly ParamSpec[]
  readonly minPositional: number
  readonly maxPositional: number
  readonly minNamed: number
  readonly maxNamed: number
  readonly hasVariadicPositional: boolean
  readonly hasVariadicNamed: boolean
}

export type RawPositionals = string[]

export type RawOptions = Map<string, string | true>

export interface Tokens {
  positionals: RawPositionals
  options: RawOptions
}

export interface BoundArgs {
  positionals: ArgValue[]
  named: Record<string, ArgValue>
}

export type BindError =
  | { type: 'InsufficientArguments'; expected: number; received: number }
  | { type: 'TooManyPositionals'; expected: number; received: number }
  | { type: 'TooManyNamed'; name: string; parameter: string }
  | { type: 'MissingDefault'; name: string }
  | { type: 'AmbiguousOption'; name: string; candidates: string[] }
  | { type: 'UnknownOption'; name: string }

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export type ValidationError = {
  path: string
  message: string
}
