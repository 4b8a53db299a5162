import type { ArgSpec, ArgValue, BindError, BoundArgs, ParamSpec, RawOptions, RawPositionals, Result } from 'shared'
import { UNIVERSAL_FLAGS, isNameable, isPositional } from './arg-spec.js'

export interface BindOptions {
  /** Accept unambiguous prefixes of option names. Defaults to true. */
  abbreviations?: boolean
}

type Resolution =
  | { kind: 'param'; param: ParamSpec }
  | { kind: 'universal' }
  | { kind: 'ambiguous'; candidates: string[] }
  | { kind: 'none' }

function fail(error: BindError): Result<BoundArgs, BindError> {
  return { ok: false, error }
}

function resolveOption(name: string, pool: readonly ParamSpec[], abbreviations: boolean): Resolution {
  const exact = pool.find(param => param.name === name)
  if (exact) return { kind: 'param', param: exact }

  if (UNIVERSAL_FLAGS.has(name)) return { kind: 'universal' }

  if (!abbreviations) return { kind: 'none' }

  const matches = pool.filter(param => param.name.startsWith(name))
  if (matches.length === 1) return { kind: 'param', param: matches[0] }
  if (matches.length > 1) return { kind: 'ambiguous', candidates: matches.map(param => param.name) }

  return { kind: 'none' }
}

/**
 * Match tokenized arguments against an ArgSpec. Positionals are consumed first,
 * then options are resolved by exact name or unambiguous prefix. Nothing is
 * returned unless every parameter ends up with a value.
 */
export function bind(
  positionals: RawPositionals,
  options: RawOptions,
  spec: ArgSpec,
  bindOptions: BindOptions = {},
): Result<BoundArgs, BindError> {
  const abbreviations = bindOptions.abbreviations ?? true

  // Phase 1: positionals
  if (positionals.length < spec.minPositional) {
    return fail({ type: 'InsufficientArguments', expected: spec.minPositional, received: positionals.length })
  }
  if (positionals.length > spec.maxPositional && !spec.hasVariadicPositional) {
    return fail({ type: 'TooManyPositionals', expected: spec.maxPositional, received: positionals.length })
  }

  // createArgSpec keeps every positional-only slot ahead of the ambiguous ones.
  const slots = spec.params.filter(param => isPositional(param.kind))
  const boundPositionals: ArgValue[] = []
  const pool: ParamSpec[] = []

  for (const [index, param] of slots.entries()) {
    if (index < positionals.length) {
      boundPositionals.push(positionals[index])
    } else if (param.kind === 'ambiguous') {
      pool.push(param)
    } else if (param.default.given) {
      boundPositionals.push(param.default.value)
    } else {
      return fail({ type: 'MissingDefault', name: param.name })
    }
  }
  const tail = positionals.slice(slots.length)

  // Phase 2: options
  pool.push(...spec.params.filter(param => param.kind === 'named-only'))
  const consumed = spec.params.filter(param => isNameable(param.kind) && !pool.includes(param))
  const named: Record<string, ArgValue> = {}

  for (const [name, value] of options) {
    const resolution = resolveOption(name, pool, abbreviations)
    switch (resolution.kind) {
      case 'param':
        named[resolution.param.name] = value
        pool.splice(pool.indexOf(resolution.param), 1)
        consumed.push(resolution.param)
        break
      case 'universal':
        named[name] = value
        break
      case 'ambiguous':
        return fail({ type: 'AmbiguousOption', name, candidates: resolution.candidates })
      case 'none': {
        const taken = resolveOption(name, consumed, abbreviations)
        if (taken.kind === 'param') {
          return fail({ type: 'TooManyNamed', name, parameter: taken.param.name })
        }
        if (spec.hasVariadicNamed) {
          named[name] = value
          break
        }
        return fail({ type: 'UnknownOption', name })
      }
    }
  }

  for (const param of pool) {
    if (!param.default.given) {
      return fail({ type: 'MissingDefault', name: param.name })
    }
    named[param.name] = param.default.value
  }

  return { ok: true, value: { positionals: [...boundPositionals, ...tail], named } }
}
