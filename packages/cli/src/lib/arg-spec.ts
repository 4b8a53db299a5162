import type { ArgSpec, ParamKind, ParamSpec, Result, ValidationError } from 'shared'

export const UNIVERSAL_FLAGS: ReadonlySet<string> = new Set(['h', 'help', 'd', 'debug'])

export interface ArgSpecMeta {
  name?: string
  description?: string
}

export interface ArgSpecIssue {
  severity: 'warning' | 'info'
  code: string
  message: string
  param: string
}

// Names the tokenizer can produce once dashes are normalized to underscores.
const ADDRESSABLE_NAME = /^[A-Za-z][A-Za-z_]*$/

export function isPositional(kind: ParamKind): boolean {
  return kind === 'positional-only' || kind === 'ambiguous'
}

export function isNameable(kind: ParamKind): boolean {
  return kind === 'ambiguous' || kind === 'named-only'
}

export function isVariadic(kind: ParamKind): boolean {
  return kind === 'variadic-positional' || kind === 'variadic-named'
}

/**
 * Build an immutable ArgSpec from declared parameters, deriving arity counts.
 * Structural problems are reported all at once.
 */
export function createArgSpec(params: readonly ParamSpec[], meta: ArgSpecMeta = {}): Result<ArgSpec, ValidationError[]> {
  const errors: ValidationError[] = []
  const seen = new Set<string>()
  let variadicPositional: number | undefined
  let variadicNamed: number | undefined
  let firstAmbiguous: string | undefined

  for (const [index, param] of params.entries()) {
    const path = `params/${index}`

    if (param.name.length === 0) {
      errors.push({ path, message: 'Parameter name must not be empty' })
    } else if (seen.has(param.name)) {
      errors.push({ path, message: `Duplicate parameter name: ${param.name}` })
    }
    seen.add(param.name)

    if (isVariadic(param.kind) && param.default.given) {
      errors.push({ path, message: `Variadic parameter ${param.name} cannot have a default` })
    }

    switch (param.kind) {
      case 'positional-only':
      case 'ambiguous':
        if (variadicPositional !== undefined) {
          errors.push({ path, message: `Positional parameter ${param.name} follows the variadic positional parameter` })
        }
        if (param.kind === 'ambiguous') {
          firstAmbiguous ??= param.name
        } else if (firstAmbiguous !== undefined) {
          errors.push({ path, message: `Positional-only parameter ${param.name} follows the ambiguous parameter ${firstAmbiguous}` })
        }
        break
      case 'named-only':
        break
      case 'variadic-positional':
        if (variadicPositional !== undefined) {
          errors.push({ path, message: `Only one variadic positional parameter is allowed (${param.name})` })
        }
        variadicPositional = index
        break
      case 'variadic-named':
        if (variadicNamed !== undefined) {
          errors.push({ path, message: `Only one variadic named parameter is allowed (${param.name})` })
        }
        variadicNamed = index
        break
      default: {
        const unreachable: never = param.kind
        errors.push({ path, message: `Unknown parameter kind: ${String(unreachable)}` })
      }
    }
  }

  if (variadicNamed !== undefined && variadicNamed !== params.length - 1) {
    errors.push({ path: `params/${variadicNamed}`, message: 'The variadic named parameter must be declared last' })
  }

  if (errors.length > 0) {
    return { ok: false, error: errors }
  }

  const count = (predicate: (param: ParamSpec) => boolean) => params.filter(predicate).length

  const spec: ArgSpec = {
    ...(meta.name !== undefined ? { name: meta.name } : {}),
    ...(meta.description !== undefined ? { description: meta.description } : {}),
    params: Object.freeze(params.map(param => Object.freeze({ ...param }))),
    minPositional: count(p => isPositional(p.kind) && !p.default.given),
    maxPositional: count(p => isPositional(p.kind)),
    minNamed: count(p => p.kind === 'named-only' && !p.default.given),
    maxNamed: count(p => isNameable(p.kind)),
    hasVariadicPositional: variadicPositional !== undefined,
    hasVariadicNamed: variadicNamed !== undefined,
  }

  return { ok: true, value: Object.freeze(spec) }
}

/**
 * Report declarations that are legal but bind surprisingly.
 */
export function lintArgSpec(spec: ArgSpec): ArgSpecIssue[] {
  const issues: ArgSpecIssue[] = []
  const positional = spec.params.filter(p => isPositional(p.kind))
  const nameable = spec.params.filter(p => isNameable(p.kind))

  if (!spec.hasVariadicPositional) {
    let defaulted: ParamSpec | undefined
    for (const param of positional) {
      if (param.default.given) {
        defaulted ??= param
      } else if (defaulted) {
        issues.push({
          severity: 'warning',
          code: 'ORDER-REQUIRED-AFTER-DEFAULT',
          message: `Required parameter ${param.name} follows ${defaulted.name}, which has a default`,
          param: param.name,
        })
      }
    }
  }

  for (const param of nameable) {
    if (!ADDRESSABLE_NAME.test(param.name)) {
      issues.push({
        severity: 'warning',
        code: 'NAME-NOT-ADDRESSABLE',
        message: `${param.name} cannot be written as a command-line option`,
        param: param.name,
      })
    }
    if (UNIVERSAL_FLAGS.has(param.name)) {
      issues.push({
        severity: 'warning',
        code: 'NAME-SHADOWS-UNIVERSAL',
        message: `${param.name} shadows a built-in help/debug flag`,
        param: param.name,
      })
    }
    const longer = nameable.find(other => other !== param && other.name.startsWith(param.name))
    if (longer) {
      issues.push({
        severity: 'info',
        code: 'PREFIX-SHADOWED',
        message: `${param.name} is a prefix of ${longer.name}; it can only be given in full`,
        param: param.name,
      })
    }
  }

  return issues
}
