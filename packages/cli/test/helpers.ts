import { NoDefault, withDefault } from 'shared'
import type { ArgSpec, DefaultValue, ParamKind, ParamSpec } from 'shared'
import { createArgSpec } from '../src/lib/arg-spec.js'

export function param(name: string, kind: ParamKind, fallback?: { default: DefaultValue }): ParamSpec {
  return { name, kind, default: fallback ? withDefault(fallback.default) : NoDefault }
}

export function specOf(...params: ParamSpec[]): ArgSpec {
  const result = createArgSpec(params, { name: 'test' })
  if (!result.ok) {
    throw new Error(result.error.map(e => `${e.path}: ${e.message}`).join('\n'))
  }
  return result.value
}
