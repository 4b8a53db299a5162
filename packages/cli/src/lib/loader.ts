import { readFile, access } from 'node:fs/promises'
import AjvModule from 'ajv'
import { parse as parseYaml } from 'yaml'
import { argSpecFileSchema, NoDefault, withDefault } from 'shared'
import type { ArgSpec, DefaultValue, ParamKind, ParamSpec, Result, ValidationError } from 'shared'
import { createArgSpec } from './arg-spec.js'

// ajv is CommonJS; under Node's ESM loader the class sits on `default`.
const Ajv = AjvModule.default
const ajv = new Ajv({ allErrors: true, allowUnionTypes: true })
const validateArgSpecFile = ajv.compile<ArgSpecFile>(argSpecFileSchema)

export interface ArgSpecFile {
  name?: string
  description?: string
  params: {
    name: string
    kind: ParamKind
    default?: DefaultValue
    help?: string
  }[]
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * Validate a parsed ArgSpec document and build the ArgSpec it declares.
 * A `default` key holding `null` is a real default; an absent key means required.
 */
export function parseArgSpecDocument(document: unknown): Result<ArgSpec, ValidationError[]> {
  if (!validateArgSpecFile(document)) {
    const schemaErrors = (validateArgSpecFile.errors ?? []).map(e => ({
      path: e.instancePath || '/',
      message: e.message ?? 'Unknown validation error',
    }))
    return { ok: false, error: schemaErrors }
  }

  const params: ParamSpec[] = document.params.map(entry => ({
    name: entry.name,
    kind: entry.kind,
    default: entry.default !== undefined ? withDefault(entry.default) : NoDefault,
    ...(entry.help !== undefined ? { help: entry.help } : {}),
  }))

  return createArgSpec(params, { name: document.name, description: document.description })
}

export async function loadArgSpec(filePath: string): Promise<Result<ArgSpec, ValidationError[]>> {
  if (!(await fileExists(filePath))) {
    return { ok: false, error: [{ path: filePath, message: 'ArgSpec file not found' }] }
  }

  let document: unknown
  try {
    const content = await readFile(filePath, 'utf-8')
    document = parseYaml(content)
  } catch (error) {
    return { ok: false, error: [{ path: filePath, message: `Failed to parse ArgSpec file: ${error}` }] }
  }

  return parseArgSpecDocument(document)
}

/**
 * Inverse of parseArgSpecDocument: the YAML-ready form of an ArgSpec.
 */
export function toArgSpecDocument(spec: ArgSpec): ArgSpecFile {
  return {
    ...(spec.name !== undefined ? { name: spec.name } : {}),
    ...(spec.description !== undefined ? { description: spec.description } : {}),
    params: spec.params.map(param => ({
      name: param.name,
      kind: param.kind,
      ...(param.default.given ? { default: param.default.value } : {}),
      ...(param.help !== undefined ? { help: param.help } : {}),
    })),
  }
}
