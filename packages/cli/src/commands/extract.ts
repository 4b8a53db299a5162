import { resolve } from 'node:path'
import { stringify } from 'yaml'
import type { ArgSpec, Result } from 'shared'
import { formatValidationErrors } from '../lib/errors.js'
import { createProject, extractArgSpec } from '../lib/extractor.js'
import { fileExists, toArgSpecDocument } from '../lib/loader.js'

export interface ExtractOptions {
  json?: boolean
  tsconfig?: string
}

export async function extractCommand(path: string, functionName: string, options: ExtractOptions): Promise<Result<ArgSpec, string>> {
  const file = resolve(path)
  if (!(await fileExists(file))) {
    return { ok: false, error: `File not found: ${path}` }
  }

  const project = createProject(options.tsconfig ? resolve(options.tsconfig) : undefined)
  const sourceFile = project.addSourceFileAtPath(file)
  const result = extractArgSpec(sourceFile, functionName)
  if (!result.ok) {
    return { ok: false, error: formatValidationErrors(result.error) }
  }

  const document = toArgSpecDocument(result.value)
  if (options.json) {
    console.log(JSON.stringify(document, null, 2))
  } else {
    console.log(stringify(document).trimEnd())
  }

  return { ok: true, value: result.value }
}
