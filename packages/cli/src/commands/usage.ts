import { resolve } from 'node:path'
import type { Result } from 'shared'
import { formatValidationErrors } from '../lib/errors.js'
import { formatHelp } from '../lib/help.js'
import { loadArgSpec } from '../lib/loader.js'

export async function usageCommand(specPath: string): Promise<Result<string, string>> {
  const spec = await loadArgSpec(resolve(specPath))
  if (!spec.ok) {
    return { ok: false, error: `Invalid ArgSpec ${specPath}:\n${formatValidationErrors(spec.error)}` }
  }

  const help = formatHelp(spec.value)
  console.log(help)
  return { ok: true, value: help }
}
