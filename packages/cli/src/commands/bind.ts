import { resolve } from 'node:path'
import type { BindError, BoundArgs, Result } from 'shared'
import { bind } from '../lib/binder.js'
import { loadConfig } from '../lib/config.js'
import { formatBindError, formatValidationErrors } from '../lib/errors.js'
import { formatUsage } from '../lib/help.js'
import { loadArgSpec } from '../lib/loader.js'
import { tokenize } from '../lib/tokenizer.js'

export interface BindCommandOptions {
  abbreviations?: boolean
}

export type BindReport = { bound: true; args: BoundArgs } | { bound: false; error: BindError }

export async function bindCommand(specPath: string, args: string[], options: BindCommandOptions): Promise<Result<BindReport, string>> {
  const config = await loadConfig(process.cwd())
  if (!config.ok) {
    return { ok: false, error: config.error }
  }

  const spec = await loadArgSpec(resolve(specPath))
  if (!spec.ok) {
    return { ok: false, error: `Invalid ArgSpec ${specPath}:\n${formatValidationErrors(spec.error)}` }
  }

  const { positionals, options: rawOptions } = tokenize(args)
  if (config.value.debug) {
    console.error(`Parsed positional arguments: ${JSON.stringify(positionals)}`)
    console.error(`Parsed options: ${JSON.stringify(Object.fromEntries(rawOptions))}`)
  }

  const abbreviations = options.abbreviations === false ? false : config.value.abbreviations
  const result = bind(positionals, rawOptions, spec.value, { abbreviations })

  if (!result.ok) {
    console.error(`Error: ${formatBindError(result.error)}`)
    console.error(formatUsage(spec.value))
    return { ok: true, value: { bound: false, error: result.error } }
  }

  console.log(JSON.stringify(result.value, null, 2))
  return { ok: true, value: { bound: true, args: result.value } }
}
