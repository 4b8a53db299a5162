import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import AjvModule from 'ajv'
import { parse as parseYaml } from 'yaml'
import { configSchema } from 'shared'
import type { Result } from 'shared'
import { fileExists } from './loader.js'

export const CONFIG_FILE = 'argbind.yaml'

export interface ArgbindConfig {
  abbreviations: boolean
  debug: boolean
}

export const defaultConfig: ArgbindConfig = {
  abbreviations: true,
  debug: false,
}

const Ajv = AjvModule.default
const validateConfig = new Ajv({ allErrors: true }).compile<Partial<ArgbindConfig>>(configSchema)

function debugFromEnv(env: NodeJS.ProcessEnv): boolean | undefined {
  const value = env.ARGBIND_DEBUG
  if (value === undefined || value === '') return undefined
  return value !== '0' && value.toLowerCase() !== 'false'
}

/**
 * Load argbind.yaml from the project root. A missing file yields the defaults;
 * ARGBIND_DEBUG overrides the file's `debug` setting.
 */
export async function loadConfig(projectRoot: string, env: NodeJS.ProcessEnv = process.env): Promise<Result<ArgbindConfig, string>> {
  const configPath = join(projectRoot, CONFIG_FILE)
  const config = { ...defaultConfig }

  if (await fileExists(configPath)) {
    let parsed: unknown
    try {
      parsed = parseYaml(await readFile(configPath, 'utf-8')) ?? {}
    } catch (error) {
      return { ok: false, error: `Failed to parse ${CONFIG_FILE}: ${error}` }
    }
    if (!validateConfig(parsed)) {
      const details = (validateConfig.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message}`).join('; ')
      return { ok: false, error: `Invalid ${CONFIG_FILE}: ${details}` }
    }
    Object.assign(config, parsed)
  }

  const envDebug = debugFromEnv(env)
  if (envDebug !== undefined) config.debug = envDebug

  return { ok: true, value: config }
}
