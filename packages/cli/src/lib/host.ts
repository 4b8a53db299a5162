import type { ArgSpec, BoundArgs, RawOptions } from 'shared'
import { UNIVERSAL_FLAGS } from './arg-spec.js'
import { bind, type BindOptions } from './binder.js'
import { formatBindError } from './errors.js'
import { formatHelp, formatUsage } from './help.js'
import { tokenize } from './tokenizer.js'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

export type CliHandler = (args: BoundArgs) => number | void | Promise<number | void>

export interface CliDefinition {
  spec: ArgSpec
  run: CliHandler
  /** Program name shown in usage lines. Falls back to the ArgSpec name. */
  program?: string
  bind?: BindOptions
}

export interface Cli {
  /** Run against arguments with the program name already removed; resolves to an exit code. */
  exec(args: readonly string[]): Promise<number>
  /** Run against `process.argv` and record the exit code on the process. */
  main(argv?: readonly string[]): Promise<void>
}

/**
 * A universal flag is on when either spelling appears as an option, with or
 * without a value, and the ArgSpec does not declare a parameter of that name.
 */
function hasFlag(options: RawOptions, declared: ReadonlySet<string>, names: readonly string[]): boolean {
  return names.some(name => options.has(name) && !declared.has(name))
}

/**
 * Wrap a handler in a command-line entry point: help and debug flags, binding,
 * diagnostics and exit codes.
 */
export function defineCli(definition: CliDefinition): Cli {
  const { spec, run } = definition
  const program = definition.program ?? spec.name
  const declared: ReadonlySet<string> = new Set(spec.params.map(p => p.name))

  async function exec(args: readonly string[]): Promise<number> {
    const { positionals, options } = tokenize(args)

    if (hasFlag(options, declared, ['h', 'help'])) {
      console.log(formatHelp(spec, program))
      return EXIT_OK
    }

    const debug = hasFlag(options, declared, ['d', 'debug'])

    if (debug) {
      console.error(`Parsed positional arguments: ${JSON.stringify(positionals)}`)
      console.error(`Parsed options: ${JSON.stringify(Object.fromEntries(options))}`)
      console.error(`ArgSpec: ${JSON.stringify(spec)}`)
    }

    const result = bind(positionals, options, spec, definition.bind)
    if (!result.ok) {
      console.error(`Error: ${formatBindError(result.error)}`)
      console.error(formatUsage(spec, program))
      return EXIT_USAGE
    }

    const named = Object.fromEntries(
      Object.entries(result.value.named).filter(([name]) => declared.has(name) || !UNIVERSAL_FLAGS.has(name)),
    )
    const bound: BoundArgs = { positionals: result.value.positionals, named }

    if (debug) {
      console.error(`Bound positional arguments: ${JSON.stringify(bound.positionals)}`)
      console.error(`Bound named arguments: ${JSON.stringify(bound.named)}`)
    }

    try {
      const code = await run(bound)
      return typeof code === 'number' ? code : EXIT_OK
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      console.error(`Fatal: ${message}`)
      if (debug && error instanceof Error && error.stack) console.error(error.stack)
      return EXIT_FAILURE
    }
  }

  async function main(argv: readonly string[] = process.argv): Promise<void> {
    process.exitCode = await exec(argv.slice(2))
  }

  return { exec, main }
}
