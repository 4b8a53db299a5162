#!/usr/bin/env node
import { Command } from 'commander'
import { bindCommand } from './commands/bind.js'
import { checkCommand } from './commands/check.js'
import { usageCommand } from './commands/usage.js'
import { extractCommand } from './commands/extract.js'
import { EXIT_USAGE } from './lib/host.js'

const program = new Command()

program
  .name('argbind')
  .description('Bind command-line arguments to declared parameter lists')
  .version('0.1.0')
  .enablePositionalOptions()

program
  .command('bind <spec> [args...]')
  .description('Bind arguments against an ArgSpec file and print the result as JSON')
  .option('--no-abbreviations', 'Only accept option names given in full')
  .passThroughOptions()
  .action(async (spec: string, args: string[] | undefined, options) => {
    const result = await bindCommand(spec, args ?? [], options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    } else if (!result.value.bound) {
      process.exit(EXIT_USAGE)
    }
  })

program
  .command('check <spec>')
  .description('Validate an ArgSpec file and report declarations that bind surprisingly')
  .option('--json', 'Output as JSON')
  .option('--strict', 'Treat warnings as errors')
  .action(async (spec: string, options) => {
    const result = await checkCommand(spec, options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    } else if (!result.value.passed) {
      process.exit(1)
    }
  })

program
  .command('usage <spec>')
  .description('Print the help text for an ArgSpec file')
  .action(async (spec: string) => {
    const result = await usageCommand(spec)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

program
  .command('extract <file> <function>')
  .description('Derive an ArgSpec from a TypeScript function declaration')
  .option('--json', 'Output as JSON instead of YAML')
  .option('--tsconfig <path>', 'tsconfig.json to resolve the file with')
  .action(async (file: string, fn: string, options) => {
    const result = await extractCommand(file, fn, options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

await program.parseAsync()
