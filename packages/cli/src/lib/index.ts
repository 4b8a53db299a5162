export { tokenize, parseToken, cliToIdentifier, identifierToCli } from './tokenizer.js'
export { bind, type BindOptions } from './binder.js'
export { createArgSpec, lintArgSpec, UNIVERSAL_FLAGS, type ArgSpecIssue, type ArgSpecMeta } from './arg-spec.js'
export { formatBindError, formatValidationErrors } from './errors.js'
export { formatHelp, formatUsage, shortAlias } from './help.js'
export { loadArgSpec, parseArgSpecDocument, toArgSpecDocument, type ArgSpecFile } from './loader.js'
export { extractArgSpec, createProject } from './extractor.js'
export { loadConfig, defaultConfig, type ArgbindConfig } from './config.js'
export { defineCli, EXIT_OK, EXIT_FAILURE, EXIT_USAGE, type Cli, type CliDefinition, type CliHandler } from './host.js'
export * from 'shared'
