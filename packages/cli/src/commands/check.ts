import { resolve } from 'node:path'
import type { Result, ValidationError } from 'shared'
import { lintArgSpec, type ArgSpecIssue } from '../lib/arg-spec.js'
import { loadArgSpec } from '../lib/loader.js'

export interface CheckOptions {
  json?: boolean
  strict?: boolean
}

export interface CheckReport {
  file: string
  passed: boolean
  errors: ValidationError[]
  issues: ArgSpecIssue[]
  timestamp: string
}

export async function checkCommand(path: string, options: CheckOptions): Promise<Result<CheckReport, string>> {
  const file = resolve(path)
  const loaded = await loadArgSpec(file)
  const errors = loaded.ok ? [] : loaded.error
  const issues = loaded.ok ? lintArgSpec(loaded.value) : []
  const warnings = issues.filter(issue => issue.severity === 'warning')

  const report: CheckReport = {
    file,
    passed: errors.length === 0 && (!options.strict || warnings.length === 0),
    errors,
    issues,
    timestamp: new Date().toISOString(),
  }

  if (options.json) {
    console.log(JSON.stringify(report, null, 2))
  } else {
    console.error(`\nArgSpec check: ${report.passed ? '✅ PASSED' : '❌ FAILED'}\n`)
    for (const error of errors) {
      console.error(`  ✗ ${error.path}: ${error.message}`)
    }
    for (const issue of issues) {
      const icon = issue.severity === 'warning' ? '⚠' : 'ℹ'
      console.error(`  ${icon} [${issue.code}] ${issue.message}`)
    }
    if (errors.length === 0 && issues.length === 0) {
      console.error('  All checks passed.')
    }
    console.error('')
  }

  return { ok: true, value: report }
}
