import { Node, Project, SyntaxKind } from 'ts-morph'
import type { ArrowFunction, FunctionDeclaration, FunctionExpression, JSDoc, ParameterDeclaration, SourceFile } from 'ts-morph'
import { NoDefault, withDefault } from 'shared'
import type { ArgSpec, Default, DefaultValue, ParamSpec, Result, ValidationError } from 'shared'
import { createArgSpec } from './arg-spec.js'

type Callable = FunctionDeclaration | ArrowFunction | FunctionExpression

/**
 * Create a ts-morph project for reading declarations from disk.
 */
export function createProject(tsConfigPath?: string): Project {
  if (tsConfigPath) {
    return new Project({ tsConfigFilePath: tsConfigPath, skipAddingFilesFromTsConfig: true })
  }
  return new Project({ compilerOptions: { strict: true } })
}

function findCallable(sourceFile: SourceFile, name: string): { callable: Callable; docs: JSDoc[] } | undefined {
  const declaration = sourceFile.getFunction(name)
  if (declaration) return { callable: declaration, docs: declaration.getJsDocs() }

  const variable = sourceFile.getVariableDeclaration(name)
  const initializer = variable?.getInitializer()
  if (variable && initializer && (Node.isArrowFunction(initializer) || Node.isFunctionExpression(initializer))) {
    return { callable: initializer, docs: variable.getVariableStatement()?.getJsDocs() ?? [] }
  }

  return undefined
}

function literalValue(node: Node): Result<DefaultValue, string> {
  if (Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
    return { ok: true, value: node.getLiteralValue() }
  }
  if (Node.isNumericLiteral(node)) {
    return { ok: true, value: node.getLiteralValue() }
  }
  if (Node.isPrefixUnaryExpression(node) && node.getOperatorToken() === SyntaxKind.MinusToken) {
    const operand = node.getOperand()
    if (Node.isNumericLiteral(operand)) return { ok: true, value: -operand.getLiteralValue() }
  }
  switch (node.getKind()) {
    case SyntaxKind.TrueKeyword:
      return { ok: true, value: true }
    case SyntaxKind.FalseKeyword:
      return { ok: true, value: false }
    case SyntaxKind.NullKeyword:
      return { ok: true, value: null }
  }
  return { ok: false, error: `default is not a literal: ${node.getText()}` }
}

function defaultOf(initializer: Node | undefined, optional: boolean): Result<Default, string> {
  if (!initializer) return { ok: true, value: optional ? withDefault(null) : NoDefault }
  const literal = literalValue(initializer)
  return literal.ok ? { ok: true, value: withDefault(literal.value) } : literal
}

/**
 * Collect `@param` descriptions, keyed by the last segment of the documented
 * name so that `@param options.force` documents the destructured `force`.
 */
function paramDocs(docs: readonly JSDoc[]): Map<string, string> {
  const help = new Map<string, string>()
  for (const doc of docs) {
    for (const tag of doc.getTags()) {
      if (!Node.isJSDocParameterTag(tag)) continue
      const text = tag.getCommentText()?.replace(/^\s*-\s*/, '').trim()
      const name = tag.getName().split('.').pop()
      if (text && name) help.set(name, text)
    }
  }
  return help
}

function describeCallable(docs: readonly JSDoc[]): string | undefined {
  const description = docs.map(doc => doc.getDescription().trim()).filter(Boolean).join('\n\n')
  return description || undefined
}

/**
 * Build an ArgSpec from a function's declared parameters. Plain parameters are
 * positional-only, a rest parameter collects extra positionals, and a trailing
 * object pattern declares the named-only parameters (`...rest` inside it
 * collects unknown options).
 */
export function extractArgSpec(sourceFile: SourceFile, functionName: string): Result<ArgSpec, ValidationError[]> {
  const found = findCallable(sourceFile, functionName)
  if (!found) {
    return { ok: false, error: [{ path: functionName, message: `Function not found in ${sourceFile.getBaseName()}` }] }
  }

  const { callable, docs } = found
  const help = paramDocs(docs)
  const errors: ValidationError[] = []
  const params: ParamSpec[] = []
  const declared: ParameterDeclaration[] = callable.getParameters()

  const push = (name: string, kind: ParamSpec['kind'], initializer: Node | undefined, optional: boolean) => {
    const fallback = defaultOf(initializer, optional)
    if (!fallback.ok) {
      errors.push({ path: `${functionName}/${name}`, message: fallback.error })
      return
    }
    const text = help.get(name)
    params.push({ name, kind, default: fallback.value, ...(text ? { help: text } : {}) })
  }

  for (const [index, parameter] of declared.entries()) {
    const nameNode = parameter.getNameNode()

    if (parameter.isRestParameter()) {
      push(parameter.getName(), 'variadic-positional', undefined, false)
      continue
    }

    if (Node.isObjectBindingPattern(nameNode)) {
      if (index !== declared.length - 1) {
        errors.push({ path: `${functionName}/${index}`, message: 'An options object must be the last parameter' })
        continue
      }
      for (const element of nameNode.getElements()) {
        const key = element.getPropertyNameNode()?.getText() ?? element.getName()
        if (element.getDotDotDotToken()) {
          push(key, 'variadic-named', undefined, false)
        } else {
          push(key, 'named-only', element.getInitializer(), false)
        }
      }
      continue
    }

    if (Node.isArrayBindingPattern(nameNode)) {
      errors.push({ path: `${functionName}/${index}`, message: 'Array destructuring parameters are not supported' })
      continue
    }

    push(parameter.getName(), 'positional-only', parameter.getInitializer(), parameter.hasQuestionToken())
  }

  if (errors.length > 0) {
    return { ok: false, error: errors }
  }

  return createArgSpec(params, { name: functionName, description: describeCallable(docs) })
}
