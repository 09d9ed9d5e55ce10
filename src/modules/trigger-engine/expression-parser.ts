/**
 * Trigger condition language.
 *
 * Conditions are parsed once, when triggers are loaded, into a tagged
 * expression tree that the evaluator walks for every selection.
 *
 *   expr       := or
 *   or         := and ('or' and)*
 *   and        := unary ('and' unary)*
 *   unary      := 'not' unary | primary
 *   primary    := '(' expr ')' | 'true' | 'false' | comparison | flag | contains
 *   comparison := numeric OP NUMBER          OP: >= > <= < == !=
 *   numeric    := 'branch_commits' | 'iteration' | 'iterations_since_role' '(' NAME ')'
 *   flag       := 'last_iteration_failed' | 'task_marked_ready_to_complete' | 'verifying'
 *   contains   := 'task_title' 'contains' STRING
 */

import { TriggerSyntaxError } from '../../core/errors.js'

// ---------------------------------------------------------------------------
// Expression tree
// ---------------------------------------------------------------------------

export const COMPARISON_OPERATORS = ['>=', '>', '<=', '<', '==', '!='] as const
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number]

export const FLAG_NAMES = ['last_iteration_failed', 'task_marked_ready_to_complete', 'verifying'] as const
export type FlagName = (typeof FLAG_NAMES)[number]

export type NumericField =
  | { name: 'branch_commits' }
  | { name: 'iteration' }
  | { name: 'iterations_since_role'; role: string }

export type Expression =
  | { kind: 'literal'; value: boolean }
  | { kind: 'not'; operand: Expression }
  | { kind: 'and'; left: Expression; right: Expression }
  | { kind: 'or'; left: Expression; right: Expression }
  | { kind: 'compare'; field: NumericField; operator: ComparisonOperator; value: number }
  | { kind: 'flag'; flag: FlagName }
  | { kind: 'contains'; needle: string }

// ---------------------------------------------------------------------------
// Tokenizer
// ---------------------------------------------------------------------------

type Token =
  | { type: 'ident'; value: string; position: number }
  | { type: 'number'; value: number; position: number }
  | { type: 'string'; value: string; position: number }
  | { type: 'operator'; value: ComparisonOperator; position: number }
  | { type: 'lparen'; position: number }
  | { type: 'rparen'; position: number }
  | { type: 'end'; position: number }

const IDENT = /[A-Za-z_][A-Za-z0-9_-]*/y
const NUMBER = /\d+(?:\.\d+)?/y
const OPERATOR = />=|<=|==|!=|>|</y

function isComparisonOperator(value: string): value is ComparisonOperator {
  return COMPARISON_OPERATORS.some((operator) => operator === value)
}

function isFlagName(value: string): value is FlagName {
  return FLAG_NAMES.some((flag) => flag === value)
}

function matchAt(pattern: RegExp, source: string, position: number): string | null {
  pattern.lastIndex = position
  const match = pattern.exec(source)
  return match === null ? null : match[0]
}

export function tokenize(source: string): Token[] {
  const tokens: Token[] = []
  let position = 0

  while (position < source.length) {
    const char = source.charAt(position)

    if (/\s/.test(char)) {
      position++
      continue
    }
    if (char === '(') {
      tokens.push({ type: 'lparen', position })
      position++
      continue
    }
    if (char === ')') {
      tokens.push({ type: 'rparen', position })
      position++
      continue
    }
    if (char === '"' || char === "'") {
      const close = source.indexOf(char, position + 1)
      if (close === -1) {
        throw new TriggerSyntaxError(`Unterminated string starting at position ${String(position)}`, {
          condition: source,
          position,
        })
      }
      tokens.push({ type: 'string', value: source.slice(position + 1, close), position })
      position = close + 1
      continue
    }

    const operator = matchAt(OPERATOR, source, position)
    if (operator !== null && isComparisonOperator(operator)) {
      tokens.push({ type: 'operator', value: operator, position })
      position += operator.length
      continue
    }

    const number = matchAt(NUMBER, source, position)
    if (number !== null) {
      tokens.push({ type: 'number', value: Number(number), position })
      position += number.length
      continue
    }

    const ident = matchAt(IDENT, source, position)
    if (ident !== null) {
      tokens.push({ type: 'ident', value: ident, position })
      position += ident.length
      continue
    }

    throw new TriggerSyntaxError(`Unexpected character "${char}" at position ${String(position)}`, {
      condition: source,
      position,
    })
  }

  tokens.push({ type: 'end', position: source.length })
  return tokens
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

function describe(token: Token): string {
  switch (token.type) {
    case 'end':
      return 'end of condition'
    case 'lparen':
      return '"("'
    case 'rparen':
      return '")"'
    case 'string':
      return `string "${token.value}"`
    default:
      return `"${String(token.value)}"`
  }
}

class Parser {
  private _index = 0

  constructor(
    private readonly _source: string,
    private readonly _tokens: readonly Token[],
  ) {}

  parse(): Expression {
    const expression = this._or()
    const next = this._peek()
    if (next.type !== 'end') {
      this._fail(`Unexpected ${describe(next)}`, next)
    }
    return expression
  }

  private _or(): Expression {
    let left = this._and()
    while (this._acceptKeyword('or')) {
      left = { kind: 'or', left, right: this._and() }
    }
    return left
  }

  private _and(): Expression {
    let left = this._unary()
    while (this._acceptKeyword('and')) {
      left = { kind: 'and', left, right: this._unary() }
    }
    return left
  }

  private _unary(): Expression {
    if (this._acceptKeyword('not')) {
      return { kind: 'not', operand: this._unary() }
    }
    return this._primary()
  }

  private _primary(): Expression {
    const token = this._advance()

    if (token.type === 'lparen') {
      const inner = this._or()
      this._expect('rparen', '")"')
      return inner
    }
    if (token.type !== 'ident') {
      return this._fail(`Expected a condition but found ${describe(token)}`, token)
    }

    switch (token.value) {
      case 'true':
        return { kind: 'literal', value: true }
      case 'false':
        return { kind: 'literal', value: false }
      case 'branch_commits':
      case 'iteration':
        return this._comparison({ name: token.value })
      case 'iterations_since_role': {
        this._expect('lparen', '"(" after iterations_since_role')
        const role = this._advance()
        if (role.type !== 'ident' && role.type !== 'string') {
          return this._fail(`Expected a role name but found ${describe(role)}`, role)
        }
        this._expect('rparen', '")"')
        return this._comparison({ name: 'iterations_since_role', role: role.value })
      }
      case 'task_title': {
        if (!this._acceptKeyword('contains')) {
          return this._fail('Expected "contains" after task_title', this._peek())
        }
        const needle = this._advance()
        if (needle.type !== 'string') {
          return this._fail(`Expected a quoted string but found ${describe(needle)}`, needle)
        }
        return { kind: 'contains', needle: needle.value }
      }
      default:
        if (isFlagName(token.value)) {
          return { kind: 'flag', flag: token.value }
        }
        return this._fail(`Unknown field "${token.value}"`, token)
    }
  }

  private _comparison(field: NumericField): Expression {
    const operator = this._advance()
    if (operator.type !== 'operator') {
      return this._fail(`Expected a comparison operator after ${field.name} but found ${describe(operator)}`, operator)
    }
    const value = this._advance()
    if (value.type !== 'number') {
      return this._fail(`Expected a number but found ${describe(value)}`, value)
    }
    return { kind: 'compare', field, operator: operator.value, value: value.value }
  }

  private _peek(): Token {
    return this._tokens[this._index] ?? { type: 'end', position: this._source.length }
  }

  private _advance(): Token {
    const token = this._peek()
    if (token.type !== 'end') this._index++
    return token
  }

  private _acceptKeyword(keyword: string): boolean {
    const token = this._peek()
    if (token.type === 'ident' && token.value === keyword) {
      this._index++
      return true
    }
    return false
  }

  private _expect(type: 'lparen' | 'rparen', what: string): void {
    const token = this._advance()
    if (token.type !== type) {
      this._fail(`Expected ${what} but found ${describe(token)}`, token)
    }
  }

  private _fail(message: string, token: Token): never {
    throw new TriggerSyntaxError(`${message} at position ${String(token.position)}`, {
      condition: this._source,
      position: token.position,
    })
  }
}

/**
 * Parse a trigger condition into an expression tree.
 *
 * @throws TriggerSyntaxError for unknown fields, bad operators or trailing input
 */
export function parseCondition(source: string): Expression {
  const tokens = tokenize(source)
  return new Parser(source, tokens).parse()
}
