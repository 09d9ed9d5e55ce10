/**
 * Evaluation of parsed trigger conditions against an iteration context.
 * Total over every well-formed expression: it never throws.
 */

import type { ComparisonOperator, Expression, FlagName, NumericField } from './expression-parser.js'
import type { IterationContext } from './types.js'

/**
 * Iterations since `role` was last applied to the task. A role never applied
 * counts every iteration already run on the task.
 */
export function iterationsSinceRole(context: IterationContext, role: string): number {
  const lastApplied = context.roleHistory.get(role)
  if (lastApplied === undefined) return context.iteration - 1
  return context.iteration - lastApplied
}

function numericValue(field: NumericField, context: IterationContext): number {
  switch (field.name) {
    case 'branch_commits':
      return context.branchCommits
    case 'iteration':
      return context.iteration
    case 'iterations_since_role':
      return iterationsSinceRole(context, field.role)
  }
}

function flagValue(flag: FlagName, context: IterationContext): boolean {
  switch (flag) {
    case 'last_iteration_failed':
      return context.lastIterationFailed
    case 'task_marked_ready_to_complete':
      return context.task.ready_to_complete === true
    case 'verifying':
      return context.verifying
  }
}

function compare(left: number, operator: ComparisonOperator, right: number): boolean {
  switch (operator) {
    case '>=':
      return left >= right
    case '>':
      return left > right
    case '<=':
      return left <= right
    case '<':
      return left < right
    case '==':
      return left === right
    case '!=':
      return left !== right
  }
}

export function evaluate(expression: Expression, context: IterationContext): boolean {
  switch (expression.kind) {
    case 'literal':
      return expression.value
    case 'not':
      return !evaluate(expression.operand, context)
    case 'and':
      return evaluate(expression.left, context) && evaluate(expression.right, context)
    case 'or':
      return evaluate(expression.left, context) || evaluate(expression.right, context)
    case 'compare':
      return compare(numericValue(expression.field, context), expression.operator, expression.value)
    case 'flag':
      return flagValue(expression.flag, context)
    case 'contains':
      return context.task.title.includes(expression.needle)
  }
}
