/**
 * TriggerEngine: picks the role that governs the next agent invocation.
 *
 * Triggers are an ordered list of condition/role pairs. Conditions are
 * compiled when the engine is created; selection walks the list and returns
 * the role of the first condition that holds.
 */

import { TriggerSyntaxError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { evaluate } from './expression-evaluator.js'
import { parseCondition } from './expression-parser.js'
import type { Expression } from './expression-parser.js'
import { readTriggerFile, TriggerDefinitionSchema } from './trigger-config.js'
import type { IterationContext } from './types.js'

const logger = createLogger('trigger-engine')

export interface CompiledTrigger {
  condition: string
  role: string
  expression: Expression
}

export interface TriggerEngine {
  readonly triggers: readonly CompiledTrigger[]

  /** Role of the first trigger whose condition holds, or null */
  selectRole(context: IterationContext): string | null
}

/**
 * Validate and compile raw trigger entries. Entries with a missing field, an
 * invalid role name or a condition that does not parse are skipped with a
 * warning.
 */
export function compileTriggers(entries: readonly unknown[]): CompiledTrigger[] {
  const compiled: CompiledTrigger[] = []

  entries.forEach((entry, index) => {
    const parsed = TriggerDefinitionSchema.safeParse(entry)
    if (!parsed.success) {
      logger.warn(
        { index, issues: parsed.error.issues.map((issue) => issue.message) },
        'Skipping invalid trigger entry',
      )
      return
    }

    const { condition, role } = parsed.data
    try {
      compiled.push({ condition, role, expression: parseCondition(condition) })
    } catch (err) {
      if (!(err instanceof TriggerSyntaxError)) throw err
      logger.warn({ index, condition, role, error: err.message }, 'Skipping trigger with malformed condition')
    }
  })

  return compiled
}

class TriggerEngineImpl implements TriggerEngine {
  constructor(readonly triggers: readonly CompiledTrigger[]) {}

  selectRole(context: IterationContext): string | null {
    const match = this.triggers.find((trigger) => evaluate(trigger.expression, context))
    return match?.role ?? null
  }
}

export function createTriggerEngine(entries: readonly unknown[]): TriggerEngine {
  return new TriggerEngineImpl(compileTriggers(entries))
}

/** Build an engine from a triggers file; a missing file gives an engine that never selects a role */
export async function loadTriggerEngine(path: string): Promise<TriggerEngine> {
  const entries = await readTriggerFile(path)
  const engine = createTriggerEngine(entries)
  logger.debug({ path, loaded: engine.triggers.length, skipped: entries.length - engine.triggers.length }, 'Triggers loaded')
  return engine
}
