/**
 * trigger-engine module: barrel export.
 */

export type { IterationContext, Role, RoleLoader } from './types.js'
export { parseCondition, tokenize, COMPARISON_OPERATORS, FLAG_NAMES } from './expression-parser.js'
export type { Expression, ComparisonOperator, FlagName, NumericField } from './expression-parser.js'
export { evaluate, iterationsSinceRole } from './expression-evaluator.js'
export { readTriggerFile, ROLE_NAME_PATTERN, TriggerDefinitionSchema } from './trigger-config.js'
export type { TriggerDefinition } from './trigger-config.js'
export { compileTriggers, createTriggerEngine, loadTriggerEngine } from './trigger-engine.js'
export type { CompiledTrigger, TriggerEngine } from './trigger-engine.js'
export { FileRoleLoader } from './role-loader.js'
export { buildBasePrompt, buildCompletionCheckPrompt, buildIdleMessagePrompt, composePrompt } from './prompt.js'
export type { BasePromptOptions, CompletionCheckOptions, IdleMessagePromptOptions } from './prompt.js'
