/**
 * agent module: barrel export.
 */

export type { AgentMode, AgentRunner, AgentRequest, AgentResult } from './agent-runner.js'
export { CliAgentRunner } from './cli-agent-runner.js'
export type { CliAgentRunnerOptions } from './cli-agent-runner.js'
export { classifyAgentResult, classifyMessage, parseStructuredOutput } from './failure-classifier.js'
export type { AgentFailure, AgentFailureKind } from './failure-classifier.js'
export { AgentInvoker } from './agent-invoker.js'
export type { AgentInvokerOptions, InvocationOutcome } from './agent-invoker.js'
