/**
 * Tests for IterationControllerImpl.
 *
 * Uses a real JSONL task store in a temporary directory, an in-memory branch
 * workflow and a scripted agent that edits the store as the real one would.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { Mock } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createEventBus } from '../../../core/event-bus.js'
import type { TypedEventBus } from '../../../core/event-bus.js'
import type { LoopEvents } from '../../../core/event-bus.types.js'
import type { TaskStatus } from '../../../core/types.js'
import { FakeBranchManager, ScriptedAgentRunner } from '../../../../test/helpers/fakes.js'
import type { AgentStep } from '../../../../test/helpers/fakes.js'
import { AgentInvoker } from '../../agent/agent-invoker.js'
import { StuckTaskRecovery } from '../../stuck-recovery/stuck-recovery.js'
import type { Task } from '../../task-store/schemas.js'
import { JsonlTaskStore, withStatus } from '../../task-store/task-store-impl.js'
import { createTriggerEngine } from '../../trigger-engine/trigger-engine.js'
import type { Role, RoleLoader } from '../../trigger-engine/types.js'
import type { StopCheck } from '../iteration-controller.js'
import { IterationControllerImpl } from '../iteration-controller-impl.js'

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const BRANCH = 'task/A-add-login-form'
const NOW = new Date('2026-03-01T10:00:00.000Z')

const roleFiles: Record<string, string> = {
  debugger: 'Look at the failure first.',
}

const roles: RoleLoader = {
  load: async (name: string): Promise<Role | null> => {
    const content = roleFiles[name]
    return content === undefined ? null : { name, content }
  },
}

let dir: string
let store: JsonlTaskStore
let bus: TypedEventBus
let branches: FakeBranchManager
let sleep: Mock<(ms: number) => Promise<void>>

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'taskloop-controller-'))
  store = new JsonlTaskStore({
    tasksPath: join(dir, 'tasks.jsonl'),
    archivePath: join(dir, 'tasks-done.jsonl'),
  })
  bus = createEventBus()
  branches = new FakeBranchManager()
  sleep = vi.fn(async (_ms: number) => {})
  await store.save([{ id: 'A', title: 'Add login form', status: 'pending', leaf: true }])
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

function setStatus(id: string, status: TaskStatus, reason?: string): AgentStep {
  return async () => {
    await store.update(id, (task) => withStatus(task, status, reason))
  }
}

function buildController(
  runner: ScriptedAgentRunner,
  options: { triggers?: unknown[]; stop?: StopCheck; readInbox?: () => Promise<string | null> } = {},
): IterationControllerImpl {
  return new IterationControllerImpl(
    {
      store,
      branches,
      agent: new AgentInvoker(runner, { maxConsecutiveFailures: 5, retryDelaysMs: [], sleep }),
      triggers: createTriggerEngine(options.triggers ?? []),
      roles,
      recovery: new StuckTaskRecovery(store, branches, bus),
      eventBus: bus,
      stop: options.stop,
      readInbox: options.readInbox,
    },
    { maxIterations: 3, iterationDelayMs: 1000, workingAgreement: 'WORKING.md', sleep, now: () => NOW },
  )
}

function recordEvents<K extends keyof LoopEvents>(event: K): LoopEvents[K][] {
  const seen: LoopEvents[K][] = []
  bus.on(event, (payload) => seen.push(payload))
  return seen
}

async function activeTask(id: string): Promise<Task | undefined> {
  return (await store.loadTree()).get(id)
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('runOnce()', () => {
  it('returns idle when nothing is workable', async () => {
    await store.save([{ id: 'A', title: 'x', status: 'blocked', leaf: true, blocked_reason: 'waiting' }])
    const runner = new ScriptedAgentRunner()

    await expect(buildController(runner).runOnce()).resolves.toEqual({ kind: 'idle' })
    expect(runner.requests).toHaveLength(0)
    expect(branches.calls).toEqual([])
  })

  it('claims the task with its branch before the first invocation', async () => {
    const claimed = recordEvents('task:claimed')
    let seen: Task | undefined
    const runner = new ScriptedAgentRunner([
      async () => {
        seen = await activeTask('A')
        await store.update('A', (task) => withStatus(task, 'complete'))
      },
    ])

    await buildController(runner).runOnce()

    expect(seen).toEqual({ id: 'A', title: 'Add login form', status: 'active', leaf: true, branch: BRANCH })
    expect(claimed).toEqual([{ taskId: 'A', title: 'Add login form', mode: 'work' }])
    expect(runner.requests[0]).toMatchObject({ taskId: 'A', title: 'Add login form', mode: 'work' })
  })

  it('blocks the task and parks its branch when the iteration cap is reached', async () => {
    const blocked = recordEvents('task:blocked')
    const runner = new ScriptedAgentRunner()

    const outcome = await buildController(runner).runOnce()

    expect(outcome).toEqual({ kind: 'stuck', taskId: 'A' })
    expect(runner.requests).toHaveLength(3)
    expect(await activeTask('A')).toMatchObject({ status: 'blocked', blocked_reason: 'iteration limit reached' })
    expect(branches.calls).toEqual([`open:${BRANCH}`, `park:${BRANCH}`])
    expect(branches.existing.has(BRANCH)).toBe(true)
    expect(blocked).toEqual([{ taskId: 'A', reason: 'iteration limit reached' }])
    expect(sleep.mock.calls).toEqual([[1000], [1000]])
  })

  it('merges and archives a completed task', async () => {
    const completed = recordEvents('task:completed')
    const runner = new ScriptedAgentRunner([setStatus('A', 'complete')])

    const outcome = await buildController(runner).runOnce()

    expect(outcome).toEqual({ kind: 'completed', taskId: 'A', commit: 'c0ffee1' })
    expect(branches.calls).toEqual([`open:${BRANCH}`, `merge:${BRANCH}`])
    expect(await store.load()).toEqual([])
    expect(await store.loadArchive()).toEqual([
      {
        id: 'A',
        title: 'Add login form',
        status: 'complete',
        leaf: true,
        branch: BRANCH,
        completed: '2026-03-01T10:00:00.000Z',
        commit: 'c0ffee1',
      },
    ])
    expect(completed).toEqual([{ taskId: 'A', title: 'Add login form', commit: 'c0ffee1' }])
  })

  it('blocks with the conflicting files when the merge conflicts', async () => {
    branches.conflicts.set('A', ['src/app.ts', 'src/form.ts'])
    const runner = new ScriptedAgentRunner([setStatus('A', 'complete')])

    const outcome = await buildController(runner).runOnce()

    expect(outcome).toEqual({ kind: 'blocked', taskId: 'A', reason: 'merge conflict: src/app.ts, src/form.ts' })
    expect(await activeTask('A')).toMatchObject({
      status: 'blocked',
      blocked_reason: 'merge conflict: src/app.ts, src/form.ts',
    })
    expect(await store.loadArchive()).toEqual([])
  })

  it('parks the branch when the agent blocks the task', async () => {
    const runner = new ScriptedAgentRunner([setStatus('A', 'blocked', 'needs an API key')])

    const outcome = await buildController(runner).runOnce()

    expect(outcome).toEqual({ kind: 'blocked', taskId: 'A', reason: 'needs an API key' })
    expect(runner.requests).toHaveLength(1)
    expect(branches.calls).toEqual([`open:${BRANCH}`, `park:${BRANCH}`])
  })

  it('blocks without invoking the agent when the branch name belongs to someone else', async () => {
    branches.existing.add(BRANCH)
    const runner = new ScriptedAgentRunner()

    const outcome = await buildController(runner).runOnce()

    const reason = `Branch "${BRANCH}" already exists and is not owned by task A; resolve it manually`
    expect(outcome).toEqual({ kind: 'blocked', taskId: 'A', reason })
    expect(runner.requests).toHaveLength(0)
    expect(await activeTask('A')).toMatchObject({ status: 'blocked', blocked_reason: reason })
  })

  it('resumes an interrupted task on the branch it owns', async () => {
    await store.save([{ id: 'A', title: 'Add login form', status: 'active', leaf: true, branch: BRANCH }])
    branches.existing.add(BRANCH)
    const runner = new ScriptedAgentRunner([setStatus('A', 'complete')])

    const outcome = await buildController(runner).runOnce()

    expect(outcome).toEqual({ kind: 'completed', taskId: 'A', commit: 'c0ffee1' })
  })

  describe('split', () => {
    it('merges work done before the split and hands over to the first child', async () => {
      const splits = recordEvents('task:split')
      const runner = new ScriptedAgentRunner([
        async () => {
          branches.addCommits(BRANCH, 2)
          await store.split('A', ['Build form', 'Wire submit'])
        },
        setStatus('A.1', 'complete'),
      ])
      const controller = buildController(runner)

      const outcome = await controller.runOnce()

      expect(outcome).toEqual({ kind: 'split', taskId: 'A', children: ['A.1', 'A.2'] })
      expect(branches.calls).toEqual([`open:${BRANCH}`, `merge:${BRANCH}`])
      expect(branches.mergeReasons).toEqual(['split'])
      expect(await activeTask('A')).toEqual({ id: 'A', title: 'Add login form', status: 'split', leaf: false })
      expect(splits).toEqual([{ taskId: 'A', children: ['A.1', 'A.2'] }])

      await expect(controller.runOnce()).resolves.toEqual({ kind: 'completed', taskId: 'A.1', commit: 'c0ffee2' })
      expect(runner.requests[1]?.taskId).toBe('A.1')
    })

    it('abandons the branch when nothing was committed before the split', async () => {
      const runner = new ScriptedAgentRunner([
        async () => {
          await store.split('A', ['Build form'])
        },
      ])

      await buildController(runner).runOnce()

      expect(branches.calls).toEqual([`open:${BRANCH}`, `abandon:${BRANCH}`])
      expect(branches.existing.has(BRANCH)).toBe(false)
    })

    it('blocks a task marked split without any subtasks', async () => {
      const runner = new ScriptedAgentRunner([setStatus('A', 'split')])

      const outcome = await buildController(runner).runOnce()

      expect(outcome).toEqual({ kind: 'blocked', taskId: 'A', reason: 'split without subtasks' })
      expect(await activeTask('A')).toMatchObject({
        status: 'blocked',
        leaf: false,
        blocked_reason: 'split without subtasks',
      })
      expect(branches.calls).toEqual([`open:${BRANCH}`, `park:${BRANCH}`])
    })
  })

  it('applies a role once its trigger condition holds', async () => {
    const applied = recordEvents('role:applied')
    const failed = recordEvents('iteration:failed')
    const runner = new ScriptedAgentRunner([
      async () => ({ exitCode: 1, stdout: '', stderr: 'boom' }),
      setStatus('A', 'complete'),
    ])

    await buildController(runner, {
      triggers: [{ condition: 'last_iteration_failed', role: 'debugger' }],
    }).runOnce()

    expect(runner.requests[0]?.prompt).not.toContain('ROLE:')
    expect(runner.requests[1]?.prompt).toContain('ROLE: debugger\n\nLook at the failure first.')
    expect(applied).toEqual([{ taskId: 'A', iteration: 2, role: 'debugger' }])
    expect(failed).toEqual([{ taskId: 'A', iteration: 1, kind: 'transient', message: 'boom' }])
  })

  it('puts the inbox message at the top of the prompt', async () => {
    const runner = new ScriptedAgentRunner([setStatus('A', 'complete')])

    await buildController(runner, { readInbox: async () => 'Use the new API client.\n' }).runOnce()

    expect(runner.requests[0]?.prompt.split('\n').slice(0, 3)).toEqual([
      'OPERATOR MESSAGE (handle this before anything else):',
      'Use the new API client.',
      '',
    ])
  })

  it('stops between iterations and leaves the task active', async () => {
    const stop: StopCheck = { isRequested: vi.fn(async () => true) }
    const runner = new ScriptedAgentRunner()

    const outcome = await buildController(runner, { stop }).runOnce()

    expect(outcome).toEqual({ kind: 'stopped', taskId: 'A' })
    expect(runner.requests).toHaveLength(1)
    expect(await activeTask('A')).toMatchObject({ status: 'active', branch: BRANCH })
    expect(branches.calls).toEqual([`open:${BRANCH}`, `park:${BRANCH}`])
  })

  it('ends the run when the agent deletes the task', async () => {
    const runner = new ScriptedAgentRunner([
      async () => {
        await store.save([])
      },
    ])

    await expect(buildController(runner).runOnce()).resolves.toEqual({ kind: 'vanished', taskId: 'A' })
    expect(branches.calls).toEqual([`open:${BRANCH}`, `park:${BRANCH}`])
  })
})
