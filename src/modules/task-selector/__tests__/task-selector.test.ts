import { describe, it, expect } from 'vitest'
import { parseTaskLines } from '../../task-store/task-store-impl.js'
import type { Task } from '../../task-store/schemas.js'
import { TaskTree } from '../../task-store/task-tree.js'
import { nextWorkable, selectNext } from '../task-selector.js'

function tasks(...lines: string[]): Task[] {
  return parseTaskLines(lines.join('\n'), 'tasks.jsonl')
}

describe('nextWorkable', () => {
  it('skips a pending container and returns its leaf child', () => {
    const store = tasks(
      '{"id":"A","status":"pending","leaf":false}',
      '{"id":"A.1","status":"pending","leaf":true}',
    )
    expect(nextWorkable(store)?.id).toBe('A.1')
  })

  it('returns the first pending leaf in file order', () => {
    const store = tasks(
      '{"id":"B","status":"blocked","blocked_reason":"x"}',
      '{"id":"C","status":"pending"}',
      '{"id":"A","status":"pending"}',
    )
    expect(nextWorkable(store)?.id).toBe('C')
  })

  it('returns null when nothing is workable', () => {
    const store = tasks(
      '{"id":"A","status":"split","leaf":false}',
      '{"id":"A.1","status":"blocked","blocked_reason":"iteration limit reached"}',
    )
    expect(nextWorkable(store)).toBeNull()
  })

  it('never returns a non-leaf task', () => {
    const store = tasks(
      '{"id":"A","status":"pending","leaf":false}',
      '{"id":"B","status":"pending","leaf":false}',
    )
    expect(nextWorkable(store)).toBeNull()
  })
})

describe('selectNext', () => {
  it('resumes an interrupted leaf first, in work mode', () => {
    const tree = new TaskTree(tasks('{"id":"A","status":"pending"}', '{"id":"B","status":"active"}'))
    expect(selectNext(tree)).toMatchObject({ task: { id: 'B' }, mode: 'work', resumed: true })
  })

  it('resumes an interrupted container in verify mode', () => {
    const tree = new TaskTree(tasks('{"id":"A","status":"active","leaf":false}'), ['A.1'])
    expect(selectNext(tree)).toMatchObject({ task: { id: 'A' }, mode: 'verify', resumed: true })
  })

  it('prefers workable leaves over re-evaluating a parent', () => {
    const tree = new TaskTree(
      tasks('{"id":"A","status":"split","leaf":false}', '{"id":"B","status":"pending"}'),
      ['A.1'],
    )
    expect(selectNext(tree)).toMatchObject({ task: { id: 'B' }, mode: 'work', resumed: false })
  })

  it('re-evaluates a split parent once all its children are archived', () => {
    const tree = new TaskTree(tasks('{"id":"A","status":"split","leaf":false}'), ['A.1', 'A.2'])
    expect(selectNext(tree)).toMatchObject({ task: { id: 'A' }, mode: 'verify', resumed: false })
  })

  it('returns null when only blocked work remains', () => {
    const tree = new TaskTree(
      tasks(
        '{"id":"A","status":"split","leaf":false}',
        '{"id":"A.1","status":"blocked","blocked_reason":"merge conflict: a.ts"}',
      ),
    )
    expect(selectNext(tree)).toBeNull()
  })
})
