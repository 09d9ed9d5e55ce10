import { describe, it, expect } from 'vitest'
import { isValidTaskId } from '../../task-store/task-id.js'
import { branchNameFor, slugify } from '../branch-naming.js'

describe('slugify', () => {
  it('lower-cases, joins words with dashes and drops other characters', () => {
    expect(slugify('Fix the Login bug!', 30)).toBe('fix-the-login-bug')
  })

  it('collapses whitespace runs', () => {
    expect(slugify('  Add   OAuth\tsupport ', 30)).toBe('add-oauth-support')
  })

  it('truncates to the maximum length', () => {
    expect(slugify('Implement the authentication middleware for api', 30)).toBe('implement-the-authentication-m')
  })

  it('trims dashes left at the end by truncation', () => {
    expect(slugify('Add a very long title here', 6)).toBe('add-a')
  })
})

describe('branchNameFor', () => {
  it('puts the id ahead of the slug', () => {
    expect(branchNameFor({ id: 'A', title: 'Fix bug' })).toBe('task/A-fix-bug')
  })

  it('keeps tasks with identical titles on different branches', () => {
    const parent = branchNameFor({ id: 'A', title: 'Fix bug' })
    const child = branchNameFor({ id: 'A.1', title: 'Fix bug' })
    expect(child).toBe('task/A.1-fix-bug')
    expect(child).not.toBe(parent)
  })

  it('keeps an id and a title starting with digits apart', () => {
    // "A-1" is not a valid id, so the first dash always ends the id
    expect(isValidTaskId('A-1')).toBe(false)
    expect(branchNameFor({ id: 'A', title: '1 fix bug' })).toBe('task/A-1-fix-bug')
    expect(branchNameFor({ id: 'A_1', title: 'fix bug' })).toBe('task/A_1-fix-bug')
    expect(branchNameFor({ id: 'A.1', title: 'fix bug' })).toBe('task/A.1-fix-bug')
  })

  it('falls back to the id alone when the title leaves no slug', () => {
    expect(branchNameFor({ id: '7', title: '!!!' })).toBe('task/7')
    expect(branchNameFor({ id: '7', title: '' })).toBe('task/7')
  })

  it('uses the configured prefix and slug length', () => {
    expect(branchNameFor({ id: 'B.2', title: 'Write docs' }, { prefix: 'loop/', slugMaxLength: 5 })).toBe('loop/B.2-write')
  })
})
