import { describe, expect, it } from 'vitest'
import { buildSquashMessage, remapGroup } from '../SquashMessage'
import { makeChain } from './commit-fixtures'

describe('buildSquashMessage', () => {
  it('joins full messages oldest first with one blank line', () => {
    const commits = makeChain([
      { message: 'ABC-1 add parser\n\nHandles quoted fields.\n' },
      { message: 'fix parser edge case  \n' }
    ])

    expect(buildSquashMessage(commits)).toBe(
      'ABC-1 add parser\n\nHandles quoted fields.\n\nfix parser edge case'
    )
  })

  it('keeps empty messages as empty paragraphs', () => {
    const commits = makeChain([{ message: 'first' }, { message: '' }, { message: 'third' }])
    expect(buildSquashMessage(commits)).toBe('first\n\n\n\nthird')
  })
})

describe('remapGroup', () => {
  it('translates hashes and parents through the rewrite map', () => {
    const [a, b] = makeChain([{ at: 0 }, { at: 10 }])
    const group = { commits: [a, b], correlationKey: null }
    const rewritten = new Map([
      [a.hash, 'new-a'],
      [b.hash, 'new-b']
    ])

    const remapped = remapGroup(group, rewritten)

    expect(remapped.commits.map((c) => c.hash)).toEqual(['new-a', 'new-b'])
    expect(remapped.commits[1].parentHashes).toEqual(['new-a'])
    expect(remapped.commits[0].parentHashes).toEqual([])
    expect(group.commits[0].hash).toBe(a.hash)
  })

  it('returns the group itself when nothing was rewritten', () => {
    const group = { commits: makeChain([{}, {}]), correlationKey: 'ABC-1' }
    expect(remapGroup(group, new Map())).toBe(group)
  })
})
