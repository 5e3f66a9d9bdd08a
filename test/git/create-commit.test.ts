import { describe, expect, it } from 'vitest'

import { formatCommitUrl } from '../../core/git/format-commit-url'
import { createCommit } from '../../core/git/create-commit'

describe('createCommit', () => {
  it('parses the title and builds the url', () => {
    let commit = createCommit(
      {
        message: 'ARROW-8684: [Python] Fix docstring\n\nCloses #7000',
        hexsha: '0123456789abcdef0123456789abcdef01234567',
        parents: ['fedcba9876543210fedcba9876543210fedcba98'],
      },
      'https://github.com/example/project/commit/{hexsha}',
    )

    expect(commit.hexsha).toBe('0123456789abcdef0123456789abcdef01234567')
    expect(commit.url).toBe(
      'https://github.com/example/project/commit/' +
        '0123456789abcdef0123456789abcdef01234567',
    )
    expect(commit.title).toEqual({
      summary: 'Fix docstring',
      components: ['Python'],
      issue: 'ARROW-8684',
      project: 'ARROW',
    })
    expect(commit.message).toBe(
      'ARROW-8684: [Python] Fix docstring\n\nCloses #7000',
    )
  })

  it('never fails on unstructured messages', () => {
    let commit = createCommit(
      { message: 'wip', hexsha: 'abc1234', parents: [] },
      'https://example.com/{hexsha}',
    )

    expect(commit.title.summary).toBe('wip')
    expect(commit.url).toBe('https://example.com/abc1234')
  })
})

describe('formatCommitUrl', () => {
  it('replaces every placeholder', () => {
    expect(formatCommitUrl('/{hexsha}/{hexsha}.patch', 'abc')).toBe(
      '/abc/abc.patch',
    )
  })

  it('returns templates without placeholder unchanged', () => {
    expect(formatCommitUrl('https://example.com', 'abc')).toBe(
      'https://example.com',
    )
  })
})
