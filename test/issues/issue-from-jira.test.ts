import { describe, expect, it } from 'vitest'

import { issueFromJira } from '../../core/issues/issue-from-jira'
import { ParseError } from '../../core/errors/parse-error'

describe('issueFromJira', () => {
  it('reads key, type and summary', () => {
    let issue = issueFromJira({
      fields: {
        issuetype: { name: 'Feature' },
        summary: 'Issue title',
      },
      key: 'ARROW-2222',
    })

    expect(issue.key).toBe('ARROW-2222')
    expect(issue.type).toBe('Feature')
    expect(issue.summary).toBe('Issue title')
    expect(issue.project).toBe('ARROW')
    expect(issue.number).toBe(2222)
  })

  it('ignores extra fields', () => {
    let issue = issueFromJira({
      fields: {
        issuetype: { name: 'Bug', id: '1' },
        summary: 'Crash',
        status: { name: 'Resolved' },
      },
      self: 'https://jira.example.com/rest/api/2/issue/1',
      key: 'ARROW-1',
    })

    expect(issue.type).toBe('Bug')
  })

  it('fails fast on a missing issue type', () => {
    expect(() =>
      issueFromJira({ fields: { summary: 'Crash' }, key: 'ARROW-1' }),
    ).toThrowError(
      'Invalid Jira issue record "ARROW-1": expected key, ' +
        'fields.issuetype.name and fields.summary',
    )
  })

  it('fails on a record without key', () => {
    expect(() =>
      issueFromJira({ fields: { issuetype: { name: 'Bug' }, summary: 'x' } }),
    ).toThrowError(ParseError)
  })

  it('describes non-object records by type', () => {
    expect(() => issueFromJira(null)).toThrowError(
      'Invalid Jira issue record (null)',
    )
    expect(() => issueFromJira('ARROW-1')).toThrowError(
      'Invalid Jira issue record (string)',
    )
  })

  it('propagates an invalid key', () => {
    expect(() =>
      issueFromJira({
        fields: { issuetype: { name: 'Bug' }, summary: 'x' },
        key: 'ARROW',
      }),
    ).toThrowError('Issue key "ARROW" has no project prefix')
  })
})
