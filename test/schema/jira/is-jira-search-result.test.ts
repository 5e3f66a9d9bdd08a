import { describe, expect, it } from 'vitest'

import { isJiraSearchResult } from '../../../core/schema/jira/is-jira-search-result'

describe('isJiraSearchResult', () => {
  it('accepts a page of results', () => {
    expect(
      isJiraSearchResult({
        issues: [{ key: 'DEMO-1' }],
        maxResults: 100,
        startAt: 0,
        total: 1,
      }),
    ).toBeTruthy()
  })

  it('accepts an empty page', () => {
    expect(
      isJiraSearchResult({ issues: [], maxResults: 100, startAt: 0, total: 0 }),
    ).toBeTruthy()
  })

  it('rejects pages without pagination fields', () => {
    expect(isJiraSearchResult({ issues: [] })).toBeFalsy()
    expect(
      isJiraSearchResult({
        issues: [],
        maxResults: 100,
        startAt: '0',
        total: 0,
      }),
    ).toBeFalsy()
  })

  it('rejects pages without an issues array', () => {
    expect(
      isJiraSearchResult({ maxResults: 100, startAt: 0, total: 0, issues: {} }),
    ).toBeFalsy()
  })

  it('rejects non-objects', () => {
    expect(isJiraSearchResult(null)).toBeFalsy()
    expect(isJiraSearchResult([])).toBeFalsy()
  })
})
