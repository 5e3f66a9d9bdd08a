import type { JiraSearchResult } from '../../../types/jira-search-result'

/**
 * Checks if the given value is a page of Jira search results.
 *
 * Individual issues are validated separately.
 *
 * @param value - Value to check.
 * @returns True if the value has pagination fields and an issues array.
 */
export function isJiraSearchResult(value: unknown): value is JiraSearchResult {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }

  let page = value as Record<string, unknown>

  return (
    Array.isArray(page['issues']) &&
    typeof page['startAt'] === 'number' &&
    typeof page['maxResults'] === 'number' &&
    typeof page['total'] === 'number'
  )
}
