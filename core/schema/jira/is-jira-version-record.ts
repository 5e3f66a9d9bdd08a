import type { JiraVersionRecord } from '../../../types/jira-version-record'

/**
 * Checks if the given value is a Jira project version record.
 *
 * @param value - Value to check.
 * @returns True if the value has a name, a released flag and an optional
 *   release date.
 */
export function isJiraVersionRecord(
  value: unknown,
): value is JiraVersionRecord {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }

  let record = value as Record<string, unknown>

  return (
    typeof record['name'] === 'string' &&
    typeof record['released'] === 'boolean' &&
    (record['releaseDate'] === undefined ||
      typeof record['releaseDate'] === 'string')
  )
}
