import type { JiraIssueRecord } from '../../../types/jira-issue-record'

/**
 * Checks if the given value is a Jira issue record with the fields we read.
 *
 * @param value - Value to check.
 * @returns True if the value has a key, an issue type name and a summary.
 */
export function isJiraIssueRecord(value: unknown): value is JiraIssueRecord {
  if (!isObject(value) || typeof value['key'] !== 'string') {
    return false
  }

  let { fields } = value
  if (!isObject(fields) || typeof fields['summary'] !== 'string') {
    return false
  }

  let { issuetype: issueType } = fields
  return isObject(issueType) && typeof issueType['name'] === 'string'
}

/**
 * Checks if the value is a non-null, non-array object.
 *
 * @param value - Value to check.
 * @returns True for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
