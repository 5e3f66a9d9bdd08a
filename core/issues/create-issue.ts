import type { Issue } from '../../types/issue'

import { parseIssueKey } from './parse-issue-key'

/**
 * Create an issue, deriving its project and number from the key.
 *
 * @param fields - Issue fields.
 * @param fields.key - Issue key (e.g., 'PARQUET-1111').
 * @param fields.type - Issue type name.
 * @param fields.summary - Issue summary.
 * @returns Immutable issue.
 */
export function createIssue(fields: {
  summary: string
  type: string
  key: string
}): Issue {
  let { summary, type, key } = fields
  let { project, number } = parseIssueKey(key)

  return Object.freeze({ summary, project, number, type, key })
}
