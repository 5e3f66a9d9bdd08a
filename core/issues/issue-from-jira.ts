import type { Issue } from '../../types/issue'

import { isJiraIssueRecord } from '../schema/jira/is-jira-issue-record'
import { ParseError } from '../errors/parse-error'
import { createIssue } from './create-issue'

/**
 * Build an issue from a raw Jira record.
 *
 * Reads `key`, `fields.issuetype.name` and `fields.summary`.
 *
 * @param record - Raw record from the Jira REST API.
 * @returns Parsed issue.
 * @throws {ParseError} When a required field is missing or mistyped.
 */
export function issueFromJira(record: unknown): Issue {
  if (!isJiraIssueRecord(record)) {
    throw new ParseError(
      `Invalid Jira issue record ${describeRecord(record)}: expected key, ` +
        'fields.issuetype.name and fields.summary',
    )
  }

  return createIssue({
    type: record.fields.issuetype.name,
    summary: record.fields.summary,
    key: record.key,
  })
}

/**
 * Short label for a rejected record.
 *
 * @param record - Rejected record.
 * @returns The record key when present, otherwise its type.
 */
function describeRecord(record: unknown): string {
  if (
    typeof record === 'object' &&
    record !== null &&
    'key' in record &&
    typeof record.key === 'string'
  ) {
    return `"${record.key}"`
  }
  return `(${record === null ? 'null' : typeof record})`
}
