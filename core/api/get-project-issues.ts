import type { JiraClientContext } from '../../types/jira-client-context'
import type { Version } from '../../types/version'
import type { Issue } from '../../types/issue'

import { isJiraSearchResult } from '../schema/jira/is-jira-search-result'
import { formatVersion } from '../versions/format-version'
import { issueFromJira } from '../issues/issue-from-jira'
import { makeRequest } from './make-request'

/** Page size requested from the search endpoint. */
const PAGE_SIZE = 100

/**
 * List every issue of a project whose fix version is `version`.
 *
 * Follows search pagination until the reported total is reached.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.version - Fix version.
 * @param parameters.project - Project key.
 * @returns Issues in the order Jira returns them.
 */
export async function getProjectIssues(
  context: JiraClientContext,
  parameters: { version: Version | string; project: string },
): Promise<Issue[]> {
  let { version, project } = parameters
  let versionName =
    typeof version === 'string' ? version : formatVersion(version)
  let cacheKey = `${project}@${versionName}`

  let cached = context.caches.issues.get(cacheKey)
  if (cached) {
    return cached
  }

  let issues: Issue[] = []
  let startAt = 0

  for (;;) {
    let page = await makeRequest(context, '/rest/api/2/search', {
      jql: `project=${project} AND fixVersion="${versionName}"`,
      maxResults: String(PAGE_SIZE),
      fields: 'summary,issuetype',
      startAt: String(startAt),
    })
    if (!isJiraSearchResult(page)) {
      throw new TypeError(`Unexpected search payload for ${cacheKey}`)
    }

    issues.push(...page.issues.map(issueFromJira))
    startAt = page.startAt + page.issues.length

    if (page.issues.length === 0 || startAt >= page.total) {
      break
    }
  }

  context.caches.issues.set(cacheKey, issues)
  return issues
}
