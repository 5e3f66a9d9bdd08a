import type { JiraClientContext } from '../../types/jira-client-context'
import type { JiraClient } from '../../types/jira-client'

import { resolveJiraTokenSync } from './resolve-jira-token-sync'
import { getProjectVersions } from './get-project-versions'
import { getProjectIssues } from './get-project-issues'

/**
 * Create a functional Jira API client with internal caches.
 *
 * @param options - Client options.
 * @param options.baseUrl - Jira server URL.
 * @param options.token - Optional token override.
 * @param options.directory - Working tree searched for a token when none is
 *   given.
 * @returns Client with bound methods.
 */
export function createJiraClient(options: {
  directory?: string
  token?: string
  baseUrl: string
}): JiraClient {
  let context: JiraClientContext = {
    caches: {
      versions: new Map(),
      issues: new Map(),
    },
    token: options.token ?? resolveJiraTokenSync(options.directory),
    baseUrl: options.baseUrl.replace(/\/+$/u, ''),
  }

  return {
    projectIssues: (version, project) =>
      getProjectIssues(context, { version, project }),
    projectVersions: project => getProjectVersions(context, project),
  }
}
