import type { JiraClientContext } from '../../types/jira-client-context'

import { JiraRateLimitError } from '../errors/jira-rate-limit-error'

/**
 * Perform a GET request against the Jira REST API with auth.
 *
 * @param context - Client context with base URL and token.
 * @param path - API path beginning with '/'.
 * @param query - Query string parameters.
 * @returns Parsed JSON body.
 * @throws {JiraRateLimitError} When the server answers 429.
 */
export async function makeRequest(
  context: JiraClientContext,
  path: string,
  query: Record<string, string> = {},
): Promise<unknown> {
  let headers: Record<string, string> = {
    'User-Agent': 'release-curator',
    Accept: 'application/json',
  }

  if (context.token) {
    headers['Authorization'] = `Bearer ${context.token}`
  }

  let search = new URLSearchParams(query).toString()
  let url = `${context.baseUrl}${path}${search ? `?${search}` : ''}`

  let response = await fetch(url, { headers })

  if (response.status === 429) {
    let retryAfter = Number.parseInt(
      response.headers.get('retry-after') ?? '',
      10,
    )
    throw new JiraRateLimitError(
      Number.isFinite(retryAfter) ? retryAfter : null,
    )
  }

  if (!response.ok) {
    let error = Object.assign(
      new Error(`Jira API error: ${response.status} ${response.statusText}`),
      { status: response.status },
    )
    throw error
  }

  return response.json()
}
