import type { JiraClientContext } from '../../types/jira-client-context'
import type { Version } from '../../types/version'

import { isJiraVersionRecord } from '../schema/jira/is-jira-version-record'
import { parseVersion } from '../versions/parse-version'
import { sortVersions } from '../versions/sort-versions'
import { ParseError } from '../errors/parse-error'
import { makeRequest } from './make-request'

/**
 * List the versions of a Jira project, newest first.
 *
 * Versions whose name is not a three-part version (e.g., 'JS-0.4.0') are
 * skipped.
 *
 * @param context - Client context.
 * @param project - Project key.
 * @returns Sorted versions with release flags and dates.
 */
export async function getProjectVersions(
  context: JiraClientContext,
  project: string,
): Promise<Version[]> {
  let cached = context.caches.versions.get(project)
  if (cached) {
    return cached
  }

  let data = await makeRequest(
    context,
    `/rest/api/2/project/${encodeURIComponent(project)}/versions`,
  )
  if (!Array.isArray(data)) {
    throw new TypeError(`Unexpected versions payload for project ${project}`)
  }

  let versions: Version[] = []
  for (let record of data) {
    if (!isJiraVersionRecord(record)) {
      throw new TypeError(`Unexpected version record in project ${project}`)
    }
    try {
      versions.push(
        parseVersion(record.name, {
          releaseDate: record.releaseDate ?? null,
          released: record.released,
        }),
      )
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error
      }
      /** Not a release version of the main line, skip it. */
    }
  }

  let sorted = sortVersions(versions)
  context.caches.versions.set(project, sorted)
  return sorted
}
