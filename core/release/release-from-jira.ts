import type { ReleaseContext } from '../../types/release-context'
import type { Version } from '../../types/version'
import type { Release } from '../../types/release'

import { UnknownVersionError } from '../errors/unknown-version-error'
import { isSameVersion } from '../versions/is-same-version'
import { parseVersion } from '../versions/parse-version'
import { createRelease } from './create-release'

/**
 * Look a version up in the tracker and create its release.
 *
 * A version string is resolved against the project's version list, which
 * provides the released flag and date. A `Version` object is used as is.
 *
 * @example
 *
 * ```ts
 * let release = await releaseFromJira('0.17.1', context)
 * release.kind // 'patch'
 * release.branch // 'maint-0.17.x'
 * ```
 *
 * @param version - Version string (e.g., '1.0.0') or parsed version.
 * @param context - Shared collaborators.
 * @returns Classified release.
 * @throws {UnknownVersionError} When the tracker does not list the version.
 */
export async function releaseFromJira(
  version: Version | string,
  context: ReleaseContext,
): Promise<Release> {
  if (typeof version !== 'string') {
    return createRelease(version, context)
  }

  let requested = parseVersion(version)
  let { project } = context.config
  let versions = await context.jira.projectVersions(project)
  let known = versions.find(candidate => isSameVersion(candidate, requested))

  if (!known) {
    throw new UnknownVersionError(version, project)
  }

  return createRelease(known, context)
}
