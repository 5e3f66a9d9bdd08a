import type { CommitsToPickOptions } from '../../types/commits-to-pick-options'
import type { ReleaseContext } from '../../types/release-context'
import type { Version } from '../../types/version'
import type {
  MaintenanceRelease,
  MajorRelease,
  Release,
} from '../../types/release'
import type { Commit } from '../../types/commit'
import type { Issue } from '../../types/issue'

import { NoPreviousReleaseError } from '../errors/no-previous-release-error'
import { NoUpcomingReleaseError } from '../errors/no-upcoming-release-error'
import { getSiblingVersions } from './get-sibling-versions'
import { findPreviousVersion } from './find-previous-version'
import { getReleaseCommits } from './get-release-commits'
import { getCommitsToPick } from './get-commits-to-pick'
import { getReleaseBranch } from './get-release-branch'
import { findNextVersion } from './find-next-version'
import { classifyVersion } from './classify-version'
import { getReleaseTag } from './get-release-tag'
import { memoize } from '../utils/memoize'

/**
 * Create a release for a version, classified by its number.
 *
 * Derived values (neighbours, issues, commits) are fetched on first access and
 * cached on the returned object.
 *
 * @param version - Version as reported by the tracker.
 * @param context - Shared collaborators.
 * @returns Major, minor or patch release.
 */
export function createRelease(
  version: Version,
  context: ReleaseContext,
): Release {
  let { config, jira } = context
  let kind = classifyVersion(version)

  let getVersions = (): Promise<Version[]> =>
    jira.projectVersions(config.project)

  let base = {
    getPrevious: memoize(async (): Promise<Release> => {
      let previous = findPreviousVersion(await getVersions(), version)
      if (!previous) {
        throw new NoPreviousReleaseError(version)
      }
      return createRelease(previous, context)
    }),
    getNext: memoize(async (): Promise<Release> => {
      let next = findNextVersion(await getVersions(), version)
      if (!next) {
        throw new NoUpcomingReleaseError(version)
      }
      return createRelease(next, context)
    }),
    getIssues: memoize(async (): Promise<Map<string, Issue>> => {
      let issues = await jira.projectIssues(version, config.project)
      return new Map(issues.map(issue => [issue.key, issue]))
    }),
    getSiblings: memoize(async () =>
      getSiblingVersions(await getVersions(), kind),
    ),
    branch: getReleaseBranch(version, config.mainBranch),
    tag: getReleaseTag(version, config.tagPrefix),
    isReleased: version.released,
    version,
  }

  if (kind === 'major') {
    let release: MajorRelease = {
      ...base,
      getCommits: memoize(() => getReleaseCommits(release, context)),
      kind,
    }
    return release
  }

  let picks = new Map<boolean, Promise<Commit[]>>()
  let release: MaintenanceRelease = {
    ...base,
    getCommitsToPick: (options: CommitsToPickOptions = {}) => {
      let { excludeAlreadyApplied = true } = options
      let cached = picks.get(excludeAlreadyApplied)
      if (!cached) {
        cached = getCommitsToPick(release, context, { excludeAlreadyApplied })
        picks.set(excludeAlreadyApplied, cached)
      }
      return cached
    },
    getCommits: memoize(() => getReleaseCommits(release, context)),
    kind,
  }
  return release
}
