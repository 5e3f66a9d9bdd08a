import type { CommitsToPickOptions } from '../../types/commits-to-pick-options'
import type { MaintenanceRelease } from '../../types/release'
import type { ReleaseContext } from '../../types/release-context'
import type { Commit } from '../../types/commit'

import { selectCommitsToPick } from './select-commits-to-pick'
import { parseVersion } from '../versions/parse-version'
import { createCommit } from '../git/create-commit'
import { getReleaseTag } from './get-release-tag'

/**
 * Main-line commits to cherry-pick onto a maintenance branch.
 *
 * Scans the main branch from the root of the maintenance line: the `X.0.0`
 * tag, or `0.Y.0` before 1.0.
 *
 * @param release - Minor or patch release.
 * @param context - Shared collaborators.
 * @param options - Selection options.
 * @returns Commits to pick, oldest first.
 */
export async function getCommitsToPick(
  release: Pick<MaintenanceRelease, 'getCommits' | 'getIssues' | 'version'>,
  context: ReleaseContext,
  options: CommitsToPickOptions = {},
): Promise<Commit[]> {
  let { excludeAlreadyApplied = true } = options
  let { config, repo } = context
  let { major, minor } = release.version

  let root = parseVersion(major === 0 ? `0.${minor}.0` : `${major}.0.0`)
  let entries = await repo.log({
    from: getReleaseTag(root, config.tagPrefix),
    to: config.mainBranch,
  })

  return selectCommitsToPick({
    mainline: entries.map(entry => createCommit(entry, config.commitUrl)),
    applied: excludeAlreadyApplied ? await release.getCommits() : [],
    issueKeys: await release.getIssues(),
  })
}
