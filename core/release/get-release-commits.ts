import pc from 'picocolors'

import type { ReleaseContext } from '../../types/release-context'
import type { Release } from '../../types/release'
import type { Commit } from '../../types/commit'

import { findPreviousVersion } from './find-previous-version'
import { createCommit } from '../git/create-commit'
import { getReleaseTag } from './get-release-tag'

/**
 * Collect the commits that make up a release.
 *
 * The range starts after the tag of the previous sibling release and ends at
 * the release tag once released, or at the release branch before that. An
 * unreleased version without a branch has no commits yet.
 *
 * @param release - Release to collect commits for.
 * @param context - Shared collaborators.
 * @returns Commits in git log order.
 */
export async function getReleaseCommits(
  release: Pick<
    Release,
    'getSiblings' | 'isReleased' | 'version' | 'branch' | 'tag'
  >,
  context: ReleaseContext,
): Promise<Commit[]> {
  let { config, repo } = context

  let upper: string
  if (release.isReleased) {
    upper = release.tag
  } else if (await repo.hasRef(release.branch)) {
    upper = release.branch
  } else {
    console.warn(
      pc.yellow(`Release branch \`${release.branch}\` doesn't exist`),
    )
    return []
  }

  let previous = findPreviousVersion(
    await release.getSiblings(),
    release.version,
  )
  let lower = previous ? getReleaseTag(previous, config.tagPrefix) : null

  let entries = await repo.log({ from: lower, to: upper })
  return entries.map(entry => createCommit(entry, config.commitUrl))
}
