import pc from 'picocolors'

import type { GitRepository } from '../types/git-repository'
import type { Commit } from '../types/commit'

import { formatCommitLine } from '../core/interactive/format-commit-line'

/**
 * Cherry-pick commits, in order, onto the release branch.
 *
 * Stops at the first failing pick so the user can resolve the conflict.
 *
 * @param repo - Repository to apply the commits in.
 * @param commits - Commits to apply, oldest first.
 * @param branch - Branch that must be checked out.
 * @throws {Error} When another branch is checked out.
 */
export async function applyCherryPicks(
  repo: GitRepository,
  commits: Commit[],
  branch: string,
): Promise<void> {
  let current = await repo.currentBranch()
  if (current !== branch) {
    throw new Error(
      `Check out ${branch} before cherry-picking (currently on ${current})`,
    )
  }

  for (let commit of commits) {
    await repo.cherryPick(commit.hexsha)
    console.info(`${pc.green('✓')} ${formatCommitLine(commit)}`)
  }
}
