import type { Commit } from '../../types/commit'

/**
 * Choose main-line commits that belong to a maintenance release.
 *
 * Cherry-picks change the hash, so commits already on the maintenance branch
 * are recognized by issue key.
 *
 * @param parameters - Selection input.
 * @param parameters.mainline - Main-line commits, newest first.
 * @param parameters.issueKeys - Issues fixed in the release.
 * @param parameters.applied - Commits already on the maintenance branch.
 * @returns Commits to cherry-pick, oldest first.
 */
export function selectCommitsToPick(parameters: {
  issueKeys: ReadonlySet<string> | ReadonlyMap<string, unknown>
  applied: readonly Commit[]
  mainline: readonly Commit[]
}): Commit[] {
  let { issueKeys, mainline, applied } = parameters

  let appliedIssues = new Set<string>()
  for (let commit of applied) {
    if (commit.title.issue !== null) {
      appliedIssues.add(commit.title.issue)
    }
  }

  return mainline
    .filter(commit => {
      let { issue } = commit.title
      return issue !== null && issueKeys.has(issue) && !appliedIssues.has(issue)
    })
    .toReversed()
}
