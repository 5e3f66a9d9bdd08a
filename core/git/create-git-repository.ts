import type { GitRepository } from '../../types/git-repository'
import type { CommitRange } from '../../types/commit-range'

import { LOG_FORMAT, parseGitLog } from './parse-git-log'
import { runGit } from './run-git'

/**
 * Create a repository adapter backed by the git command line.
 *
 * @param directory - Path to the working tree.
 * @returns Repository operations bound to the directory.
 */
export function createGitRepository(directory: string): GitRepository {
  return {
    hasRef: async reference => {
      try {
        await runGit(directory, ['rev-parse', '--verify', '--quiet', reference])
        return true
      } catch (error) {
        /** `--verify --quiet` exits with 1 for a missing revision. */
        if (error instanceof Error && 'code' in error && error.code === 1) {
          return false
        }
        throw error
      }
    },
    log: async (range: CommitRange) => {
      let revision = range.from ? `${range.from}..${range.to}` : range.to
      let output = await runGit(directory, [
        'log',
        `--format=${LOG_FORMAT}`,
        revision,
        '--',
      ])
      return parseGitLog(output)
    },
    currentBranch: async () =>
      (await runGit(directory, ['rev-parse', '--abbrev-ref', 'HEAD'])).trim(),
    cherryPick: async hexsha => {
      await runGit(directory, ['cherry-pick', hexsha])
    },
  }
}
