import type { CommitRange } from './commit-range'
import type { RawCommit } from './raw-commit'

/**
 * Version-control operations needed to collect and apply release commits.
 *
 * All methods reject with the underlying git error.
 */
export interface GitRepository {
  /** List commits of a range in git log order (newest first). */
  log(range: CommitRange): Promise<RawCommit[]>

  /** Whether a branch, tag or other revision exists. */
  hasRef(reference: string): Promise<boolean>

  /** Apply a commit on top of the current branch. */
  cherryPick(hexsha: string): Promise<void>

  /** Name of the checked out branch. */
  currentBranch(): Promise<string>
}
