import type { CommitTitle } from './commit-title'

/** Commit with its parsed title and a link to its web page. */
export interface Commit {
  /** Parsed first line of the message. */
  readonly title: CommitTitle

  /** Full commit message. */
  readonly message: string

  /** Full commit hash. */
  readonly hexsha: string

  /** Web URL of the commit. */
  readonly url: string
}
