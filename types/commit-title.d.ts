/** Structured form of the first line of a commit message. */
export interface CommitTitle {
  /** Component tags in order of appearance (e.g., ['C++', 'Parquet']). */
  readonly components: readonly string[]

  /** Project prefix of the issue key, null when the title has none. */
  readonly project: string | null

  /** Issue key (e.g., 'ARROW-9598'), null when the title has none. */
  readonly issue: string | null

  /** Remaining text of the first line. */
  readonly summary: string
}
