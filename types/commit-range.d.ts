/** Git revision range, `from..to`, or everything reachable from `to`. */
export interface CommitRange {
  /** Excluded lower boundary; null means no lower boundary. */
  from: string | null

  /** Included upper boundary (tag, branch or hash). */
  to: string
}
