/** Options for selecting commits to cherry-pick. */
export interface CommitsToPickOptions {
  /**
   * Drop commits whose issue already has a commit on the maintenance branch.
   * Defaults to true.
   */
  excludeAlreadyApplied?: boolean
}
