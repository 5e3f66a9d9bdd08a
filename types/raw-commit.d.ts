/** A single entry of the git log. */
export interface RawCommit {
  /** Parent commit hashes. */
  parents: string[]

  /** Full commit message. */
  message: string

  /** Full commit hash. */
  hexsha: string
}
