/** Issue tracker ticket identified by a project-prefixed key. */
export interface Issue {
  /** Issue summary (title). */
  readonly summary: string

  /** Project prefix of the key (e.g., 'ARROW'). */
  readonly project: string

  /** Numeric suffix of the key. */
  readonly number: number

  /** Issue type name (e.g., 'Bug', 'Improvement'). */
  readonly type: string

  /** Full issue key (e.g., 'ARROW-1234'). */
  readonly key: string
}
