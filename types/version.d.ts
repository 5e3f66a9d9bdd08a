/** A three-part release version with tracker metadata. */
export interface Version {
  /** Release date reported by the tracker (e.g., '2020-07-24'). */
  readonly releaseDate: string | null

  /** Whether the tracker marks this version as released. */
  readonly released: boolean

  /** Major component. */
  readonly major: number

  /** Minor component. */
  readonly minor: number

  /** Patch component. */
  readonly patch: number
}
