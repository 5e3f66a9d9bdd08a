import type { CommitsToPickOptions } from './commits-to-pick-options'
import type { ReleaseKind } from './release-kind'
import type { Version } from './version'
import type { Commit } from './commit'
import type { Issue } from './issue'

/** Members shared by every kind of release. */
interface ReleaseBase {
  /** Versions of the same line, newest first, used for commit ranges. */
  getSiblings(): Promise<Version[]>

  /** Issues fixed in this version, keyed by issue key. */
  getIssues(): Promise<Map<string, Issue>>

  /** Commits between the previous sibling tag and this release. */
  getCommits(): Promise<Commit[]>

  /** Nearest known release before this one. */
  getPrevious(): Promise<Release>

  /** Nearest known release after this one. */
  getNext(): Promise<Release>

  /** Whether the tracker marks this version as released. */
  readonly isReleased: boolean

  /** Version of the release. */
  readonly version: Version

  /** Kind of release. */
  readonly kind: ReleaseKind

  /** Branch the release is cut from. */
  readonly branch: string

  /** Git tag of the release. */
  readonly tag: string
}

/** Release built on a maintenance branch from cherry-picked commits. */
interface MaintenanceReleaseBase extends ReleaseBase {
  /** Main-line commits to cherry-pick onto the branch, oldest first. */
  getCommitsToPick(options?: CommitsToPickOptions): Promise<Commit[]>
}

/** Major release cut from the main branch. */
export interface MajorRelease extends ReleaseBase {
  readonly kind: 'major'
}

/** Minor release cut from a `maint-X.x.x` branch. */
export interface MinorRelease extends MaintenanceReleaseBase {
  readonly kind: 'minor'
}

/** Patch release cut from a `maint-X.Y.x` branch. */
export interface PatchRelease extends MaintenanceReleaseBase {
  readonly kind: 'patch'
}

/** Minor or patch release. */
export type MaintenanceRelease = MinorRelease | PatchRelease

/** Any release. */
export type Release = MaintenanceRelease | MajorRelease
