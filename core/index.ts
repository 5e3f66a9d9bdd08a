export type {
  MaintenanceRelease,
  MajorRelease,
  MinorRelease,
  PatchRelease,
  Release,
} from '../types/release'
export type { CommitsToPickOptions } from '../types/commits-to-pick-options'
export type { ReleaseContext } from '../types/release-context'
export type { GitRepository } from '../types/git-repository'
export type { ReleaseConfig } from '../types/release-config'
export type { CommitTitle } from '../types/commit-title'
export type { ReleaseKind } from '../types/release-kind'
export type { CommitRange } from '../types/commit-range'
export type { JiraClient } from '../types/jira-client'
export type { RawCommit } from '../types/raw-commit'
export type { Version } from '../types/version'
export type { Commit } from '../types/commit'
export type { Issue } from '../types/issue'

export { NoUpcomingReleaseError } from './errors/no-upcoming-release-error'
export { NoPreviousReleaseError } from './errors/no-previous-release-error'
export { DEFAULT_RELEASE_CONFIG } from './config/default-release-config'
export { resolveReleaseConfig } from './config/resolve-release-config'
export { selectCommitsToPick } from './release/select-commits-to-pick'
export { getSiblingVersions } from './release/get-sibling-versions'
export { findPreviousVersion } from './release/find-previous-version'
export { UnknownVersionError } from './errors/unknown-version-error'
export { JiraRateLimitError } from './errors/jira-rate-limit-error'
export { createGitRepository } from './git/create-git-repository'
export { parseCommitTitle } from './parsing/parse-commit-title'
export { findNextVersion } from './release/find-next-version'
export { releaseFromJira } from './release/release-from-jira'
export { classifyVersion } from './release/classify-version'
export { getReleaseBranch } from './release/get-release-branch'
export { createJiraClient } from './api/create-jira-client'
export { compareVersions } from './versions/compare-versions'
export { createRelease } from './release/create-release'
export { getReleaseTag } from './release/get-release-tag'
export { isSameVersion } from './versions/is-same-version'
export { formatVersion } from './versions/format-version'
export { issueFromJira } from './issues/issue-from-jira'
export { parseVersion } from './versions/parse-version'
export { sortVersions } from './versions/sort-versions'
export { createIssue } from './issues/create-issue'
export { createCommit } from './git/create-commit'
export { ParseError } from './errors/parse-error'
