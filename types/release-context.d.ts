import type { GitRepository } from './git-repository'
import type { ReleaseConfig } from './release-config'
import type { JiraClient } from './jira-client'

/** Collaborators shared by every release created from the same source. */
export interface ReleaseContext {
  /** Project constants. */
  config: ReleaseConfig

  /** Repository to read commits from. */
  repo: GitRepository

  /** Issue tracker client. */
  jira: JiraClient
}
