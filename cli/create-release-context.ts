import path from 'node:path'

import type { ReleaseContext } from '../types/release-context'

import { resolveReleaseConfig } from '../core/config/resolve-release-config'
import { createGitRepository } from '../core/git/create-git-repository'
import { createJiraClient } from '../core/api/create-jira-client'

/** Options shared by every command. */
export interface GlobalOptions {
  /** Jira server URL override. */
  jiraUrl?: string

  /** Jira project key override. */
  project?: string

  /** Path to the git working tree (default: current directory). */
  repo?: string
}

/**
 * Build the collaborators for the repository named on the command line.
 *
 * @param options - Global CLI options.
 * @returns Release context.
 */
export async function createReleaseContext(
  options: GlobalOptions,
): Promise<ReleaseContext> {
  let directory = path.resolve(options.repo ?? process.cwd())
  let config = await resolveReleaseConfig(directory, {
    jiraUrl: options.jiraUrl,
    project: options.project,
  })

  return {
    jira: createJiraClient({
      baseUrl: config.jiraUrl,
      directory,
    }),
    repo: createGitRepository(directory),
    config,
  }
}
