import type { ReleaseConfig } from '../../types/release-config'

/** Configuration used when neither a file nor a flag overrides a key. */
export const DEFAULT_RELEASE_CONFIG: Readonly<ReleaseConfig> = Object.freeze({
  commitUrl: 'https://github.com/apache/arrow/commit/{hexsha}',
  jiraUrl: 'https://issues.apache.org/jira',
  tagPrefix: 'apache-arrow-',
  mainBranch: 'master',
  project: 'ARROW',
})
