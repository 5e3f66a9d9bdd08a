import pc from 'picocolors'

import type { Commit } from '../types/commit'

import { formatCommitLine } from '../core/interactive/format-commit-line'

/**
 * Print one line per commit.
 *
 * @param commits - Commits to print, in the given order.
 * @param options - Output options.
 * @param options.urls - Append the web URL of each commit.
 */
export function printCommits(
  commits: Commit[],
  options: { urls?: boolean } = {},
): void {
  if (commits.length === 0) {
    console.info(pc.gray('No commits'))
    return
  }

  for (let commit of commits) {
    let line = formatCommitLine(commit)
    console.info(options.urls ? `${line} ${pc.gray(commit.url)}` : line)
  }
}
