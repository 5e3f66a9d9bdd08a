import pc from 'picocolors'

import type { Issue } from '../types/issue'

/** Width of the issue type column. */
const TYPE_WIDTH = 12

/**
 * Print issues ordered by key number.
 *
 * @param issues - Issues of a release.
 */
export function printIssues(issues: Iterable<Issue>): void {
  let sorted = [...issues].toSorted((a, b) =>
    a.project === b.project
      ? a.number - b.number
      : a.project.localeCompare(b.project),
  )

  if (sorted.length === 0) {
    console.info(pc.gray('No issues'))
    return
  }

  for (let issue of sorted) {
    console.info(
      `${pc.cyan(issue.key)} ${pc.gray(issue.type.padEnd(TYPE_WIDTH))} ` +
        issue.summary,
    )
  }
}
