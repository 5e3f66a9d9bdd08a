import pc from 'picocolors'

import type { Commit } from '../../types/commit'

/** Number of hash characters shown. */
const SHORT_SHA_LENGTH = 10

/**
 * Render a commit as one line: short hash, issue key and first message line.
 *
 * @param commit - Commit to render.
 * @returns Coloured line.
 */
export function formatCommitLine(commit: Commit): string {
  let [firstLine = ''] = commit.message.split(/\r?\n/u, 1)
  let sha = pc.gray(commit.hexsha.slice(0, SHORT_SHA_LENGTH))
  let issue = commit.title.issue ? pc.cyan(commit.title.issue) : pc.gray('–')
  let summary = firstLine.trim()
  return `${sha} ${issue} ${summary}`
}
