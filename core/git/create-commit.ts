import type { RawCommit } from '../../types/raw-commit'
import type { Commit } from '../../types/commit'

import { parseCommitTitle } from '../parsing/parse-commit-title'
import { formatCommitUrl } from './format-commit-url'

/**
 * Wrap a git log entry with its parsed title and web URL.
 *
 * @param raw - Git log entry.
 * @param urlTemplate - Commit URL template with a `{hexsha}` placeholder.
 * @returns Immutable commit.
 */
export function createCommit(raw: RawCommit, urlTemplate: string): Commit {
  return Object.freeze({
    url: formatCommitUrl(urlTemplate, raw.hexsha),
    title: parseCommitTitle(raw.message),
    message: raw.message,
    hexsha: raw.hexsha,
  })
}
