import type { RawCommit } from '../../types/raw-commit'

/** Separates the fields of one log entry. */
export const FIELD_SEPARATOR = '\u001F'

/** Terminates each log entry. */
export const RECORD_SEPARATOR = '\u001E'

/** Format passed to `git log --format`, matching the separators above. */
export const LOG_FORMAT = '%H%x1f%P%x1f%B%x1e'

/**
 * Parse the output of `git log --format=%H%x1f%P%x1f%B%x1e`.
 *
 * @param output - Raw stdout of git log.
 * @returns Commits in log order.
 */
export function parseGitLog(output: string): RawCommit[] {
  let commits: RawCommit[] = []

  for (let record of output.split(RECORD_SEPARATOR)) {
    let entry = record.replace(/^\n/u, '')
    if (entry.trim() === '') {
      continue
    }

    let [hexsha = '', parents = '', ...rest] = entry.split(FIELD_SEPARATOR)
    commits.push({
      message: rest.join(FIELD_SEPARATOR).replace(/\n+$/u, ''),
      parents: parents.split(' ').filter(Boolean),
      hexsha: hexsha.trim(),
    })
  }

  return commits
}
