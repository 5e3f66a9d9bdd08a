import type { CommitTitle } from '../../types/commit-title'

/** One or more `[Tag]` groups, optionally separated by whitespace. */
const COMPONENTS = String.raw`(?<components>(?:\[[^\]]+\]\s*)+)`

/** `KEY-123: [A][B] summary` or `KEY-123 [A][B] summary`. */
const TITLE_WITH_ISSUE = new RegExp(
  String.raw`^(?<issue>(?<project>[A-Z][\dA-Z_]*)-\d+)(?::\s*|\s+)` +
    COMPONENTS +
    String.raw`(?<summary>.*)$`,
  'u',
)

/** `[A][B] summary`. */
const TITLE_WITHOUT_ISSUE = new RegExp(
  String.raw`^\s*${COMPONENTS}(?<summary>.*)$`,
  'u',
)

/**
 * Parses the first line of a commit message into issue key, component tags and
 * summary.
 *
 * @example
 *
 * ```ts
 * parseCommitTitle('ARROW-9598: [C++][Parquet] Fix writing nullable structs')
 * // {
 * //   project: 'ARROW',
 * //   issue: 'ARROW-9598',
 * //   components: ['C++', 'Parquet'],
 * //   summary: 'Fix writing nullable structs',
 * // }
 * ```
 *
 * Titles that match no known shape keep the whole first line as summary with
 * no components and no issue.
 *
 * @param message - Full commit message.
 * @returns Parsed title.
 */
export function parseCommitTitle(message: string): CommitTitle {
  let [firstLine = ''] = message.split(/\r?\n/u, 1)

  let match =
    TITLE_WITH_ISSUE.exec(firstLine) ?? TITLE_WITHOUT_ISSUE.exec(firstLine)
  let groups = match?.groups

  if (!groups) {
    return {
      summary: firstLine.trim(),
      components: [],
      project: null,
      issue: null,
    }
  }

  return {
    components: extractComponents(groups['components'] ?? ''),
    summary: (groups['summary'] ?? '').trim(),
    project: groups['project'] ?? null,
    issue: groups['issue'] ?? null,
  }
}

/**
 * Collect bracket contents in order of appearance.
 *
 * @param run - Bracket run such as `[C++][Dataset] `.
 * @returns Tags without brackets.
 */
function extractComponents(run: string): string[] {
  return [...run.matchAll(/\[(?<tag>[^\]]+)\]/gu)].map(
    tagMatch => tagMatch.groups?.['tag'] ?? '',
  )
}
