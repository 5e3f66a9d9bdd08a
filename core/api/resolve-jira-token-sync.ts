import { readFileSync } from 'node:fs'
import { join } from 'node:path'

/**
 * Resolve a Jira API token from multiple sources with descending priority.
 *
 * Priority:
 *
 * 1. Env JIRA_TOKEN
 * 2. Env JIRA_API_TOKEN
 * 3. `token` key of the `[jira]` section in .git/config.
 *
 * Anonymous access works for public trackers, so a missing token is not an
 * error.
 *
 * @param directory - Working tree holding the .git directory.
 * @returns Token string or undefined when not found.
 */
export function resolveJiraTokenSync(
  directory: string = process.cwd(),
): undefined | string {
  for (let name of ['JIRA_TOKEN', 'JIRA_API_TOKEN']) {
    let value = process.env[name]?.trim()
    if (value) {
      return value
    }
  }

  let content: string
  try {
    content = readFileSync(join(directory, '.git', 'config'), 'utf8')
  } catch {
    /** No git config, anonymous access. */
    return undefined
  }

  let currentSection: string | null = null
  for (let rawLine of content.split(/\r?\n/u)) {
    let line = rawLine.trim()
    let sectionMatch = line.match(/^\[(?<name>[^\]]+)\]$/u)
    if (sectionMatch?.groups) {
      currentSection = (sectionMatch.groups['name'] ?? '').toLowerCase()
      continue
    }

    if (currentSection === 'jira') {
      let tokenMatch = line.match(/^token\s*=\s*(?<val>\S[^\n\r]*)$/u)
      let token = tokenMatch?.groups?.['val']?.trim()
      if (token) {
        return token
      }
    }
  }

  return undefined
}
