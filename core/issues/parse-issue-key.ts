import { ParseError } from '../errors/parse-error'

/**
 * Split an issue key into its project prefix and number.
 *
 * @param key - Issue key (e.g., 'ARROW-1234').
 * @returns Project and number.
 * @throws {ParseError} When the key has no `-` or the suffix is not numeric.
 */
export function parseIssueKey(key: string): {
  project: string
  number: number
} {
  let separator = key.indexOf('-')
  if (separator === -1) {
    throw new ParseError(`Issue key "${key}" has no project prefix`)
  }

  let project = key.slice(0, separator)
  let suffix = key.slice(separator + 1)
  if (!/^\d+$/u.test(suffix)) {
    throw new ParseError(`Issue key "${key}" has no numeric suffix`)
  }

  return { number: Number.parseInt(suffix, 10), project }
}
