import pc from 'picocolors'

import { JiraRateLimitError } from '../core/errors/jira-rate-limit-error'

/**
 * Print an error raised by a command.
 *
 * @param error - Caught value.
 */
export function printError(error: unknown): void {
  if (error instanceof JiraRateLimitError) {
    console.error(pc.yellow('\n⚠️ Rate Limit Exceeded\n'))
    console.error(error.message)
    console.error(pc.gray('\nExample: JIRA_TOKEN=<token> release-curator\n'))
    return
  }

  console.error(
    pc.redBright('\nError:'),
    error instanceof Error ? error.message : String(error),
  )
}
