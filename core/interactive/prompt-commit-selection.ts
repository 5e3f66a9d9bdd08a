import enquirer from 'enquirer'
import pc from 'picocolors'

import type { Commit } from '../../types/commit'

import { formatCommitLine } from './format-commit-line'

/** Result shape returned by enquirer for the multiselect prompt. */
interface PromptResult {
  /** Names of the selected choices (commit indexes as strings). */
  selected: string[]
}

/**
 * Ask which commits to cherry-pick. Every commit starts selected.
 *
 * @param commits - Candidate commits, oldest first.
 * @returns Selected commits in their original order, or null when nothing was
 *   selected or the prompt was cancelled.
 */
export async function promptCommitSelection(
  commits: Commit[],
): Promise<Commit[] | null> {
  if (commits.length === 0) {
    return null
  }

  try {
    let { selected } = await enquirer.prompt<PromptResult>({
      message:
        'Choose which commits to cherry-pick ' +
        `(Press ${pc.cyan('<space>')} to select, ` +
        `${pc.cyan('<a>')} to toggle all)`,
      choices: commits.map((commit, index) => ({
        message: formatCommitLine(commit),
        name: String(index),
        enabled: true,
      })),
      type: 'multiselect',
      name: 'selected',
    })

    let indexes = new Set(selected.map(name => Number.parseInt(name, 10)))
    let result = commits.filter((_commit, index) => indexes.has(index))

    if (result.length === 0) {
      console.info(pc.yellow('\nNo commits selected'))
      return null
    }

    return result
  } catch (error) {
    /** Enquirer rejects with an empty value when the user presses Ctrl-C. */
    if (
      !error ||
      (error instanceof Error && error.message.includes('cancelled'))
    ) {
      console.info(pc.gray('\nSelection cancelled'))
      return null
    }

    throw error
  }
}
