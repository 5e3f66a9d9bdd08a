import pc from 'picocolors'

import type { Release } from '../types/release'

import { NoPreviousReleaseError } from '../core/errors/no-previous-release-error'
import { NoUpcomingReleaseError } from '../core/errors/no-upcoming-release-error'
import { formatVersion } from '../core/versions/format-version'

/** Width of the label column. */
const LABEL_WIDTH = 10

/**
 * Print the classification and neighbours of a release.
 *
 * A missing previous or next release is shown as "none".
 *
 * @param release - Release to describe.
 */
export async function printReleaseInfo(release: Release): Promise<void> {
  let previous = await describeNeighbour(() => release.getPrevious())
  let next = await describeNeighbour(() => release.getNext())

  let rows: [string, string][] = [
    ['Version', formatVersion(release.version)],
    ['Kind', release.kind],
    ['Branch', release.branch],
    ['Tag', release.tag],
    ['Released', release.isReleased ? pc.green('yes') : pc.yellow('no')],
    ['Previous', previous],
    ['Next', next],
  ]

  for (let [label, value] of rows) {
    console.info(`${pc.gray(label.padEnd(LABEL_WIDTH))}${value}`)
  }
}

/**
 * Resolve a neighbouring release to its version string.
 *
 * @param getRelease - Accessor of the neighbour.
 * @returns Version string, or a grey "none" at either end of the list.
 */
async function describeNeighbour(
  getRelease: () => Promise<Release>,
): Promise<string> {
  try {
    let neighbour = await getRelease()
    return `${formatVersion(neighbour.version)} ${pc.gray(`(${neighbour.kind})`)}`
  } catch (error) {
    if (
      error instanceof NoUpcomingReleaseError ||
      error instanceof NoPreviousReleaseError
    ) {
      return pc.gray('none')
    }
    throw error
  }
}
