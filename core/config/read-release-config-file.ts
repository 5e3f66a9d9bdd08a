import { readFile } from 'node:fs/promises'
import { parse } from 'yaml'

import type { ReleaseConfigFile } from '../../types/release-config-file'

import { isReleaseConfigFile } from '../schema/config/is-release-config-file'

/**
 * Read and validate a YAML configuration file.
 *
 * @param filePath - Path to the file.
 * @returns Parsed configuration, or an empty object when the file is missing
 *   or empty.
 * @throws {Error} When the file is not a mapping of known string keys.
 */
export async function readReleaseConfigFile(
  filePath: string,
): Promise<ReleaseConfigFile> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (error) {
    if (
      error instanceof Error &&
      'code' in error &&
      error.code === 'ENOENT'
    ) {
      return {}
    }
    throw error
  }

  let data: unknown = parse(content)
  if (data === null || data === undefined) {
    return {}
  }

  if (!isReleaseConfigFile(data)) {
    throw new Error(
      `Invalid configuration in ${filePath}: expected string values for ` +
        'project, tagPrefix, mainBranch, jiraUrl or commitUrl',
    )
  }

  return data
}
