import path from 'node:path'

import type { ReleaseConfigFile } from '../../types/release-config-file'
import type { ReleaseConfig } from '../../types/release-config'

import { readReleaseConfigFile } from './read-release-config-file'
import { DEFAULT_RELEASE_CONFIG } from './default-release-config'
import { CONFIG_FILE_NAME } from '../constants'

/**
 * Merge defaults, the configuration file and explicit overrides.
 *
 * Later sources win; undefined overrides are ignored.
 *
 * @param directory - Directory holding `.release-curator.yml`.
 * @param overrides - Values from the command line.
 * @returns Complete configuration.
 */
export async function resolveReleaseConfig(
  directory: string,
  overrides: ReleaseConfigFile = {},
): Promise<ReleaseConfig> {
  let fromFile = await readReleaseConfigFile(
    path.join(directory, CONFIG_FILE_NAME),
  )

  let config: ReleaseConfig = { ...DEFAULT_RELEASE_CONFIG, ...fromFile }
  for (let [key, value] of Object.entries(overrides)) {
    if (value !== undefined && isConfigKey(key)) {
      config[key] = value
    }
  }
  return config
}

/**
 * Narrow an object key to a configuration key.
 *
 * @param key - Key to check.
 * @returns True when the key names a configuration field.
 */
function isConfigKey(key: string): key is keyof ReleaseConfig {
  return key in DEFAULT_RELEASE_CONFIG
}
