import type { ReleaseConfigFile } from '../../../types/release-config-file'

/** Keys accepted in the configuration file. */
const KNOWN_KEYS = new Set([
  'mainBranch',
  'tagPrefix',
  'commitUrl',
  'jiraUrl',
  'project',
])

/**
 * Type guard for the parsed configuration file.
 *
 * Every key is optional but must hold a string when present.
 *
 * @param value - Parsed YAML document.
 * @returns True if the value is a valid configuration object.
 */
export function isReleaseConfigFile(
  value: unknown,
): value is ReleaseConfigFile {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false
  }

  return Object.entries(value).every(
    ([key, entry]) => KNOWN_KEYS.has(key) && typeof entry === 'string',
  )
}
