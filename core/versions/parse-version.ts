import type { Version } from '../../types/version'

import { ParseError } from '../errors/parse-error'

/** Tracker metadata attached to a parsed version. */
interface ParseVersionOptions {
  /** Release date reported by the tracker. */
  releaseDate?: string | null

  /** Whether the version is released. */
  released?: boolean
}

/**
 * Parse a strict `major.minor.patch` version string.
 *
 * @example
 *
 * ```ts
 * parseVersion('1.0.0', { released: true, releaseDate: '2020-07-24' })
 * // { major: 1, minor: 0, patch: 0, released: true, releaseDate: '2020-07-24' }
 * ```
 *
 * @param value - Version string.
 * @param options - Tracker metadata.
 * @returns Immutable version.
 * @throws {ParseError} When the string does not have exactly three numeric
 *   components, a component has a leading zero or exceeds the safe integer
 *   range.
 */
export function parseVersion(
  value: string,
  options: ParseVersionOptions = {},
): Version {
  let { releaseDate = null, released = false } = options

  let parts = value.split('.')
  let numbers = parts.map(part =>
    /^(?:0|[1-9]\d*)$/u.test(part) ? Number.parseInt(part, 10) : Number.NaN,
  )
  if (numbers.length !== 3 || !numbers.every(Number.isSafeInteger)) {
    throw new ParseError(`Unable to parse version "${value}"`)
  }

  let [major, minor, patch] = numbers

  return Object.freeze({
    major: major ?? 0,
    minor: minor ?? 0,
    patch: patch ?? 0,
    releaseDate,
    released,
  })
}
