import type { Version } from '../../types/version'

import { classifyVersion } from './classify-version'

/**
 * Branch a release is cut from.
 *
 * @param version - Release version.
 * @param mainBranch - Name of the main development branch.
 * @returns The main branch for major releases, `maint-X.x.x` for minor and
 *   `maint-X.Y.x` for patch releases.
 */
export function getReleaseBranch(
  version: Version,
  mainBranch: string,
): string {
  switch (classifyVersion(version)) {
    case 'major':
      return mainBranch
    case 'minor':
      return `maint-${version.major}.x.x`
    case 'patch':
      return `maint-${version.major}.${version.minor}.x`
  }
}
