/** Kind of release, derived from the version number. */
export type ReleaseKind = 'major' | 'minor' | 'patch'
