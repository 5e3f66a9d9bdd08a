import type { ReleaseConfig } from './release-config'

/** Shape of `.release-curator.yml`, every key optional. */
export type ReleaseConfigFile = Partial<ReleaseConfig>
