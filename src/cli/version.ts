import { readFileSync } from 'fs'
import { z } from 'zod'

declare const BUILD_VERSION: string
declare const BUILD_TIME: string
declare const GIT_COMMIT: string

const packageSchema = z.object({ version: z.string() })

function packageVersion(): string {
  const file = new URL('../../package.json', import.meta.url)
  return packageSchema.parse(JSON.parse(readFileSync(file, 'utf-8'))).version
}

const BUILT = typeof BUILD_VERSION !== 'undefined'

/** Plain semantic version, compared against release metadata */
export const APP_VERSION = BUILT ? BUILD_VERSION : packageVersion()

export const APP_VERSION_LABEL = BUILT
  ? `${BUILD_VERSION} (${GIT_COMMIT} / ${BUILD_TIME})`
  : `${APP_VERSION} (dev)`
