import { z } from 'zod'

import { UPDATE_TIMEOUT_MS } from '@/shared/constants'

const releaseSchema = z.object({
  version: z.string().optional(),
  tag: z.string().optional(),
  release_url: z.string().optional()
})

export type UpdateStatus = 'available' | 'current' | 'failed'

export interface UpdateCheck {
  status: UpdateStatus
  message: string
  latestVersion?: string
  releaseUrl?: string
}

type Semver = [number, number, number]

const SEMVER = /^v?(\d+)\.(\d+)\.(\d+)/

export function parseSemver(version: string): Semver | null {
  const match = SEMVER.exec(version.trim())
  if (!match) return null
  return [Number(match[1]), Number(match[2]), Number(match[3])]
}

/** Sign tells whether `a` is older (-), equal (0) or newer (+) than `b` */
export function compareSemver(a: Semver, b: Semver): number {
  for (let i = 0; i < 3; i++) {
    if (a[i] !== b[i]) return a[i] - b[i]
  }
  return 0
}

export class UpdateService {
  constructor(
    private fetcher: typeof fetch = fetch,
    private timeoutMs: number = UPDATE_TIMEOUT_MS
  ) {}

  async check(updateUrl: string, currentVersion: string): Promise<UpdateCheck> {
    const current = parseSemver(currentVersion)
    if (!current) {
      return {
        status: 'failed',
        message: `Current version is not a release version: ${currentVersion}`
      }
    }

    let body: unknown
    try {
      const response = await this.fetcher(updateUrl, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs)
      })
      if (!response.ok) {
        return {
          status: 'failed',
          message: `Update check failed: HTTP ${response.status}`
        }
      }
      body = await response.json()
    } catch (e) {
      return {
        status: 'failed',
        message: `Update check failed: ${e instanceof Error ? e.message : e}`
      }
    }

    const parsed = releaseSchema.safeParse(body)
    if (!parsed.success) {
      return { status: 'failed', message: 'Invalid release metadata' }
    }

    const latestVersion = parsed.data.version || parsed.data.tag || ''
    const latest = parseSemver(latestVersion)
    if (!latest) {
      return {
        status: 'failed',
        message: `Invalid release version: ${latestVersion || '(missing)'}`
      }
    }

    const releaseUrl = parsed.data.release_url
    if (compareSemver(latest, current) > 0) {
      return {
        status: 'available',
        message: `New version available: ${latestVersion}`,
        latestVersion,
        releaseUrl
      }
    }
    return {
      status: 'current',
      message: `You are up to date (${currentVersion}).`,
      latestVersion,
      releaseUrl
    }
  }
}
