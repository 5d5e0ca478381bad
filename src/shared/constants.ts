import { homedir } from 'os'
import { join } from 'path'

export const APP_NAME = 'ebook-renamer'

export const GITHUB_URL = 'https://github.com/etng/EbookRenamer'
export const UPDATE_METADATA_URL =
  `${GITHUB_URL}/releases/latest/download/latest.json`
export const UPDATE_TIMEOUT_MS = 8000

export function configDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): string {
  if (platform === 'darwin') {
    return join(home, 'Library', 'Application Support', APP_NAME)
  }
  if (platform === 'win32') {
    return join(env.APPDATA || join(home, 'AppData', 'Roaming'), APP_NAME)
  }
  return join(env.XDG_CONFIG_HOME || join(home, '.config'), APP_NAME)
}

export const CONFIG_FILE = join(configDir(), 'config.json')
