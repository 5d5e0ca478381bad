import { execSync } from 'child_process'
import { build } from 'esbuild'
import { chmodSync, existsSync, readFileSync, rmSync } from 'fs'
import { dirname, join } from 'path'
import { fileURLToPath } from 'url'
import { z } from 'zod'

import { logger } from '../src/cli/utils/logger'

const projectRoot = join(dirname(fileURLToPath(import.meta.url)), '..')

async function main() {
  const mainScript = join(projectRoot, 'src', 'cli', 'index.ts')

  if (!existsSync(mainScript)) {
    logger.error(`Could not find main script at ${mainScript}`)
    process.exit(1)
  }

  const { version } = z
    .object({ version: z.string() })
    .parse(JSON.parse(readFileSync(join(projectRoot, 'package.json'), 'utf-8')))
  const buildTime = new Date().toISOString()
  let gitCommit = 'unknown'

  try {
    gitCommit = execSync('git rev-parse --short HEAD', { stdio: 'pipe' })
      .toString()
      .trim()
  } catch {
    logger.warn('Could not get git commit hash.')
  }

  const distDir = join(projectRoot, 'dist')
  const outFile = join(distDir, 'ebook-renamer.js')
  rmSync(distDir, { recursive: true, force: true })

  logger.info('Bundling CLI with esbuild...')
  console.log(`  Version: ${version}`)
  console.log(`  Commit: ${gitCommit}`)
  console.log(`  Time: ${buildTime}`)

  const result = await build({
    entryPoints: [mainScript],
    outfile: outFile,
    bundle: true,
    platform: 'node',
    target: 'node20',
    format: 'esm',
    packages: 'external',
    sourcemap: 'linked',
    banner: { js: '#!/usr/bin/env node' },
    define: {
      BUILD_VERSION: JSON.stringify(version),
      BUILD_TIME: JSON.stringify(buildTime),
      GIT_COMMIT: JSON.stringify(gitCommit)
    }
  })

  for (const warning of result.warnings) {
    logger.warn(warning.text)
  }
  chmodSync(outFile, 0o755)
  logger.success(`Build successful! Executable: ${outFile}`)
}

main().catch(error => {
  logger.error(`Build error: ${error}`)
  process.exit(1)
})
