#!/usr/bin/env node
/**
 * Composition root for the CLI: configuration, logger, adapter, cache and
 * service are built here and nowhere else.
 */

import { createLogger } from '@shared/logger'
import { createGitAdapter } from '../node/adapters/git'
import { type Configuration, loadConfiguration, loadEnvFile } from '../node/core/config'
import { startApiServer } from '../node/handlers'
import { MetadataCache } from '../node/services/MetadataCache'
import { RepoService } from '../node/services/RepoService'
import { toPublicMessage } from '../node/shared/errors'
import { runCli } from './program'

const writeOut = (text: string): void => {
  process.stdout.write(text)
}

const writeErr = (text: string): void => {
  process.stderr.write(text)
}

export async function main(argv: readonly string[]): Promise<number> {
  loadEnvFile()

  let config: Configuration
  try {
    config = loadConfiguration()
  } catch (error) {
    writeErr(`error: ${toPublicMessage(error)}\n`)
    return 1
  }

  // Only warnings and errors unless the user asked for more
  const logger = createLogger({
    level: process.env.REPOKEEPER_LOG_LEVEL ? config.log.level : 'warn',
    format: config.log.format
  })

  const git = createGitAdapter({
    binary: config.git.binary,
    timeoutMs: config.git.timeoutMs,
    searchPath: config.git.searchPath,
    logger
  })
  const cache = config.cache.enabled ? new MetadataCache({ root: config.cache.dir, logger }) : undefined
  const service = new RepoService({ git, cache, logger })

  return runCli(argv, {
    service,
    config,
    logger,
    stdout: writeOut,
    stderr: writeErr,
    startServer: startApiServer
  })
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    writeErr(`fatal: ${toPublicMessage(error)}\n`)
    process.exitCode = 1
  }
)
