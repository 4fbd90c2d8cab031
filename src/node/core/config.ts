/**
 * Runtime configuration, read from the environment (and an optional `.env`
 * file) and validated once at startup.
 */

import type { LogFormat, LogLevel } from '@shared/logger'
import { LOG_LEVELS } from '@shared/logger'
import dotenv from 'dotenv'
import os from 'os'
import path from 'path'
import { z } from 'zod'
import { DEFAULT_GIT_TIMEOUT_MS, SECURE_SEARCH_PATH } from '../shared/constants'
import { ValidationError } from '../shared/errors'

export type Configuration = {
  git: {
    binary: string
    timeoutMs: number
    searchPath: string[]
  }
  cache: {
    enabled: boolean
    dir: string
  }
  server: {
    host: string
    port: number
  }
  log: {
    level: LogLevel
    format: LogFormat
  }
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('true')
  .transform((value) => value === 'true' || value === '1' || value === 'yes')

const envSchema = z.object({
  REPOKEEPER_GIT_BINARY: z.string().default('git'),
  REPOKEEPER_GIT_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_GIT_TIMEOUT_MS),
  REPOKEEPER_GIT_SEARCH_PATH: z.string().optional(),
  REPOKEEPER_CACHE_DIR: z.string().optional(),
  REPOKEEPER_CACHE_ENABLED: booleanFlag,
  REPOKEEPER_HOST: z.string().default('127.0.0.1'),
  REPOKEEPER_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  REPOKEEPER_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  REPOKEEPER_LOG_FORMAT: z.enum(['text', 'json']).default('text'),
  XDG_CACHE_HOME: z.string().optional()
})

/**
 * Loads `.env` into `process.env`. Variables already set win.
 */
export function loadEnvFile(file?: string): void {
  dotenv.config(file ? { path: file } : undefined)
}

function defaultCacheDir(xdgCacheHome: string | undefined): string {
  return path.join(xdgCacheHome ?? path.join(os.homedir(), '.cache'), 'repokeeper')
}

/**
 * Builds the configuration from `env`. Empty variables count as unset.
 *
 * @throws ValidationError naming the first offending variable
 */
export function loadConfiguration(env: NodeJS.ProcessEnv = process.env): Configuration {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''))
  const parsed = envSchema.safeParse(present)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue ? issue.path.join('.') : 'environment'
    throw new ValidationError(`invalid ${field}: ${issue?.message ?? 'unknown error'}`, field)
  }

  const vars = parsed.data
  const searchPath = vars.REPOKEEPER_GIT_SEARCH_PATH
    ? vars.REPOKEEPER_GIT_SEARCH_PATH.split(path.delimiter).filter(Boolean)
    : [...SECURE_SEARCH_PATH]

  return {
    git: {
      binary: vars.REPOKEEPER_GIT_BINARY,
      timeoutMs: vars.REPOKEEPER_GIT_TIMEOUT_MS,
      searchPath
    },
    cache: {
      enabled: vars.REPOKEEPER_CACHE_ENABLED,
      dir: path.resolve(vars.REPOKEEPER_CACHE_DIR ?? defaultCacheDir(vars.XDG_CACHE_HOME))
    },
    server: {
      host: vars.REPOKEEPER_HOST,
      port: vars.REPOKEEPER_PORT
    },
    log: {
      level: vars.REPOKEEPER_LOG_LEVEL,
      format: vars.REPOKEEPER_LOG_FORMAT
    }
  }
}
