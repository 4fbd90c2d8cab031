import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, describe, expect, it } from 'vitest'
import { SECURE_SEARCH_PATH } from '../../shared/constants'
import { ValidationError } from '../../shared/errors'
import { loadConfiguration, loadEnvFile } from '../config'

function captureError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  return undefined
}

describe('loadConfiguration', () => {
  it('falls back to defaults', () => {
    const config = loadConfiguration({ XDG_CACHE_HOME: '/var/cache/test' })

    expect(config).toEqual({
      git: { binary: 'git', timeoutMs: 120_000, searchPath: [...SECURE_SEARCH_PATH] },
      cache: { enabled: true, dir: '/var/cache/test/repokeeper' },
      server: { host: '127.0.0.1', port: 8080 },
      log: { level: 'info', format: 'text' }
    })
  })

  it('reads overrides', () => {
    const config = loadConfiguration({
      REPOKEEPER_GIT_BINARY: 'git2',
      REPOKEEPER_GIT_TIMEOUT_MS: '5000',
      REPOKEEPER_GIT_SEARCH_PATH: ['/opt/git/bin', '/usr/bin'].join(path.delimiter),
      REPOKEEPER_CACHE_DIR: '/srv/cache',
      REPOKEEPER_CACHE_ENABLED: 'no',
      REPOKEEPER_HOST: '0.0.0.0',
      REPOKEEPER_PORT: '9000',
      REPOKEEPER_LOG_LEVEL: 'debug',
      REPOKEEPER_LOG_FORMAT: 'json'
    })

    expect(config).toEqual({
      git: { binary: 'git2', timeoutMs: 5000, searchPath: ['/opt/git/bin', '/usr/bin'] },
      cache: { enabled: false, dir: '/srv/cache' },
      server: { host: '0.0.0.0', port: 9000 },
      log: { level: 'debug', format: 'json' }
    })
  })

  it('treats empty variables as unset', () => {
    const config = loadConfiguration({ REPOKEEPER_PORT: '', REPOKEEPER_CACHE_ENABLED: '', XDG_CACHE_HOME: '/tmp/x' })

    expect(config.server.port).toBe(8080)
    expect(config.cache.enabled).toBe(true)
  })

  it('resolves a relative cache directory', () => {
    expect(loadConfiguration({ REPOKEEPER_CACHE_DIR: 'cache' }).cache.dir).toBe(path.resolve('cache'))
  })

  it('names the offending variable', () => {
    expect(() => loadConfiguration({ REPOKEEPER_PORT: 'abc' })).toThrow(ValidationError)
    expect(() => loadConfiguration({ REPOKEEPER_PORT: '70000' })).toThrow(/^invalid REPOKEEPER_PORT: /)

    const error = captureError(() => loadConfiguration({ REPOKEEPER_LOG_LEVEL: 'verbose' }))
    expect(error).toBeInstanceOf(ValidationError)
    expect(error).toMatchObject({ field: 'REPOKEEPER_LOG_LEVEL' })
  })
})

describe('loadEnvFile', () => {
  const keys = ['REPOKEEPER_ENV_FILE_TEST', 'REPOKEEPER_ENV_FILE_KEEP']
  let dir: string | undefined

  afterEach(() => {
    for (const key of keys) delete process.env[key]
    if (dir) fs.rmSync(dir, { recursive: true, force: true })
    dir = undefined
  })

  it('loads variables without overriding ones already set', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'repokeeper-env-'))
    const file = path.join(dir, '.env')
    fs.writeFileSync(file, 'REPOKEEPER_ENV_FILE_TEST=from-file\nREPOKEEPER_ENV_FILE_KEEP=from-file\n')
    process.env.REPOKEEPER_ENV_FILE_KEEP = 'from-shell'

    loadEnvFile(file)

    expect(process.env.REPOKEEPER_ENV_FILE_TEST).toBe('from-file')
    expect(process.env.REPOKEEPER_ENV_FILE_KEEP).toBe('from-shell')
  })
})
