/**
 * repokeeper command-line interface.
 *
 * Each command parses its arguments, calls RepoService and prints the
 * result, as text or (with `--json`) as JSON. Errors are printed with
 * credentials masked and turn into exit code 1.
 */

import type { Logger } from '@shared/logger'
import { Command, CommanderError, InvalidArgumentError } from 'commander'
import { describeGitFailure, extractRepoName } from '../node/domain'
import type { RunningServer, StartApiServerOptions } from '../node/handlers/server'
import type { Configuration } from '../node/core/config'
import type { RepoService } from '../node/services/RepoService'
import { GitProcessError, toPublicMessage, ValidationError } from '../node/shared/errors'
import {
  formatBranches,
  formatCapabilities,
  formatLog,
  formatRemotes,
  formatRepo,
  formatStatus
} from './output'

const VERSION = '0.1.0'

export type CliDeps = {
  service: RepoService
  config: Configuration
  logger: Logger
  stdout: (text: string) => void
  stderr: (text: string) => void
  startServer: (options: StartApiServerOptions) => Promise<RunningServer>
}

type GlobalOptions = { json?: boolean }

function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Not a positive integer.')
  }
  return parsed
}

function parsePort(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
    throw new InvalidArgumentError('Not a valid port.')
  }
  return parsed
}

export function createProgram(deps: CliDeps): Command {
  const program = new Command()
  const { service } = deps

  /**
   * Prints `value` as JSON with --json, otherwise through `format`.
   */
  const print = <T>(value: T, format: (value: T) => string): void => {
    const { json } = program.opts<GlobalOptions>()
    const text = json ? JSON.stringify(value, null, 2) : format(value)
    if (text) deps.stdout(`${text}\n`)
  }

  const done = (message: string): void => {
    if (!program.opts<GlobalOptions>().json) deps.stdout(`${message}\n`)
  }

  program
    .name('repokeeper')
    .description('Inspect and synchronize git repositories')
    .version(VERSION)
    .option('--json', 'print results as JSON')
    .exitOverride()
    .configureOutput({
      writeOut: deps.stdout,
      writeErr: deps.stderr
    })

  // ==========================================================================
  // Repository handles
  // ==========================================================================

  program
    .command('open')
    .description('Show where a repository lives')
    .argument('<path>', 'path inside the repository')
    .option('--discover', 'walk up to the top-level directory first')
    .action(async (path: string, options: { discover?: boolean }) => {
      const repo = options.discover ? await service.discover(path) : await service.open(path)
      print(repo, formatRepo)
    })

  program
    .command('init')
    .description('Create a repository')
    .argument('<path>', 'directory to create it in')
    .option('--bare', 'create a bare repository')
    .action(async (path: string, options: { bare?: boolean }) => {
      print(await service.init(path, { bare: options.bare }), formatRepo)
    })

  program
    .command('clone')
    .description('Clone a repository')
    .argument('<url>', 'clone source')
    .argument('[path]', 'destination (defaults to the repository name)')
    .option('-b, --branch <name>', 'check out this branch')
    .option('--depth <n>', 'shallow clone with this many commits', parsePositiveInt)
    .option('--bare', 'bare clone')
    .option('--mirror', 'mirror clone')
    .option('--recursive', 'initialize submodules')
    .action(
      async (
        url: string,
        path: string | undefined,
        options: { branch?: string; depth?: number; bare?: boolean; mirror?: boolean; recursive?: boolean }
      ) => {
        const destination = path ?? extractRepoName(url)
        if (!destination) {
          throw new ValidationError(`cannot derive a directory name from ${url}; pass a path`, 'path')
        }
        const repo = await service.clone({ url, path: destination, ...options })
        print(repo, formatRepo)
      }
    )

  // ==========================================================================
  // Inspection
  // ==========================================================================

  program
    .command('status')
    .description('Show branch, upstream and changed files')
    .argument('[path]', 'repository path', '.')
    .option('--refresh', 'bypass the cache')
    .action(async (path: string, options: { refresh?: boolean }) => {
      print(await service.status(path, options), formatStatus)
    })

  program
    .command('log')
    .description('Show recent commits')
    .argument('[path]', 'repository path', '.')
    .option('-n, --max-count <n>', 'number of commits', parsePositiveInt)
    .option('--ref <ref>', 'start from this ref instead of HEAD')
    .option('--oneline', 'hash and subject only')
    .option('--refresh', 'bypass the cache')
    .action(
      async (
        path: string,
        options: { maxCount?: number; ref?: string; oneline?: boolean; refresh?: boolean }
      ) => {
        print(await service.log(path, options), formatLog)
      }
    )

  program
    .command('diff')
    .description('Show changes')
    .argument('[path]', 'repository path', '.')
    .option('--base <ref>', 'compare from this ref')
    .option('--head <ref>', 'compare to this ref')
    .option('--stat', 'summary instead of the patch')
    .action(async (path: string, options: { base?: string; head?: string; stat?: boolean }) => {
      print(await service.diff(path, options), (text) => text.trimEnd())
    })

  program
    .command('branches')
    .description('List branches')
    .argument('[path]', 'repository path', '.')
    .option('-a, --all', 'include remote-tracking branches')
    .option('--refresh', 'bypass the cache')
    .action(async (path: string, options: { all?: boolean; refresh?: boolean }) => {
      print(await service.branches(path, options), formatBranches)
    })

  program
    .command('remotes')
    .description('List remotes')
    .argument('[path]', 'repository path', '.')
    .option('--refresh', 'bypass the cache')
    .action(async (path: string, options: { refresh?: boolean }) => {
      print(await service.remotes(path, options), formatRemotes)
    })

  program
    .command('capabilities')
    .description('List optional operations the git backend supports')
    .action(() => {
      print(service.capabilities(), formatCapabilities)
    })

  // ==========================================================================
  // Sync
  // ==========================================================================

  program
    .command('fetch')
    .description('Download objects and refs')
    .argument('[path]', 'repository path', '.')
    .option('--remote <name>', 'remote to fetch from')
    .option('--prune', 'remove deleted remote-tracking refs')
    .option('--tags', 'fetch all tags')
    .action(async (path: string, options: { remote?: string; prune?: boolean; tags?: boolean }) => {
      await service.fetch(path, options)
      done('fetched')
    })

  program
    .command('pull')
    .description('Fetch and integrate')
    .argument('[path]', 'repository path', '.')
    .option('--remote <name>', 'remote to pull from')
    .option('--branch <name>', 'remote branch to pull')
    .option('--rebase', 'rebase instead of merge')
    .action(async (path: string, options: { remote?: string; branch?: string; rebase?: boolean }) => {
      await service.pull(path, options)
      done('pulled')
    })

  program
    .command('push')
    .description('Update the remote')
    .argument('[path]', 'repository path', '.')
    .option('--remote <name>', 'remote to push to')
    .option('--branch <name>', 'branch to push')
    .option('--force', 'overwrite remote history if it has not moved (--force-with-lease)')
    .option('--tags', 'push tags as well')
    .option('-u, --set-upstream', 'record the upstream')
    .action(
      async (
        path: string,
        options: { remote?: string; branch?: string; force?: boolean; tags?: boolean; setUpstream?: boolean }
      ) => {
        await service.push(path, options)
        done('pushed')
      }
    )

  program
    .command('merge')
    .description('Merge a ref into the current branch')
    .argument('<ref>', 'ref to merge')
    .argument('[path]', 'repository path', '.')
    .action(async (ref: string, path: string) => {
      await service.merge(path, ref)
      done(`merged ${ref}`)
    })

  program
    .command('rebase')
    .description('Rebase the current branch')
    .argument('<onto>', 'new base')
    .argument('[path]', 'repository path', '.')
    .action(async (onto: string, path: string) => {
      await service.rebase(path, onto)
      done(`rebased onto ${onto}`)
    })

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  const cache = program.command('cache').description('Manage the metadata cache')
  cache
    .command('clear')
    .description("Drop a repository's cached metadata")
    .argument('[path]', 'repository path', '.')
    .action(async (path: string) => {
      await service.clearCache(path)
      done('cache cleared')
    })

  program
    .command('serve')
    .description('Run the HTTP API')
    .option('--host <host>', 'interface to bind', deps.config.server.host)
    .option('--port <port>', 'port to listen on', parsePort, deps.config.server.port)
    .action(async (options: { host: string; port: number }) => {
      const running = await deps.startServer({
        service,
        logger: deps.logger,
        host: options.host,
        port: options.port
      })
      deps.stdout(`listening on ${running.url}\n`)

      const shutdown = (): void => {
        running.close().catch((error: unknown) => {
          deps.logger.error('Failed to stop server', { error })
        })
      }
      process.once('SIGINT', shutdown)
      process.once('SIGTERM', shutdown)
    })

  return program
}

/**
 * Parses `argv` (user arguments only) and runs the command.
 *
 * @returns process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const program = createProgram(deps)
  try {
    await program.parseAsync([...argv], { from: 'user' })
    return 0
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed its own message
      return error.exitCode
    }
    deps.logger.debug('Command failed', { error })
    const message = toPublicMessage(error)
    deps.stderr(`error: ${message}\n`)
    if (error instanceof GitProcessError) {
      const hint = describeGitFailure(error.reason)
      // network failures already lead with the cause
      if (hint && !message.includes(hint)) deps.stderr(`hint: ${hint}\n`)
    }
    return 1
  }
}
