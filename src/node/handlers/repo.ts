/**
 * Repository Handlers - thin HTTP routing layer
 *
 * Validates request input and delegates to RepoService. No business logic.
 */

import type { RepoService } from '../services/RepoService'
import type { RouteTable } from './http'
import {
  branchesQuery,
  cloneBody,
  diffQuery,
  fetchBody,
  logQuery,
  parseInput,
  pullBody,
  pushBody,
  rawBody,
  remotesQuery,
  repoQuery,
  statusQuery
} from './schemas'

export function createRepoRoutes(service: RepoService): RouteTable {
  return {
    // ==========================================================================
    // Inspection
    // ==========================================================================

    '/v1/repo': {
      method: 'GET',
      deadline: 'query',
      handle: async ({ query, signal }) => {
        const { path } = parseInput(repoQuery, query)
        return service.open(path, { signal })
      }
    },

    '/v1/status': {
      method: 'GET',
      deadline: 'query',
      handle: async ({ query, signal }) => {
        const { path, refresh } = parseInput(statusQuery, query)
        return service.status(path, { refresh, signal })
      }
    },

    '/v1/log': {
      method: 'GET',
      deadline: 'query',
      handle: async ({ query, signal }) => {
        const { path, max, ref, refresh } = parseInput(logQuery, query)
        return service.log(path, { maxCount: max, ref, refresh, signal })
      }
    },

    '/v1/diff': {
      method: 'GET',
      deadline: 'query',
      handle: async ({ query, signal }) => {
        const { path, base, head, stat } = parseInput(diffQuery, query)
        return service.diff(path, { base, head, stat, signal })
      }
    },

    '/v1/branches': {
      method: 'GET',
      deadline: 'query',
      handle: async ({ query, signal }) => {
        const { path, all, refresh } = parseInput(branchesQuery, query)
        return service.branches(path, { all, refresh, signal })
      }
    },

    '/v1/remotes': {
      method: 'GET',
      deadline: 'query',
      handle: async ({ query, signal }) => {
        const { path, refresh } = parseInput(remotesQuery, query)
        return service.remotes(path, { refresh, signal })
      }
    },

    // ==========================================================================
    // Clone and sync
    // ==========================================================================

    '/v1/clone': {
      method: 'POST',
      deadline: 'clone',
      handle: async ({ body, signal }) => {
        const options = parseInput(cloneBody, body)
        return service.clone(options, { signal })
      }
    },

    '/v1/fetch': {
      method: 'POST',
      deadline: 'sync',
      handle: async ({ body, signal }) => {
        const { path, ...options } = parseInput(fetchBody, body)
        await service.fetch(path, { ...options, signal })
        return null
      }
    },

    '/v1/pull': {
      method: 'POST',
      deadline: 'sync',
      handle: async ({ body, signal }) => {
        const { path, ...options } = parseInput(pullBody, body)
        await service.pull(path, { ...options, signal })
        return null
      }
    },

    '/v1/push': {
      method: 'POST',
      deadline: 'sync',
      handle: async ({ body, signal }) => {
        const { path, ...options } = parseInput(pushBody, body)
        await service.push(path, { ...options, signal })
        return null
      }
    },

    '/v1/raw': {
      method: 'POST',
      deadline: 'sync',
      handle: async ({ body, signal }) => {
        const { path, args } = parseInput(rawBody, body)
        return service.raw(path, args, { signal })
      }
    },

    // ==========================================================================
    // Maintenance
    // ==========================================================================

    '/v1/capabilities': {
      method: 'GET',
      deadline: null,
      handle: async () => service.capabilities()
    },

    '/v1/cache': {
      method: 'DELETE',
      deadline: 'query',
      handle: async ({ query }) => {
        const { path } = parseInput(repoQuery, query)
        await service.clearCache(path)
        return null
      }
    }
  }
}
