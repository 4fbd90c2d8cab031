import type { RepoService } from '../services/RepoService'
import type { RouteTable } from './http'
import { createRepoRoutes } from './repo'

export function createRoutes(service: RepoService): RouteTable {
  return {
    '/health': {
      method: 'GET',
      deadline: null,
      handle: async () => ({ status: 'ok', time: new Date().toISOString() })
    },
    ...createRepoRoutes(service)
  }
}
