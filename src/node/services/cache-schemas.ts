/**
 * Runtime shapes of cached payloads. A cached file is untrusted input: it
 * may predate a format change or have been edited by hand.
 */

import type { BranchInfo, CommitInfo, FileStatus, RemoteInfo, RepoStatus } from '@shared/types/repo'
import { z } from 'zod'

export const cacheEnvelopeSchema = z.object({
  payload: z.unknown(),
  /** Write time, epoch milliseconds. */
  timestamp: z.number(),
  ttl: z.number()
})

export type CacheEnvelope = z.infer<typeof cacheEnvelopeSchema>

const fileStatusSchema: z.ZodType<FileStatus> = z.object({
  path: z.string(),
  status: z.string(),
  staged: z.boolean(),
  modified: z.boolean(),
  originalPath: z.string().optional()
})

export const repoStatusSchema: z.ZodType<RepoStatus> = z.object({
  branch: z.string(),
  upstream: z.string(),
  ahead: z.number().int().nonnegative(),
  behind: z.number().int().nonnegative(),
  tracking: z.enum(['none', 'unknown', 'tracked']),
  files: z.array(fileStatusSchema),
  clean: z.boolean()
})

export const branchListSchema: z.ZodType<BranchInfo[]> = z.array(
  z.object({
    name: z.string(),
    current: z.boolean(),
    remote: z.string().optional(),
    upstream: z.string().optional(),
    ahead: z.number().int().nonnegative(),
    behind: z.number().int().nonnegative(),
    sha: z.string(),
    subject: z.string()
  })
)

export const remoteListSchema: z.ZodType<RemoteInfo[]> = z.array(
  z.object({
    name: z.string(),
    fetchUrl: z.string(),
    pushUrl: z.string()
  })
)

export const commitListSchema: z.ZodType<CommitInfo[]> = z.array(
  z.object({
    hash: z.string(),
    shortHash: z.string(),
    author: z.string(),
    email: z.string(),
    date: z.string().nullable(),
    subject: z.string(),
    body: z.string()
  })
)
