/**
 * Request shapes for the HTTP API. Query values arrive as strings; bodies
 * are JSON.
 */

import { z } from 'zod'
import { isValidGitUrl } from '../domain/GitUrlParser'
import { ValidationError } from '../shared/errors'

const repoPath = z.string().trim().min(1, 'path is required')
const name = z.string().min(1)

const flag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1')

export const repoQuery = z.object({ path: repoPath })

export const statusQuery = repoQuery.extend({ refresh: flag })

export const logQuery = repoQuery.extend({
  max: z.coerce.number().int().positive().optional(),
  ref: name.optional(),
  refresh: flag
})

export const diffQuery = repoQuery.extend({
  base: name.optional(),
  head: name.optional(),
  stat: flag
})

export const branchesQuery = repoQuery.extend({ all: flag, refresh: flag })

export const remotesQuery = repoQuery.extend({ refresh: flag })

export const cloneBody = z.object({
  url: z
    .string()
    .trim()
    .min(1, 'url is required')
    .refine(isValidGitUrl, 'not a clone URL or absolute path'),
  path: repoPath,
  branch: name.optional(),
  depth: z.number().int().positive().optional(),
  bare: z.boolean().optional(),
  mirror: z.boolean().optional(),
  recursive: z.boolean().optional(),
  progress: z.boolean().optional()
})

export const fetchBody = z.object({
  path: repoPath,
  remote: name.optional(),
  prune: z.boolean().optional(),
  tags: z.boolean().optional()
})

export const pullBody = z.object({
  path: repoPath,
  remote: name.optional(),
  branch: name.optional(),
  rebase: z.boolean().optional()
})

export const pushBody = z.object({
  path: repoPath,
  remote: name.optional(),
  branch: name.optional(),
  force: z.boolean().optional(),
  tags: z.boolean().optional(),
  setUpstream: z.boolean().optional()
})

export const rawBody = z.object({
  path: repoPath,
  args: z.array(z.string()).min(1, 'args must not be empty')
})

/**
 * Parses `input` or throws ValidationError describing the first problem.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input)
  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : undefined
    const message = issue ? (field ? `${field}: ${issue.message}` : issue.message) : 'invalid input'
    throw new ValidationError(message, field)
  }
  return result.data
}
