/**
 * ExecGitAdapter against the real git binary.
 */

import fs from 'fs'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { NotARepositoryError, ValidationError } from '../../../shared/errors'
import { createGitAdapter } from '../factory'
import type { GitAdapter } from '../interface'
import {
  configureIdentity,
  createCommit,
  createTempDir,
  createTestRepo,
  git,
  removeTempDir
} from './test-utils'

describe('ExecGitAdapter with git', () => {
  let repoPath: string
  let adapter: GitAdapter

  beforeEach(async () => {
    repoPath = await createTestRepo()
    adapter = createGitAdapter({ timeoutMs: 10_000 })
  })

  afterEach(async () => {
    await removeTempDir(repoPath)
  })

  it('opens the repository from a subdirectory with discover', async () => {
    await createCommit(repoPath, { 'src/index.ts': 'export {}\n' }, 'initial commit')

    const repo = await adapter.discover(path.join(repoPath, 'src'))

    expect(repo.path).toBe(repoPath)
    expect(repo.isBare).toBe(false)
  })

  it('reports status with untracked and modified files', async () => {
    await createCommit(repoPath, { 'a.txt': 'one\n' }, 'initial commit')
    await fs.promises.writeFile(path.join(repoPath, 'a.txt'), 'two\n')
    await fs.promises.writeFile(path.join(repoPath, 'b.txt'), 'new\n')

    const status = await adapter.getStatus(await adapter.open(repoPath))

    expect(status.branch).toBe('main')
    expect(status.tracking).toBe('none')
    expect(status.files).toEqual([
      { path: 'a.txt', status: ' M', staged: false, modified: true },
      { path: 'b.txt', status: '??', staged: false, modified: false }
    ])
  })

  it('reads commit metadata with multi-line bodies', async () => {
    const sha = await createCommit(repoPath, { 'a.txt': 'one\n' }, 'Add a\n\nFirst line\nSecond line')

    const [commit] = await adapter.log(await adapter.open(repoPath))

    expect(commit).toMatchObject({
      hash: sha,
      author: 'Test User',
      email: 'test@example.com',
      subject: 'Add a',
      body: 'First line\nSecond line'
    })
  })

  it('returns an empty log for a repository without commits', async () => {
    await expect(adapter.log(await adapter.open(repoPath))).resolves.toEqual([])
  })

  it('tracks an upstream after cloning', async () => {
    await createCommit(repoPath, { 'a.txt': 'one\n' }, 'initial commit')
    const workspace = await createTempDir()
    try {
      const clone = await adapter.clone({ url: repoPath, path: path.join(workspace, 'copy') })
      configureIdentity(clone.path)
      await createCommit(clone.path, { 'b.txt': 'two\n' }, 'local work')

      const status = await adapter.getStatus(clone)

      expect(status).toMatchObject({ upstream: 'origin/main', ahead: 1, behind: 0, tracking: 'tracked' })
      expect((await adapter.listRemotes(clone)).map((r) => r.name)).toEqual(['origin'])
    } finally {
      await removeTempDir(workspace)
    }
  })

  it('tracks a branch whose name holds shell characters', async () => {
    await createCommit(repoPath, { 'a.txt': 'one\n' }, 'initial commit')
    const workspace = await createTempDir()
    try {
      const clone = await adapter.clone({ url: repoPath, path: path.join(workspace, 'copy') })
      configureIdentity(clone.path)
      git(clone.path, 'checkout', '-b', 'feat&x', '--track', 'origin/main')
      await createCommit(clone.path, { 'b.txt': 'two\n' }, 'local work')

      const status = await adapter.getStatus(clone)

      expect(status).toMatchObject({
        branch: 'feat&x',
        upstream: 'origin/main',
        ahead: 1,
        behind: 0,
        tracking: 'tracked'
      })
    } finally {
      await removeTempDir(workspace)
    }
  })

  it('leaves config untouched when a value would not reach git intact', async () => {
    const repo = await adapter.open(repoPath)

    await expect(adapter.setConfig(repo, 'user.name', 'Tom & Jerry')).rejects.toBeInstanceOf(ValidationError)

    expect(git(repoPath, 'config', '--get', 'user.name').trim()).toBe('Test User')
  })

  it('creates and lists branches', async () => {
    await createCommit(repoPath, { 'a.txt': 'one\n' }, 'initial commit')
    const repo = await adapter.open(repoPath)

    await adapter.createBranch(repo, 'feature')
    const branches = await adapter.listBranches(repo)

    expect(branches.map((b) => [b.name, b.current])).toEqual([
      ['feature', false],
      ['main', true]
    ])
    expect(git(repoPath, 'branch', '--show-current').trim()).toBe('main')
  })

  it('rejects a directory outside any repository', async () => {
    const plain = await createTempDir()
    try {
      await expect(adapter.open(plain)).rejects.toBeInstanceOf(NotARepositoryError)
    } finally {
      await removeTempDir(plain)
    }
  })
})
