/**
 * Plain-text renderings of results for the terminal.
 */

import type { BranchInfo, CommitInfo, Repo, RemoteInfo, RepoStatus } from '@shared/types/repo'
import { redactUrl } from '../node/adapters/git/sanitize'
import type { CapabilityReport } from '../node/services/RepoService'

export function formatRepo(repo: Repo): string {
  const kind = repo.isBare ? 'bare repository' : 'repository'
  return `${kind} at ${repo.path}\ngit dir: ${repo.gitDir}`
}

function describeTracking(status: RepoStatus): string {
  switch (status.tracking) {
    case 'none':
      return 'no upstream'
    case 'unknown':
      return status.upstream ? `tracking ${status.upstream} (counts unavailable)` : 'upstream unknown'
    case 'tracked':
      return `tracking ${status.upstream}: ahead ${status.ahead}, behind ${status.behind}`
  }
}

export function formatStatus(status: RepoStatus): string {
  const head = status.branch ? `On branch ${status.branch}` : 'HEAD detached'
  const lines = [`${head} (${describeTracking(status)})`]

  if (status.clean) {
    lines.push('working tree clean')
  } else {
    for (const file of status.files) {
      const target = file.originalPath ? `${file.originalPath} -> ${file.path}` : file.path
      lines.push(`${file.status} ${target}`)
    }
  }
  return lines.join('\n')
}

export function formatLog(commits: CommitInfo[]): string {
  return commits
    .map((commit) => {
      const day = commit.date ? commit.date.slice(0, 10) : '??????????'
      const author = commit.author ? ` ${commit.author}:` : ''
      return commit.author || commit.date
        ? `${commit.shortHash} ${day}${author} ${commit.subject}`
        : `${commit.shortHash} ${commit.subject}`
    })
    .join('\n')
}

export function formatBranches(branches: BranchInfo[]): string {
  return branches
    .map((branch) => {
      const marker = branch.current ? '*' : ' '
      const name = branch.remote ? `${branch.remote}/${branch.name}` : branch.name
      let tracking = ''
      if (branch.upstream) {
        const counts = [
          branch.ahead > 0 ? `ahead ${branch.ahead}` : '',
          branch.behind > 0 ? `behind ${branch.behind}` : ''
        ].filter(Boolean)
        tracking = counts.length > 0 ? ` [${branch.upstream}: ${counts.join(', ')}]` : ` [${branch.upstream}]`
      }
      return `${marker} ${name} ${branch.sha}${tracking} ${branch.subject}`.trimEnd()
    })
    .join('\n')
}

export function formatRemotes(remotes: RemoteInfo[]): string {
  return remotes
    .flatMap((remote) => [
      `${remote.name}\t${redactUrl(remote.fetchUrl)} (fetch)`,
      `${remote.name}\t${redactUrl(remote.pushUrl)} (push)`
    ])
    .join('\n')
}

export function formatCapabilities(report: CapabilityReport): string {
  const lines = [`backend: ${report.backend}`]
  for (const [operation, supported] of Object.entries(report.operations)) {
    lines.push(`  ${supported ? '✓' : '✗'} ${operation}`)
  }
  return lines.join('\n')
}
