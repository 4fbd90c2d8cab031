import { describe, expect, it } from 'vitest'
import { ParseError } from '../../../shared/errors'
import {
  buildLogFormat,
  parseAheadBehind,
  parseBranches,
  parseGitDate,
  parseLines,
  parseLog,
  parsePorcelainStatus,
  parseRemotes,
  parseWorktrees,
  unquotePath
} from '../parsers'

describe('parsePorcelainStatus', () => {
  it('classifies staged, modified and untracked entries', () => {
    expect(parsePorcelainStatus(' M README.md\n?? new.txt\nA  added.ts\nMM both.ts\n')).toEqual([
      { path: 'README.md', status: ' M', staged: false, modified: true },
      { path: 'new.txt', status: '??', staged: false, modified: false },
      { path: 'added.ts', status: 'A ', staged: true, modified: false },
      { path: 'both.ts', status: 'MM', staged: true, modified: true }
    ])
  })

  it('reports an untracked file as neither staged nor modified', () => {
    expect(parsePorcelainStatus('?? newfile.txt')).toEqual([
      { path: 'newfile.txt', status: '??', staged: false, modified: false }
    ])
  })

  it('treats ignored entries as unchanged', () => {
    expect(parsePorcelainStatus('!! build/')).toEqual([
      { path: 'build/', status: '!!', staged: false, modified: false }
    ])
  })

  it('splits renames into original and new path', () => {
    expect(parsePorcelainStatus('R  old.ts -> new.ts')).toEqual([
      { path: 'new.ts', status: 'R ', staged: true, modified: false, originalPath: 'old.ts' }
    ])
  })

  it('unquotes C-quoted paths, including renames', () => {
    expect(parsePorcelainStatus('?? "caf\\303\\251.txt"\nR  "old\\tname.txt" -> "new name.txt"')).toEqual([
      { path: 'café.txt', status: '??', staged: false, modified: false },
      { path: 'new name.txt', status: 'R ', staged: true, modified: false, originalPath: 'old\tname.txt' }
    ])
  })

  it('returns nothing for a clean tree', () => {
    expect(parsePorcelainStatus('')).toEqual([])
  })
})

describe('unquotePath', () => {
  it('returns unquoted input unchanged', () => {
    expect(unquotePath('plain.txt')).toBe('plain.txt')
  })

  it('decodes escapes', () => {
    expect(unquotePath('"a\\"b\\\\c"')).toBe('a"b\\c')
  })
})

describe('parseAheadBehind', () => {
  it('reads left and right counts', () => {
    expect(parseAheadBehind('3\t1\n')).toEqual({ ahead: 3, behind: 1 })
  })

  it('returns null for anything else', () => {
    expect(parseAheadBehind('fatal: bad revision')).toBeNull()
  })
})

describe('parseGitDate', () => {
  it('converts to UTC ISO-8601', () => {
    expect(parseGitDate('2025-01-01 10:00:00 +0000')).toBe('2025-01-01T10:00:00.000Z')
    expect(parseGitDate('2024-12-31 23:30:00 -0130')).toBe('2025-01-01T01:00:00.000Z')
  })

  it('returns null when the text is not a git date', () => {
    expect(parseGitDate('yesterday')).toBeNull()
    expect(parseGitDate('2025-13-45 10:00:00 +0000')).toBeNull()
  })
})

describe('parseLog', () => {
  it('parses a pipe-delimited record with an empty body', () => {
    const commits = parseLog('abcd1234|abcd123|Jane Doe|jane@example.com|2025-01-01 10:00:00 +0000|fix: bug|', {
      delimiter: '|'
    })

    expect(commits).toEqual([
      {
        hash: 'abcd1234',
        shortHash: 'abcd123',
        author: 'Jane Doe',
        email: 'jane@example.com',
        date: '2025-01-01T10:00:00.000Z',
        subject: 'fix: bug',
        body: ''
      }
    ])
  })

  it('parses terminated records with multi-line bodies', () => {
    const output =
      'a1\x1fa\x1fAnn\x1fann@example.com\x1f2025-02-03 04:05:06 +0200\x1ffeat: x\x1fline one\nline two\n\x1e\n' +
      'b2\x1fb\x1fBob\x1fbob@example.com\x1fnot a date\x1ffix: y\x1f\x1e'

    const commits = parseLog(output)

    expect(commits).toHaveLength(2)
    expect(commits[0]).toMatchObject({ hash: 'a1', date: '2025-02-03T02:05:06.000Z', body: 'line one\nline two' })
    expect(commits[1]).toMatchObject({ hash: 'b2', author: 'Bob', date: null, subject: 'fix: y', body: '' })
  })

  it('keeps delimiters that occur inside the body', () => {
    const [commit] = parseLog('h|s|A|a@example.com|2025-01-01 10:00:00 +0000|subj|body|with pipe', { delimiter: '|' })
    expect(commit?.body).toBe('body|with pipe')
  })

  it('skips records with too few fields', () => {
    const output = 'a|b|c\nh|s|A|a@example.com|2025-01-01 10:00:00 +0000|subject|'
    expect(parseLog(output, { delimiter: '|' }).map((c) => c.hash)).toEqual(['h'])
  })

  it('raises ParseError when nothing in non-empty output parses', () => {
    expect(() => parseLog('garbage output\n')).toThrow(ParseError)
  })

  it('returns nothing for empty output', () => {
    expect(parseLog('')).toEqual([])
  })

  it('parses oneline output', () => {
    expect(parseLog('abc1234 first change\ndef5678 second\n', { oneline: true })).toEqual([
      { hash: 'abc1234', shortHash: 'abc1234', author: '', email: '', date: null, subject: 'first change', body: '' },
      { hash: 'def5678', shortHash: 'def5678', author: '', email: '', date: null, subject: 'second', body: '' }
    ])
  })

  it('builds a format string the parser understands', () => {
    expect(buildLogFormat()).toBe('--pretty=format:%H\x1f%h\x1f%an\x1f%ae\x1f%ai\x1f%s\x1f%b\x1e')
  })
})

describe('parseRemotes', () => {
  it('merges fetch and push lines into one record per remote', () => {
    const output = [
      'origin\thttps://example.com/repo.git (fetch)',
      'origin\thttps://example.com/repo.git (push)',
      'upstream\tgit@example.com:team/repo.git (fetch)',
      'upstream\tgit@example.com:mirror/repo.git (push)'
    ].join('\n')

    expect(parseRemotes(output)).toEqual([
      { name: 'origin', fetchUrl: 'https://example.com/repo.git', pushUrl: 'https://example.com/repo.git' },
      { name: 'upstream', fetchUrl: 'git@example.com:team/repo.git', pushUrl: 'git@example.com:mirror/repo.git' }
    ])
  })

  it('handles local paths with spaces', () => {
    expect(parseRemotes('local\t/srv/my repos/x (fetch)\nlocal\t/srv/my repos/x (push)\n')).toEqual([
      { name: 'local', fetchUrl: '/srv/my repos/x', pushUrl: '/srv/my repos/x' }
    ])
  })

  it('returns nothing when there are no remotes', () => {
    expect(parseRemotes('')).toEqual([])
  })

  it('raises ParseError for unrecognised output', () => {
    expect(() => parseRemotes('nonsense')).toThrow(ParseError)
  })
})

describe('parseBranches', () => {
  const output = [
    '* main                abc1234 [origin/main: ahead 2, behind 1] Latest change',
    '  feature/login       def5678 Add login form',
    '+ hotfix              0123abc [origin/hotfix] Patch',
    '  remotes/origin/HEAD -> origin/main',
    '  remotes/origin/main abc1234 Latest change'
  ].join('\n')

  it('parses local, worktree and remote-tracking branches', () => {
    expect(parseBranches(output)).toEqual([
      {
        name: 'main',
        current: true,
        upstream: 'origin/main',
        ahead: 2,
        behind: 1,
        sha: 'abc1234',
        subject: 'Latest change'
      },
      { name: 'feature/login', current: false, ahead: 0, behind: 0, sha: 'def5678', subject: 'Add login form' },
      { name: 'hotfix', current: false, upstream: 'origin/hotfix', ahead: 0, behind: 0, sha: '0123abc', subject: 'Patch' },
      { name: 'main', remote: 'origin', current: false, ahead: 0, behind: 0, sha: 'abc1234', subject: 'Latest change' }
    ])
  })

  it('marks exactly one branch as current', () => {
    expect(parseBranches(output).filter((b) => b.current).map((b) => b.name)).toEqual(['main'])
  })

  it('skips detached HEAD entries', () => {
    const branches = parseBranches('* (HEAD detached at abc1234) abc1234 Detached work\n  main def5678 Base')
    expect(branches.map((b) => b.name)).toEqual(['main'])
    expect(branches[0]?.current).toBe(false)
  })
})

describe('parseWorktrees', () => {
  it('parses porcelain blocks', () => {
    const output = [
      'worktree /srv/project',
      'HEAD 1111111111111111111111111111111111111111',
      'branch refs/heads/main',
      '',
      'worktree /srv/project-feature',
      'HEAD 2222222222222222222222222222222222222222',
      'detached',
      '',
      'worktree /srv/project-old',
      'HEAD 3333333333333333333333333333333333333333',
      'branch refs/heads/old',
      'prunable gitdir file points to non-existent location',
      ''
    ].join('\n')

    expect(parseWorktrees(output)).toEqual([
      {
        path: '/srv/project',
        headSha: '1111111111111111111111111111111111111111',
        branch: 'main',
        isBare: false,
        isPrunable: false
      },
      {
        path: '/srv/project-feature',
        headSha: '2222222222222222222222222222222222222222',
        branch: null,
        isBare: false,
        isPrunable: false
      },
      {
        path: '/srv/project-old',
        headSha: '3333333333333333333333333333333333333333',
        branch: 'old',
        isBare: false,
        isPrunable: true
      }
    ])
  })

  it('recognises bare entries', () => {
    expect(parseWorktrees('worktree /srv/project.git\nbare\n')).toEqual([
      { path: '/srv/project.git', headSha: '', branch: null, isBare: true, isPrunable: false }
    ])
  })
})

describe('parseLines', () => {
  it('drops blank lines and trailing whitespace', () => {
    expect(parseLines('stash@{0}: WIP on main: abc1234 msg  \n\nstash@{1}: On main: saved\n')).toEqual([
      'stash@{0}: WIP on main: abc1234 msg',
      'stash@{1}: On main: saved'
    ])
  })
})
