import { execa } from 'execa';

export interface GitRepo {
  repoRoot: string;
}

export function git(repoRoot: string): GitRepo {
  return { repoRoot };
}

async function run(repo: GitRepo, args: string[]): Promise<string> {
  const res = await execa('git', args, {
    cwd: repo.repoRoot,
    stdout: 'pipe',
    stderr: 'pipe'
  });
  return res.stdout;
}

export async function getCurrentCommit(repo: GitRepo): Promise<string> {
  return (await run(repo, ['rev-parse', 'HEAD'])).trim();
}

/**
 * HEAD of the repository containing `repo.repoRoot`, or null when git is missing,
 * the directory is not a work tree, or the repository has no commits yet.
 */
export async function tryCurrentCommit(repo: GitRepo): Promise<string | null> {
  try {
    const head = await getCurrentCommit(repo);
    return head || null;
  } catch {
    return null;
  }
}

/**
 * Equivalent: `git -C <dir> rev-parse --git-dir` succeeding.
 */
export async function isGitRepo(repo: GitRepo): Promise<boolean> {
  try {
    await run(repo, ['rev-parse', '--git-dir']);
    return true;
  } catch {
    return false;
  }
}

/**
 * Stage everything under the repository root and commit it.
 * Returns false when there was nothing to commit.
 */
export async function commitAll(repo: GitRepo, message: string): Promise<boolean> {
  await run(repo, ['add', '.']);
  const staged = (await run(repo, ['diff', '--cached', '--name-only'])).trim();
  if (!staged) return false;

  await run(repo, ['commit', '-m', message]);
  return true;
}
