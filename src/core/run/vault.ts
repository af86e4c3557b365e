import { commitAll, git, isGitRepo } from '../../git/operations.js';

export type VaultCommitOutcome = 'committed' | 'nothing_to_commit' | 'not_a_repository';

/**
 * Commit everything under the vault as `Run <label>` when the vault is a git work tree.
 * A vault outside git is left alone.
 */
export async function commitRunToVault(vaultDir: string, label: string): Promise<VaultCommitOutcome> {
  const repo = git(vaultDir);
  if (!(await isGitRepo(repo))) return 'not_a_repository';
  const committed = await commitAll(repo, `Run ${label}`);
  return committed ? 'committed' : 'nothing_to_commit';
}
