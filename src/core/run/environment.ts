import { arch, hostname, platform, release } from 'node:os';

import { git, tryCurrentCommit } from '../../git/operations.js';

export interface HostEnvironment {
  node_version: string;
  platform: string;
  hostname: string;
  user: string | null;
  git_head: string | null;
}

export interface CaptureEnvironmentOptions {
  /** Directory whose repository HEAD is recorded; defaults to the process cwd. */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  gitHead?: (cwd: string) => Promise<string | null>;
}

/**
 * Host and version-control metadata for the logger record. Never fails: values that
 * cannot be determined are null.
 */
export async function captureEnvironment(opts: CaptureEnvironmentOptions = {}): Promise<HostEnvironment> {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;
  const gitHead = opts.gitHead ?? ((dir: string) => tryCurrentCommit(git(dir)));

  return {
    node_version: process.versions.node,
    platform: `${platform()}-${release()}-${arch()}`,
    hostname: hostname(),
    user: env.USER ?? env.USERNAME ?? null,
    git_head: await gitHead(cwd)
  };
}
