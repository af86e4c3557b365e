import { resolve } from 'node:path';

import type { ConfigPaths } from '../core/config/types.js';

export interface PathFlags {
  stacksDir?: string;
  vault?: string;
  policies?: string;
  environment?: string;
  rubric?: string;
}

export interface Settings extends ConfigPaths {
  stacksDir: string;
  vaultDir: string;
}

export const DEFAULTS = {
  stacksDir: 'stacks',
  vaultDir: 'vault',
  policiesPath: 'config/policies.yaml',
  environmentPath: 'config/environment.yaml',
  rubricPath: 'config/rubric.json'
} as const;

/**
 * Each path resolves as CLI flag, then `STACKRELAY_*` environment variable, then default,
 * relative to `cwd`.
 */
export function resolveSettings(
  flags: PathFlags = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Settings {
  const pick = (flag: string | undefined, envKey: string, fallback: string) => {
    const value = nonEmpty(flag) ?? nonEmpty(env[envKey]) ?? fallback;
    return resolve(cwd, value);
  };

  return {
    stacksDir: pick(flags.stacksDir, 'STACKRELAY_STACKS_DIR', DEFAULTS.stacksDir),
    vaultDir: pick(flags.vault, 'STACKRELAY_VAULT', DEFAULTS.vaultDir),
    policiesPath: pick(flags.policies, 'STACKRELAY_POLICIES', DEFAULTS.policiesPath),
    environmentPath: pick(flags.environment, 'STACKRELAY_ENVIRONMENT', DEFAULTS.environmentPath),
    rubricPath: pick(flags.rubric, 'STACKRELAY_RUBRIC', DEFAULTS.rubricPath)
  };
}

function nonEmpty(v: string | undefined): string | undefined {
  return v && v.trim() ? v : undefined;
}
