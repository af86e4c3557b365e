import { resolve } from 'node:path';

import { generateDigest } from '../../core/digest/aggregator.js';
import { VaultRunRepository } from '../../core/digest/repository.js';
import type { Digest } from '../../core/digest/types.js';
import { writeJson } from '../../utils/fs.js';
import { createLogger } from '../../utils/logger.js';
import { defaultDigestPath } from '../../workspace/layout.js';
import { resolveSettings } from '../settings.js';
import { getRenderer } from '../ui/renderer.js';
import { failure, type CommandContext, type CommandResult } from './shared.js';

export const DEFAULT_WINDOW_DAYS = 7;

export interface DigestCommandOptions extends Pick<CommandContext, 'cwd' | 'env'> {
  vault?: string;
  output?: string;
  windowDays?: number;
  now?: Date;
}

/**
 * `stackrelay digest`: summarize the vault's runs from the trailing window into `digest.json`.
 */
export async function runDigestCommand(opts: DigestCommandOptions): Promise<CommandResult<Digest>> {
  const r = getRenderer();
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;
  const logger = createLogger('digest', env);

  const windowDays = opts.windowDays ?? DEFAULT_WINDOW_DAYS;
  if (!Number.isInteger(windowDays) || windowDays < 0) {
    return { ok: false, details: `--window-days must be a non-negative integer, got ${windowDays}` };
  }

  try {
    const { vaultDir } = resolveSettings({ vault: opts.vault }, env, cwd);
    const outputPath = opts.output ? resolve(cwd, opts.output) : defaultDigestPath(vaultDir);

    const digest = await generateDigest(new VaultRunRepository(vaultDir, { logger }), {
      now: opts.now,
      windowDays
    });
    await writeJson(outputPath, digest);

    r.digestSummary(digest, outputPath);
    return { ok: true, value: digest };
  } catch (err) {
    return failure(err);
  }
}
