import { dirname, resolve } from 'node:path';

import { loadRelayConfig } from '../../core/config/store.js';
import { displayValue, parsePayload } from '../../core/payload.js';
import { relay, type RelayDocument } from '../../core/relay.js';
import type { HostEnvironment } from '../../core/run/environment.js';
import { RunRecorder } from '../../core/run/recorder.js';
import { commitRunToVault } from '../../core/run/vault.js';
import { errorMessage } from '../../core/config/documents.js';
import { createLogger } from '../../utils/logger.js';
import { initRun } from '../../workspace/layout.js';
import { resolveSettings, type PathFlags } from '../settings.js';
import { getRenderer, type RunCompleteInfo } from '../ui/renderer.js';
import { failure, type CommandContext, type CommandResult } from './shared.js';

export interface RunCommandOptions extends Omit<PathFlags, 'stacksDir'>, Pick<CommandContext, 'cwd' | 'env'> {
  stack: string;
  persona: string;
  role: string;
  payload?: string;
  now?: Date;
  captureEnvironment?: () => Promise<HostEnvironment>;
}

/**
 * `stackrelay run <stack> <persona> <role> [payload]`: the full flow for one request:
 *
 * 1. create `<vault>/runs/<YYYY-MM-DD>/<HHMMSS>/`
 * 2. relay with the stack's own directory as the stacks directory
 * 3. write agent outputs and `relay.json`
 * 4. write `logger.json` with the host environment
 * 5. copy the rubric schema to `evaluation.json`
 * 6. commit the vault when it is a git work tree
 */
export async function runRunCommand(opts: RunCommandOptions): Promise<CommandResult<RunCompleteInfo>> {
  const r = getRenderer();
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;
  const logger = createLogger('run', env);

  try {
    const settings = resolveSettings(opts, env, cwd);
    const stackPath = resolve(cwd, opts.stack);
    const payload = parsePayload(opts.payload ?? '{}');
    const config = await loadRelayConfig(settings, logger);

    const run = await initRun(settings.vaultDir, opts.now);
    const spinner = r.spinner(`Relaying ${opts.persona}/${opts.role} (run ${run.label})`);

    let doc: RelayDocument;
    try {
      doc = await relay(
        {
          persona: opts.persona,
          role: opts.role,
          payload,
          stacksDir: dirname(stackPath),
          stackFile: stackPath,
          runDir: run.runDir
        },
        { config, logger }
      );
    } catch (err) {
      spinner.fail('Relay failed');
      throw err;
    }
    spinner.succeed(`Relayed to ${displayValue(doc.result.stack_id ?? doc.stack_file)}`);

    const recorder = new RunRecorder(run.runDir, { logger, captureEnvironment: opts.captureEnvironment });
    await recorder.writeAgentOutputs(doc.result.outputs);
    await recorder.writeRelay(doc);
    await recorder.writeLoggerRecord({ recordEnv: true });
    await recorder.snapshotRubric(settings.rubricPath);

    let vault: RunCompleteInfo['vault'];
    try {
      vault = await commitRunToVault(settings.vaultDir, run.label);
    } catch (err) {
      vault = 'failed';
      r.warn(`Vault commit failed: ${errorMessage(err)}`);
    }

    const info: RunCompleteInfo = {
      runDir: run.runDir,
      label: run.label,
      stackId: doc.result.stack_id,
      weightedTotal: doc.result.evaluation.weighted_total,
      vault
    };
    r.runComplete(info);
    return { ok: true, value: info };
  } catch (err) {
    return failure(err);
  }
}
