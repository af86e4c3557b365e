import { resolve } from 'node:path';

import { loadRelayConfig } from '../../core/config/store.js';
import { parsePayload } from '../../core/payload.js';
import { relay, type RelayDocument } from '../../core/relay.js';
import { RunRecorder } from '../../core/run/recorder.js';
import { createLogger } from '../../utils/logger.js';
import { resolveSettings, type PathFlags } from '../settings.js';
import { getRenderer } from '../ui/renderer.js';
import { failure, printJson, stdoutSink, type CommandContext, type CommandResult } from './shared.js';

export interface RelayCommandOptions extends PathFlags, CommandContext {
  persona: string;
  role: string;
  /** Raw JSON text; defaults to `{}`. */
  payload?: string;
  stackFile?: string;
  runDir: string;
}

/**
 * `stackrelay relay`: route, execute and score one request, write one file per agent under
 * `<run-dir>/outputs/`, and print the relay document on stdout.
 */
export async function runRelayCommand(opts: RelayCommandOptions): Promise<CommandResult<RelayDocument>> {
  const r = getRenderer();
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;
  const logger = createLogger('relay', env);

  try {
    const settings = resolveSettings(opts, env, cwd);
    const payload = parsePayload(opts.payload ?? '{}');
    const config = await loadRelayConfig(settings, logger);

    const runDir = resolve(cwd, opts.runDir);
    const doc = await relay(
      {
        persona: opts.persona,
        role: opts.role,
        payload,
        stacksDir: settings.stacksDir,
        stackFile: opts.stackFile ? resolve(cwd, opts.stackFile) : undefined,
        runDir
      },
      { config, logger }
    );

    const recorder = new RunRecorder(runDir, { logger });
    const written = await recorder.writeAgentOutputs(doc.result.outputs);

    r.relaySummary(doc, written);
    printJson(opts.out ?? stdoutSink, doc);
    return { ok: true, value: doc };
  } catch (err) {
    return failure(err);
  }
}
