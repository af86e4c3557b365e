import { resolve } from 'node:path';

import { RunRecorder, type LoggerRecord } from '../../core/run/recorder.js';
import { createLogger } from '../../utils/logger.js';
import { getRenderer } from '../ui/renderer.js';
import { failure, type CommandContext, type CommandResult } from './shared.js';

export interface LogCommandOptions extends Pick<CommandContext, 'cwd' | 'env'> {
  runDir: string;
  recordEnv?: boolean;
}

/**
 * `stackrelay log --run-dir <dir>`: write `logger.json` listing the run directory's files,
 * optionally with a snapshot of the host environment.
 */
export async function runLogCommand(opts: LogCommandOptions): Promise<CommandResult<LoggerRecord>> {
  const r = getRenderer();
  const cwd = opts.cwd ?? process.cwd();
  const logger = createLogger('log', opts.env ?? process.env);

  try {
    const recorder = new RunRecorder(resolve(cwd, opts.runDir), { logger });
    const record = await recorder.writeLoggerRecord({ recordEnv: !!opts.recordEnv });
    r.success(`Logger record written to ${recorder.paths.loggerPath}`);
    return { ok: true, value: record };
  } catch (err) {
    return failure(err);
  }
}
