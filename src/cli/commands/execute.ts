import { resolve } from 'node:path';

import { loadRelayConfig } from '../../core/config/store.js';
import { ExecutionEngine } from '../../core/execution/engine.js';
import type { ExecutionResult } from '../../core/execution/types.js';
import { parsePayload } from '../../core/payload.js';
import { loadStack } from '../../core/stack/repository.js';
import { createLogger } from '../../utils/logger.js';
import { resolveSettings, type PathFlags } from '../settings.js';
import { failure, printJson, stdoutSink, type CommandContext, type CommandResult } from './shared.js';

export interface ExecuteCommandOptions extends Omit<PathFlags, 'stacksDir' | 'vault'>, CommandContext {
  stack: string;
  payload?: string;
}

/**
 * `stackrelay execute <stack>`: run one stack standalone. Includes are not resolved and
 * routing is not checked; the result envelope is printed on stdout.
 */
export async function runExecuteCommand(opts: ExecuteCommandOptions): Promise<CommandResult<ExecutionResult>> {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;
  const logger = createLogger('execute', env);

  try {
    const settings = resolveSettings(opts, env, cwd);
    const payload = parsePayload(opts.payload ?? '{}');
    const stack = await loadStack(resolve(cwd, opts.stack));
    const config = await loadRelayConfig(settings, logger);

    const result = new ExecutionEngine(config).execute(stack, payload);
    logger.debug('stack executed', { stack: stack.file, weighted_total: result.evaluation.weighted_total });

    printJson(opts.out ?? stdoutSink, result);
    return { ok: true, value: result };
  } catch (err) {
    return failure(err);
  }
}
