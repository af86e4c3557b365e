import type { RelayConfig } from './config/types.js';
import { ExecutionEngine } from './execution/engine.js';
import type { ExecutionResult } from './execution/types.js';
import { checkInvariants, type GuardReport } from './invariants/guard.js';
import { selectStack } from './stack/router.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface RelayRequest {
  persona: string;
  role: string;
  /** Parsed request payload, before normalization. */
  payload: unknown;
  stacksDir: string;
  stackFile?: string;
  runDir: string;
}

/** What `relay.json` holds: the envelope plus the request that produced it. */
export interface RelayDocument {
  run_dir: string;
  stack_file: string;
  persona: string;
  role: string;
  payload: unknown;
  result: ExecutionResult;
  cfms: GuardReport;
}

export interface RelayDeps {
  config: RelayConfig;
  engine?: ExecutionEngine;
  logger?: Logger;
}

/**
 * One pass of the pipeline: route → invariant guard → execute → evaluate.
 *
 * Routing and loading failures propagate and leave nothing behind. The guard only annotates.
 */
export async function relay(request: RelayRequest, deps: RelayDeps): Promise<RelayDocument> {
  const logger = deps.logger ?? silentLogger;
  const engine = deps.engine ?? new ExecutionEngine(deps.config);

  const stack = await selectStack({
    persona: request.persona,
    role: request.role,
    stacksDir: request.stacksDir,
    stackFile: request.stackFile,
    logger
  });

  const cfms = checkInvariants(stack);
  if (cfms.status !== 'ok') {
    logger.warn(`invariants ${cfms.status}`, { stack: stack.file });
  }

  const result = engine.execute(stack, request.payload);
  logger.info('stack executed', {
    stack: result.stack_id,
    agents: Object.keys(result.outputs).length,
    weighted_total: result.evaluation.weighted_total
  });

  return {
    run_dir: request.runDir,
    stack_file: stack.file,
    persona: request.persona,
    role: request.role,
    payload: request.payload,
    result,
    cfms
  };
}
