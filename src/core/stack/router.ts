import { extname, join } from 'node:path';

import { NoMatchingStackError, RoutingMismatchError } from '../errors.js';
import { displayValue } from '../payload.js';
import { listSorted } from '../../utils/fs.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { loadResolvedStack } from './repository.js';
import type { ResolvedStack, StackRouting } from './types.js';

const STACK_EXTS = new Set(['.yaml', '.yml']);

export interface SelectStackOptions {
  persona: string;
  role: string;
  stacksDir: string;
  /** Explicit stack reference; its routing must equal the request. */
  stackFile?: string;
  logger?: Logger;
}

/**
 * Pick exactly one stack for a persona/role pair.
 *
 * With `stackFile` the stack is loaded and its routing validated. Otherwise every
 * `*.yml`/`*.yaml` file in `stacksDir` is loaded in sorted filename order and the first
 * matching routing wins. Several stacks declaring the same routing are not rejected; the
 * earliest filename shadows the rest.
 */
export async function selectStack(opts: SelectStackOptions): Promise<ResolvedStack> {
  const logger = opts.logger ?? silentLogger;
  const { persona, role, stacksDir } = opts;

  if (opts.stackFile) {
    const stack = await loadResolvedStack(opts.stackFile, stacksDir);
    validateRouting(stack, persona, role);
    logger.debug('explicit stack accepted', { file: stack.file });
    return stack;
  }

  for (const path of await listStackFiles(stacksDir)) {
    const stack = await loadResolvedStack(path, stacksDir);
    if (routingMatches(stack.routing, persona, role)) {
      logger.debug('stack discovered', { file: path });
      return stack;
    }
  }
  throw new NoMatchingStackError(persona, role, stacksDir);
}

export function validateRouting(stack: ResolvedStack, persona: string, role: string): void {
  if (!routingMatches(stack.routing, persona, role)) {
    throw new RoutingMismatchError(
      { persona, role },
      { persona: shown(stack.routing?.persona), role: shown(stack.routing?.role) },
      stack.file
    );
  }
}

export function routingMatches(routing: StackRouting | null | undefined, persona: string, role: string): boolean {
  return routing?.persona === persona && routing?.role === role;
}

function shown(value: unknown): string | undefined {
  return value === undefined ? undefined : displayValue(value);
}

export async function listStackFiles(stacksDir: string): Promise<string[]> {
  const entries = await listSorted(stacksDir);
  return entries.filter((e) => STACK_EXTS.has(extname(e))).map((e) => join(stacksDir, e));
}
