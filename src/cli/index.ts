#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { existsSync } from 'node:fs';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { runRelayCommand } from './commands/relay.js';
import { runExecuteCommand } from './commands/execute.js';
import { runLogCommand } from './commands/log.js';
import { runDigestCommand, DEFAULT_WINDOW_DAYS } from './commands/digest.js';
import { runRunCommand } from './commands/run.js';
import type { CommandResult } from './commands/shared.js';
import { createRenderer, getRenderer } from './ui/renderer.js';

export function buildCli() {
  const program = new Command();

  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('stackrelay')
    .description('Route persona requests to declarative agent stacks, score the result and keep a run vault')
    .version(version, '-v, --version');

  program
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Machine-friendly output (no formatting)');

  program.hook('preAction', (thisCommand) => {
    const o = thisCommand.opts<{ verbose?: boolean; quiet?: boolean }>();
    process.env.STACKRELAY_VERBOSE = o.verbose ? '1' : '0';
    process.env.STACKRELAY_QUIET = o.quiet ? '1' : '0';
    createRenderer({ quiet: !!o.quiet });
  });

  // ── Pipeline Commands ────────────────────────────────────────────────────

  program
    .command('relay')
    .description('Route a request to its stack, execute it and print the relay document')
    .requiredOption('--persona <id>', 'Persona to route')
    .requiredOption('--role <id>', 'Role requested')
    .option('--payload <json>', 'JSON payload provided to the persona', '{}')
    .option('--stacks-dir <dir>', 'Directory holding stack YAML files')
    .option('--stack-file <path>', 'Explicit stack file (routing is still checked)')
    .requiredOption('--run-dir <dir>', "Directory for this run's artifacts")
    .option('--policies <path>', 'Policy catalog YAML')
    .option('--environment <path>', 'Environment YAML')
    .option('--rubric <path>', 'Rubric schema JSON')
    .action(async (opts: {
      persona: string;
      role: string;
      payload: string;
      stacksDir?: string;
      stackFile?: string;
      runDir: string;
      policies?: string;
      environment?: string;
      rubric?: string;
    }) => {
      report('Relay failed', await runRelayCommand(opts));
    });

  program
    .command('execute')
    .description('Execute one stack standalone and print the result envelope')
    .argument('<stack>', 'Path to the stack YAML file')
    .option('--payload <json>', 'JSON payload to feed the engine', '{}')
    .option('--policies <path>', 'Policy catalog YAML')
    .option('--environment <path>', 'Environment YAML')
    .option('--rubric <path>', 'Rubric schema JSON')
    .action(async (stack: string, opts: { payload: string; policies?: string; environment?: string; rubric?: string }) => {
      report('Execute failed', await runExecuteCommand({ stack, ...opts }));
    });

  program
    .command('run')
    .description('Full flow: new vault run, relay, record, snapshot the rubric, commit')
    .argument('<stack>', 'Path to the stack YAML file')
    .argument('<persona>', 'Persona to route')
    .argument('<role>', 'Role requested')
    .argument('[payload]', 'JSON payload', '{}')
    .option('--vault <dir>', 'Vault directory')
    .option('--policies <path>', 'Policy catalog YAML')
    .option('--environment <path>', 'Environment YAML')
    .option('--rubric <path>', 'Rubric schema JSON')
    .action(async (
      stack: string,
      persona: string,
      role: string,
      payload: string,
      opts: { vault?: string; policies?: string; environment?: string; rubric?: string }
    ) => {
      report('Run failed', await runRunCommand({ stack, persona, role, payload, ...opts }));
    });

  // ── Vault Commands ───────────────────────────────────────────────────────

  program
    .command('log')
    .description('Write logger.json for a run directory')
    .requiredOption('--run-dir <dir>', 'Run directory')
    .option('--record-env', 'Record execution environment details')
    .action(async (opts: { runDir: string; recordEnv?: boolean }) => {
      report('Log failed', await runLogCommand(opts));
    });

  program
    .command('digest')
    .description('Summarize recent vault runs into a digest')
    .option('--vault <dir>', 'Vault directory')
    .option('--output <path>', 'Digest output path (defaults to <vault>/digest.json)')
    .option('--window-days <n>', 'Look-back window in days', parseNonNegativeInt, DEFAULT_WINDOW_DAYS)
    .action(async (opts: { vault?: string; output?: string; windowDays: number }) => {
      report('Digest failed', await runDigestCommand(opts));
    });

  return program;
}

function report(title: string, res: CommandResult<unknown>): void {
  if (res.ok) return;
  getRenderer().error(title, String(res.details ?? 'unknown error'), res.tip ?? 'Try running with --verbose for more details.');
  process.exitCode = 1;
}

function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

function detectVersionSync(): string | null {
  try {
    const startDir = dirname(fileURLToPath(import.meta.url));

    let current = startDir;
    for (let i = 0; i < 8; i++) {
      const candidate = resolve(current, 'package.json');
      if (existsSync(candidate)) {
        const content = readFileSync(candidate, 'utf8');
        const parsed: unknown = JSON.parse(content);
        return typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string'
          ? parsed.version
          : null;
      }
      const parent = resolve(current, '..');
      if (parent === current) break;
      current = parent;
    }
    return null;
  } catch {
    return null;
  }
}

await buildCli().parseAsync(process.argv);
