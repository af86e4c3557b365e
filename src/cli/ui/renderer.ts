import type { Digest } from '../../core/digest/types.js';
import { displayValue } from '../../core/payload.js';
import type { RelayDocument } from '../../core/relay.js';
import { coloredScore, drawBox, keyValue, padRight, rule } from './format.js';
import { startSpinner, type SpinnerHandle } from './spinner.js';
import { INDENT, theme } from './theme.js';

/**
 * Human-facing output of the CLI, always on stderr. Documents a command produces go to
 * stdout separately.
 *
 * `InteractiveRenderer` draws colored summaries; `QuietRenderer` (`--quiet`) writes one
 * JSON object per event instead.
 */
export interface Renderer {
  relaySummary(doc: RelayDocument, written: string[]): void;
  digestSummary(digest: Digest, outputPath: string): void;
  runComplete(info: RunCompleteInfo): void;
  success(message: string): void;
  warn(message: string): void;
  error(title: string, details: string, tip?: string): void;
  spinner(message: string): SpinnerHandle;
}

export type VaultOutcome = 'committed' | 'nothing_to_commit' | 'not_a_repository' | 'failed';

export interface RunCompleteInfo {
  runDir: string;
  label: string;
  stackId: unknown;
  weightedTotal: number;
  vault: VaultOutcome;
}

function stackLabel(stackId: unknown): string | null {
  return stackId === null || stackId === undefined ? null : displayValue(stackId);
}

export class InteractiveRenderer implements Renderer {
  private writeln(msg = ''): void {
    process.stderr.write(`${msg}\n`);
  }

  relaySummary(doc: RelayDocument, written: string[]): void {
    const { result, cfms } = doc;
    const total = result.evaluation.weighted_total;
    this.writeln();
    this.writeln(
      drawBox('Relay', [
        `${theme.dim('Stack')}      ${stackLabel(result.stack_id) ?? theme.dim('(no id)')}`,
        `${theme.dim('Route')}      ${doc.persona} ${theme.arrow} ${doc.role}`,
        `${theme.dim('Invariants')} ${theme.guard(cfms.status)(cfms.status)}`,
        `${theme.dim('Agents')}     ${Object.keys(result.outputs).length}`,
        `${theme.dim('Score')}      ${coloredScore(total)}`
      ])
    );

    const criteria = Object.entries(result.evaluation.criteria);
    if (criteria.length > 0) this.writeln();
    for (const [key, c] of criteria) {
      this.writeln(`${INDENT}${theme.bullet} ${padRight(key, 20)}${coloredScore(c.score)} ${theme.dim(`× ${c.weight}`)}`);
    }

    if (written.length > 0) this.writeln();
    for (const path of written) {
      this.writeln(`${INDENT}${theme.check} ${theme.dim(path)}`);
    }
    this.writeln();
  }

  digestSummary(digest: Digest, outputPath: string): void {
    this.writeln();
    this.writeln(keyValue('Window', `${digest.window_days} days`));
    this.writeln(keyValue('Runs', String(digest.runs_considered)));
    const scores = Object.entries(digest.average_scores);
    if (scores.length > 0) this.writeln(`${INDENT}${rule(40)}`);
    for (const [key, value] of scores) {
      this.writeln(keyValue(key, coloredScore(value), 22));
    }
    this.writeln();
    this.writeln(`${INDENT}${theme.check} Digest written to ${theme.bold(outputPath)}`);
    this.writeln();
  }

  runComplete(info: RunCompleteInfo): void {
    const vault: Record<VaultOutcome, string> = {
      committed: theme.success(`committed (Run ${info.label})`),
      nothing_to_commit: theme.dim('nothing to commit'),
      not_a_repository: theme.dim('not a git repository, skipped'),
      failed: theme.warning('commit failed')
    };
    this.writeln();
    this.writeln(`${INDENT}${theme.success(theme.bold('RUN COMPLETE'))}`);
    this.writeln();
    this.writeln(keyValue('Stack', stackLabel(info.stackId) ?? '(no id)'));
    this.writeln(keyValue('Score', coloredScore(info.weightedTotal)));
    this.writeln(keyValue('Run', info.runDir));
    this.writeln(keyValue('Vault', vault[info.vault]));
    this.writeln();
  }

  success(message: string): void {
    this.writeln(`${INDENT}${theme.check} ${message}`);
  }

  warn(message: string): void {
    this.writeln(`${INDENT}${theme.warning('⚠')} ${message}`);
  }

  error(title: string, details: string, tip?: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.error(theme.bold('ERROR'))}  ${title}`);
    this.writeln();
    for (const line of details.split('\n')) this.writeln(`${INDENT}${line}`);
    if (tip) {
      this.writeln();
      this.writeln(`${INDENT}${theme.dim('Tip:')} ${tip}`);
    }
    this.writeln();
  }

  spinner(message: string): SpinnerHandle {
    return startSpinner(message);
  }
}

export class QuietRenderer implements Renderer {
  private emit(type: string, data: Record<string, unknown> = {}): void {
    process.stderr.write(`${JSON.stringify({ type, timestamp: new Date().toISOString(), ...data })}\n`);
  }

  relaySummary(doc: RelayDocument, written: string[]): void {
    this.emit('relay_complete', {
      stack_id: stackLabel(doc.result.stack_id),
      persona: doc.persona,
      role: doc.role,
      invariants: doc.cfms.status,
      weighted_total: doc.result.evaluation.weighted_total,
      written
    });
  }

  digestSummary(digest: Digest, outputPath: string): void {
    this.emit('digest_complete', {
      runs_considered: digest.runs_considered,
      average_scores: digest.average_scores,
      output: outputPath
    });
  }

  runComplete(info: RunCompleteInfo): void {
    this.emit('run_complete', { ...info, stackId: stackLabel(info.stackId) });
  }

  success(message: string): void {
    this.emit('success', { message });
  }

  warn(message: string): void {
    this.emit('warning', { message });
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, tip });
  }

  spinner(message: string): SpinnerHandle {
    this.emit('spinner_start', { message });
    return {
      succeed: (t) => this.emit('spinner_succeed', { message: t ?? message }),
      fail: (t) => this.emit('spinner_fail', { message: t ?? message })
    };
  }
}

let current: Renderer | null = null;

/** The process-wide renderer; interactive unless `STACKRELAY_QUIET=1`. */
export function getRenderer(): Renderer {
  if (!current) {
    current = process.env.STACKRELAY_QUIET === '1' ? new QuietRenderer() : new InteractiveRenderer();
  }
  return current;
}

export function setRenderer(renderer: Renderer): void {
  current = renderer;
}

export function createRenderer(opts: { quiet?: boolean } = {}): Renderer {
  const renderer = opts.quiet ? new QuietRenderer() : new InteractiveRenderer();
  setRenderer(renderer);
  return renderer;
}
