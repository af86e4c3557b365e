import { isStackRelayError, type StackRelayErrorCode } from '../../core/errors.js';
import { stringifyJson } from '../../utils/json.js';

export interface CommandResult<T = undefined> {
  ok: boolean;
  value?: T;
  details?: unknown;
  tip?: string;
}

/** Where a command writes its machine-readable document. */
export type OutputSink = (text: string) => void;

export const stdoutSink: OutputSink = (text) => {
  process.stdout.write(text);
};

export interface CommandContext {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  out?: OutputSink;
}

const TIPS: Record<StackRelayErrorCode, string> = {
  config_error: 'Check the YAML/JSON document named above; top-level documents must be mappings.',
  no_matching_stack: 'Add a stack whose routing matches, or pass --stack-file explicitly.',
  routing_mismatch: "The explicit stack's routing must equal --persona and --role.",
  payload_parse_error: "Quote the payload for your shell, e.g. --payload '{\"intent\":\"...\"}'."
};

export function printJson(out: OutputSink, value: unknown): void {
  out(`${stringifyJson(value, 2)}\n`);
}

/**
 * Convert a terminal error into a failed command result. Pipeline errors carry a tip keyed by code.
 */
export function failure<T>(err: unknown): CommandResult<T> {
  if (isStackRelayError(err)) {
    return { ok: false, details: err.message, tip: TIPS[err.code] };
  }
  return { ok: false, details: err instanceof Error ? err.message : String(err) };
}
