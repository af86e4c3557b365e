import ora from 'ora';

/** Progress line for a long step; it ends in exactly one of `succeed` or `fail`. */
export interface SpinnerHandle {
  succeed(text?: string): void;
  fail(text?: string): void;
}

/**
 * Spinner on stderr, since stdout carries documents. Without a TTY, or under
 * `STACKRELAY_QUIET=1`, it prints plain lines instead.
 */
export function startSpinner(text: string): SpinnerHandle {
  const stream = process.stderr;

  if (!stream.isTTY || process.env.STACKRELAY_QUIET === '1') {
    stream.write(`  ${text}\n`);
    const line = (mark: string, t?: string): void => {
      if (t) stream.write(`  ${mark} ${t}\n`);
    };
    return {
      succeed: (t) => line('✔', t),
      fail: (t) => line('✖', t)
    };
  }

  const spinner = ora({ text, stream, indent: 2, isEnabled: true }).start();
  return {
    succeed: (t) => {
      spinner.succeed(t ?? text);
    },
    fail: (t) => {
      spinner.fail(t ?? text);
    }
  };
}
