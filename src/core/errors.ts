export type StackRelayErrorCode = 'config_error' | 'no_matching_stack' | 'routing_mismatch' | 'payload_parse_error';

/**
 * Terminal pipeline failure. Any of these aborts the invocation before an envelope exists.
 */
export class StackRelayError extends Error {
  constructor(
    readonly code: StackRelayErrorCode,
    message: string,
    readonly details?: unknown
  ) {
    super(message);
    this.name = 'StackRelayError';
  }
}

/** A document is missing, is not a mapping, or has a malformed section. */
export class ConfigError extends StackRelayError {
  constructor(
    readonly path: string,
    message: string,
    details?: unknown
  ) {
    super('config_error', message, details);
    this.name = 'ConfigError';
  }
}

export class NoMatchingStackError extends StackRelayError {
  constructor(
    readonly persona: string,
    readonly role: string,
    readonly stacksDir: string
  ) {
    super('no_matching_stack', `No stack matches persona=${persona} role=${role} in ${stacksDir}`);
    this.name = 'NoMatchingStackError';
  }
}

export class RoutingMismatchError extends StackRelayError {
  constructor(
    readonly expected: { persona: string; role: string },
    readonly actual: { persona?: string; role?: string },
    readonly stackFile: string
  ) {
    super(
      'routing_mismatch',
      `Stack routing mismatch: expected persona=${expected.persona}, role=${expected.role}, ` +
        `got persona=${actual.persona ?? '(none)'}, role=${actual.role ?? '(none)'} in ${stackFile}`
    );
    this.name = 'RoutingMismatchError';
  }
}

export class PayloadParseError extends StackRelayError {
  constructor(
    readonly raw: string,
    readonly diagnostic: string
  ) {
    super('payload_parse_error', `Invalid payload JSON: ${diagnostic}`);
    this.name = 'PayloadParseError';
  }
}

export function isStackRelayError(err: unknown): err is StackRelayError {
  return err instanceof StackRelayError;
}
