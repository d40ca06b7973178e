/** The configuration document is missing, unreadable or structurally invalid. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConfigError';
  }

  readonly code = 'CONFIG_ERROR';
}

/** A single rule pattern could not be compiled; the rule is skipped. */
export class RulePatternError extends Error {
  constructor(
    message: string,
    public readonly pattern: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RulePatternError';
  }

  readonly code = 'RULE_PATTERN_ERROR';
}

/** The host's tool-call payload could not be turned into a request. */
export class PayloadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PayloadError';
  }

  readonly code = 'PAYLOAD_ERROR';
}
