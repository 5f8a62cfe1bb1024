export type ErrorContextValue = string | number | boolean | null | undefined;

export type ErrorContext = Record<string, ErrorContextValue>;

/**
 * One diagnostic line: `Error <action>: <reason> (<Key> <value>, ...)`.
 * Only the first line of a multi-line error message is kept, and context
 * entries without a value are left out.
 */
export function buildError(action: string, error: unknown, context: ErrorContext = {}): string {
  const head = `Error ${action}: ${describeError(error)}`;
  const details = Object.entries(context).flatMap(([key, value]) =>
    value === undefined || value === null ? [] : [`${capitalize(key)} ${formatContextValue(value)}`]
  );
  return details.length > 0 ? `${head} (${details.join(', ')})` : head;
}

function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const [firstLine = ''] = error.message.split('\n');
  return firstLine.trim() || error.name;
}

/**
 * Bad command-line usage. The entry point reports it and exits with status 1.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type PatternLabel = 'filename' | 'data';

/**
 * A search pattern that does not compile.
 */
export class PatternSyntaxError extends Error {
  readonly label: PatternLabel;
  readonly pattern: string;
  readonly reason: string;

  constructor(label: PatternLabel, pattern: string, reason: string) {
    super(`Invalid ${label} pattern "${pattern}": ${reason}`);
    this.name = 'PatternSyntaxError';
    this.label = label;
    this.pattern = pattern;
    this.reason = reason;
  }
}

/**
 * A channel line that is not a decoded message event.
 */
export class EventDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EventDecodeError';
  }
}

function capitalize(key: string): string {
  return key.slice(0, 1).toUpperCase() + key.slice(1);
}

function formatContextValue(value: string | number | boolean): string {
  if (typeof value === 'string') {
    return value || '(empty)';
  }
  return String(value);
}
