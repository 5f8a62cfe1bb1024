import { CLI_NAME, type TraceTailDefaults, type TraceTailSettings } from '../config.js';
import { UsageError } from '../core/errors.js';

export type ParsedCliArguments =
  | { kind: 'help' }
  | { kind: 'run'; settings: TraceTailSettings };

interface OptionSpec {
  long: string;
  short: string;
  value?: string;
  description: string;
}

const OPTIONS: OptionSpec[] = [
  { long: '--help', short: '-h', description: 'Print this help message.' },
  {
    long: '--fifo-root',
    short: '-f',
    value: 'DIR',
    description: "Path of the debug channels' directory.",
  },
  {
    long: '--filename-pattern',
    short: '-P',
    value: 'PATTERN',
    description: 'Basic regular expression (BRE) to match the name of the channels.',
  },
  { long: '--quiet', short: '-q', description: "Doesn't display values." },
];

export function formatUsage(): string {
  const lines = [
    `Usage: ${CLI_NAME} [OPTION]... [PATTERN]`,
    'Search for PATTERN in each debug channel in the channel root directory',
    '(see --fifo-root).',
    'If PATTERN is not provided, match everything.',
    'PATTERN is a basic regular expression (BRE), matched against the rendered message.',
    '',
    'Allowed options:',
  ];
  const labels = OPTIONS.map((option) =>
    option.value ? `${option.short}, ${option.long} ${option.value}` : `${option.short}, ${option.long}`
  );
  const width = Math.max(...labels.map((label) => label.length));
  OPTIONS.forEach((option, index) => {
    const label = labels[index] ?? option.long;
    lines.push(`  ${label.padEnd(width)}  ${option.description}`);
  });
  return lines.join('\n');
}

export function parseCliArguments(argv: string[], defaults: TraceTailDefaults): ParsedCliArguments {
  let fifoRoot = defaults.fifoRoot;
  let filenamePattern = '';
  let quiet = false;
  const positional: string[] = [];

  const expectValue = (flag: string, value: string | undefined): string => {
    if (value !== undefined) {
      return value;
    }
    throw new UsageError(`Missing value for ${flag}.`);
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === undefined) {
      continue;
    }

    if (token === '--') {
      positional.push(...argv.slice(index + 1));
      break;
    }

    if (token === '--help' || token === '-h') {
      return { kind: 'help' };
    }

    if (token === '--quiet' || token === '-q') {
      quiet = true;
      continue;
    }

    if (token === '--fifo-root' || token === '-f') {
      fifoRoot = expectValue(token, argv[index + 1]);
      index += 1;
      continue;
    }

    if (token.startsWith('--fifo-root=')) {
      fifoRoot = token.slice('--fifo-root='.length);
      continue;
    }

    if (token === '--filename-pattern' || token === '-P') {
      filenamePattern = expectValue(token, argv[index + 1]);
      index += 1;
      continue;
    }

    if (token.startsWith('--filename-pattern=')) {
      filenamePattern = token.slice('--filename-pattern='.length);
      continue;
    }

    if (token.startsWith('-') && token !== '-') {
      throw new UsageError(`Unknown option ${token}.`);
    }

    positional.push(token);
  }

  if (positional.length > 1) {
    throw new UsageError(`Expected at most one PATTERN, got ${positional.length}.`);
  }
  if (!fifoRoot.trim()) {
    throw new UsageError("Channel directory (--fifo-root) can't be empty.");
  }

  return {
    kind: 'run',
    settings: Object.freeze({
      fifoRoot,
      filenamePattern,
      dataPattern: positional[0] ?? '',
      quiet,
      pollIntervalMs: defaults.pollIntervalMs,
    }),
  };
}
