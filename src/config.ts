export const CLI_NAME = 'tracetail';
export const DEFAULT_FIFO_ROOT = '/var/mcrouter/fifos';
export const DEFAULT_POLL_INTERVAL_MS = 1000;

export interface TraceTailDefaults {
  fifoRoot: string;
  pollIntervalMs: number;
}

export interface TraceTailSettings {
  readonly fifoRoot: string;
  readonly filenamePattern: string;
  readonly dataPattern: string;
  readonly quiet: boolean;
  readonly pollIntervalMs: number;
}

export function pickEnv(env: NodeJS.ProcessEnv, suffix: string): string | null {
  const value = env[`TRACETAIL_${suffix}`];
  if (value && value.trim()) {
    return value.trim();
  }
  return null;
}

export function resolveDefaults(env: NodeJS.ProcessEnv = process.env): TraceTailDefaults {
  return {
    fifoRoot: pickEnv(env, 'FIFO_ROOT') ?? DEFAULT_FIFO_ROOT,
    pollIntervalMs: parsePollInterval(pickEnv(env, 'POLL_INTERVAL_MS')),
  };
}

function parsePollInterval(raw: string | null): number {
  if (!raw) {
    return DEFAULT_POLL_INTERVAL_MS;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : DEFAULT_POLL_INTERVAL_MS;
}
