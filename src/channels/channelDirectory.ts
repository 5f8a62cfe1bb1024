import { existsSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import type { CompiledPattern } from '../pattern/patternCompiler.js';

export type ChannelKind = 'fifo' | 'file';

export interface ChannelEntry {
  name: string;
  path: string;
  kind: ChannelKind;
}

/**
 * Debug channels under `root`: named pipes and regular files whose name the
 * filename pattern finds a match in. A root that does not exist yet has no
 * channels.
 */
export function listChannels(root: string, filenamePattern: CompiledPattern | null): ChannelEntry[] {
  if (!existsSync(root)) {
    return [];
  }

  return readdirSync(root, { withFileTypes: true })
    .filter((entry) => entry.isFIFO() || entry.isFile())
    .filter((entry) => !filenamePattern || filenamePattern.test(entry.name))
    .map((entry): ChannelEntry => ({
      name: entry.name,
      path: join(root, entry.name),
      kind: entry.isFIFO() ? 'fifo' : 'file',
    }))
    .sort((left, right) => left.name.localeCompare(right.name));
}
