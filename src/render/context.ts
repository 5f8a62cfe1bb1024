import type { FlagDecoder, RenderContext, ValueFormatter } from '../core/types.js';
import { defaultColorScheme, type ColorScheme } from '../ui/theme.js';
import { DefaultFlagDecoder } from './flags.js';
import { DefaultValueFormatter } from './valueFormatter.js';

export interface RenderContextOptions {
  quiet?: boolean;
  scheme?: Readonly<ColorScheme>;
  valueFormatter?: ValueFormatter;
  flagDecoder?: FlagDecoder;
}

export function createRenderContext(options: RenderContextOptions = {}): RenderContext {
  return Object.freeze({
    scheme: options.scheme ?? defaultColorScheme,
    quiet: options.quiet ?? false,
    valueFormatter: options.valueFormatter ?? new DefaultValueFormatter(),
    flagDecoder: options.flagDecoder ?? new DefaultFlagDecoder(),
  });
}
