import type { ColorScheme } from '../ui/theme.js';
import type { StyledText } from '../ui/styledText.js';

/**
 * Operation name that marks the end of a channel's stream. It carries no data.
 */
export const END_OF_STREAM_OPERATION = 'end';

export interface DecodedMessage {
  operation: string | null;
  result: string | null;
  key: Uint8Array | null;
  /** Unsigned 64-bit. */
  requestId: bigint;
  /** Unsigned 64-bit bit field. */
  flags: bigint;
  /** Zero means the message carries no expiration. */
  expiration: number;
  value: Uint8Array | null;
}

export interface FormattedValue {
  styled: StyledText;
  uncompressedSize: number;
}

export interface ValueFormatter {
  format(bytes: Uint8Array, flags: bigint, scheme: ColorScheme): FormattedValue;
}

export interface FlagDecoder {
  describe(flags: bigint): string[];
}

export interface RenderContext {
  readonly scheme: ColorScheme;
  readonly quiet: boolean;
  readonly valueFormatter: ValueFormatter;
  readonly flagDecoder: FlagDecoder;
}

/**
 * Receives decoded events one at a time. Returns false when the output side
 * asks the producer to wait for it to drain.
 */
export interface MessageConsumer {
  accept(message: DecodedMessage): boolean;
}

export function isEndOfStream(message: DecodedMessage): boolean {
  return message.operation === END_OF_STREAM_OPERATION;
}

export function endOfStreamMessage(): DecodedMessage {
  return {
    operation: END_OF_STREAM_OPERATION,
    result: null,
    key: null,
    requestId: 0n,
    flags: 0n,
    expiration: 0,
    value: null,
  };
}
