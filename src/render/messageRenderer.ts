import { isEndOfStream, type DecodedMessage, type RenderContext } from '../core/types.js';
import { StyledText } from '../ui/styledText.js';
import { backslashify } from './escape.js';

/**
 * Lays out one decoded message as a `{ … }` block:
 *
 * ```
 * {
 *   set stored foo
 *   reqid: 0x1a
 *   flags: 0x801 [PHP_SERIALIZED, ZLIB_COMPRESSED]
 *   exptime: 120
 *   value size: 100 uncompressed, 50 compressed, 50.00% savings
 *   value: …
 * }
 * ```
 *
 * The end-of-stream marker renders as an empty block.
 */
export function renderMessage(message: DecodedMessage, context: RenderContext): StyledText {
  const out = new StyledText();
  if (isEndOfStream(message)) {
    return out;
  }

  const { scheme } = context;

  out.append('{\n', scheme.blockDelimiter);

  const header = formatMessageHeader(message);
  if (header) {
    out.append('  ');
    out.append(header, scheme.header);
  }

  out.append('\n  reqid: ', scheme.attributeLabel);
  out.append(`0x${message.requestId.toString(16)}`, scheme.attributeValue);
  out.append('\n  flags: ', scheme.attributeLabel);
  out.append(`0x${message.flags.toString(16)}`, scheme.attributeValue);
  if (message.flags !== 0n) {
    const descriptions = context.flagDecoder.describe(message.flags);
    if (descriptions.length > 0) {
      out.pushColor(scheme.decoration);
      out.append(' [');
      out.append(descriptions.join(', '));
      out.append(']');
      out.popColor();
    }
  }
  if (message.expiration) {
    out.append('\n  exptime: ', scheme.attributeLabel);
    out.append(String(message.expiration), scheme.attributeValue);
  }
  out.append('\n');

  if (message.value && message.value.length > 0) {
    renderValue(out, message.value, message.flags, context);
  }

  out.append('}\n', scheme.blockDelimiter);
  return out;
}

/**
 * Operation, result and escaped key, space separated, each only when known.
 */
export function formatMessageHeader(message: DecodedMessage): string {
  const tokens: string[] = [];
  if (message.operation) {
    tokens.push(message.operation);
  }
  if (message.result) {
    tokens.push(message.result);
  }
  if (message.key && message.key.length > 0) {
    tokens.push(backslashify(message.key));
  }
  return tokens.join(' ');
}

export function formatValueSize(rawSize: number, uncompressedSize: number): string {
  if (uncompressedSize === rawSize) {
    return String(rawSize);
  }
  if (uncompressedSize === 0) {
    return `0 uncompressed, ${rawSize} compressed`;
  }
  const savings = 100 - (100 * rawSize) / uncompressedSize;
  return `${uncompressedSize} uncompressed, ${rawSize} compressed, ${savings.toFixed(2)}% savings`;
}

function renderValue(out: StyledText, value: Uint8Array, flags: bigint, context: RenderContext): void {
  const { scheme } = context;
  const formatted = context.valueFormatter.format(value, flags, scheme);

  out.append('  value size: ', scheme.attributeLabel);
  out.append(formatValueSize(value.length, formatted.uncompressedSize), scheme.attributeValue);

  if (!context.quiet) {
    out.append('\n  value: ', scheme.attributeLabel);
    out.appendStyled(formatted.styled);
  }
  out.append('\n');
}
