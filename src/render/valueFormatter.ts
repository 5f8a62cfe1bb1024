import { inflateSync } from 'node:zlib';
import type { FormattedValue, ValueFormatter } from '../core/types.js';
import { StyledText } from '../ui/styledText.js';
import type { ColorScheme } from '../ui/theme.js';
import { backslashify } from './escape.js';
import { hasFlag, ZLIB_COMPRESSED_FLAG } from './flags.js';

// Continuation lines of a value sit under the "value:" label.
const BASE_INDENT = '  ';
const INDENT_STEP = '  ';

/**
 * Inflates zlib-compressed values, pretty-prints JSON objects and arrays with
 * the scheme's value colors, and escapes anything else. Pretty-printing only
 * changes whitespace.
 */
export class DefaultValueFormatter implements ValueFormatter {
  format(bytes: Uint8Array, flags: bigint, scheme: ColorScheme): FormattedValue {
    const inflated = hasFlag(flags, ZLIB_COMPRESSED_FLAG) ? tryInflate(bytes) : null;
    const data = inflated ?? bytes;
    const styled = new StyledText();

    const tokens = tokenizeStructured(data);
    if (tokens) {
      writeJson(styled, tokens, scheme);
    } else {
      styled.append(backslashify(data), scheme.attributeValue);
    }

    return { styled, uncompressedSize: data.length };
  }
}

function tryInflate(bytes: Uint8Array): Uint8Array | null {
  try {
    return inflateSync(bytes);
  } catch {
    return null;
  }
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

type JsonTokenKind = 'punctuation' | 'string' | 'number' | 'keyword';

interface JsonToken {
  kind: JsonTokenKind;
  text: string;
}

const JSON_TOKEN =
  /\s*(?:("(?:[^"\\]|\\.)*")|(-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)|(true|false|null)|([{}[\]:,]))/y;

/**
 * Tokens of a JSON object or array, spelled exactly as stored. Returns null
 * for anything else. `JSON.parse` only checks well-formedness.
 */
function tokenizeStructured(bytes: Uint8Array): JsonToken[] | null {
  let text: string;
  try {
    text = utf8.decode(bytes).trim();
  } catch {
    return null;
  }
  if (!(text.startsWith('{') && text.endsWith('}')) && !(text.startsWith('[') && text.endsWith(']'))) {
    return null;
  }
  try {
    JSON.parse(text);
  } catch {
    return null;
  }

  const tokens: JsonToken[] = [];
  JSON_TOKEN.lastIndex = 0;
  while (JSON_TOKEN.lastIndex < text.length) {
    const match = JSON_TOKEN.exec(text);
    if (!match) {
      return null;
    }
    const [, quoted, numeric, keyword, punctuation] = match;
    if (quoted !== undefined) {
      tokens.push({ kind: 'string', text: quoted });
    } else if (numeric !== undefined) {
      tokens.push({ kind: 'number', text: numeric });
    } else if (keyword !== undefined) {
      tokens.push({ kind: 'keyword', text: keyword });
    } else if (punctuation !== undefined) {
      tokens.push({ kind: 'punctuation', text: punctuation });
    }
  }
  return tokens;
}

const CLOSING: Record<string, string> = { '{': '}', '[': ']' };

function newline(out: StyledText, depth: number): void {
  out.append(`\n${BASE_INDENT}${INDENT_STEP.repeat(depth)}`, 'default');
}

function writeJson(out: StyledText, tokens: JsonToken[], scheme: ColorScheme): void {
  let depth = 0;
  for (let index = 0; index < tokens.length; index += 1) {
    const token = tokens[index];
    if (!token) {
      continue;
    }
    const next = tokens[index + 1];

    switch (token.kind) {
      case 'string':
        out.append(token.text, next?.text === ':' ? scheme.valueKey : scheme.valueString);
        break;
      case 'number':
        out.append(token.text, scheme.valueNumber);
        break;
      case 'keyword':
        out.append(token.text, scheme.valueKeyword);
        break;
      case 'punctuation': {
        const closing = CLOSING[token.text];
        if (closing !== undefined) {
          if (next?.text === closing) {
            out.append(`${token.text}${closing}`, scheme.valuePunctuation);
            index += 1;
          } else {
            out.append(token.text, scheme.valuePunctuation);
            depth += 1;
            newline(out, depth);
          }
        } else if (token.text === '}' || token.text === ']') {
          depth -= 1;
          newline(out, depth);
          out.append(token.text, scheme.valuePunctuation);
        } else if (token.text === ',') {
          out.append(',', scheme.valuePunctuation);
          newline(out, depth);
        } else {
          out.append(':', scheme.valuePunctuation);
          out.append(' ', 'default');
        }
        break;
      }
    }
  }
}
