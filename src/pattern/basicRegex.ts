/**
 * Translates a POSIX basic regular expression (BRE) into JavaScript RegExp
 * source.
 *
 * In a BRE, grouping and intervals are written `\(`…`\)` and `\{m,n\}`, while
 * `+ ? | ( ) { }` are ordinary characters. `*` is literal where there is
 * nothing to repeat. `^` anchors only at the start of the pattern or of a
 * group, and `$` only at the end of either. Syntax errors are thrown as
 * `SyntaxError` with a short reason.
 */

interface Token {
  text: string;
  repeatable: boolean;
  quantified: boolean;
  anchor?: '^' | '$';
}

interface Frame {
  tokens: Token[];
  group: number;
}

const CHARACTER_CLASSES: Record<string, string> = {
  alpha: 'a-zA-Z',
  digit: '0-9',
  alnum: 'a-zA-Z0-9',
  upper: 'A-Z',
  lower: 'a-z',
  space: ' \\t\\n\\r\\f\\v',
  blank: ' \\t',
  punct: '!-\\/:-@\\[-`{-~',
  print: '\\x20-\\x7e',
  graph: '\\x21-\\x7e',
  cntrl: '\\x00-\\x1f\\x7f',
  xdigit: '0-9A-Fa-f',
};

const SPECIAL_OUTSIDE_CLASS = /[\\^$.*+?()[\]{}|/]/;
const SPECIAL_INSIDE_CLASS = /[\\\]\[^-]/;

export function translateBasicRegex(pattern: string): string {
  const frames: Frame[] = [{ tokens: [], group: 0 }];
  const closedGroups = new Set<number>();
  let groupCount = 0;
  let index = 0;

  const top = (): Frame => {
    const frame = frames[frames.length - 1];
    if (!frame) {
      throw new SyntaxError('Unmatched \\)');
    }
    return frame;
  };

  const pushAtom = (text: string) => {
    top().tokens.push({ text, repeatable: true, quantified: false });
  };

  while (index < pattern.length) {
    const char = pattern.charAt(index);

    if (char === '\\') {
      const next = pattern.charAt(index + 1);
      if (!next) {
        throw new SyntaxError('Trailing backslash');
      }

      if (next === '(') {
        groupCount += 1;
        frames.push({ tokens: [], group: groupCount });
        index += 2;
        continue;
      }

      if (next === ')') {
        if (frames.length === 1) {
          throw new SyntaxError('Unmatched \\)');
        }
        const frame = top();
        frames.pop();
        closedGroups.add(frame.group);
        pushAtom(`(${joinTokens(frame.tokens)})`);
        index += 2;
        continue;
      }

      if (next === '{') {
        const interval = parseInterval(pattern, index + 2);
        applyQuantifier(top(), interval.quantifier, 'Invalid preceding regular expression');
        index = interval.end;
        continue;
      }

      if (next === '}') {
        throw new SyntaxError('Unmatched \\}');
      }

      if (/[1-9]/.test(next)) {
        const reference = Number(next);
        if (!closedGroups.has(reference)) {
          throw new SyntaxError('Invalid back reference');
        }
        pushAtom(`(?:\\${reference})`);
        index += 2;
        continue;
      }

      pushAtom(escapeLiteral(next));
      index += 2;
      continue;
    }

    if (char === '[') {
      const bracket = parseBracket(pattern, index + 1);
      pushAtom(bracket.text);
      index = bracket.end;
      continue;
    }

    if (char === '*') {
      const frame = top();
      const previous = frame.tokens[frame.tokens.length - 1];
      if (!previous || previous.anchor === '^') {
        pushAtom('\\*');
      } else {
        applyQuantifier(frame, '*', 'Invalid preceding regular expression');
      }
      index += 1;
      continue;
    }

    if (char === '^') {
      const frame = top();
      if (frame.tokens.length === 0) {
        frame.tokens.push({ text: '^', repeatable: false, quantified: false, anchor: '^' });
      } else {
        pushAtom('\\^');
      }
      index += 1;
      continue;
    }

    if (char === '$') {
      const atEnd = index === pattern.length - 1 || pattern.startsWith('\\)', index + 1);
      if (atEnd) {
        top().tokens.push({ text: '$', repeatable: false, quantified: false, anchor: '$' });
      } else {
        pushAtom('\\$');
      }
      index += 1;
      continue;
    }

    if (char === '.') {
      pushAtom('.');
      index += 1;
      continue;
    }

    pushAtom(escapeLiteral(char));
    index += 1;
  }

  if (frames.length > 1) {
    throw new SyntaxError('Unmatched \\(');
  }

  return joinTokens(top().tokens);
}

function joinTokens(tokens: Token[]): string {
  return tokens.map((token) => token.text).join('');
}

function applyQuantifier(frame: Frame, quantifier: string, emptyReason: string): void {
  const previous = frame.tokens[frame.tokens.length - 1];
  if (!previous || !previous.repeatable) {
    throw new SyntaxError(emptyReason);
  }
  previous.text = previous.quantified ? `(?:${previous.text})${quantifier}` : `${previous.text}${quantifier}`;
  previous.quantified = true;
}

function parseInterval(pattern: string, start: number): { quantifier: string; end: number } {
  const close = pattern.indexOf('\\}', start);
  if (close === -1) {
    throw new SyntaxError('Unmatched \\{');
  }
  const body = pattern.slice(start, close);
  const match = body.match(/^(\d+)(,(\d*))?$/);
  if (!match) {
    throw new SyntaxError('Invalid content of \\{\\}');
  }

  const min = Number(match[1]);
  const hasComma = Boolean(match[2]);
  const maxText = match[3] ?? '';
  const end = close + 2;

  if (!hasComma) {
    return { quantifier: `{${min}}`, end };
  }
  if (!maxText) {
    return { quantifier: `{${min},}`, end };
  }
  const max = Number(maxText);
  if (min > max) {
    throw new SyntaxError('Invalid range in \\{\\}');
  }
  return { quantifier: `{${min},${max}}`, end };
}

type BracketItem =
  | { kind: 'char'; value: string }
  | { kind: 'class'; value: string };

function parseBracket(pattern: string, start: number): { text: string; end: number } {
  let index = start;
  let negated = false;
  if (pattern.charAt(index) === '^') {
    negated = true;
    index += 1;
  }

  let first = true;

  const readItem = (): BracketItem => {
    const char = pattern.charAt(index);
    const next = pattern.charAt(index + 1);
    if (char === '[' && (next === ':' || next === '.' || next === '=')) {
      const terminator = `${next}]`;
      const close = pattern.indexOf(terminator, index + 2);
      if (close === -1) {
        throw new SyntaxError('Unmatched [ or [^');
      }
      const name = pattern.slice(index + 2, close);
      index = close + 2;
      if (next === ':') {
        const members = CHARACTER_CLASSES[name];
        if (!members) {
          throw new SyntaxError('Invalid character class name');
        }
        return { kind: 'class', value: members };
      }
      if (name.length !== 1) {
        throw new SyntaxError('Invalid collation character');
      }
      return { kind: 'char', value: name };
    }
    index += 1;
    return { kind: 'char', value: char };
  };

  let body = '';

  while (true) {
    if (index >= pattern.length) {
      throw new SyntaxError('Unmatched [ or [^');
    }
    const char = pattern.charAt(index);
    if (char === ']' && !first) {
      index += 1;
      break;
    }
    first = false;

    const item = readItem();
    const isRange =
      item.kind === 'char' &&
      pattern.charAt(index) === '-' &&
      index + 1 < pattern.length &&
      pattern.charAt(index + 1) !== ']';

    if (isRange) {
      index += 1;
      const endItem = readItem();
      if (endItem.kind !== 'char') {
        throw new SyntaxError('Invalid range end');
      }
      if (item.value.charCodeAt(0) > endItem.value.charCodeAt(0)) {
        throw new SyntaxError('Invalid range end');
      }
      body += `${escapeClassChar(item.value)}-${escapeClassChar(endItem.value)}`;
      continue;
    }

    body += item.kind === 'class' ? item.value : escapeClassChar(item.value);
  }

  return { text: `[${negated ? '^' : ''}${body}]`, end: index };
}

function escapeLiteral(char: string): string {
  return SPECIAL_OUTSIDE_CLASS.test(char) ? `\\${char}` : char;
}

function escapeClassChar(char: string): string {
  return SPECIAL_INSIDE_CLASS.test(char) ? `\\${char}` : char;
}
