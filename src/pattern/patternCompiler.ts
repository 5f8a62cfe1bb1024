import { PatternSyntaxError, type PatternLabel } from '../core/errors.js';
import { translateBasicRegex } from './basicRegex.js';

/**
 * A span of a searched text, in string indices.
 */
export interface MatchSpan {
  offset: number;
  length: number;
}

/**
 * A basic regular expression compiled once into a JavaScript RegExp.
 *
 * `.` matches any character including newlines, and `^`/`$` also match at
 * line boundaries, so a pattern can anchor on any line of a rendered block.
 */
export class CompiledPattern {
  readonly source: string;
  readonly expression: string;
  private readonly global: RegExp;
  private readonly single: RegExp;

  constructor(source: string, expression: string) {
    this.source = source;
    this.expression = expression;
    this.global = new RegExp(expression, 'gms');
    this.single = new RegExp(expression, 'ms');
  }

  /**
   * All non-overlapping matches, leftmost first. An empty match is reported
   * and the scan moves on by one character.
   */
  matchSpans(text: string): MatchSpan[] {
    const spans: MatchSpan[] = [];
    for (const match of text.matchAll(this.global)) {
      spans.push({ offset: match.index ?? 0, length: match[0].length });
    }
    return spans;
  }

  test(text: string): boolean {
    return this.single.test(text);
  }

  toString(): string {
    return this.source;
  }
}

/**
 * Compiles a search pattern. An empty pattern means "no pattern" and yields
 * null. Throws `PatternSyntaxError` when the pattern is malformed.
 */
export function compilePattern(source: string, label: PatternLabel): CompiledPattern | null {
  if (!source) {
    return null;
  }

  try {
    return new CompiledPattern(source, translateBasicRegex(source));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new PatternSyntaxError(label, source, error.message);
    }
    throw error;
  }
}
