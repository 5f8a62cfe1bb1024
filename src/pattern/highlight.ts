import type { StyledText } from '../ui/styledText.js';
import type { Color } from '../ui/theme.js';
import type { CompiledPattern, MatchSpan } from './patternCompiler.js';

export function findMatchSpans(text: StyledText, pattern: CompiledPattern): MatchSpan[] {
  return pattern.matchSpans(text.text);
}

/**
 * Overlays `color` on every match of `pattern` in the rendered text.
 * Returns false when nothing matched; the block must then be dropped.
 */
export function highlightMatches(text: StyledText, pattern: CompiledPattern, color: Color): boolean {
  const spans = findMatchSpans(text, pattern);
  if (spans.length === 0) {
    return false;
  }
  for (const span of spans) {
    text.overlay(span.offset, span.length, color);
  }
  return true;
}
