import type { ChalkInstance, ForegroundColorName } from 'chalk';

/**
 * A terminal foreground color, or `default` for the terminal's own color.
 */
export type Color = ForegroundColorName | 'default';

export interface ColorScheme {
  blockDelimiter: Color;
  header: Color;
  attributeLabel: Color;
  attributeValue: Color;
  decoration: Color;
  match: Color;
  valueKey: Color;
  valueString: Color;
  valueNumber: Color;
  valueKeyword: Color;
  valuePunctuation: Color;
}

export const defaultColorScheme: Readonly<ColorScheme> = Object.freeze({
  blockDelimiter: 'yellow',
  header: 'whiteBright',
  attributeLabel: 'magenta',
  attributeValue: 'default',
  decoration: 'gray',
  match: 'redBright',
  valueKey: 'yellow',
  valueString: 'green',
  valueNumber: 'cyan',
  valueKeyword: 'blue',
  valuePunctuation: 'gray',
});

export function createColorScheme(overrides: Partial<ColorScheme> = {}): Readonly<ColorScheme> {
  return Object.freeze({ ...defaultColorScheme, ...overrides });
}

/**
 * Maps a color onto the matching style of a chalk instance. `default` leaves
 * the text unstyled.
 */
export function styleFor(instance: ChalkInstance, color: Color): (text: string) => string {
  if (color === 'default') {
    return (text) => text;
  }
  return instance[color];
}

/**
 * Styles for the tool's own diagnostics, separate from the message scheme.
 */
export const diagnosticColors = {
  error: 'red',
  warning: 'yellow',
  muted: 'gray',
} satisfies Record<string, Color>;

export const icons = {
  error: '✗',
  warning: '⚠',
  attached: '→',
  detached: '←',
};
