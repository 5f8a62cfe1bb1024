import type { Color } from './theme.js';

export interface TextRun {
  text: string;
  color: Color;
}

/**
 * Text buffer that carries a color for every character.
 *
 * Text is assembled with `append`/`appendStyled`, optionally under a scoped
 * default color (`pushColor`/`popColor`). Once assembled, `overlay` recolors
 * any range without regard to how the text was appended. Adjacent runs of the
 * same color are always merged, so `runs()` is canonical.
 *
 * Offsets are indices into `text`, the plain projection of every run.
 * `consume()` hands the runs to an output sink and seals the buffer.
 */
export class StyledText {
  private runList: TextRun[] = [];
  private plain = '';
  private readonly colorStack: Color[] = [];
  private sealed = false;

  constructor(text?: string, color?: Color) {
    if (text) {
      this.append(text, color);
    }
  }

  get text(): string {
    return this.plain;
  }

  get length(): number {
    return this.plain.length;
  }

  get isEmpty(): boolean {
    return this.plain.length === 0;
  }

  get consumed(): boolean {
    return this.sealed;
  }

  /**
   * Color used by `append` when no color is passed.
   */
  get currentColor(): Color {
    return this.colorStack[this.colorStack.length - 1] ?? 'default';
  }

  append(text: string, color?: Color): this {
    this.assertWritable('append');
    if (!text) {
      return this;
    }
    appendRun(this.runList, { text, color: color ?? this.currentColor });
    this.plain += text;
    return this;
  }

  appendStyled(other: StyledText): this {
    this.assertWritable('append');
    for (const run of other.runList) {
      appendRun(this.runList, run);
      this.plain += run.text;
    }
    return this;
  }

  pushColor(color: Color): this {
    this.assertWritable('push a color');
    this.colorStack.push(color);
    return this;
  }

  popColor(): this {
    this.assertWritable('pop a color');
    if (this.colorStack.length === 0) {
      throw new Error('popColor called without a matching pushColor');
    }
    this.colorStack.pop();
    return this;
  }

  /**
   * Recolors `[offset, offset + length)`. The text is unchanged; runs are
   * split at both ends of the range and merged again afterwards.
   */
  overlay(offset: number, length: number, color: Color): this {
    this.assertWritable('overlay');
    if (
      !Number.isInteger(offset) ||
      !Number.isInteger(length) ||
      offset < 0 ||
      length < 0 ||
      offset + length > this.plain.length
    ) {
      throw new RangeError(
        `overlay(${offset}, ${length}) is outside a text of length ${this.plain.length}`
      );
    }
    if (length === 0) {
      return this;
    }

    const end = offset + length;
    const next: TextRun[] = [];
    let position = 0;

    for (const run of this.runList) {
      const runStart = position;
      const runEnd = runStart + run.text.length;
      position = runEnd;

      if (runEnd <= offset || runStart >= end) {
        appendRun(next, run);
        continue;
      }

      const from = Math.max(0, offset - runStart);
      const to = Math.min(run.text.length, end - runStart);
      const before = run.text.slice(0, from);
      const after = run.text.slice(to);

      if (before) {
        appendRun(next, { text: before, color: run.color });
      }
      appendRun(next, { text: run.text.slice(from, to), color });
      if (after) {
        appendRun(next, { text: after, color: run.color });
      }
    }

    this.runList = next;
    return this;
  }

  colorAt(offset: number): Color {
    if (!Number.isInteger(offset) || offset < 0 || offset >= this.plain.length) {
      throw new RangeError(`offset ${offset} is outside a text of length ${this.plain.length}`);
    }
    let position = 0;
    for (const run of this.runList) {
      position += run.text.length;
      if (offset < position) {
        return run.color;
      }
    }
    throw new RangeError(`offset ${offset} is not covered by any run`);
  }

  runs(): TextRun[] {
    return this.runList.map((run) => ({ ...run }));
  }

  /**
   * Returns the runs and seals the buffer. A StyledText is consumed once.
   */
  consume(): TextRun[] {
    this.assertWritable('consume');
    if (this.colorStack.length > 0) {
      throw new Error(`${this.colorStack.length} pushColor call(s) were never popped`);
    }
    this.sealed = true;
    return this.runs();
  }

  toString(): string {
    return this.plain;
  }

  private assertWritable(action: string): void {
    if (this.sealed) {
      throw new Error(`Cannot ${action}: styled text was already consumed`);
    }
  }
}

function appendRun(target: TextRun[], run: TextRun): void {
  if (!run.text) {
    return;
  }
  const last = target[target.length - 1];
  if (last && last.color === run.color) {
    last.text += run.text;
    return;
  }
  target.push({ text: run.text, color: run.color });
}
