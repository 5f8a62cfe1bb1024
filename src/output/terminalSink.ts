import { once } from 'node:events';
import type { Writable } from 'node:stream';
import { Chalk, supportsColor, type ChalkInstance, type ColorSupportLevel } from 'chalk';
import type { StyledText } from '../ui/styledText.js';
import { styleFor } from '../ui/theme.js';

export type OutputStream = Writable & { isTTY?: boolean };

export interface OutputSink {
  /**
   * Consumes the block and writes it out. Returns false when the destination
   * wants the producer to wait for `drained()`.
   */
  write(text: StyledText): boolean;
  drained(): Promise<void>;
}

export interface TerminalSinkOptions {
  colorLevel?: ColorSupportLevel;
}

/**
 * Chalk's detected level applies to stdout, and to any other stream that is
 * a TTY. Everything else gets plain text.
 */
export function detectColorLevel(stream: OutputStream): ColorSupportLevel {
  if (!supportsColor) {
    return 0;
  }
  if (stream === process.stdout || stream.isTTY === true) {
    return supportsColor.level;
  }
  return 0;
}

/**
 * Writes each block as one chunk, translating run colors into chalk styles.
 * Nothing is buffered between blocks.
 */
export class TerminalSink implements OutputSink {
  private readonly stream: OutputStream;
  private readonly chalk: ChalkInstance;

  constructor(stream: OutputStream, options: TerminalSinkOptions = {}) {
    this.stream = stream;
    this.chalk = new Chalk({ level: options.colorLevel ?? detectColorLevel(stream) });
  }

  get colorLevel(): ColorSupportLevel {
    return this.chalk.level;
  }

  write(text: StyledText): boolean {
    const chunk = text
      .consume()
      .map((run) => styleFor(this.chalk, run.color)(run.text))
      .join('');
    if (!chunk) {
      return true;
    }
    return this.stream.write(chunk);
  }

  async drained(): Promise<void> {
    if (!this.stream.writableNeedDrain) {
      return;
    }
    await once(this.stream, 'drain');
  }
}
