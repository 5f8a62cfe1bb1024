import { WriteStream } from 'node:tty';
import { Chalk, supportsColorStderr, type ChalkInstance, type ColorSupportLevel } from 'chalk';
import { createSpinner } from 'nanospinner';
import type { OutputStream } from '../output/terminalSink.js';
import { diagnosticColors, icons, styleFor, type Color } from './theme.js';

export interface DisplayOptions {
  stdout?: OutputStream;
  stderr?: OutputStream;
  /** Color level for stderr diagnostics. Defaults to what chalk detects. */
  colorLevel?: ColorSupportLevel;
}

/**
 * The tool's own messages. The trace stream owns stdout, so everything but
 * `showInfo` goes to stderr.
 *
 * While no channel is attached a spinner runs on stderr, but only when stderr
 * is a terminal.
 */
export class Display {
  private readonly stdout: OutputStream;
  private readonly stderr: OutputStream;
  private readonly chalk: ChalkInstance;
  private activeSpinner: ReturnType<typeof createSpinner> | null = null;

  constructor(options: DisplayOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    const detected = supportsColorStderr ? supportsColorStderr.level : 0;
    this.chalk = new Chalk({ level: options.colorLevel ?? detected });
  }

  showError(message: string) {
    this.writeDiagnostic(`${icons.error} ${message}`, diagnosticColors.error);
  }

  showWarning(message: string) {
    this.writeDiagnostic(`${icons.warning} ${message}`, diagnosticColors.warning);
  }

  showNotice(message: string) {
    this.writeDiagnostic(message, diagnosticColors.muted);
  }

  showInfo(message: string) {
    this.stdout.write(`${message}\n`);
  }

  showWaiting(message: string) {
    if (!(this.stderr instanceof WriteStream)) {
      return;
    }
    if (this.activeSpinner) {
      this.activeSpinner.update({ text: message });
      return;
    }
    this.activeSpinner = createSpinner(message, { stream: this.stderr }).start();
  }

  stopWaiting() {
    if (this.activeSpinner) {
      this.activeSpinner.clear();
      this.activeSpinner.reset();
      this.activeSpinner = null;
    }
  }

  get isWaiting(): boolean {
    return this.activeSpinner !== null;
  }

  private writeDiagnostic(line: string, color: Color) {
    this.stopWaiting();
    this.stderr.write(`${styleFor(this.chalk, color)(line)}\n`);
  }
}

export const display = new Display();
