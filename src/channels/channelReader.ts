import { constants, createReadStream, openSync } from 'node:fs';
import { Socket } from 'node:net';
import { createInterface, type Interface } from 'node:readline';
import type { Readable } from 'node:stream';
import { EventDecodeError } from '../core/errors.js';
import { endOfStreamMessage, type DecodedMessage, type MessageConsumer } from '../core/types.js';
import type { ChannelEntry } from './channelDirectory.js';
import { decodeEventLine } from './eventDecoder.js';

/**
 * How a reader finished. `empty` means the channel ended before carrying a
 * single line, which is what a named pipe without a writer does.
 */
export type ChannelOutcome = 'ended' | 'empty' | 'closed';

export interface ChannelReaderOptions {
  channel: ChannelEntry;
  consumer: MessageConsumer;
  waitForDrain: () => Promise<void>;
  /** Called once, when the first line arrives. */
  onActive?: () => void;
  onInvalidLine?: (lineNumber: number, error: EventDecodeError) => void;
}

/**
 * Streams one channel line by line into the consumer. When the writer of an
 * active channel goes away the consumer gets the end-of-stream marker.
 *
 * Named pipes are opened non-blocking and read as a socket, so a pipe that
 * nobody writes to never holds a threadpool thread.
 */
export class ChannelReader {
  readonly channel: ChannelEntry;
  private readonly consumer: MessageConsumer;
  private readonly waitForDrain: () => Promise<void>;
  private readonly onActive: () => void;
  private readonly onInvalidLine: (lineNumber: number, error: EventDecodeError) => void;
  private stream: Readable | null = null;
  private lines: Interface | null = null;
  private closed = false;

  constructor(options: ChannelReaderOptions) {
    this.channel = options.channel;
    this.consumer = options.consumer;
    this.waitForDrain = options.waitForDrain;
    this.onActive = options.onActive ?? (() => {});
    this.onInvalidLine = options.onInvalidLine ?? (() => {});
  }

  /**
   * Resolves once the channel ends or the reader is closed; rejects on a
   * read error.
   */
  async run(): Promise<ChannelOutcome> {
    const stream = this.open();
    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    this.stream = stream;
    this.lines = lines;

    const state: { failure: Error | null } = { failure: null };
    stream.on('error', (error) => {
      state.failure = error;
      lines.close();
    });

    let lineNumber = 0;
    try {
      for await (const line of lines) {
        lineNumber += 1;
        if (this.closed) {
          break;
        }
        if (lineNumber === 1) {
          this.onActive();
        }
        const message = this.decode(line, lineNumber);
        if (message && !this.consumer.accept(message)) {
          await this.waitForDrain();
        }
      }
    } finally {
      lines.close();
      stream.destroy();
    }

    if (state.failure) {
      throw state.failure;
    }
    if (this.closed) {
      return 'closed';
    }
    if (lineNumber === 0) {
      return 'empty';
    }
    this.consumer.accept(endOfStreamMessage());
    return 'ended';
  }

  close(): void {
    this.closed = true;
    this.lines?.close();
    this.stream?.destroy();
  }

  private open(): Readable {
    if (this.channel.kind === 'file') {
      return createReadStream(this.channel.path, { encoding: 'utf8' });
    }
    const fd = openSync(this.channel.path, constants.O_RDONLY | constants.O_NONBLOCK);
    const socket = new Socket({ fd, readable: true, writable: false });
    socket.setEncoding('utf8');
    return socket;
  }

  private decode(line: string, lineNumber: number): DecodedMessage | null {
    try {
      return decodeEventLine(line);
    } catch (error) {
      if (error instanceof EventDecodeError) {
        this.onInvalidLine(lineNumber, error);
        return null;
      }
      throw error;
    }
  }
}
