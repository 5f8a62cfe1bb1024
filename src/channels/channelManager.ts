import { buildError } from '../core/errors.js';
import type { MessageConsumer } from '../core/types.js';
import type { CompiledPattern } from '../pattern/patternCompiler.js';
import { icons } from '../ui/theme.js';
import type { Display } from '../ui/display.js';
import { listChannels, type ChannelEntry } from './channelDirectory.js';
import { ChannelReader, type ChannelOutcome } from './channelReader.js';

export interface ChannelManagerOptions {
  root: string;
  filenamePattern: CompiledPattern | null;
  consumer: MessageConsumer;
  waitForDrain: () => Promise<void>;
  pollIntervalMs: number;
  display: Display;
}

/**
 * Keeps one reader attached to every matching channel under the root. The
 * root is polled so channels created later are picked up. A named pipe whose
 * writer went away is attached again on the next poll; a regular file is read
 * once. A channel that failed to read is retried on the next poll.
 *
 * Attach and detach are reported only for channels that carried at least one
 * line, so idle pipes reopened on every poll stay quiet.
 */
export class ChannelManager {
  private readonly options: ChannelManagerOptions;
  private readonly readers = new Map<string, ChannelReader>();
  private readonly activeChannels = new Set<string>();
  private readonly tasks = new Set<Promise<void>>();
  private readonly exhaustedFiles = new Set<string>();
  private timer: NodeJS.Timeout | null = null;
  private stopped = false;

  constructor(options: ChannelManagerOptions) {
    this.options = options;
  }

  get attachedChannels(): string[] {
    return Array.from(this.readers.values(), (reader) => reader.channel.name);
  }

  /**
   * Runs the first poll synchronously, so an unreadable root fails here, then
   * keeps polling on an interval.
   */
  start(): void {
    this.poll();
    this.timer = setInterval(() => {
      try {
        this.poll();
      } catch (error) {
        this.options.display.showWarning(buildError('scanning channels', error, { root: this.options.root }));
      }
    }, this.options.pollIntervalMs);
  }

  stop(): void {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    for (const reader of this.readers.values()) {
      reader.close();
    }
    this.options.display.stopWaiting();
  }

  /**
   * Attaches readers to channels not seen before. Returns the new ones.
   */
  poll(): ChannelEntry[] {
    const { root, filenamePattern } = this.options;
    const attached = listChannels(root, filenamePattern).filter(
      (channel) => !this.readers.has(channel.path) && !this.exhaustedFiles.has(channel.path)
    );
    for (const channel of attached) {
      this.attach(channel);
    }
    this.updateWaiting();
    return attached;
  }

  /**
   * Resolves when every reader attached so far has finished.
   */
  async whenIdle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all(this.tasks);
    }
  }

  private attach(channel: ChannelEntry): void {
    const { consumer, waitForDrain, display } = this.options;
    const reader = new ChannelReader({
      channel,
      consumer,
      waitForDrain,
      onActive: () => {
        this.activeChannels.add(channel.path);
        display.showNotice(`${icons.attached} attached ${channel.name}`);
        this.updateWaiting();
      },
      onInvalidLine: (lineNumber, error) => {
        display.showWarning(buildError('decoding event', error, { channel: channel.name, line: lineNumber }));
      },
    });
    this.readers.set(channel.path, reader);

    const task = reader
      .run()
      .then((outcome: ChannelOutcome) => {
        if (channel.kind === 'file') {
          this.exhaustedFiles.add(channel.path);
        }
        if (outcome === 'ended' && !this.stopped) {
          display.showNotice(`${icons.detached} detached ${channel.name}`);
        }
      })
      .catch((error: unknown) => {
        display.showWarning(buildError('reading channel', error, { channel: channel.name }));
      })
      .finally(() => {
        this.readers.delete(channel.path);
        this.activeChannels.delete(channel.path);
        this.tasks.delete(task);
        this.updateWaiting();
      });
    this.tasks.add(task);
  }

  private updateWaiting(): void {
    if (this.stopped) {
      return;
    }
    if (this.activeChannels.size === 0) {
      this.options.display.showWaiting(`Waiting for debug channels in ${this.options.root}`);
    } else {
      this.options.display.stopWaiting();
    }
  }
}
