import { ChannelManager } from '../channels/channelManager.js';
import { resolveDefaults, type TraceTailSettings } from '../config.js';
import { buildError, PatternSyntaxError, UsageError } from '../core/errors.js';
import { TerminalSink, type OutputStream, type TerminalSinkOptions } from '../output/terminalSink.js';
import { compilePattern } from '../pattern/patternCompiler.js';
import { TracePipeline } from '../pipeline/tracePipeline.js';
import { createRenderContext } from '../render/context.js';
import { display as defaultDisplay, type Display } from '../ui/display.js';
import { formatUsage, parseCliArguments } from './args.js';

export interface TraceTailLaunchOptions {
  argv: string[];
  env?: NodeJS.ProcessEnv;
  display?: Display;
  output?: OutputStream;
  sink?: TerminalSinkOptions;
}

export interface TraceTailSession {
  readonly settings: TraceTailSettings;
  readonly pipeline: TracePipeline;
  readonly channels: ChannelManager;
  stop(): void;
}

export type LaunchResult =
  | { status: 'exited'; exitCode: number }
  | { status: 'running'; session: TraceTailSession };

/**
 * Parses arguments, compiles both patterns and starts tailing the channel
 * root. Startup failures are reported as one line on stderr and turned into
 * exit status 1; nothing below this function exits the process.
 */
export function launchTraceTail(options: TraceTailLaunchOptions): LaunchResult {
  const display = options.display ?? defaultDisplay;
  try {
    return startSession(options, display);
  } catch (error) {
    if (error instanceof UsageError || error instanceof PatternSyntaxError) {
      display.showError(error.message);
    } else {
      display.showError(buildError('starting trace viewer', error));
    }
    return { status: 'exited', exitCode: 1 };
  }
}

function startSession(options: TraceTailLaunchOptions, display: Display): LaunchResult {
  const parsed = parseCliArguments(options.argv, resolveDefaults(options.env));
  if (parsed.kind === 'help') {
    display.showInfo(formatUsage());
    return { status: 'exited', exitCode: 0 };
  }
  const { settings } = parsed;

  const filenamePattern = compilePattern(settings.filenamePattern, 'filename');
  if (filenamePattern) {
    display.showInfo(`Filename pattern: ${filenamePattern.source}`);
  }

  const dataPattern = compilePattern(settings.dataPattern, 'data');
  if (dataPattern) {
    display.showInfo(`Data pattern: ${dataPattern.source}`);
  }

  const sink = new TerminalSink(options.output ?? process.stdout, options.sink);
  const pipeline = new TracePipeline({
    context: createRenderContext({ quiet: settings.quiet }),
    dataPattern,
    sink,
  });

  const channels = new ChannelManager({
    root: settings.fifoRoot,
    filenamePattern,
    consumer: pipeline,
    waitForDrain: () => pipeline.drained(),
    pollIntervalMs: settings.pollIntervalMs,
    display,
  });
  channels.start();

  return {
    status: 'running',
    session: {
      settings,
      pipeline,
      channels,
      stop: () => channels.stop(),
    },
  };
}
