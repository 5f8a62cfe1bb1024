import type { DecodedMessage, MessageConsumer, RenderContext } from '../core/types.js';
import type { OutputSink } from '../output/terminalSink.js';
import { highlightMatches } from '../pattern/highlight.js';
import type { CompiledPattern } from '../pattern/patternCompiler.js';
import { renderMessage } from '../render/messageRenderer.js';

export interface TracePipelineOptions {
  context: RenderContext;
  dataPattern: CompiledPattern | null;
  sink: OutputSink;
}

/**
 * Render, filter and highlight, then write. One message in, at most one
 * block out.
 */
export class TracePipeline implements MessageConsumer {
  private readonly context: RenderContext;
  private readonly dataPattern: CompiledPattern | null;
  private readonly sink: OutputSink;

  constructor(options: TracePipelineOptions) {
    this.context = options.context;
    this.dataPattern = options.dataPattern;
    this.sink = options.sink;
  }

  accept(message: DecodedMessage): boolean {
    const block = renderMessage(message, this.context);
    if (block.isEmpty) {
      return true;
    }
    if (this.dataPattern && !highlightMatches(block, this.dataPattern, this.context.scheme.match)) {
      return true;
    }
    return this.sink.write(block);
  }

  drained(): Promise<void> {
    return this.sink.drained();
  }
}
