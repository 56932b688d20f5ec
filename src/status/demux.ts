// Splits the shell's merged output into what the user should see and the
// status payloads written by the reporter. Fed with decoded text chunks;
// each chunk is walked one code point at a time.
import { STATUS_CLOSE, STATUS_OPEN } from './markers.js';
import { logger } from '../shared/logger.js';

export type DemuxState = 'CAPTURING_OUTPUT' | 'CAPTURING_STATUS';

export interface DemuxResult {
  output: string;
  payloads: string[];
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

export interface DemuxHandlers {
  /** Visible text of each chunk, as soon as it is read. */
  onOutput?: (visible: string) => void;
  /** Each completed status payload. */
  onPayload?: (payload: string) => void;
}

export class StreamDemuxer {
  private state: DemuxState = 'CAPTURING_OUTPUT';
  private output = '';
  private pending = '';
  private carry = '';
  private readonly payloads: string[] = [];

  constructor(private readonly handlers: DemuxHandlers = {}) {}

  get currentState(): DemuxState {
    return this.state;
  }

  /** Consume a chunk and return the part of it that is visible output. */
  feed(chunk: string): string {
    let text = this.carry + chunk;
    this.carry = '';

    // A surrogate pair cut in half by the producer waits for its other half.
    if (text.length > 0 && isHighSurrogate(text.charCodeAt(text.length - 1))) {
      this.carry = text.slice(-1);
      text = text.slice(0, -1);
    }

    let visible = '';
    for (const codePoint of text) {
      visible += this.push(codePoint);
    }
    if (visible) this.handlers.onOutput?.(visible);
    return visible;
  }

  /** Signal end of stream. An unterminated payload is dropped. */
  end(): DemuxResult {
    if (this.carry) {
      this.push(this.carry);
      this.carry = '';
    }
    if (this.state === 'CAPTURING_STATUS') {
      logger.debug({ pending: this.pending }, 'Stream ended inside a status payload');
      this.pending = '';
      this.state = 'CAPTURING_OUTPUT';
    }
    return { output: this.output, payloads: [...this.payloads] };
  }

  private push(codePoint: string): string {
    if (this.state === 'CAPTURING_OUTPUT') {
      if (codePoint === STATUS_OPEN) {
        this.state = 'CAPTURING_STATUS';
        return '';
      }
      this.output += codePoint;
      return codePoint;
    }

    if (codePoint === STATUS_CLOSE) {
      this.payloads.push(this.pending);
      this.handlers.onPayload?.(this.pending);
      this.pending = '';
      this.state = 'CAPTURING_OUTPUT';
      return '';
    }
    this.pending += codePoint;
    return '';
  }
}

/** Run a demuxer over a whole stream of chunks. */
export async function demux(
  source: Iterable<string> | AsyncIterable<string>,
  onOutput?: (visible: string) => void
): Promise<DemuxResult> {
  const demuxer = new StreamDemuxer({ onOutput });
  for await (const chunk of source) {
    demuxer.feed(chunk);
  }
  return demuxer.end();
}
