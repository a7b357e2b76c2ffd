/**
 * Destinations for rendered text.
 */
import type { Writable } from 'node:stream';
import { RenderError, ErrorCodes } from '../../utils/errors.js';

/**
 * Anything that accepts text chunks. A `write` that throws aborts the render.
 */
export interface TextSink {
  write(chunk: string): void;
}

export interface StringSink extends TextSink {
  toString(): string;
}

export interface StreamSink extends TextSink {
  /**
   * Resolve once every accepted chunk has been handed off by the stream.
   *
   * @throws RenderError when the stream failed at any point
   */
  finish(): Promise<void>;
}

/**
 * Wrap a sink failure as a render failure, keeping the original as `cause`.
 */
export function toRenderError(error: unknown): RenderError {
  if (error instanceof RenderError) {
    return error;
  }
  return new RenderError(
    ErrorCodes.RENDER_WRITE_FAILED,
    `Failed to write rendered output: ${error instanceof Error ? error.message : String(error)}`,
    { cause: error }
  );
}

/**
 * Collect chunks in memory.
 */
export function createStringSink(): StringSink {
  const chunks: string[] = [];
  return {
    write(chunk: string): void {
      chunks.push(chunk);
    },
    toString(): string {
      return chunks.join('');
    },
  };
}

/**
 * Forward chunks to a writable stream such as `process.stdout`.
 *
 * Streams report failures asynchronously (write callback, `writableErrored`, `'error'`).
 * The first one is recorded, and every later `write` throws it as a RenderError, so a
 * render stops at the first chunk after the stream broke.
 */
export function createStreamSink(stream: Writable): StreamSink {
  let failure: Error | null = stream.errored;
  let pending = 0;
  let settle: (() => void) | undefined;

  const record = (error: Error): void => {
    if (failure === null) {
      failure = error;
    }
  };
  stream.on('error', record);

  const currentFailure = (): Error | null => {
    if (failure === null && stream.errored !== null) {
      failure = stream.errored;
    }
    if (failure === null && stream.destroyed) {
      failure = new Error('Stream was destroyed before the output was written');
    }
    return failure;
  };

  return {
    write(chunk: string): void {
      const error = currentFailure();
      if (error !== null) {
        throw toRenderError(error);
      }

      pending++;
      stream.write(chunk, (writeError?: Error | null) => {
        if (writeError) {
          record(writeError);
        }
        pending--;
        if (pending === 0 && settle !== undefined) {
          settle();
        }
      });
    },

    async finish(): Promise<void> {
      if (pending > 0) {
        await new Promise<void>((resolve) => {
          settle = resolve;
        });
      }

      const error = currentFailure();
      if (error === null) {
        stream.off('error', record);
        return;
      }

      throw toRenderError(error);
    },
  };
}
