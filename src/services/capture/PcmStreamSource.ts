import { Readable } from 'node:stream';
import { BYTES_PER_SAMPLE } from '../../audio/pcm';
import { Logger } from '../../logging/StructuredLogger';
import { AudioFrame } from '../../types';
import { AudioSource } from './AudioSource';

export interface PcmStreamSourceOptions {
  sampleRateHz: number;
  frameMs: number;
}

const toBuffer = (chunk: unknown): Buffer => {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }

  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }

  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'binary');
  }

  throw new TypeError(`Unsupported PCM chunk type: ${typeof chunk}`);
};

export const frameByteSize = (options: PcmStreamSourceOptions): number =>
  Math.max(1, Math.floor((options.sampleRateHz * options.frameMs) / 1000)) * BYTES_PER_SAMPLE;

/**
 * Re-chunks a raw s16le mono stream into fixed-duration frames stamped with their
 * sample position. A trailing partial frame is delivered as-is, minus any odd byte.
 */
export class PcmStreamSource implements AudioSource {
  private readonly frameBytes: number;
  private stopRequested = false;

  public constructor(
    private readonly stream: Readable,
    options: PcmStreamSourceOptions,
    private readonly logger?: Logger
  ) {
    if (options.frameMs <= 0) {
      throw new Error('frameMs must be positive.');
    }

    this.frameBytes = frameByteSize(options);
  }

  public async *frames(): AsyncGenerator<AudioFrame> {
    let pending = Buffer.alloc(0);
    let nextSample = 0;

    try {
      for await (const chunk of this.stream) {
        const bytes = toBuffer(chunk);
        pending = pending.length === 0 ? bytes : Buffer.concat([pending, bytes]);

        while (pending.length >= this.frameBytes) {
          const pcm = Buffer.from(pending.subarray(0, this.frameBytes));
          pending = pending.subarray(this.frameBytes);

          yield { pcm, startSample: nextSample };
          nextSample += this.frameBytes / BYTES_PER_SAMPLE;
        }
      }
    } catch (error) {
      // Destroying the stream from stop() ends iteration with a premature-close error.
      if (!this.stopRequested) {
        throw error;
      }
    }

    const tailBytes = pending.length - (pending.length % BYTES_PER_SAMPLE);
    if (tailBytes > 0) {
      yield { pcm: Buffer.from(pending.subarray(0, tailBytes)), startSample: nextSample };
    }

    this.logger?.debug('PCM stream ended', {
      samples: nextSample + tailBytes / BYTES_PER_SAMPLE,
      stopped: this.stopRequested
    });
  }

  public async stop(): Promise<void> {
    if (this.stopRequested) {
      return;
    }

    this.stopRequested = true;
    this.stream.destroy();
  }
}
