import { BYTES_PER_SAMPLE, sampleCountOf, samplesToSeconds, secondsToSamples } from '../audio/pcm';
import { Logger } from '../logging/StructuredLogger';
import { AudioFrame, AudioWindow } from '../types';
import { ConfigurationError } from './errors';

export interface WindowerOptions {
  sampleRateHz: number;
  windowSeconds: number;
  overlapSeconds: number;
  minFlushSeconds: number;
}

const EMPTY = Buffer.alloc(0);

/**
 * Cuts a PCM stream into overlapping windows on a fixed grid. Window N always covers
 * samples [N * stride, N * stride + window), whatever the frame sizes were.
 */
export class Windower {
  private readonly windowSamples: number;
  private readonly strideSamples: number;
  private readonly minFlushSamples: number;
  private buffered: Buffer = EMPTY;
  private bufferStartSample = 0;
  private nextWindowIndex = 0;
  private emittedEndSample = 0;
  private flushed = false;

  public constructor(
    private readonly options: WindowerOptions,
    private readonly logger?: Logger
  ) {
    this.windowSamples = secondsToSamples(options.windowSeconds, options.sampleRateHz);
    this.strideSamples =
      this.windowSamples - secondsToSamples(options.overlapSeconds, options.sampleRateHz);
    this.minFlushSamples = secondsToSamples(options.minFlushSeconds, options.sampleRateHz);

    if (this.windowSamples <= 0 || this.strideSamples <= 0) {
      throw new ConfigurationError([
        `overlapSeconds (${options.overlapSeconds}) must be smaller than windowSeconds (${options.windowSeconds}).`
      ]);
    }
  }

  public get strideSeconds(): number {
    return samplesToSeconds(this.strideSamples, this.options.sampleRateHz);
  }

  /** Audio buffered past the start of the next window, in seconds. */
  public pendingSeconds(): number {
    return samplesToSeconds(
      Math.max(0, this.endSample() - this.nextWindowStartSample()),
      this.options.sampleRateHz
    );
  }

  /**
   * Appends the frame right away; the returned iterable cuts whichever windows are
   * complete as it is consumed. Windows left unconsumed are cut by a later push.
   */
  public push(frame: AudioFrame): Iterable<AudioWindow> {
    if (this.flushed) {
      throw new Error('Windower was already flushed');
    }

    this.append(frame);
    return this.takeReadyWindows();
  }

  /** The final partial window, at most once per session. */
  public flush(): AudioWindow | undefined {
    if (this.flushed) {
      return undefined;
    }

    this.flushed = true;
    const startSample = this.nextWindowStartSample();
    // Complete windows are normally cut before a flush; a stop can leave one uncut.
    const endSample = Math.min(this.endSample(), startSample + this.windowSamples);
    const tailSamples = endSample - startSample;

    if (endSample <= this.emittedEndSample || tailSamples < this.minFlushSamples) {
      this.buffered = EMPTY;
      return undefined;
    }

    const pcm = this.copyRange(startSample, endSample);
    this.buffered = EMPTY;
    this.bufferStartSample = endSample;

    return {
      index: this.nextWindowIndex,
      globalStart: samplesToSeconds(startSample, this.options.sampleRateHz),
      globalEnd: samplesToSeconds(endSample, this.options.sampleRateHz),
      pcm,
      isFinal: true
    };
  }

  private *takeReadyWindows(): Generator<AudioWindow> {
    while (!this.flushed && this.endSample() >= this.nextWindowStartSample() + this.windowSamples) {
      yield this.cutWindow();
    }
  }

  private append(frame: AudioFrame): void {
    const wholeBytes = sampleCountOf(frame.pcm) * BYTES_PER_SAMPLE;
    let pcm = wholeBytes === frame.pcm.length ? frame.pcm : frame.pcm.subarray(0, wholeBytes);
    const expectedSample = this.endSample();

    if (frame.startSample !== undefined && frame.startSample !== expectedSample) {
      if (frame.startSample > expectedSample) {
        const gapSamples = frame.startSample - expectedSample;
        this.logger?.warn('Audio gap padded with silence', {
          gapSamples,
          gapMs: Math.round((gapSamples / this.options.sampleRateHz) * 1000)
        });
        this.buffered = Buffer.concat([this.buffered, Buffer.alloc(gapSamples * BYTES_PER_SAMPLE)]);
      } else {
        const repeatedSamples = Math.min(expectedSample - frame.startSample, sampleCountOf(pcm));
        this.logger?.debug('Trimmed already-buffered audio from frame', { repeatedSamples });
        pcm = pcm.subarray(repeatedSamples * BYTES_PER_SAMPLE);
      }
    }

    if (pcm.length === 0) {
      return;
    }

    this.buffered = this.buffered.length === 0 ? Buffer.from(pcm) : Buffer.concat([this.buffered, pcm]);
  }

  private cutWindow(): AudioWindow {
    const index = this.nextWindowIndex;
    const startSample = this.nextWindowStartSample();
    const endSample = startSample + this.windowSamples;
    const pcm = this.copyRange(startSample, endSample);

    this.nextWindowIndex += 1;
    this.emittedEndSample = endSample;

    // Keep only what the next window needs: its start onward, i.e. the overlap.
    const nextStart = this.nextWindowStartSample();
    this.buffered = this.buffered.subarray((nextStart - this.bufferStartSample) * BYTES_PER_SAMPLE);
    this.bufferStartSample = nextStart;

    return {
      index,
      globalStart: samplesToSeconds(startSample, this.options.sampleRateHz),
      globalEnd: samplesToSeconds(endSample, this.options.sampleRateHz),
      pcm,
      isFinal: false
    };
  }

  private copyRange(startSample: number, endSample: number): Buffer {
    const from = (startSample - this.bufferStartSample) * BYTES_PER_SAMPLE;
    const to = (endSample - this.bufferStartSample) * BYTES_PER_SAMPLE;
    return Buffer.from(this.buffered.subarray(from, to));
  }

  private nextWindowStartSample(): number {
    return this.nextWindowIndex * this.strideSamples;
  }

  private endSample(): number {
    return this.bufferStartSample + sampleCountOf(this.buffered);
  }
}
