import { BYTES_PER_SAMPLE } from '../audio/pcm';
import { EngineFailure } from '../core/errors';
import { LogContext, Logger, LogLevel } from '../logging/StructuredLogger';
import { EngineAdapter, EngineResult, PreloadResult } from '../services/asr/EngineAdapter';
import { AudioSource } from '../services/capture/AudioSource';
import { AudioFrame, GlobalSegment, LocalSegment, TranscriptSink } from '../types';

export const SAMPLE_RATE = 16000;

/** Square wave: RMS and peak both equal `amplitude`. */
export const squareWave = (seconds: number, amplitude: number, sampleRate = SAMPLE_RATE): Buffer => {
  const samples = Math.round(seconds * sampleRate);
  const pcm = Buffer.alloc(samples * BYTES_PER_SAMPLE);
  for (let index = 0; index < samples; index += 1) {
    pcm.writeInt16LE(index % 2 === 0 ? amplitude : -amplitude, index * BYTES_PER_SAMPLE);
  }
  return pcm;
};

export const silence = (seconds: number, sampleRate = SAMPLE_RATE): Buffer =>
  Buffer.alloc(Math.round(seconds * sampleRate) * BYTES_PER_SAMPLE);

/** Splits PCM into frames of `frameMs`, each stamped with its first sample. */
export const toFrames = (pcm: Buffer, frameMs = 100, sampleRate = SAMPLE_RATE): AudioFrame[] => {
  const frameBytes = Math.round((sampleRate * frameMs) / 1000) * BYTES_PER_SAMPLE;
  const frames: AudioFrame[] = [];
  for (let offset = 0; offset < pcm.length; offset += frameBytes) {
    frames.push({
      pcm: pcm.subarray(offset, Math.min(pcm.length, offset + frameBytes)),
      startSample: offset / BYTES_PER_SAMPLE
    });
  }
  return frames;
};

export interface LogRecord {
  level: LogLevel;
  message: string;
  context: LogContext;
}

export class MemoryLogger implements Logger {
  public readonly records: LogRecord[] = [];

  public debug(message: string, context: LogContext = {}): void {
    this.records.push({ level: 'debug', message, context });
  }

  public info(message: string, context: LogContext = {}): void {
    this.records.push({ level: 'info', message, context });
  }

  public warn(message: string, context: LogContext = {}): void {
    this.records.push({ level: 'warn', message, context });
  }

  public error(message: string, context: LogContext = {}): void {
    this.records.push({ level: 'error', message, context });
  }

  public messages(level: LogLevel): string[] {
    return this.records.filter((record) => record.level === level).map((record) => record.message);
  }
}

export interface EngineCall {
  pcm: Buffer;
  sampleRate: number;
  durationSeconds: number;
}

export type EngineStep = EngineResult | ((call: EngineCall) => EngineResult | Promise<EngineResult>);

export const segments = (...items: Array<[string, number, number]>): EngineResult => ({
  kind: 'segments',
  segments: items.map(([text, localStart, localEnd]): LocalSegment => ({ text, localStart, localEnd }))
});

export const engineFailure = (message: string): EngineResult => ({
  kind: 'failure',
  failure: new EngineFailure(message)
});

/** Answers the Nth transcribe call with the Nth step; calls past the script get no segments. */
export class ScriptedEngine implements EngineAdapter {
  public readonly calls: EngineCall[] = [];
  public preloadCalls = 0;
  public shutdownCalls = 0;
  public maxInFlight = 0;
  private inFlight = 0;

  public constructor(
    private readonly steps: EngineStep[] = [],
    private readonly preloadResult: PreloadResult = { kind: 'ready' }
  ) {}

  public async preload(): Promise<PreloadResult> {
    this.preloadCalls += 1;
    return this.preloadResult;
  }

  public async transcribe(pcm: Buffer, sampleRate: number): Promise<EngineResult> {
    const call: EngineCall = {
      pcm,
      sampleRate,
      durationSeconds: pcm.length / BYTES_PER_SAMPLE / sampleRate
    };
    this.calls.push(call);
    const step = this.steps[this.calls.length - 1];

    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (step === undefined) {
        return { kind: 'segments', segments: [] };
      }

      return typeof step === 'function' ? await step(call) : step;
    } finally {
      this.inFlight -= 1;
    }
  }

  public async shutdown(): Promise<void> {
    this.shutdownCalls += 1;
  }
}

export interface MemorySourceOptions {
  /** After the last frame, wait for stop() instead of ending the stream. */
  holdOpen?: boolean;
}

/** Replays a fixed list of frames. */
export class MemorySource implements AudioSource {
  public stopCalls = 0;
  /** Resolves once every frame has been handed out. */
  public readonly drained: Promise<void>;
  private markDrained: () => void = () => undefined;
  private readonly stopped: Promise<void>;
  private markStopped: () => void = () => undefined;
  private stopRequested = false;

  public constructor(
    private readonly frameList: AudioFrame[],
    private readonly options: MemorySourceOptions = {}
  ) {
    this.drained = new Promise((resolve) => {
      this.markDrained = resolve;
    });
    this.stopped = new Promise((resolve) => {
      this.markStopped = resolve;
    });
  }

  public async *frames(): AsyncGenerator<AudioFrame> {
    for (const frame of this.frameList) {
      if (this.stopRequested) {
        return;
      }
      yield frame;
    }

    this.markDrained();
    if (this.options.holdOpen) {
      await this.stopped;
    }
  }

  public async stop(): Promise<void> {
    this.stopCalls += 1;
    this.stopRequested = true;
    this.markStopped();
  }
}

export class CollectingSink implements TranscriptSink {
  public readonly segments: GlobalSegment[] = [];

  public constructor(private readonly rejectText?: string) {}

  public write(segment: GlobalSegment): void {
    if (segment.text === this.rejectText) {
      throw new Error(`sink refused "${segment.text}"`);
    }

    this.segments.push(segment);
  }

  public texts(): string[] {
    return this.segments.map((segment) => segment.text);
  }
}
