import { EventEmitter } from 'node:events';
import { Logger } from '../logging/StructuredLogger';
import { LatencySummary, LatencyTracker } from '../perf/LatencyTracker';
import { EngineAdapter, EngineResult, PreloadResult } from '../services/asr/EngineAdapter';
import { AudioSource } from '../services/capture/AudioSource';
import {
  AudioFrame,
  AudioWindow,
  GateDecision,
  GateMode,
  GlobalSegment,
  PipelineStage,
  PipelineState,
  TranscriptSink
} from '../types';
import { BoundedQueue } from './BoundedQueue';
import { Deduplicator } from './Deduplicator';
import { AudioUnderrun, ConfigurationError, describeError, EngineFailure } from './errors';
import { DEFAULT_PIPELINE_OPTIONS, PipelineOptions, validatePipelineOptions } from './pipelineOptions';
import { SilenceGate } from './SilenceGate';
import { Windower } from './Windower';

export interface TranscriptionPipelineDependencies {
  engine: EngineAdapter;
  sink: TranscriptSink;
}

export type WindowDropReason = 'backpressure' | 'stop';

export interface SessionSummary {
  windowsProduced: number;
  windowsTranscribed: number;
  windowsSilent: number;
  windowsDropped: number;
  engineFailures: number;
  segmentsEmitted: number;
  segmentsDiscarded: number;
  underruns: number;
  watermark: number;
  flushedFinalWindow: boolean;
  latency: LatencySummary;
}

interface QueuedWindow {
  window: AudioWindow;
  enqueuedAtMs: number;
}

type PullOutcome =
  | { kind: 'frame'; result: IteratorResult<AudioFrame> }
  | { kind: 'timeout' }
  | { kind: 'stop' };

const TRANSITIONS: Record<PipelineStage, PipelineStage[]> = {
  init: ['preload'],
  preload: ['streaming'],
  streaming: ['flushing'],
  flushing: ['stopped'],
  stopped: []
};

export declare interface TranscriptionPipeline {
  on(event: 'stateChanged', listener: (state: PipelineState) => void): this;
  on(event: 'segment', listener: (segment: GlobalSegment) => void): this;
  on(event: 'windowSkipped', listener: (window: AudioWindow, decision: GateDecision) => void): this;
  on(event: 'windowDropped', listener: (window: AudioWindow, reason: WindowDropReason) => void): this;
  on(event: 'engineFailure', listener: (window: AudioWindow, failure: EngineFailure) => void): this;
  on(event: 'underrun', listener: (underrun: AudioUnderrun) => void): this;
  on(event: 'stopped', listener: (summary: SessionSummary) => void): this;
}

/**
 * One transcription session: init → preload → streaming → flushing → stopped.
 *
 * The producer side pulls frames and cuts windows; a single worker takes windows off a
 * bounded queue in order and runs gate → engine → deduplicator → sink, so the engine
 * never sees two calls at once and the watermark only ever moves forward.
 */
export class TranscriptionPipeline extends EventEmitter {
  private state: PipelineState = { stage: 'init' };
  private readonly options: PipelineOptions;
  private readonly windower: Windower;
  private readonly gate: SilenceGate;
  private readonly deduplicator = new Deduplicator();
  private readonly queue: BoundedQueue<QueuedWindow>;
  private readonly latencyTracker = new LatencyTracker();
  private readonly stopRequest: Promise<{ kind: 'stop' }>;
  private resolveStopRequest: () => void = () => undefined;
  private stopRequested = false;
  private source: AudioSource | undefined;
  private gateOpen = false;

  private windowsProduced = 0;
  private windowsTranscribed = 0;
  private windowsSilent = 0;
  private windowsDropped = 0;
  private engineFailures = 0;
  private segmentsEmitted = 0;
  private segmentsDiscarded = 0;
  private underruns = 0;
  private flushedFinalWindow = false;

  public constructor(
    private readonly deps: TranscriptionPipelineDependencies,
    private readonly logger?: Logger,
    options: Partial<PipelineOptions> = {}
  ) {
    super();
    this.options = { ...DEFAULT_PIPELINE_OPTIONS, ...options };

    const problems = validatePipelineOptions(this.options);
    if (problems.length > 0) {
      throw new ConfigurationError(problems);
    }

    this.windower = new Windower(this.options, logger);
    this.gate = new SilenceGate({
      start: { rms: this.options.rmsThreshold, peak: this.options.peakThreshold },
      flush: { rms: this.options.flushRmsThreshold, peak: this.options.flushPeakThreshold },
      opening: { rms: this.options.flushRmsThreshold, peak: this.options.flushPeakThreshold }
    });
    this.queue = new BoundedQueue(this.options.queueCapacity, this.options.backpressurePolicy);
    this.stopRequest = new Promise((resolve) => {
      this.resolveStopRequest = () => resolve({ kind: 'stop' });
    });

    this.logger?.info('Pipeline initialised', {
      windowSeconds: this.options.windowSeconds,
      overlapSeconds: this.options.overlapSeconds,
      strideSeconds: this.windower.strideSeconds,
      rmsThreshold: this.options.rmsThreshold,
      peakThreshold: this.options.peakThreshold,
      flushRmsThreshold: this.options.flushRmsThreshold,
      flushPeakThreshold: this.options.flushPeakThreshold,
      startGateEnabled: this.options.startGateEnabled,
      queueCapacity: this.options.queueCapacity,
      backpressurePolicy: this.options.backpressurePolicy
    });
  }

  public getState(): PipelineState {
    return this.state;
  }

  public getWatermark(): number {
    return this.deduplicator.getWatermark();
  }

  public getStrideSeconds(): number {
    return this.windower.strideSeconds;
  }

  /** Runs the whole session against `source` and resolves once it is stopped. */
  public async run(source: AudioSource): Promise<SessionSummary> {
    if (this.state.stage !== 'init') {
      throw new Error('A TranscriptionPipeline runs a single session; create a new one');
    }

    this.source = source;

    this.setState({ stage: 'preload', detail: 'Loading ASR model' });
    await this.preloadEngine();

    this.setState({ stage: 'streaming' });
    const worker = this.runWorker();
    await this.pumpFrames(source);
    this.queue.close();
    await worker;

    this.setState({
      stage: 'flushing',
      detail: this.stopRequested ? 'Stop requested' : 'End of stream'
    });
    await this.flushTail();

    const summary = this.summarize();
    this.setState({ stage: 'stopped' });
    this.logger?.info('Session summary', { ...summary });
    this.emit('stopped', summary);

    return summary;
  }

  /**
   * Takes effect between windows: pending windows are discarded, the window in
   * flight completes, then the session flushes its tail and stops.
   */
  public async stop(): Promise<void> {
    if (this.stopRequested) {
      return;
    }

    this.stopRequested = true;
    this.resolveStopRequest();

    const pending = this.queue.clear();
    for (const item of pending) {
      this.reportDropped(item.window, 'stop');
    }
    this.queue.close();

    this.logger?.info('Stop requested', {
      stage: this.state.stage,
      discardedWindows: pending.length
    });

    await this.source?.stop().catch((error: unknown) => {
      this.logger?.warn('Audio source did not stop cleanly', { detail: describeError(error) });
    });
  }

  private async preloadEngine(): Promise<void> {
    const startedAt = Date.now();
    let result: PreloadResult;

    try {
      result = await this.deps.engine.preload();
    } catch (error) {
      result = { kind: 'failure', failure: new EngineFailure(describeError(error), error) };
    }

    if (result.kind === 'failure') {
      this.logger?.error('Engine preload failed; the model will load on the first window', {
        detail: result.failure.message
      });
      return;
    }

    this.logger?.info('Engine preloaded', { elapsedMs: Date.now() - startedAt });
  }

  private async pumpFrames(source: AudioSource): Promise<void> {
    const iterator = source.frames()[Symbol.asyncIterator]();
    let abandonedPull = false;

    try {
      while (!this.stopRequested) {
        const outcome = await this.pullFrame(iterator);
        if (outcome.kind === 'stop') {
          abandonedPull = true;
          return;
        }

        if (outcome.kind !== 'frame' || outcome.result.done) {
          this.logger?.info('Audio source reached end of stream', {
            pendingSeconds: this.windower.pendingSeconds()
          });
          return;
        }

        for (const window of this.windower.push(outcome.result.value)) {
          this.windowsProduced += 1;
          const put = await this.queue.put({ window, enqueuedAtMs: Date.now() });

          if (put.kind === 'dropped-oldest') {
            this.reportDropped(put.dropped.window, 'backpressure');
          } else if (put.kind === 'closed') {
            this.reportDropped(window, 'stop');
            return;
          }
        }
      }
    } catch (error) {
      this.logger?.error('Audio source failed; treating as end of stream', {
        detail: describeError(error)
      });
    } finally {
      // A pull still in flight would hold return() back until it settles.
      if (!abandonedPull) {
        await Promise.resolve(iterator.return?.()).catch((error: unknown) => {
          this.logger?.debug('Audio iterator cleanup failed', { detail: describeError(error) });
        });
      }
    }
  }

  private async pullFrame(iterator: AsyncIterator<AudioFrame>): Promise<PullOutcome> {
    const pending = iterator.next();
    let waitedMs = 0;

    while (true) {
      const outcome = await this.waitForFrame(pending);
      if (outcome.kind !== 'timeout') {
        return outcome;
      }

      waitedMs += this.options.underrunTimeoutMs;
      this.underruns += 1;
      const underrun = new AudioUnderrun(waitedMs);
      this.logger?.warn('Audio underrun', { waitedMs, stage: this.state.stage });
      this.emit('underrun', underrun);
    }
  }

  private async waitForFrame(pending: Promise<IteratorResult<AudioFrame>>): Promise<PullOutcome> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<PullOutcome>((resolve) => {
      timer = setTimeout(() => resolve({ kind: 'timeout' }), this.options.underrunTimeoutMs);
    });

    try {
      return await Promise.race([
        pending.then((result): PullOutcome => ({ kind: 'frame', result })),
        timeout,
        this.stopRequest
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async runWorker(): Promise<void> {
    while (!this.stopRequested) {
      const item = await this.queue.take();
      if (!item) {
        return;
      }

      if (this.stopRequested) {
        this.reportDropped(item.window, 'stop');
        return;
      }

      await this.processWindow(item.window, item.enqueuedAtMs, 'start');
    }
  }

  private async flushTail(): Promise<void> {
    const pendingSeconds = this.windower.pendingSeconds();
    const tail = this.windower.flush();

    if (!tail) {
      this.logger?.info('Nothing to flush', { pendingSeconds });
      return;
    }

    this.windowsProduced += 1;
    this.flushedFinalWindow = true;
    await this.processWindow(tail, Date.now(), 'flush');
  }

  private async processWindow(window: AudioWindow, enqueuedAtMs: number, mode: GateMode): Promise<void> {
    const startedAt = Date.now();
    const audioMs = Math.round((window.globalEnd - window.globalStart) * 1000);

    try {
      if (!this.passesGate(window, this.classifyWindow(window.pcm, mode))) {
        return;
      }

      const engineStartedAt = Date.now();
      const result = await this.transcribeWindow(window.pcm);
      const engineMs = Date.now() - engineStartedAt;

      if (result.kind === 'failure') {
        this.engineFailures += 1;
        this.logger?.error('Engine failure; window skipped', {
          windowIndex: window.index,
          globalStart: window.globalStart,
          engineMs,
          detail: result.failure.message
        });
        this.emit('engineFailure', window, result.failure);
        return;
      }

      this.windowsTranscribed += 1;
      const watermarkBefore = this.deduplicator.getWatermark();
      const reconciled = this.deduplicator.reconcile(window, result.segments);
      this.segmentsDiscarded += reconciled.discarded.length;

      const sinkStartedAt = Date.now();
      for (const segment of reconciled.emitted) {
        await this.deliver(segment);
      }
      const sinkMs = Date.now() - sinkStartedAt;

      this.latencyTracker.push({
        queueMs: Math.max(0, startedAt - enqueuedAtMs),
        audioMs,
        engineMs,
        sinkMs,
        endToEndMs: Math.max(0, Date.now() - enqueuedAtMs)
      });

      this.logger?.info('Window transcribed', {
        windowIndex: window.index,
        globalStart: window.globalStart,
        globalEnd: window.globalEnd,
        final: window.isFinal,
        segments: result.segments.length,
        emitted: reconciled.emitted.length,
        discarded: reconciled.discarded.length,
        watermarkBefore,
        watermark: reconciled.watermark,
        engineMs,
        queueMs: Math.max(0, startedAt - enqueuedAtMs),
        pendingWindows: this.queue.size
      });
    } catch (error) {
      this.logger?.error('Window processing failed', {
        windowIndex: window.index,
        detail: describeError(error)
      });
    }
  }

  /**
   * Every window is held to the silence thresholds. With the start gate enabled, a
   * streaming window that follows silence (or opens the session) must also clear the
   * stricter flush pair before the gate opens.
   */
  private classifyWindow(pcm: Buffer, mode: GateMode): GateDecision {
    if (mode === 'start' && this.options.startGateEnabled && !this.gateOpen) {
      return this.gate.classifyOpening(pcm);
    }

    return this.gate.classify(pcm, mode);
  }

  private async transcribeWindow(pcm: Buffer): Promise<EngineResult> {
    try {
      return await this.deps.engine.transcribe(pcm, this.options.sampleRateHz);
    } catch (error) {
      return { kind: 'failure', failure: new EngineFailure(describeError(error), error) };
    }
  }

  private passesGate(window: AudioWindow, decision: GateDecision): boolean {
    const context = {
      windowIndex: window.index,
      mode: decision.mode,
      rms: Number(decision.rms.toFixed(1)),
      peak: decision.peak,
      rmsThreshold: decision.thresholds.rms,
      peakThreshold: decision.thresholds.peak
    };

    if (decision.verdict === 'silent') {
      this.windowsSilent += 1;
      if (this.gateOpen) {
        this.gateOpen = false;
        this.logger?.info('Silence gate closed', context);
      }
      this.logger?.debug('Skipping silent window', context);
      this.emit('windowSkipped', window, decision);
      return false;
    }

    if (!this.gateOpen && decision.mode === 'start') {
      this.gateOpen = true;
      this.logger?.info('Silence gate opened', context);
    }

    return true;
  }

  private async deliver(segment: GlobalSegment): Promise<void> {
    this.segmentsEmitted += 1;

    try {
      await this.deps.sink.write(segment);
    } catch (error) {
      this.logger?.error('Transcript sink rejected a segment', {
        windowIndex: segment.windowIndex,
        detail: describeError(error)
      });
    }

    this.emit('segment', segment);
  }

  private reportDropped(window: AudioWindow, reason: WindowDropReason): void {
    this.windowsDropped += 1;
    this.logger?.warn('Window dropped before transcription', {
      windowIndex: window.index,
      globalStart: window.globalStart,
      reason
    });
    this.emit('windowDropped', window, reason);
  }

  private summarize(): SessionSummary {
    return {
      windowsProduced: this.windowsProduced,
      windowsTranscribed: this.windowsTranscribed,
      windowsSilent: this.windowsSilent,
      windowsDropped: this.windowsDropped,
      engineFailures: this.engineFailures,
      segmentsEmitted: this.segmentsEmitted,
      segmentsDiscarded: this.segmentsDiscarded,
      underruns: this.underruns,
      watermark: this.deduplicator.getWatermark(),
      flushedFinalWindow: this.flushedFinalWindow,
      latency: this.latencyTracker.summarize()
    };
  }

  private setState(next: PipelineState): void {
    if (!TRANSITIONS[this.state.stage].includes(next.stage)) {
      throw new Error(`Invalid pipeline transition ${this.state.stage} -> ${next.stage}`);
    }

    this.state = next;
    this.emit('stateChanged', next);
    this.logger?.info('State changed', {
      stage: next.stage,
      detail: next.detail
    });
  }
}
