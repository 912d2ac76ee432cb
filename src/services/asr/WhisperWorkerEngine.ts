import { describeError, EngineFailure } from '../../core/errors';
import { Logger } from '../../logging/StructuredLogger';
import { AppConfig } from '../../types';
import { PersistentFramedWorker } from '../process/PersistentFramedWorker';
import { PersistentJsonWorker } from '../process/PersistentJsonWorker';
import { WorkerClient } from '../process/PersistentWorker';
import { makeOfflineEnv } from '../process/runCommand';
import { EngineAdapter, EngineResult, PreloadResult } from './EngineAdapter';
import { formatIssues, TranscribeResultSchema, WarmupResultSchema } from './schemas';

export type WhisperWorkerEngineConfig = Pick<
  AppConfig,
  | 'pythonBin'
  | 'asrTransport'
  | 'asrScriptPath'
  | 'asrModel'
  | 'asrDevice'
  | 'asrComputeType'
  | 'asrLanguage'
  | 'asrVadFilter'
  | 'asrRequestTimeoutMs'
  | 'asrWarmupTimeoutMs'
  | 'enforceOffline'
>;

const failure = (message: string, detail?: unknown): { kind: 'failure'; failure: EngineFailure } => ({
  kind: 'failure',
  failure: new EngineFailure(message, detail)
});

/**
 * faster-whisper behind a persistent python worker (python/asr_runner.py). Calls are
 * chained so the model never sees two requests at once.
 */
export class WhisperWorkerEngine implements EngineAdapter {
  private readonly worker: WorkerClient;
  private callChain: Promise<unknown> = Promise.resolve();

  public constructor(
    private readonly config: WhisperWorkerEngineConfig,
    private readonly logger?: Logger,
    worker?: WorkerClient
  ) {
    this.worker = worker ?? this.createWorker();
  }

  public async preload(): Promise<PreloadResult> {
    const startedAt = Date.now();

    let raw: unknown;
    try {
      raw = await this.serialized(() =>
        this.worker.request({ action: 'warmup' }, this.config.asrWarmupTimeoutMs)
      );
    } catch (error) {
      return failure(`ASR warmup failed: ${describeError(error)}`, error);
    }

    const parsed = WarmupResultSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      return failure(`ASR warmup returned malformed output: ${formatIssues(parsed.error)}`, raw);
    }

    this.logger?.info('ASR model ready', {
      model: parsed.data.model ?? this.config.asrModel,
      loadSeconds: parsed.data.loadSeconds,
      elapsedMs: Date.now() - startedAt
    });

    return { kind: 'ready' };
  }

  public async transcribe(pcm: Buffer, sampleRate: number): Promise<EngineResult> {
    if (pcm.length === 0) {
      return { kind: 'segments', segments: [] };
    }

    let raw: unknown;
    try {
      raw = await this.serialized(() =>
        this.worker.request(
          {
            action: 'transcribe',
            sampleRate,
            language: this.config.asrLanguage,
            vadFilter: this.config.asrVadFilter
          },
          this.config.asrRequestTimeoutMs,
          pcm
        )
      );
    } catch (error) {
      return failure(`ASR request failed: ${describeError(error)}`, error);
    }

    const parsed = TranscribeResultSchema.safeParse(raw);
    if (!parsed.success) {
      return failure(`ASR worker returned malformed output: ${formatIssues(parsed.error)}`, raw);
    }

    return {
      kind: 'segments',
      segments: parsed.data.segments.map((segment) => ({
        text: segment.text,
        localStart: segment.start,
        localEnd: segment.end
      }))
    };
  }

  public async shutdown(): Promise<void> {
    await this.worker.stop();
  }

  private serialized<T>(task: () => Promise<T>): Promise<T> {
    const run = this.callChain.then(task);
    this.callChain = run.catch(() => undefined);
    return run;
  }

  private createWorker(): WorkerClient {
    const args = [
      this.config.asrScriptPath,
      '--serve',
      '--model',
      this.config.asrModel,
      '--device',
      this.config.asrDevice,
      '--compute-type',
      this.config.asrComputeType,
      ...(this.config.asrLanguage ? ['--language', this.config.asrLanguage] : []),
      ...(this.config.asrTransport === 'framed' ? ['--framed-io'] : [])
    ];
    const options = {
      name: 'asr',
      command: this.config.pythonBin,
      args,
      env: makeOfflineEnv(this.config.enforceOffline),
      logger: this.logger
    };

    return this.config.asrTransport === 'framed'
      ? new PersistentFramedWorker(options)
      : new PersistentJsonWorker(options);
  }
}
