import { describe, expect, it } from 'vitest';
import { WorkerClient } from '../process/PersistentWorker';
import { WhisperWorkerEngine, WhisperWorkerEngineConfig } from './WhisperWorkerEngine';

const CONFIG: WhisperWorkerEngineConfig = {
  pythonBin: 'python3',
  asrTransport: 'framed',
  asrScriptPath: 'python/asr_runner.py',
  asrModel: 'small.en',
  asrDevice: 'cpu',
  asrComputeType: 'int8',
  asrLanguage: undefined,
  asrVadFilter: false,
  asrRequestTimeoutMs: 30000,
  asrWarmupTimeoutMs: 180000,
  enforceOffline: false
};

interface RecordedRequest {
  payload: Record<string, unknown>;
  timeoutMs: number;
  binaryData?: Buffer;
}

class FakeWorker implements WorkerClient {
  public readonly requests: RecordedRequest[] = [];
  public stopCalls = 0;

  public constructor(private readonly reply: (payload: Record<string, unknown>) => unknown) {}

  public async start(): Promise<void> {
    // Nothing to spawn.
  }

  public async request(
    payload: Record<string, unknown>,
    timeoutMs: number,
    binaryData?: Buffer
  ): Promise<unknown> {
    this.requests.push({ payload, timeoutMs, binaryData });
    return this.reply(payload);
  }

  public async stop(): Promise<void> {
    this.stopCalls += 1;
  }
}

const pcm = Buffer.alloc(3200, 1);

describe('WhisperWorkerEngine', () => {
  it('should warm the worker up within the warmup timeout', async () => {
    const worker = new FakeWorker(() => ({ model: 'small.en', loadSeconds: 1.2 }));
    const engine = new WhisperWorkerEngine(CONFIG, undefined, worker);

    await expect(engine.preload()).resolves.toEqual({ kind: 'ready' });
    expect(worker.requests).toEqual([{ payload: { action: 'warmup' }, timeoutMs: 180000, binaryData: undefined }]);
  });

  it('should turn a failed warmup into a failure result', async () => {
    const worker = new FakeWorker(() => Promise.reject(new Error('python3: not found')));
    const engine = new WhisperWorkerEngine(CONFIG, undefined, worker);

    const result = await engine.preload();

    expect(result.kind).toBe('failure');
    expect(result.kind === 'failure' ? result.failure.message : '').toBe('ASR warmup failed: python3: not found');
  });

  it('should send the window audio and map segments to window-local times', async () => {
    const worker = new FakeWorker(() => ({
      segments: [
        { text: ' hello', start: 0.5, end: 1.25 },
        { text: ' world', start: 1.25, end: 2 }
      ],
      language: 'en'
    }));
    const engine = new WhisperWorkerEngine({ ...CONFIG, asrLanguage: 'en' }, undefined, worker);

    const result = await engine.transcribe(pcm, 16000);

    expect(result).toEqual({
      kind: 'segments',
      segments: [
        { text: ' hello', localStart: 0.5, localEnd: 1.25 },
        { text: ' world', localStart: 1.25, localEnd: 2 }
      ]
    });
    expect(worker.requests).toEqual([
      {
        payload: { action: 'transcribe', sampleRate: 16000, language: 'en', vadFilter: false },
        timeoutMs: 30000,
        binaryData: pcm
      }
    ]);
  });

  it('should reject segments that end before they start', async () => {
    const worker = new FakeWorker(() => ({ segments: [{ text: 'x', start: 2, end: 1 }] }));
    const engine = new WhisperWorkerEngine(CONFIG, undefined, worker);

    const result = await engine.transcribe(pcm, 16000);

    expect(result.kind === 'failure' ? result.failure.message : '').toBe(
      'ASR worker returned malformed output: segments.0: segment end must not precede its start'
    );
  });

  it('should reject a reply without a segment list', async () => {
    const engine = new WhisperWorkerEngine(CONFIG, undefined, new FakeWorker(() => ({ text: 'hi' })));

    const result = await engine.transcribe(pcm, 16000);

    expect(result.kind === 'failure' ? result.failure.message : '').toBe(
      'ASR worker returned malformed output: segments: Required'
    );
  });

  it('should report a request that times out', async () => {
    const worker = new FakeWorker(() =>
      Promise.reject(new Error('asr worker request timed out after 30000ms'))
    );
    const engine = new WhisperWorkerEngine(CONFIG, undefined, worker);

    const result = await engine.transcribe(pcm, 16000);

    expect(result.kind === 'failure' ? result.failure.message : '').toBe(
      'ASR request failed: asr worker request timed out after 30000ms'
    );
  });

  it('should answer empty audio without asking the worker', async () => {
    const worker = new FakeWorker(() => ({ segments: [] }));
    const engine = new WhisperWorkerEngine(CONFIG, undefined, worker);

    await expect(engine.transcribe(Buffer.alloc(0), 16000)).resolves.toEqual({ kind: 'segments', segments: [] });
    expect(worker.requests).toEqual([]);
  });

  it('should not send a request before the previous one has answered', async () => {
    let release: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
      release = resolve;
    });
    const worker = new FakeWorker(() => released.then(() => ({ segments: [] })));
    const engine = new WhisperWorkerEngine(CONFIG, undefined, worker);

    const first = engine.transcribe(pcm, 16000);
    const second = engine.transcribe(pcm, 16000);
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(worker.requests).toHaveLength(1);
    release();
    await Promise.all([first, second]);
    expect(worker.requests).toHaveLength(2);
  });

  it('should stop the worker on shutdown', async () => {
    const worker = new FakeWorker(() => ({ segments: [] }));
    const engine = new WhisperWorkerEngine(CONFIG, undefined, worker);

    await engine.shutdown();

    expect(worker.stopCalls).toBe(1);
  });
});
