import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { resolveConfig, toPipelineOptions, validateConfig } from './config';

describe('resolveConfig', () => {
  it('should fall back to the defaults', () => {
    const config = resolveConfig({});

    expect(config).toMatchObject({
      sampleRateHz: 16000,
      windowSeconds: 5,
      overlapSeconds: 1.5,
      minFlushSeconds: 0.6,
      frameMs: 100,
      rmsThreshold: 80,
      peakThreshold: 900,
      startGateEnabled: true,
      flushRmsThreshold: 120,
      flushPeakThreshold: 1500,
      queueCapacity: 20,
      backpressurePolicy: 'block',
      underrunTimeoutMs: 2000,
      pythonBin: 'python3',
      asrTransport: 'framed',
      asrModel: 'small.en',
      asrLanguage: undefined,
      logLevel: 'info',
      enforceOffline: false
    });
    expect(config.asrScriptPath.endsWith(path.join('python', 'asr_runner.py'))).toBe(true);
    expect(validateConfig(config)).toEqual([]);
  });

  it('should read TIDEMARK_* overrides', () => {
    const config = resolveConfig({
      TIDEMARK_WINDOW_SECONDS: '6',
      TIDEMARK_OVERLAP_SECONDS: '2',
      TIDEMARK_BACKPRESSURE: 'drop-oldest',
      TIDEMARK_ASR_TRANSPORT: 'jsonl',
      TIDEMARK_ASR_LANGUAGE: ' de ',
      TIDEMARK_START_GATE: 'false',
      TIDEMARK_LOG_LEVEL: 'debug',
      TIDEMARK_AUDIO_FORMAT: 'alsa',
      TIDEMARK_AUDIO_INPUT: 'hw:1'
    });

    expect(config).toMatchObject({
      windowSeconds: 6,
      overlapSeconds: 2,
      backpressurePolicy: 'drop-oldest',
      asrTransport: 'jsonl',
      asrLanguage: 'de',
      startGateEnabled: false,
      logLevel: 'debug',
      audioInputFormat: 'alsa',
      audioInput: 'hw:1'
    });
  });

  it('should switch to file input when a path is given', () => {
    const config = resolveConfig({ TIDEMARK_AUDIO_FORMAT: 'pulse', TIDEMARK_AUDIO_INPUT: 'mic' }, 'talk.wav');

    expect(config.audioInputFormat).toBe('file');
    expect(config.audioInput).toBe('talk.wav');
  });

  it('should ignore values it does not recognise', () => {
    const config = resolveConfig({
      TIDEMARK_BACKPRESSURE: 'spill',
      TIDEMARK_LOG_LEVEL: 'loud',
      TIDEMARK_QUEUE_CAPACITY: 'many'
    });

    expect(config.backpressurePolicy).toBe('block');
    expect(config.logLevel).toBe('info');
    expect(config.queueCapacity).toBe(20);
  });
});

describe('validateConfig', () => {
  it('should report an overlap as long as the window', () => {
    const config = resolveConfig({ TIDEMARK_OVERLAP_SECONDS: '5' });

    expect(validateConfig(config)).toEqual(['overlapSeconds (5) must be smaller than windowSeconds (5).']);
  });

  it('should report out-of-range settings by their variable name', () => {
    const config = resolveConfig({ TIDEMARK_FRAME_MS: '5', TIDEMARK_ASR_TIMEOUT_MS: '500' });

    expect(validateConfig(config)).toEqual([
      'TIDEMARK_FRAME_MS must be between 10 and 1000 milliseconds.',
      'TIDEMARK_ASR_TIMEOUT_MS must be between 1000 and 600000 milliseconds.'
    ]);
  });

  it('should require a sample rate of 16 kHz', () => {
    expect(validateConfig(resolveConfig({ TIDEMARK_SAMPLE_RATE: '44100' }))).toEqual([
      'sampleRateHz must be 16000.'
    ]);
  });
});

describe('toPipelineOptions', () => {
  it('should carry the pipeline settings over', () => {
    const config = resolveConfig({ TIDEMARK_QUEUE_CAPACITY: '4' });

    expect(toPipelineOptions(config)).toEqual({
      sampleRateHz: 16000,
      windowSeconds: 5,
      overlapSeconds: 1.5,
      minFlushSeconds: 0.6,
      rmsThreshold: 80,
      peakThreshold: 900,
      startGateEnabled: true,
      flushRmsThreshold: 120,
      flushPeakThreshold: 1500,
      queueCapacity: 4,
      backpressurePolicy: 'block',
      underrunTimeoutMs: 2000
    });
  });
});
