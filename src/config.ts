import os from 'node:os';
import path from 'node:path';
import { DEFAULT_PIPELINE_OPTIONS, PipelineOptions, validatePipelineOptions } from './core/pipelineOptions';
import { AppConfig, AsrTransport, AudioInputFormat, BackpressurePolicy } from './types';

type LogLevel = AppConfig['logLevel'];

const AUDIO_INPUT_FORMATS: AudioInputFormat[] = ['avfoundation', 'pulse', 'alsa', 'dshow', 'file'];
const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseFloatOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseBoolOrDefault = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return value.toLowerCase() === 'true';
};

const resolveAsrTransport = (value: string | undefined): AsrTransport => {
  if (value === 'jsonl') {
    return 'jsonl';
  }

  return 'framed';
};

const resolveBackpressurePolicy = (value: string | undefined): BackpressurePolicy => {
  if (value === 'drop-oldest') {
    return 'drop-oldest';
  }

  return 'block';
};

const resolveLogLevel = (value: string | undefined): LogLevel =>
  LOG_LEVELS.find((level) => level === value) ?? 'info';

const defaultAudioInputFormat = (): AudioInputFormat => {
  if (process.platform === 'darwin') {
    return 'avfoundation';
  }

  if (process.platform === 'win32') {
    return 'dshow';
  }

  return 'pulse';
};

const defaultAudioInput = (format: AudioInputFormat): string => {
  if (format === 'avfoundation') {
    return ':0';
  }

  if (format === 'dshow') {
    return 'audio=default';
  }

  return 'default';
};

const resolveAudioInputFormat = (
  value: string | undefined,
  fileArgument: string | undefined
): AudioInputFormat => {
  if (fileArgument) {
    return 'file';
  }

  return AUDIO_INPUT_FORMATS.find((format) => format === value) ?? defaultAudioInputFormat();
};

/**
 * Reads `TIDEMARK_*` variables. A file path given on the command line overrides the
 * capture device.
 */
export const resolveConfig = (
  env: NodeJS.ProcessEnv = process.env,
  fileArgument?: string
): AppConfig => {
  const rootDir = path.resolve(__dirname, '..');
  const defaults = DEFAULT_PIPELINE_OPTIONS;
  const audioInputFormat = resolveAudioInputFormat(env.TIDEMARK_AUDIO_FORMAT, fileArgument);
  const language = env.TIDEMARK_ASR_LANGUAGE?.trim();

  return {
    sampleRateHz: parseIntOrDefault(env.TIDEMARK_SAMPLE_RATE, defaults.sampleRateHz),
    windowSeconds: parseFloatOrDefault(env.TIDEMARK_WINDOW_SECONDS, defaults.windowSeconds),
    overlapSeconds: parseFloatOrDefault(env.TIDEMARK_OVERLAP_SECONDS, defaults.overlapSeconds),
    minFlushSeconds: parseFloatOrDefault(env.TIDEMARK_MIN_FLUSH_SECONDS, defaults.minFlushSeconds),
    frameMs: parseIntOrDefault(env.TIDEMARK_FRAME_MS, 100),
    rmsThreshold: parseFloatOrDefault(env.TIDEMARK_RMS_THRESHOLD, defaults.rmsThreshold),
    peakThreshold: parseFloatOrDefault(env.TIDEMARK_PEAK_THRESHOLD, defaults.peakThreshold),
    startGateEnabled: parseBoolOrDefault(env.TIDEMARK_START_GATE, defaults.startGateEnabled),
    flushRmsThreshold: parseFloatOrDefault(
      env.TIDEMARK_FLUSH_RMS_THRESHOLD,
      defaults.flushRmsThreshold
    ),
    flushPeakThreshold: parseFloatOrDefault(
      env.TIDEMARK_FLUSH_PEAK_THRESHOLD,
      defaults.flushPeakThreshold
    ),
    queueCapacity: parseIntOrDefault(env.TIDEMARK_QUEUE_CAPACITY, defaults.queueCapacity),
    backpressurePolicy: resolveBackpressurePolicy(env.TIDEMARK_BACKPRESSURE),
    underrunTimeoutMs: parseIntOrDefault(env.TIDEMARK_UNDERRUN_TIMEOUT_MS, defaults.underrunTimeoutMs),
    audioInput: fileArgument ?? env.TIDEMARK_AUDIO_INPUT ?? defaultAudioInput(audioInputFormat),
    audioInputFormat,
    realtimeFileInput: parseBoolOrDefault(env.TIDEMARK_REALTIME_FILE, true),
    pythonBin: env.TIDEMARK_PYTHON_BIN ?? 'python3',
    asrTransport: resolveAsrTransport(env.TIDEMARK_ASR_TRANSPORT),
    asrScriptPath: env.TIDEMARK_ASR_SCRIPT ?? path.join(rootDir, 'python', 'asr_runner.py'),
    asrModel: env.TIDEMARK_ASR_MODEL ?? 'small.en',
    asrDevice: env.TIDEMARK_ASR_DEVICE ?? 'cpu',
    asrComputeType: env.TIDEMARK_ASR_COMPUTE_TYPE ?? 'int8',
    asrLanguage: language ? language : undefined,
    asrVadFilter: parseBoolOrDefault(env.TIDEMARK_ASR_VAD_FILTER, false),
    asrRequestTimeoutMs: parseIntOrDefault(env.TIDEMARK_ASR_TIMEOUT_MS, 30000),
    asrWarmupTimeoutMs: parseIntOrDefault(env.TIDEMARK_ASR_WARMUP_TIMEOUT_MS, 180000),
    logDir: env.TIDEMARK_LOG_DIR ?? path.join(os.homedir(), '.tidemark', 'logs'),
    logLevel: resolveLogLevel(env.TIDEMARK_LOG_LEVEL),
    enforceOffline: parseBoolOrDefault(env.TIDEMARK_ENFORCE_OFFLINE, false)
  };
};

export const toPipelineOptions = (config: AppConfig): PipelineOptions => ({
  sampleRateHz: config.sampleRateHz,
  windowSeconds: config.windowSeconds,
  overlapSeconds: config.overlapSeconds,
  minFlushSeconds: config.minFlushSeconds,
  rmsThreshold: config.rmsThreshold,
  peakThreshold: config.peakThreshold,
  startGateEnabled: config.startGateEnabled,
  flushRmsThreshold: config.flushRmsThreshold,
  flushPeakThreshold: config.flushPeakThreshold,
  queueCapacity: config.queueCapacity,
  backpressurePolicy: config.backpressurePolicy,
  underrunTimeoutMs: config.underrunTimeoutMs
});

export const validateConfig = (config: AppConfig): string[] => {
  const errors = validatePipelineOptions(toPipelineOptions(config));

  if (config.frameMs < 10 || config.frameMs > 1000) {
    errors.push('TIDEMARK_FRAME_MS must be between 10 and 1000 milliseconds.');
  }

  if (config.underrunTimeoutMs <= config.frameMs) {
    errors.push('TIDEMARK_UNDERRUN_TIMEOUT_MS must be longer than TIDEMARK_FRAME_MS.');
  }

  if (!config.audioInput.trim()) {
    errors.push('TIDEMARK_AUDIO_INPUT must not be empty.');
  }

  if (!config.pythonBin.trim()) {
    errors.push('TIDEMARK_PYTHON_BIN must not be empty.');
  }

  if (!config.asrScriptPath.trim()) {
    errors.push('TIDEMARK_ASR_SCRIPT must not be empty.');
  }

  if (!config.asrModel.trim()) {
    errors.push('TIDEMARK_ASR_MODEL must not be empty.');
  }

  if (config.asrRequestTimeoutMs < 1000 || config.asrRequestTimeoutMs > 600000) {
    errors.push('TIDEMARK_ASR_TIMEOUT_MS must be between 1000 and 600000 milliseconds.');
  }

  if (config.asrWarmupTimeoutMs < config.asrRequestTimeoutMs) {
    errors.push('TIDEMARK_ASR_WARMUP_TIMEOUT_MS must not be shorter than TIDEMARK_ASR_TIMEOUT_MS.');
  }

  return errors;
};
