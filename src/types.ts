export type AsrTransport = 'jsonl' | 'framed';
export type BackpressurePolicy = 'block' | 'drop-oldest';
export type AudioInputFormat = 'avfoundation' | 'pulse' | 'alsa' | 'dshow' | 'file';
export type GateMode = 'start' | 'flush';
export type GateVerdict = 'voiced' | 'silent';

export type PipelineStage = 'init' | 'preload' | 'streaming' | 'flushing' | 'stopped';

export interface PipelineState {
  stage: PipelineStage;
  detail?: string;
}

export interface AudioFrame {
  /** s16le mono PCM. */
  pcm: Buffer;
  /** Position of the first sample on the session's global axis. */
  startSample?: number;
}

export interface AudioWindow {
  index: number;
  globalStart: number;
  globalEnd: number;
  pcm: Buffer;
  isFinal: boolean;
}

export interface LocalSegment {
  text: string;
  localStart: number;
  localEnd: number;
}

export interface GlobalSegment {
  text: string;
  globalStart: number;
  globalEnd: number;
  windowIndex: number;
}

export interface GateThresholds {
  rms: number;
  peak: number;
}

export interface GateDecision {
  verdict: GateVerdict;
  mode: GateMode;
  rms: number;
  peak: number;
  thresholds: GateThresholds;
}

export interface TranscriptSink {
  write(segment: GlobalSegment): void | Promise<void>;
}

export interface AppConfig {
  sampleRateHz: number;
  windowSeconds: number;
  overlapSeconds: number;
  minFlushSeconds: number;
  frameMs: number;
  rmsThreshold: number;
  peakThreshold: number;
  startGateEnabled: boolean;
  flushRmsThreshold: number;
  flushPeakThreshold: number;
  queueCapacity: number;
  backpressurePolicy: BackpressurePolicy;
  underrunTimeoutMs: number;
  audioInput: string;
  audioInputFormat: AudioInputFormat;
  realtimeFileInput: boolean;
  pythonBin: string;
  asrTransport: AsrTransport;
  asrScriptPath: string;
  asrModel: string;
  asrDevice: string;
  asrComputeType: string;
  asrLanguage: string | undefined;
  asrVadFilter: boolean;
  asrRequestTimeoutMs: number;
  asrWarmupTimeoutMs: number;
  logDir: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  enforceOffline: boolean;
}
