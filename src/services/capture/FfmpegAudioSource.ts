import { ChildProcessByStdio, spawn } from 'node:child_process';
import { Readable } from 'node:stream';
import { Logger } from '../../logging/StructuredLogger';
import { AudioFrame, AudioInputFormat } from '../../types';
import { tailString } from '../process/PersistentWorker';
import { AudioSource } from './AudioSource';
import { PcmStreamSource } from './PcmStreamSource';

const STOP_GRACE_MS = 1500;
const STDERR_TAIL_CHARS = 4000;

export interface FfmpegAudioSourceOptions {
  input: string;
  format: AudioInputFormat;
  /** Pace file input at playback speed (`-re`). */
  realtime: boolean;
  sampleRateHz: number;
  frameMs: number;
  ffmpegBin?: string;
}

type FfmpegProcess = ChildProcessByStdio<null, Readable, Readable>;

interface ExitOutcome {
  code: number | null;
  spawnError?: Error;
}

export const buildFfmpegArgs = (options: FfmpegAudioSourceOptions): string[] => {
  const inputArgs =
    options.format === 'file'
      ? [...(options.realtime ? ['-re'] : []), '-i', options.input, '-vn']
      : ['-f', options.format, '-i', options.input];

  return [
    '-hide_banner',
    '-loglevel',
    'error',
    ...inputArgs,
    '-ac',
    '1',
    '-ar',
    String(options.sampleRateHz),
    '-f',
    's16le',
    '-acodec',
    'pcm_s16le',
    'pipe:1'
  ];
};

export const describeCaptureFailure = (
  stderr: string,
  format: AudioInputFormat,
  code: number | null
): string => {
  const detail = stderr.trim();

  if (format === 'file' && /No such file or directory/i.test(detail)) {
    return 'Audio file not found. Check the path passed to tidemark.';
  }

  if (/Operation not permitted|not authorized|Permission denied/i.test(detail)) {
    return 'Microphone permission denied. Grant the terminal microphone access, then restart tidemark.';
  }

  if (/Input\/output error|No such file|device not found|could not find/i.test(detail)) {
    return 'Audio input device is unavailable. Verify TIDEMARK_AUDIO_INPUT and TIDEMARK_AUDIO_FORMAT.';
  }

  if (detail) {
    return `Audio capture failed: ${detail}`;
  }

  return `Audio capture failed (ffmpeg exit code ${code ?? 'none'}).`;
};

export class FfmpegAudioSource implements AudioSource {
  private process: FfmpegProcess | undefined;
  private reader: PcmStreamSource | undefined;
  private stopping = false;

  public constructor(
    private readonly options: FfmpegAudioSourceOptions,
    private readonly logger?: Logger
  ) {}

  public async *frames(): AsyncGenerator<AudioFrame> {
    if (this.process) {
      throw new Error('Audio source is already active');
    }

    const ffmpeg = spawn(this.options.ffmpegBin ?? 'ffmpeg', buildFfmpegArgs(this.options), {
      stdio: ['ignore', 'pipe', 'pipe']
    });
    this.process = ffmpeg;

    let stderrLog = '';
    ffmpeg.stderr.on('data', (chunk: Buffer) => {
      stderrLog = tailString(`${stderrLog}${chunk.toString()}`, STDERR_TAIL_CHARS);
    });

    const exit = new Promise<ExitOutcome>((resolve) => {
      ffmpeg.once('error', (error) => {
        resolve({ code: null, spawnError: error });
      });
      ffmpeg.once('close', (code) => {
        resolve({ code });
      });
    });

    this.logger?.info('Audio capture started', {
      input: this.options.input,
      format: this.options.format,
      sampleRate: this.options.sampleRateHz
    });

    const reader = new PcmStreamSource(ffmpeg.stdout, this.options, this.logger);
    this.reader = reader;

    try {
      let streamError: unknown;
      try {
        yield* reader.frames();
      } catch (error) {
        streamError = error;
      }

      const outcome = await exit;
      if (this.stopping) {
        return;
      }

      if (outcome.spawnError) {
        throw new Error(`Could not start ffmpeg: ${outcome.spawnError.message}`);
      }

      if (outcome.code !== 0) {
        throw new Error(describeCaptureFailure(stderrLog, this.options.format, outcome.code));
      }

      if (streamError !== undefined) {
        throw streamError;
      }

      this.logger?.info('Audio capture ended');
    } finally {
      if (ffmpeg.exitCode === null && ffmpeg.signalCode === null) {
        ffmpeg.kill('SIGINT');
      }

      this.process = undefined;
      this.reader = undefined;
    }
  }

  public async stop(): Promise<void> {
    this.stopping = true;
    await this.reader?.stop();

    const current = this.process;
    if (!current || current.exitCode !== null || current.signalCode !== null) {
      return;
    }

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        current.kill('SIGKILL');
        resolve();
      }, STOP_GRACE_MS);

      current.once('close', () => {
        clearTimeout(timer);
        resolve();
      });

      current.kill('SIGINT');
    });

    this.logger?.info('Audio capture stopped');
  }
}
