import { EngineFailure } from '../../core/errors';
import { LocalSegment } from '../../types';

export type EngineResult =
  | { kind: 'segments'; segments: LocalSegment[] }
  | { kind: 'failure'; failure: EngineFailure };

export type PreloadResult = { kind: 'ready' } | { kind: 'failure'; failure: EngineFailure };

/**
 * One ASR call per window. Implementations resolve with a result kind instead of
 * rejecting, and never run two engine calls at once.
 */
export interface EngineAdapter {
  preload(): Promise<PreloadResult>;
  transcribe(pcm: Buffer, sampleRate: number): Promise<EngineResult>;
  shutdown?(): Promise<void>;
}
