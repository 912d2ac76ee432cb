import { AudioFrame } from '../../types';

/**
 * Pull-based audio input. `frames()` ends at end-of-stream; `stop()` ends it early.
 * A session iterates `frames()` once.
 */
export interface AudioSource {
  frames(): AsyncIterable<AudioFrame>;
  stop(): Promise<void>;
}
